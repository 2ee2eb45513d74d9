/**
 * Units Module - Type Definitions
 */

/**
 * Canonical dimensions. Each has exactly one canonical storage unit.
 */
export type Dimension = 'power' | 'energy' | 'price' | 'revenue' | 'dimensionless';

/**
 * One accepted unit and how to get from it to the canonical unit of its dimension.
 */
export interface UnitDefinition {
    unit: string;
    dimension: Dimension;

    /** Multiply a magnitude in `unit` by this to get the canonical magnitude (decimal string) */
    factor: string;
}

/**
 * Scalar with a unit, e.g. { magnitude: 45, unit: 'Eur/MWh' }
 */
export interface Quantity {
    readonly magnitude: number;
    readonly unit: string;
}
