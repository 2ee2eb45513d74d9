/**
 * Unit Registry
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Explicit, immutable replacement for a process-wide unit registry. A registry is
 * built once (from definitions) and passed around inside the PfContext.
 *
 * RESPONSIBILITIES:
 * - Resolve a unit string to its dimension
 * - Convert magnitudes into the canonical unit of that dimension
 * - Derive the dimension of products and quotients (energy × price = revenue)
 *
 * Conversion factors are held as BigNumber so that combined factors
 * (e.g. ct/kWh → Eur/kWh) stay exact decimals; the bulk multiplication over a
 * series is done in float.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import BigNumber from 'bignumber.js';
import { UnitError } from '../core/errors';
import { CANONICAL_UNITS, DEFAULT_UNIT_DEFINITIONS } from './definitions';
import { Dimension, Quantity, UnitDefinition } from './types';

interface ResolvedUnit {
    dimension: Dimension;
    factor: BigNumber;
}

const PRODUCTS: ReadonlyArray<[Dimension, Dimension, Dimension]> = [
    ['energy', 'price', 'revenue'],
    ['price', 'energy', 'revenue'],
];

const QUOTIENTS: ReadonlyArray<[Dimension, Dimension, Dimension]> = [
    ['revenue', 'price', 'energy'],
    ['revenue', 'energy', 'price'],
];

export class UnitRegistry {
    private readonly units: ReadonlyMap<string, ResolvedUnit>;

    constructor(definitions: readonly UnitDefinition[] = DEFAULT_UNIT_DEFINITIONS) {
        const units = new Map<string, ResolvedUnit>();
        for (const def of definitions) {
            if (units.has(def.unit)) {
                throw new UnitError(`Unit '${def.unit}' is defined twice`, { unit: def.unit });
            }
            const factor = new BigNumber(def.factor);
            if (!factor.isFinite() || factor.isZero()) {
                throw new UnitError(`Unit '${def.unit}' has invalid factor '${def.factor}'`, { unit: def.unit });
            }
            units.set(def.unit, { dimension: def.dimension, factor });
        }
        for (const [dimension, unit] of Object.entries(CANONICAL_UNITS)) {
            const resolved = units.get(unit);
            if (!resolved || resolved.dimension !== dimension || !resolved.factor.isEqualTo(1)) {
                throw new UnitError(`Canonical unit '${unit}' of ${dimension} must be defined with factor 1`, { unit });
            }
        }
        this.units = units;
        Object.freeze(this);
    }

    has(unit: string): boolean {
        return this.units.has(unit);
    }

    dimensionOf(unit: string): Dimension {
        return this.resolve(unit).dimension;
    }

    canonicalUnit(dimension: Dimension): string {
        return CANONICAL_UNITS[dimension];
    }

    /**
     * Factor to go from `from` to `to`; both must share a dimension.
     */
    conversionFactor(from: string, to: string): number {
        const a = this.resolve(from);
        const b = this.resolve(to);
        if (a.dimension !== b.dimension) {
            throw new UnitError(`Cannot convert '${from}' (${a.dimension}) into '${to}' (${b.dimension})`, { from, to });
        }
        return a.factor.dividedBy(b.factor).toNumber();
    }

    /**
     * Canonical magnitude of a quantity; `expected` restricts the allowed dimension.
     */
    toCanonical(quantity: Quantity, expected?: Dimension): number {
        const resolved = this.resolve(quantity.unit);
        this.assertDimension(quantity.unit, resolved.dimension, expected);
        return new BigNumber(quantity.magnitude).times(resolved.factor).toNumber();
    }

    /**
     * Canonical magnitudes of an array of values in `unit`.
     */
    valuesToCanonical(values: ArrayLike<number>, unit: string, expected?: Dimension): Float64Array {
        const resolved = this.resolve(unit);
        this.assertDimension(unit, resolved.dimension, expected);
        const factor = resolved.factor.toNumber();
        const out = new Float64Array(values.length);
        for (let i = 0; i < values.length; i++) out[i] = values[i] * factor;
        return out;
    }

    multiply(a: Dimension, b: Dimension): Dimension {
        if (a === 'dimensionless') return b;
        if (b === 'dimensionless') return a;
        const hit = PRODUCTS.find(([x, y]) => x === a && y === b);
        if (!hit) {
            throw new UnitError(`Product of ${a} and ${b} has no canonical dimension`, { a, b });
        }
        return hit[2];
    }

    divide(a: Dimension, b: Dimension): Dimension {
        if (b === 'dimensionless') return a;
        if (a === b) return 'dimensionless';
        const hit = QUOTIENTS.find(([x, y]) => x === a && y === b);
        if (!hit) {
            throw new UnitError(`Quotient of ${a} and ${b} has no canonical dimension`, { a, b });
        }
        return hit[2];
    }

    private resolve(unit: string): ResolvedUnit {
        const resolved = this.units.get(unit.trim());
        if (!resolved) {
            throw new UnitError(`Unknown unit '${unit}'`, { unit, known: [...this.units.keys()] });
        }
        return resolved;
    }

    private assertDimension(unit: string, actual: Dimension, expected?: Dimension): void {
        if (expected !== undefined && actual !== expected) {
            throw new UnitError(`Unit '${unit}' is ${actual}, expected ${expected}`, { unit, actual, expected });
        }
    }
}
