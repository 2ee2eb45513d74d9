import { Dimension, UnitDefinition } from './types';

export const CANONICAL_UNITS: Readonly<Record<Dimension, string>> = {
    power: 'MW',
    energy: 'MWh',
    price: 'Eur/MWh',
    revenue: 'Eur',
    dimensionless: '',
};

export const DEFAULT_UNIT_DEFINITIONS: readonly UnitDefinition[] = [
    // Power
    { unit: 'W', dimension: 'power', factor: '0.000001' },
    { unit: 'kW', dimension: 'power', factor: '0.001' },
    { unit: 'MW', dimension: 'power', factor: '1' },
    { unit: 'GW', dimension: 'power', factor: '1000' },

    // Energy
    { unit: 'Wh', dimension: 'energy', factor: '0.000001' },
    { unit: 'kWh', dimension: 'energy', factor: '0.001' },
    { unit: 'MWh', dimension: 'energy', factor: '1' },
    { unit: 'GWh', dimension: 'energy', factor: '1000' },
    { unit: 'TWh', dimension: 'energy', factor: '1000000' },

    // Price
    { unit: 'Eur/MWh', dimension: 'price', factor: '1' },
    { unit: 'Eur/kWh', dimension: 'price', factor: '1000' },
    { unit: 'ct/kWh', dimension: 'price', factor: '10' },

    // Revenue
    { unit: 'Eur', dimension: 'revenue', factor: '1' },
    { unit: 'kEur', dimension: 'revenue', factor: '1000' },
    { unit: 'MEur', dimension: 'revenue', factor: '1000000' },

    // Dimensionless
    { unit: '', dimension: 'dimensionless', factor: '1' },
    { unit: '%', dimension: 'dimensionless', factor: '0.01' },
];
