import BigNumber from 'bignumber.js';
import { UnitError } from '../core/errors';
import { Quantity } from './types';

export function quantity(magnitude: number, unit: string): Quantity {
    return Object.freeze({ magnitude, unit: unit.trim() });
}

export function isQuantity(value: unknown): value is Quantity {
    return (
        typeof value === 'object' &&
        value !== null &&
        'magnitude' in value &&
        'unit' in value &&
        typeof value.magnitude === 'number' &&
        typeof value.unit === 'string'
    );
}

/**
 * Parse text like '45 Eur/MWh', '-1_200.5 kWh' or '0.25'. Underscores and
 * thousands commas in the number are ignored.
 */
export function parseQuantity(text: string): Quantity {
    const match = /^\s*([-+]?[\d_,]*\.?\d+(?:[eE][-+]?\d+)?)\s*(.*?)\s*$/.exec(text);
    if (!match) {
        throw new UnitError(`Cannot parse quantity from '${text}'`, { text });
    }
    const magnitude = new BigNumber(match[1].replace(/[_,]/g, ''));
    if (!magnitude.isFinite()) {
        throw new UnitError(`Cannot parse magnitude from '${text}'`, { text });
    }
    return quantity(magnitude.toNumber(), match[2]);
}
