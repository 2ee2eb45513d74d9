import { Dimension } from '../units';

/**
 * How a dimension behaves when the frequency changes.
 *
 * - summable:   up = distribute by duration, down = sum              (energy, revenue)
 * - averagable: up = copy,                   down = duration-weighted (power, bare prices)
 * - derived:    up = copy,                   down = energy-weighted   (price with volume)
 */
export type ResampleClass = 'summable' | 'averagable' | 'derived';

export function resampleClassOf(dimension: Dimension, hasVolume: boolean): ResampleClass {
    switch (dimension) {
        case 'energy':
        case 'revenue':
            return 'summable';
        case 'price':
            return hasVolume ? 'derived' : 'averagable';
        case 'power':
        case 'dimensionless':
            return 'averagable';
    }
}
