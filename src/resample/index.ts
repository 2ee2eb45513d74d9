/**
 * Resampling Module
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * PURPOSE: Change the frequency of dimensioned series, treating each dimension
 * by its semantic class.
 *
 * CLASSES:
 * - summable   (energy, revenue)        up: split by duration   down: sum
 * - averagable (power, bare prices)     up: copy                down: duration-weighted
 * - derived    (prices with a volume)   up: copy                down: energy-weighted
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export type { ResampleClass } from './types';
export { resampleClassOf } from './types';

export type { PeriodGroup } from './grouping';
export { periodGroups, downsampleGroups, upsampleMap } from './grouping';

export {
    resampleIndex,
    summable,
    averagable,
    derived,
    resampleSeries,
} from './changefreq';
