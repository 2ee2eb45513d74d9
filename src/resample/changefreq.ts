/**
 * Resampling engine
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Converts a series from its regular frequency to another one, treating the
 * values according to their resample class (see ./types).
 *
 * Summable values are distributed in proportion to duration when upsampling,
 * which is the constant-rate assumption; averagable values are copied. Derived
 * prices are copied when upsampling and averaged with ENERGY weights when
 * downsampling, which differs from naive duration weighting whenever volumes are
 * not flat.
 *
 * Downsampling keeps only the target periods the source covers completely.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { IndexError } from '../core/errors';
import { Series } from '../series';
import { Freq, TimeIndex, upOrDown } from '../timeindex';
import { downsampleGroups, upsampleMap } from './grouping';
import { ResampleClass } from './types';

export function resampleIndex(index: TimeIndex, freq: Freq): TimeIndex {
    const direction = upOrDown(index.freq, freq);
    if (direction === 0) return index;
    return direction < 0 ? downsampleGroups(index, freq).target : upsampleMap(index, freq).target;
}

/**
 * Energy, revenue: sum when downsampling, split by duration when upsampling.
 */
export function summable(s: Series, freq: Freq): Series {
    const direction = upOrDown(s.index.freq, freq);
    if (direction === 0) return s;

    const durations = s.index.durations();
    if (direction < 0) {
        const { target, groups } = downsampleGroups(s.index, freq);
        const out = new Float64Array(groups.length);
        groups.forEach((g, k) => {
            let sum = 0;
            for (let i = g.from; i < g.to; i++) sum += s.values[i];
            out[k] = sum;
        });
        return new Series(target, out, s.unit);
    }

    const { target, source } = upsampleMap(s.index, freq);
    const targetDurations = target.durations();
    const out = new Float64Array(target.length);
    for (let k = 0; k < target.length; k++) {
        const i = source[k];
        out[k] = (s.values[i] / durations[i]) * targetDurations[k];
    }
    return new Series(target, out, s.unit);
}

/**
 * Power, prices without volume: duration-weighted average when downsampling,
 * copy when upsampling.
 */
export function averagable(s: Series, freq: Freq): Series {
    const direction = upOrDown(s.index.freq, freq);
    if (direction === 0) return s;

    if (direction < 0) {
        const durations = s.index.durations();
        const { target, groups } = downsampleGroups(s.index, freq);
        const out = new Float64Array(groups.length);
        groups.forEach((g, k) => {
            let weighted = 0;
            let duration = 0;
            for (let i = g.from; i < g.to; i++) {
                weighted += s.values[i] * durations[i];
                duration += durations[i];
            }
            out[k] = weighted / duration;
        });
        return new Series(target, out, s.unit);
    }

    return copyUp(s, freq);
}

/**
 * Prices that apply to a volume: energy-weighted average when downsampling, copy
 * when upsampling. A target period whose energy sums to zero falls back to the
 * duration-weighted average.
 */
export function derived(price: Series, energy: Series, freq: Freq): Series {
    if (!energy.index.equals(price.index)) {
        throw new IndexError('Price and energy must share one index', {
            price: price.index.describe(),
            energy: energy.index.describe(),
        });
    }
    const direction = upOrDown(price.index.freq, freq);
    if (direction === 0) return price;
    if (direction > 0) return copyUp(price, freq);

    const durations = price.index.durations();
    const { target, groups } = downsampleGroups(price.index, freq);
    const out = new Float64Array(groups.length);
    groups.forEach((g, k) => {
        let revenue = 0;
        let volume = 0;
        let weighted = 0;
        let duration = 0;
        for (let i = g.from; i < g.to; i++) {
            revenue += price.values[i] * energy.values[i];
            volume += energy.values[i];
            weighted += price.values[i] * durations[i];
            duration += durations[i];
        }
        out[k] = volume !== 0 ? revenue / volume : weighted / duration;
    });
    return new Series(target, out, price.unit);
}

/**
 * Dispatch on resample class; `energy` is required for 'derived'.
 */
export function resampleSeries(s: Series, freq: Freq, how: ResampleClass, energy?: Series): Series {
    switch (how) {
        case 'summable':
            return summable(s, freq);
        case 'averagable':
            return averagable(s, freq);
        case 'derived':
            if (!energy) {
                throw new IndexError('Resampling a derived price needs the energy it applies to');
            }
            return derived(s, energy, freq);
    }
}

function copyUp(s: Series, freq: Freq): Series {
    const { target, source } = upsampleMap(s.index, freq);
    const out = new Float64Array(target.length);
    for (let k = 0; k < target.length; k++) out[k] = s.values[source[k]];
    return new Series(target, out, s.unit);
}
