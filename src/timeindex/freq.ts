import { PFLINE_CONFIG } from '../config/constants';

/**
 * Supported frequencies, shortest first:
 * quarter-hour, hour, day, month start, quarter start, year start.
 */
export type Freq = typeof PFLINE_CONFIG.FREQUENCIES[number];

export const FREQUENCIES: readonly Freq[] = PFLINE_CONFIG.FREQUENCIES;

export function isFreq(value: string): value is Freq {
    return FREQUENCIES.some((freq) => freq === value);
}

/**
 * 1 if going from `source` to `target` is upsampling (shorter periods),
 * -1 if downsampling, 0 if equal.
 */
export function upOrDown(source: Freq, target: Freq): -1 | 0 | 1 {
    const diff = FREQUENCIES.indexOf(source) - FREQUENCIES.indexOf(target);
    return diff > 0 ? 1 : diff < 0 ? -1 : 0;
}

export function isSubDaily(freq: Freq): boolean {
    return freq === '15T' || freq === 'H';
}
