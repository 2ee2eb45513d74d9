/**
 * Mapping between source periods and target periods.
 *
 * Downsampling groups consecutive source periods into target periods; upsampling
 * points every target period back to the source period that contains it. Both
 * use the start-of-day offset of the source index, so a day (month, ...) that
 * starts at 06:00 stays at 06:00 in either direction.
 */

import { IndexError } from '../core/errors';
import { Freq, TimeIndex, addPeriods, floorInstant, formatInstant } from '../timeindex';

export interface PeriodGroup {
    /** Start of the target period */
    start: number;

    /** Source positions [from, to) inside the period */
    from: number;
    to: number;

    /** True if the source covers the whole target period */
    full: boolean;
}

/**
 * All target periods touched by the source index, including partial ones at
 * either end.
 */
export function periodGroups(index: TimeIndex, freq: Freq): PeriodGroup[] {
    const { tz } = index;
    const sod = index.startOfDay;
    const rights = index.rights();
    const groups: PeriodGroup[] = [];

    let from = 0;
    while (from < index.length) {
        const start = floorInstant(index.stamps[from], freq, tz, sod);
        const end = addPeriods(start, freq, tz);
        let to = from;
        while (to < index.length && index.stamps[to] < end) to++;
        if (rights[to - 1] > end) {
            throw new IndexError(`Periods of the index are not nested inside '${freq}' periods`, {
                index: index.describe(),
                at: formatInstant(index.stamps[to - 1], tz),
            });
        }
        groups.push({
            start,
            from,
            to,
            full: index.stamps[from] === start && rights[to - 1] === end,
        });
        from = to;
    }
    return groups;
}

/**
 * Only the target periods that the source covers completely; the rest is
 * trimmed. Fails if nothing remains.
 */
export function downsampleGroups(index: TimeIndex, freq: Freq): { target: TimeIndex; groups: PeriodGroup[] } {
    const groups = periodGroups(index, freq).filter((g) => g.full);
    if (groups.length === 0) {
        throw new IndexError(`There are no full periods available when changing to the frequency '${freq}'`, {
            index: index.describe(),
            freq,
        });
    }
    const target = TimeIndex.trusted(
        groups.map((g) => g.start),
        freq,
        index.tz
    );
    return { target, groups };
}

/**
 * Target index at a shorter frequency plus, for each target period, the position
 * of the source period it lies in.
 */
export function upsampleMap(index: TimeIndex, freq: Freq): { target: TimeIndex; source: Int32Array } {
    const { tz } = index;
    const rights = index.rights();
    const stamps: number[] = [];
    const source: number[] = [];
    for (let i = 0; i < index.length; i++) {
        let t = index.stamps[i];
        while (t < rights[i]) {
            stamps.push(t);
            source.push(i);
            t = addPeriods(t, freq, tz);
        }
        if (t !== rights[i]) {
            throw new IndexError(`Period starting ${formatInstant(index.stamps[i], tz)} cannot be split into '${freq}' periods`, {
                index: index.describe(),
                freq,
            });
        }
    }
    return { target: TimeIndex.trusted(stamps, freq, tz), source: Int32Array.from(source) };
}
