/**
 * TimeIndex - regular, left-bound, gapless index of delivery periods
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Each stamp is the START of a delivery period; the period ends where the next
 * one starts. All periods share one frequency. The time of day of the first stamp
 * is the start-of-day offset: with hourly values starting at 06:00, delivery days
 * (and months, quarters, years) run from 06:00 to 06:00.
 *
 * Instances are immutable. Stamps are epoch milliseconds; `tz` is an IANA zone
 * name, or null for tz-naive data (wall clock read as UTC).
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { PFLINE_CONFIG } from '../config/constants';
import { IndexError } from '../core/errors';
import {
    addPeriods,
    assertValidZone,
    formatInstant,
    isPeriodStart,
    minutesOfDay,
    toInstant,
} from './calendar';
import { Freq, isFreq } from './freq';

export type InstantLike = string | number | Date;

export interface TimeIndexSpec {
    start: InstantLike;

    /** Exclusive end; give this or `periods` */
    end?: InstantLike;
    periods?: number;

    freq: Freq;
    tz?: string | null;
}

export class TimeIndex {
    readonly stamps: readonly number[];
    readonly freq: Freq;
    readonly tz: string | null;

    private cachedRights?: Float64Array;
    private cachedDurations?: Float64Array;

    private constructor(stamps: readonly number[], freq: Freq, tz: string | null) {
        this.stamps = Object.freeze([...stamps]);
        this.freq = freq;
        this.tz = tz;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // CONSTRUCTION
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Index from a start and either an exclusive end or a number of periods.
     */
    static create(spec: TimeIndexSpec): TimeIndex {
        const tz = spec.tz ?? null;
        if (!isFreq(spec.freq)) {
            throw new IndexError(`Unsupported frequency '${spec.freq}'`, { freq: spec.freq });
        }
        assertValidZone(tz);
        const start = toInstant(spec.start, tz);
        const sod = minutesOfDay(start, tz);
        if (!isPeriodStart(start, spec.freq, tz, sod)) {
            throw new IndexError(`${formatInstant(start, tz)} is not the start of a '${spec.freq}' period`, {
                start: formatInstant(start, tz),
                freq: spec.freq,
            });
        }

        const stamps: number[] = [];
        if (spec.periods !== undefined) {
            if (!Number.isInteger(spec.periods) || spec.periods < 1) {
                throw new IndexError(`'periods' must be a positive integer; got ${spec.periods}`);
            }
            let t = start;
            for (let i = 0; i < spec.periods; i++) {
                stamps.push(t);
                t = addPeriods(t, spec.freq, tz);
            }
        } else if (spec.end !== undefined) {
            const end = toInstant(spec.end, tz);
            let t = start;
            while (t < end) {
                stamps.push(t);
                t = addPeriods(t, spec.freq, tz);
            }
            if (t !== end) {
                throw new IndexError(`End ${formatInstant(end, tz)} does not fall on a period boundary`, {
                    end: formatInstant(end, tz),
                    freq: spec.freq,
                });
            }
        } else {
            throw new IndexError(`Give 'end' or 'periods' to create an index`);
        }
        if (stamps.length === 0) {
            throw new IndexError('Index must contain at least one period', { start: formatInstant(start, tz) });
        }
        return new TimeIndex(stamps, spec.freq, tz);
    }

    /**
     * Index from explicit stamps; they must be left-bound and gapless.
     */
    static fromStamps(stamps: readonly InstantLike[], freq: Freq, tz: string | null = null): TimeIndex {
        if (!isFreq(freq)) {
            throw new IndexError(`Unsupported frequency '${freq}'`, { freq });
        }
        assertValidZone(tz);
        if (stamps.length === 0) {
            throw new IndexError('Index must contain at least one period');
        }
        const instants = stamps.map((s) => toInstant(s, tz));
        const sod = minutesOfDay(instants[0], tz);
        for (let i = 0; i < instants.length; i++) {
            if (!isPeriodStart(instants[i], freq, tz, sod)) {
                throw new IndexError(`${formatInstant(instants[i], tz)} is not the start of a '${freq}' period`, {
                    position: i,
                    freq,
                });
            }
            if (i > 0 && addPeriods(instants[i - 1], freq, tz) !== instants[i]) {
                throw new IndexError(`Index has a gap or overlap before ${formatInstant(instants[i], tz)}`, {
                    position: i,
                    freq,
                });
            }
        }
        return new TimeIndex(instants, freq, tz);
    }

    /**
     * Stamps already known to be regular (resampling and slicing results).
     * @internal
     */
    static trusted(stamps: readonly number[], freq: Freq, tz: string | null): TimeIndex {
        if (stamps.length === 0) {
            throw new IndexError('Index must contain at least one period', { freq });
        }
        return new TimeIndex(stamps, freq, tz);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // ACCESSORS
    // ═══════════════════════════════════════════════════════════════════════════

    get length(): number {
        return this.stamps.length;
    }

    get first(): number {
        return this.stamps[0];
    }

    get last(): number {
        return this.stamps[this.stamps.length - 1];
    }

    /** Exclusive end: right bound of the last period */
    get end(): number {
        return this.rights()[this.stamps.length - 1];
    }

    /** Minutes after midnight at which delivery days start */
    get startOfDay(): number {
        return minutesOfDay(this.first, this.tz);
    }

    rights(): Float64Array {
        if (!this.cachedRights) {
            const rights = new Float64Array(this.stamps.length);
            for (let i = 0; i < this.stamps.length - 1; i++) rights[i] = this.stamps[i + 1];
            rights[this.stamps.length - 1] = addPeriods(this.last, this.freq, this.tz);
            this.cachedRights = rights;
        }
        return this.cachedRights;
    }

    /** Period durations in hours */
    durations(): Float64Array {
        if (!this.cachedDurations) {
            const rights = this.rights();
            const durations = new Float64Array(this.stamps.length);
            for (let i = 0; i < this.stamps.length; i++) {
                durations[i] = (rights[i] - this.stamps[i]) / PFLINE_CONFIG.MS_PER_HOUR;
            }
            this.cachedDurations = durations;
        }
        return this.cachedDurations;
    }

    /** Position of a stamp, or -1 */
    indexOf(ms: number): number {
        let lo = 0;
        let hi = this.stamps.length - 1;
        while (lo <= hi) {
            const mid = (lo + hi) >> 1;
            const value = this.stamps[mid];
            if (value === ms) return mid;
            if (value < ms) lo = mid + 1;
            else hi = mid - 1;
        }
        return -1;
    }

    toISOStrings(): string[] {
        return this.stamps.map((s) => formatInstant(s, this.tz));
    }

    describe(): string {
        return `${formatInstant(this.first, this.tz)} .. ${formatInstant(this.end, this.tz)} (${this.freq}, ${this.length} periods, ${this.tz ?? 'tz-naive'})`;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // COMPARISON
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Same frequency, timezone and start-of-day; such indices can be aligned.
     */
    isCompatible(other: TimeIndex): boolean {
        return this.freq === other.freq && this.tz === other.tz && this.startOfDay === other.startOfDay;
    }

    equals(other: TimeIndex): boolean {
        if (this === other) return true;
        return (
            this.freq === other.freq &&
            this.tz === other.tz &&
            this.length === other.length &&
            this.first === other.first &&
            this.last === other.last
        );
    }

    /** True if every period of `other` is also in this index */
    covers(other: TimeIndex): boolean {
        return this.isCompatible(other) && this.first <= other.first && this.end >= other.end;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // SUBSETS
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Positions [from, to) of the periods starting in [start, end).
     */
    locate(start?: InstantLike, end?: InstantLike): [number, number] {
        const lower = start === undefined ? -Infinity : toInstant(start, this.tz);
        const upper = end === undefined ? Infinity : toInstant(end, this.tz);
        let from = 0;
        while (from < this.stamps.length && this.stamps[from] < lower) from++;
        let to = from;
        while (to < this.stamps.length && this.stamps[to] < upper) to++;
        return [from, to];
    }

    subset(from: number, to: number): TimeIndex {
        if (from === 0 && to === this.stamps.length) return this;
        if (from < 0 || to > this.stamps.length || from >= to) {
            throw new IndexError(`Empty or invalid slice [${from}, ${to}) of index ${this.describe()}`, { from, to });
        }
        return TimeIndex.trusted(this.stamps.slice(from, to), this.freq, this.tz);
    }

    slice(start?: InstantLike, end?: InstantLike): TimeIndex {
        const [from, to] = this.locate(start, end);
        return this.subset(from, to);
    }

    /**
     * Overlapping part of two compatible indices.
     */
    intersect(other: TimeIndex): TimeIndex {
        if (!this.isCompatible(other)) {
            throw new IndexError('Indices are not compatible; resample first', {
                left: this.describe(),
                right: other.describe(),
            });
        }
        if (this.equals(other)) return this;
        const start = Math.max(this.first, other.first);
        const end = Math.min(this.end, other.end);
        if (start >= end) {
            throw new IndexError('Indices have no overlapping periods', {
                left: this.describe(),
                right: other.describe(),
            });
        }
        return this.slice(start, end);
    }

    /**
     * Indices joined end to start; each must begin where the previous one ends.
     */
    static concat(indices: readonly TimeIndex[]): TimeIndex {
        if (indices.length === 0) {
            throw new IndexError('Nothing to concatenate');
        }
        const [head, ...rest] = indices;
        const stamps = [...head.stamps];
        let previous = head;
        for (const index of rest) {
            if (!head.isCompatible(index)) {
                throw new IndexError('Cannot concatenate indices that are not compatible', {
                    left: head.describe(),
                    right: index.describe(),
                });
            }
            if (previous.end !== index.first) {
                throw new IndexError('Indices must be adjacent, without gap or overlap', {
                    left: previous.describe(),
                    right: index.describe(),
                });
            }
            for (const stamp of index.stamps) stamps.push(stamp);
            previous = index;
        }
        return TimeIndex.trusted(stamps, head.freq, head.tz);
    }
}
