/**
 * Calendar arithmetic on period-start instants.
 *
 * Instants are epoch milliseconds. Quarter-hours and hours are fixed lengths;
 * days, months, quarters and years follow the wall clock of the timezone (UTC for
 * tz-naive indices), so a day may last 23 or 25 hours. Daily-and-longer periods
 * begin at the start-of-day offset (minutes after midnight) of their index.
 */

import { DateTime, DateTimeUnit } from 'luxon';
import { PFLINE_CONFIG } from '../config/constants';
import { IndexError } from '../core/errors';
import { Freq } from './freq';

const CALENDAR_UNIT: Record<'D' | 'MS' | 'QS' | 'AS', DateTimeUnit> = {
    D: 'day',
    MS: 'month',
    QS: 'quarter',
    AS: 'year',
};

export function zoneName(tz: string | null): string {
    return tz ?? 'UTC';
}

export function assertValidZone(tz: string | null): void {
    if (tz === null) return;
    if (!DateTime.now().setZone(tz).isValid) {
        throw new IndexError(`Unknown timezone '${tz}'`, { tz });
    }
}

export function toDateTime(ms: number, tz: string | null): DateTime {
    return DateTime.fromMillis(ms, { zone: zoneName(tz) });
}

/**
 * Instant of an ISO string (wall time in `tz` when it carries no offset),
 * a Date, or epoch ms.
 */
export function toInstant(value: string | number | Date, tz: string | null): number {
    if (typeof value === 'number') return value;
    if (value instanceof Date) return value.getTime();
    const dt = DateTime.fromISO(value, { zone: zoneName(tz) });
    if (!dt.isValid) {
        throw new IndexError(`Cannot parse timestamp '${value}'`, { value, reason: dt.invalidReason });
    }
    return dt.toMillis();
}

export function formatInstant(ms: number, tz: string | null): string {
    const dt = toDateTime(ms, tz);
    return tz === null ? dt.toISO({ includeOffset: false }) ?? String(ms) : dt.toISO() ?? String(ms);
}

export function minutesOfDay(ms: number, tz: string | null): number {
    const dt = toDateTime(ms, tz);
    return dt.hour * 60 + dt.minute;
}

/**
 * Start of the `n`-th period after the one starting at `ms`.
 */
export function addPeriods(ms: number, freq: Freq, tz: string | null, n = 1): number {
    if (freq === '15T' || freq === 'H') {
        return ms + n * PFLINE_CONFIG.FIXED_PERIOD_MS[freq];
    }
    const dt = toDateTime(ms, tz);
    switch (freq) {
        case 'D':
            return dt.plus({ days: n }).toMillis();
        case 'MS':
            return dt.plus({ months: n }).toMillis();
        case 'QS':
            return dt.plus({ months: 3 * n }).toMillis();
        case 'AS':
            return dt.plus({ years: n }).toMillis();
    }
}

/**
 * Start of the period of frequency `freq` that contains `ms`.
 */
export function floorInstant(ms: number, freq: Freq, tz: string | null, startOfDay: number): number {
    const dt = toDateTime(ms, tz);
    if (freq === 'H') {
        return dt.startOf('hour').toMillis();
    }
    if (freq === '15T') {
        const hour = dt.startOf('hour');
        return hour.toMillis() + Math.floor(dt.minute / 15) * PFLINE_CONFIG.FIXED_PERIOD_MS['15T'];
    }
    // The delivery day begins at the start-of-day offset, not at midnight.
    let day = dt.startOf('day');
    if (dt.hour * 60 + dt.minute < startOfDay) {
        day = day.minus({ days: 1 });
    }
    const start = day.startOf(CALENDAR_UNIT[freq]);
    return start.set({ hour: Math.floor(startOfDay / 60), minute: startOfDay % 60 }).toMillis();
}

export function isPeriodStart(ms: number, freq: Freq, tz: string | null, startOfDay: number): boolean {
    return floorInstant(ms, freq, tz, startOfDay) === ms;
}
