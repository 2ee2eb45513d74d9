/**
 * TimeIndex Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Construction, durations (including DST days), start-of-day offsets, slicing,
 * intersection and concatenation of delivery-period indices.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { IndexError } from '../src/core/errors';
import { TimeIndex } from '../src/timeindex';

const days = (start: string, periods: number): TimeIndex => TimeIndex.create({ start, periods, freq: 'D' });

describe('TimeIndex', () => {
    describe('create', () => {
        test('quarters of 2023 have unequal durations', () => {
            const idx = TimeIndex.create({ start: '2023-01-01', end: '2024-01-01', freq: 'QS' });
            expect(idx.length).toBe(4);
            expect(Array.from(idx.durations())).toEqual([2160, 2184, 2208, 2208]);
        });

        test('periods and end give the same index', () => {
            const a = TimeIndex.create({ start: '2023-01-01', periods: 12, freq: 'MS' });
            const b = TimeIndex.create({ start: '2023-01-01', end: '2024-01-01', freq: 'MS' });
            expect(a.equals(b)).toBe(true);
        });

        test('DST days last 23 and 25 hours', () => {
            const spring = TimeIndex.create({ start: '2023-03-26', periods: 1, freq: 'D', tz: 'Europe/Berlin' });
            const autumn = TimeIndex.create({ start: '2023-10-29', periods: 1, freq: 'D', tz: 'Europe/Berlin' });
            expect(spring.durations()[0]).toBe(23);
            expect(autumn.durations()[0]).toBe(25);
        });

        test('start-of-day offset comes from the first stamp', () => {
            const idx = TimeIndex.create({ start: '2023-01-01T06:00', periods: 3, freq: 'D' });
            expect(idx.startOfDay).toBe(360);
            expect(idx.toISOStrings()).toEqual([
                '2023-01-01T06:00:00.000',
                '2023-01-02T06:00:00.000',
                '2023-01-03T06:00:00.000',
            ]);
        });

        test('start must be a period start', () => {
            expect(() => TimeIndex.create({ start: '2023-01-15', periods: 1, freq: 'MS' })).toThrow(IndexError);
        });

        test('end must fall on a period boundary', () => {
            expect(() => TimeIndex.create({ start: '2023-01-01', end: '2023-01-01T12:30', freq: 'H' })).toThrow(
                IndexError
            );
        });

        test('unknown timezone is rejected', () => {
            expect(() => TimeIndex.create({ start: '2023-01-01', periods: 1, freq: 'D', tz: 'Mars/Olympus' })).toThrow(
                IndexError
            );
        });
    });

    describe('fromStamps', () => {
        test('accepts gapless stamps', () => {
            const idx = TimeIndex.fromStamps(['2023-01-01T00:00', '2023-01-01T01:00', '2023-01-01T02:00'], 'H');
            expect(idx.length).toBe(3);
            expect(idx.end).toBe(Date.UTC(2023, 0, 1, 3));
        });

        test('rejects gaps', () => {
            expect(() => TimeIndex.fromStamps(['2023-01-01T00:00', '2023-01-01T02:00'], 'H')).toThrow(IndexError);
        });

        test('rejects an empty list', () => {
            expect(() => TimeIndex.fromStamps([], 'H')).toThrow(IndexError);
        });
    });

    describe('subsets', () => {
        const idx = days('2023-01-01', 10);

        test('slice is left-inclusive and right-exclusive', () => {
            const part = idx.slice('2023-01-03', '2023-01-05');
            expect(part.length).toBe(2);
            expect(part.first).toBe(Date.UTC(2023, 0, 3));
        });

        test('empty slice raises IndexError', () => {
            expect(() => idx.slice('2023-02-01')).toThrow(IndexError);
        });

        test('indexOf finds stamps', () => {
            expect(idx.indexOf(Date.UTC(2023, 0, 4))).toBe(3);
            expect(idx.indexOf(Date.UTC(2023, 0, 4, 12))).toBe(-1);
        });

        test('covers', () => {
            expect(idx.covers(idx.slice('2023-01-02', '2023-01-04'))).toBe(true);
            expect(idx.slice('2023-01-02', '2023-01-04').covers(idx)).toBe(false);
        });
    });

    describe('intersect', () => {
        test('keeps the overlapping periods', () => {
            const overlap = days('2023-01-01', 10).intersect(days('2023-01-05', 10));
            expect(overlap.length).toBe(6);
            expect(overlap.first).toBe(Date.UTC(2023, 0, 5));
        });

        test('no overlap raises IndexError', () => {
            expect(() => days('2023-01-01', 10).intersect(days('2023-02-01', 10))).toThrow(IndexError);
        });

        test('different frequencies are not compatible', () => {
            const hours = TimeIndex.create({ start: '2023-01-01', periods: 24, freq: 'H' });
            expect(() => days('2023-01-01', 1).intersect(hours)).toThrow(IndexError);
        });

        test('different start-of-day offsets are not compatible', () => {
            const shifted = TimeIndex.create({ start: '2023-01-01T06:00', periods: 10, freq: 'D' });
            expect(days('2023-01-01', 10).isCompatible(shifted)).toBe(false);
        });
    });

    describe('concat', () => {
        test('joins adjacent indices', () => {
            const joined = TimeIndex.concat([days('2023-01-01', 10), days('2023-01-11', 5)]);
            expect(joined.equals(days('2023-01-01', 15))).toBe(true);
        });

        test('rejects gaps', () => {
            expect(() => TimeIndex.concat([days('2023-01-01', 10), days('2023-01-12', 5)])).toThrow(IndexError);
        });
    });
});
