/**
 * PfLine Construction Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Kind inference from dimension tags, unit conversion at the boundary, bare
 * number policy, consistency checks and the typed errors of createPfLine.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { createContext } from '../src/context';
import {
    AmbiguousDimensionError,
    ConsistencyError,
    IndexError,
    InsufficientDataError,
    ShapeError,
    UnitError,
} from '../src/core/errors';
import { silentSink } from '../src/diagnostics';
import { createPfLine, FlatPfLine, Kind } from '../src/pfline';
import { Series } from '../src/series';
import { TimeIndex } from '../src/timeindex';
import { quantity } from '../src/units';

// ═══════════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════════

const context = createContext({ diagnostics: silentSink, bareNumbers: 'reject' });
const quarters = TimeIndex.create({ start: '2023-01-01', end: '2024-01-01', freq: 'QS' });
const twoDays = TimeIndex.create({ start: '2023-01-01', periods: 2, freq: 'D' });

const energy = (values: number[], index = quarters): Series => Series.of(index, values, 'MWh');
const price = (values: number[], index = quarters): Series => Series.of(index, values, 'Eur/MWh');

describe('createPfLine', () => {
    describe('kind inference', () => {
        test('q alone gives a VOLUME line with derived power', () => {
            const line = createPfLine({ q: energy([2160, 2184, 2208, 2208]) }, { context });
            expect(line.kind).toBe(Kind.VOLUME);
            expect(line.structure).toBe('flat');
            expect(line.w.toArray()).toEqual([1, 1, 1, 1]);
            expect(line.w.unit).toBe('MW');
        });

        test('w as a scalar quantity is broadcast onto the given index', () => {
            const line = createPfLine({ w: quantity(10, 'MW') }, { context, index: quarters });
            expect(line.q.toArray()).toEqual([21600, 21840, 22080, 22080]);
        });

        test('consistent w and q are accepted', () => {
            const line = createPfLine({ w: quantity(1, 'MW'), q: energy([2160, 2184, 2208, 2208]) }, { context });
            expect(line.kind).toBe(Kind.VOLUME);
        });

        test('p alone gives PRICE, r alone gives REVENUE', () => {
            expect(createPfLine({ p: price([1, 2, 3, 4]) }, { context }).kind).toBe(Kind.PRICE);
            expect(createPfLine({ r: Series.of(quarters, 5, 'Eur') }, { context }).kind).toBe(Kind.REVENUE);
        });

        test('q and p give COMPLETE with r = p × q', () => {
            const line = createPfLine({ q: energy([10, 20, 30, 40]), p: price([50, 60, 70, 80]) }, { context });
            expect(line.kind).toBe(Kind.COMPLETE);
            expect(line.r.toArray()).toEqual([500, 1200, 2100, 3200]);
            expect(line.r.unit).toBe('Eur');
        });

        test('p and r give COMPLETE with q = r / p', () => {
            const line = createPfLine(
                { p: quantity(50, 'Eur/MWh'), r: Series.of(quarters, [500, 1000, 1500, 2000], 'Eur') },
                { context }
            );
            expect(line.q.toArray()).toEqual([10, 20, 30, 40]);
        });

        test('q and r give COMPLETE with p = r / q', () => {
            const line = createPfLine({ q: energy([10, 20, 30, 40]), r: quantity(1, 'kEur') }, { context });
            expect(line.p.toArray()).toEqual([100, 50, 1000 / 30, 25]);
        });

        test('a single series infers its tag from the unit', () => {
            expect(createPfLine(price([1, 2, 3, 4]), { context }).kind).toBe(Kind.PRICE);
            expect(createPfLine(Series.of(quarters, 1, 'GW'), { context }).q.at(0)).toBe(2160000);
        });

        test('a single quantity needs an index', () => {
            const line = createPfLine(quantity(3, 'MW'), { context, index: twoDays });
            expect(line.q.toArray()).toEqual([72, 72]);
            expect(() => createPfLine(quantity(3, 'MW'), { context })).toThrow(InsufficientDataError);
        });

        test('an existing line is returned unchanged', () => {
            const line = createPfLine({ q: energy([1, 2, 3, 4]) }, { context });
            expect(createPfLine(line)).toBe(line);
        });

        test('undefined and null tags are ignored', () => {
            const line = createPfLine({ q: energy([1, 2, 3, 4]), p: undefined, r: null }, { context });
            expect(line.kind).toBe(Kind.VOLUME);
        });
    });

    describe('units', () => {
        test('values are converted to canonical units', () => {
            const line = createPfLine({ q: Series.of(twoDays, [1000, 2000], 'kWh') }, { context });
            expect(line.q.unit).toBe('MWh');
            expect(line.q.at(0)).toBeCloseTo(1, 12);
            expect(line.q.at(1)).toBeCloseTo(2, 12);
        });

        test('ct/kWh becomes Eur/MWh', () => {
            const line = createPfLine({ p: quantity(5, 'ct/kWh') }, { context, index: twoDays });
            expect(line.p.toArray()).toEqual([50, 50]);
        });

        test('unit of another dimension than the tag raises UnitError', () => {
            expect(() => createPfLine({ q: quantity(5, 'Eur') }, { context, index: twoDays })).toThrow(UnitError);
        });

        test('unknown unit raises UnitError', () => {
            expect(() => createPfLine({ q: Series.of(twoDays, 1, 'MWhh') }, { context })).toThrow(UnitError);
        });
    });

    describe('bare numbers', () => {
        test('unit-less series under a tag is rejected by the default context', () => {
            expect(() => createPfLine({ p: Series.of(twoDays, [40, 50]) })).toThrow(AmbiguousDimensionError);
        });

        test('unit-less number under a tag is rejected', () => {
            expect(() => createPfLine({ p: 40 }, { context, index: twoDays })).toThrow(AmbiguousDimensionError);
        });

        test('canonical policy reads bare numbers in the canonical unit', () => {
            const lenient = createContext({ diagnostics: silentSink, bareNumbers: 'canonical' });
            const line = createPfLine({ p: 40, q: Series.of(twoDays, [1, 2]) }, { context: lenient });
            expect(line.kind).toBe(Kind.COMPLETE);
            expect(line.r.toArray()).toEqual([40, 80]);
        });

        test('series without unit or tag is ambiguous', () => {
            expect(() => createPfLine(Series.of(twoDays, [1, 2]), { context })).toThrow(AmbiguousDimensionError);
        });

        test('dimensionless series without tag is ambiguous', () => {
            expect(() => createPfLine(Series.of(twoDays, [1, 2], '%'), { context })).toThrow(AmbiguousDimensionError);
        });
    });

    describe('immutability', () => {
        test('series handed out are copies', () => {
            const line = createPfLine({ q: energy([10, 20], twoDays), p: price([50, 60], twoDays) }, { context });
            line.q.values[0] = 999;
            line.p.values[0] = -1;
            expect(line.q.at(0)).toBe(10);
            expect(line.p.at(0)).toBe(50);
            expect(line.r.at(0)).toBe(500);
        });

        test('unit-less input arrays are copied', () => {
            const canonical = createContext({ diagnostics: silentSink, bareNumbers: 'canonical' });
            const input = Series.of(twoDays, [40, 50]);
            const line = createPfLine({ p: input }, { context: canonical });
            input.values[0] = -1;
            expect(line.p.toArray()).toEqual([40, 50]);
        });

        test('the aggregate of a nested line cannot be changed through a child', () => {
            const child = createPfLine({ q: energy([1, 2], twoDays) }, { context });
            const nested = createPfLine({ a: child, b: child }, { context });
            child.q.values[0] = 100;
            expect(nested.q.toArray()).toEqual([2, 4]);
        });
    });

    describe('errors', () => {
        test('inconsistent w and q raise ConsistencyError', () => {
            expect(() =>
                createPfLine({ w: quantity(10, 'MW'), q: energy([1, 1, 1, 1]) }, { context })
            ).toThrow(ConsistencyError);
        });

        test('inconsistent q, p and r raise ConsistencyError', () => {
            expect(() =>
                createPfLine(
                    { q: energy([1, 1, 1, 1]), p: price([10, 10, 10, 10]), r: Series.of(quarters, 11, 'Eur') },
                    { context }
                )
            ).toThrow(ConsistencyError);
        });

        test('consistent q, p and r are accepted', () => {
            const line = createPfLine(
                { q: energy([1, 1, 1, 1]), p: price([10, 10, 10, 10]), r: Series.of(quarters, 10, 'Eur') },
                { context }
            );
            expect(line).toBeInstanceOf(FlatPfLine);
            expect(line.kind).toBe(Kind.COMPLETE);
        });

        test('empty mapping raises InsufficientDataError', () => {
            expect(() => createPfLine({}, { context })).toThrow(InsufficientDataError);
            expect(() => createPfLine({ q: undefined }, { context })).toThrow(InsufficientDataError);
        });

        test('scalars without series or index raise InsufficientDataError', () => {
            expect(() => createPfLine({ q: quantity(5, 'MWh') }, { context })).toThrow(InsufficientDataError);
        });

        test('series on different indices raise IndexError', () => {
            expect(() =>
                createPfLine({ q: energy([1, 2], twoDays), p: price([1, 2, 3, 4]) }, { context })
            ).toThrow(IndexError);
        });

        test('mixing tags and child names raises ShapeError', () => {
            expect(() =>
                createPfLine({ q: energy([1, 2, 3, 4]), child: { q: energy([1, 2, 3, 4]) } }, { context })
            ).toThrow(ShapeError);
        });

        test('reading a dimension the line lacks raises ShapeError', () => {
            const line = createPfLine({ p: price([1, 2, 3, 4]) }, { context });
            expect(() => line.q).toThrow(ShapeError);
            expect(() => line.volume).toThrow(ShapeError);
        });
    });
});
