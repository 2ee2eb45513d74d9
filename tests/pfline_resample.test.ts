/**
 * PfLine Resampling Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Frequency changes of flat lines per kind: energy-weighted prices for COMPLETE
 * lines, duration-weighted prices for PRICE lines, power averaged by duration,
 * and r = p × q after resampling in either direction.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { createContext } from '../src/context';
import { IndexError } from '../src/core/errors';
import { silentSink } from '../src/diagnostics';
import { createPfLine, Kind, PfLine } from '../src/pfline';
import { Series } from '../src/series';
import { TimeIndex } from '../src/timeindex';

// ═══════════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════════

const context = createContext({ diagnostics: silentSink });
const quarters = TimeIndex.create({ start: '2023-01-01', end: '2024-01-01', freq: 'QS' });

const ENERGIES = [300, 180, 200, 320];
const PRICES = [37.77, 25.3, 21.3, 30.8];

const completeLine = (): PfLine =>
    createPfLine({ q: Series.of(quarters, ENERGIES, 'MWh'), p: Series.of(quarters, PRICES, 'Eur/MWh') }, { context });

function expectClosure(line: PfLine): void {
    const q = line.q.toArray();
    const p = line.p.toArray();
    line.r.toArray().forEach((r, i) => expect(r).toBeCloseTo(p[i] * q[i], 6));
}

describe('PfLine resampling', () => {
    describe('COMPLETE', () => {
        test('yearly price is the energy-weighted average', () => {
            const year = completeLine().resample('AS');
            expect(year.kind).toBe(Kind.COMPLETE);
            expect(year.index.length).toBe(1);
            expect(year.q.at(0)).toBeCloseTo(1000, 9);
            expect(year.r.at(0)).toBeCloseTo(30001, 6);
            expect(year.p.at(0)).toBeCloseTo(30.001, 9);
        });

        test('r = p × q holds after downsampling', () => {
            expectClosure(completeLine().resample('AS'));
        });

        test('r = p × q holds after upsampling, and prices are copied', () => {
            const months = completeLine().resample('MS');
            expect(months.index.length).toBe(12);
            expectClosure(months);
            expect(months.p.at(0)).toBeCloseTo(37.77, 9);
            expect(months.p.at(11)).toBeCloseTo(30.8, 9);
            expect(months.q.at(0)).toBeCloseTo((300 / 2160) * 744, 9);
        });
    });

    describe('PRICE', () => {
        test('yearly price is the duration-weighted average', () => {
            const year = createPfLine({ p: Series.of(quarters, PRICES, 'Eur/MWh') }, { context }).resample('AS');
            expect(year.kind).toBe(Kind.PRICE);
            expect(year.p.at(0)).toBeCloseTo(28.7528767, 6);
        });
    });

    describe('VOLUME', () => {
        const line = createPfLine({ w: Series.of(quarters, [1, 2, 3, 4], 'MW') }, { context });

        test('yearly power is averaged by duration', () => {
            const year = line.resample('AS');
            expect(year.q.at(0)).toBeCloseTo(2160 + 2 * 2184 + 3 * 2208 + 4 * 2208, 9);
            expect(year.w.at(0)).toBeCloseTo(21984 / 8760, 9);
        });

        test('monthly power repeats the quarterly power', () => {
            const months = line.resample('MS');
            expect(months.w.at(0)).toBeCloseTo(1, 9);
            expect(months.w.at(1)).toBeCloseTo(1, 9);
            expect(months.w.at(11)).toBeCloseTo(4, 9);
        });

        test('downsampling without a full period is an index error', () => {
            expect(() => line.slice('2023-01-01', '2023-07-01').resample('AS')).toThrow(IndexError);
        });
    });
});
