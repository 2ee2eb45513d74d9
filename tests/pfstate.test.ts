/**
 * PfState Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Derived lines, validation of inputs, resampling, arithmetic, valuation and
 * hedging of a portfolio state.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { createContext } from '../src/context';
import { IndexError, InvariantError, ShapeError } from '../src/core/errors';
import { collectingSink, silentSink } from '../src/diagnostics';
import { createPfLine, Kind, PfLine } from '../src/pfline';
import { PfState } from '../src/pfstate';
import { Series } from '../src/series';
import { TimeIndex } from '../src/timeindex';
import { quantity } from '../src/units';

// ═══════════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════════

const context = createContext({ diagnostics: silentSink });
const quarters = TimeIndex.create({ start: '2023-01-01', periods: 4, freq: 'QS' });

const OFFTAKE = [-100, -80, -60, -90];
const MARKET_PRICE = [50, 40, 30, 60];
const SOURCED_Q = [60, 40, 30, 45];
const SOURCED_P = [45, 35, 25, 50];

const offtakeLine = (): PfLine => createPfLine({ q: Series.of(quarters, OFFTAKE, 'MWh') }, { context });
const priceLine = (): PfLine => createPfLine({ p: Series.of(quarters, MARKET_PRICE, 'Eur/MWh') }, { context });
const sourcedLine = (): PfLine =>
    createPfLine(
        { q: Series.of(quarters, SOURCED_Q, 'MWh'), p: Series.of(quarters, SOURCED_P, 'Eur/MWh') },
        { context }
    );

const makeState = (): PfState => new PfState(offtakeLine(), priceLine(), sourcedLine());

/** January, plus `extraDays` of February: 24 MWh offtake per day at 50 Eur/MWh */
function dailyState(extraDays = 0): PfState {
    const index = TimeIndex.create({ start: '2023-01-01', periods: 31 + extraDays, freq: 'D' });
    return new PfState(
        createPfLine({ q: Series.of(index, -24, 'MWh') }, { context }),
        createPfLine({ p: Series.of(index, 50, 'Eur/MWh') }, { context })
    );
}

describe('PfState', () => {
    // ═══════════════════════════════════════════════════════════════════════════
    // DERIVED LINES
    // ═══════════════════════════════════════════════════════════════════════════

    describe('derived lines', () => {
        const state = makeState();

        test('unsourced is the remaining volume at the market price', () => {
            expect(state.unsourced.kind).toBe(Kind.COMPLETE);
            expect(state.unsourced.q.toArray()).toEqual([40, 40, 30, 45]);
            expect(state.unsourced.p.toArray()).toEqual(MARKET_PRICE);
            expect(state.unsourced.r.toArray()).toEqual([2000, 1600, 900, 2700]);
        });

        test('netPosition is the negated unsourced line', () => {
            expect(state.netPosition.q.toArray()).toEqual([-40, -40, -30, -45]);
        });

        test('pnlCost holds the sourced and unsourced parts', () => {
            const cost = state.pnlCost;
            expect(cost.names()).toEqual(['sourced', 'unsourced']);
            expect(cost.q.toArray()).toEqual([100, 80, 60, 90]);
            expect(cost.r.toArray()).toEqual([4700, 3000, 1650, 4950]);
        });

        test('sourced and unsourced fractions', () => {
            expect(state.sourcedFraction.unit).toBe('');
            expect(state.sourcedFraction.toArray()).toEqual([0.6, 0.5, 0.5, 0.5]);
            const unsourced = state.unsourcedFraction.toArray();
            expect(unsourced[0]).toBeCloseTo(0.4, 12);
            expect(unsourced.slice(1)).toEqual([0.5, 0.5, 0.5]);
        });

        test('fractions are NaN where the offtake is zero', () => {
            const offtake = createPfLine({ q: Series.of(quarters, [-100, 0, -60, -90], 'MWh') }, { context });
            const open = new PfState(offtake, priceLine());
            expect(open.sourcedFraction.toArray()).toEqual([0, NaN, 0, 0]);
            expect(open.unsourcedFraction.toArray()).toEqual([1, NaN, 1, 1]);
        });

        test('mark-to-market of the sourced volume', () => {
            const mtm = state.mtmOfSourced();
            expect(mtm.kind).toBe(Kind.REVENUE);
            expect(mtm.r.toArray()).toEqual([300, 200, 150, 450]);
        });
    });

    // ═══════════════════════════════════════════════════════════════════════════
    // CONSTRUCTION
    // ═══════════════════════════════════════════════════════════════════════════

    describe('construction', () => {
        test('without sourcing everything is unsourced', () => {
            const state = new PfState(offtakeLine(), priceLine());
            expect(state.sourced.isZero()).toBe(true);
            expect(state.unsourced.q.toArray()).toEqual([100, 80, 60, 90]);
        });

        test('fromSeries builds the same state', () => {
            const state = PfState.fromSeries(
                {
                    pu: Series.of(quarters, MARKET_PRICE, 'Eur/MWh'),
                    qo: Series.of(quarters, OFFTAKE, 'MWh'),
                    qs: Series.of(quarters, SOURCED_Q, 'MWh'),
                    ps: Series.of(quarters, SOURCED_P, 'Eur/MWh'),
                },
                { context }
            );
            expect(state.equals(makeState())).toBe(true);
        });

        test('a COMPLETE offtake keeps only its volume and says so', () => {
            const sink = collectingSink();
            const ctx = createContext({ diagnostics: sink });
            const state = new PfState(sourcedLine().neg(), priceLine(), null, { context: ctx });

            expect(state.offtake.kind).toBe(Kind.VOLUME);
            expect(sink.codes()).toEqual(['discarded-information']);
        });

        test('offtake must carry volume', () => {
            expect(() => new PfState(priceLine(), priceLine())).toThrow(ShapeError);
        });

        test('sourced must be COMPLETE', () => {
            expect(() => new PfState(offtakeLine(), priceLine(), offtakeLine().neg())).toThrow(ShapeError);
        });

        test('prices must cover the offtake', () => {
            const halfYear = createPfLine({ p: Series.of(quarters, MARKET_PRICE, 'Eur/MWh') }, { context }).slice(
                '2023-01-01',
                '2023-07-01'
            );
            expect(() => new PfState(offtakeLine(), halfYear)).toThrow(InvariantError);
        });

        test('prices must be on a compatible index', () => {
            const monthly = createPfLine(
                { p: Series.of(TimeIndex.create({ start: '2023-01-01', periods: 12, freq: 'MS' }), 50, 'Eur/MWh') },
                { context }
            );
            expect(() => new PfState(offtakeLine(), monthly)).toThrow(IndexError);
        });

        test('longer inputs are cut to the offtake', () => {
            const firstHalf = offtakeLine().slice('2023-01-01', '2023-07-01');
            const state = new PfState(firstHalf, priceLine(), sourcedLine());
            expect(state.index.length).toBe(2);
            expect(state.unsourced.q.toArray()).toEqual([40, 40]);
        });
    });

    // ═══════════════════════════════════════════════════════════════════════════
    // NEW STATES
    // ═══════════════════════════════════════════════════════════════════════════

    describe('setters', () => {
        test('changing offtake or sourced volume is reported', () => {
            const sink = collectingSink();
            const ctx = createContext({ diagnostics: sink });
            const state = new PfState(offtakeLine(), priceLine(), sourcedLine(), { context: ctx });

            state.setOfftake(offtakeLine().mul(2));
            state.setSourced(sourcedLine());
            expect(sink.codes()).toEqual(['changes-unsourced-volume', 'changes-unsourced-volume']);

            sink.clear();
            state.setUnsourcedPrice(priceLine());
            expect(sink.codes()).toEqual([]);
        });

        test('addSourced adds to the sourced line', () => {
            const state = makeState().addSourced({
                q: Series.of(quarters, 10, 'MWh'),
                p: Series.of(quarters, 50, 'Eur/MWh'),
            });
            expect(state.sourced.q.toArray()).toEqual([70, 50, 40, 55]);
            expect(state.unsourced.q.toArray()).toEqual([30, 30, 20, 35]);
        });

        test('slice keeps the delivery periods asked for', () => {
            const state = makeState().slice('2023-04-01', '2023-10-01');
            expect(state.index.length).toBe(2);
            expect(state.unsourced.q.toArray()).toEqual([40, 30]);
        });

        test('resample weights the market price with the unsourced volume', () => {
            const year = makeState().resample('AS');
            expect(year.index.length).toBe(1);
            expect(year.offtake.q.toArray()).toEqual([-330]);
            expect(year.sourced.q.toArray()).toEqual([175]);
            expect(year.sourced.r.toArray()).toEqual([7100]);
            expect(year.unsourcedPrice.p.at(0)).toBeCloseTo(7200 / 155, 9);
        });
    });

    // ═══════════════════════════════════════════════════════════════════════════
    // ARITHMETIC
    // ═══════════════════════════════════════════════════════════════════════════

    describe('arithmetic', () => {
        test('adding a state to itself doubles it', () => {
            const state = makeState();
            expect(state.add(state).equals(state.mul(2))).toBe(true);
        });

        test('subtracting a state from itself leaves nothing', () => {
            const state = makeState();
            const difference = state.sub(state);
            expect(difference.offtake.isZero()).toBe(true);
            expect(difference.sourced.isZero()).toBe(true);
        });

        test('scaling leaves prices alone', () => {
            const half = makeState().div(2);
            expect(half.offtake.q.toArray()).toEqual([-50, -40, -30, -45]);
            expect(half.sourced.p.toArray()).toEqual(SOURCED_P);
            expect(makeState().mul(quantity(50, '%')).equals(half)).toBe(true);
        });

        test('only dimensionless factors scale', () => {
            expect(() => makeState().mul(quantity(1, 'MWh'))).toThrow(ShapeError);
        });

        test('dividing two states gives ratios per part', () => {
            const ratios = makeState().div(makeState());
            expect(ratios.offtake.volume.toArray()).toEqual([1, 1, 1, 1]);
            expect(ratios.sourced.price.toArray()).toEqual([1, 1, 1, 1]);
            expect(ratios.unsourced.volume.toArray()).toEqual([1, 1, 1, 1]);
            expect(ratios.pnlCost.price.toArray()).toEqual([1, 1, 1, 1]);
        });

        test('neg flips volumes', () => {
            expect(makeState().neg().offtake.q.toArray()).toEqual([100, 80, 60, 90]);
        });
    });

    // ═══════════════════════════════════════════════════════════════════════════
    // HEDGING
    // ═══════════════════════════════════════════════════════════════════════════

    describe('hedging', () => {
        test('hedgeOfUnsourced is a base product at the market price', () => {
            const hedge = dailyState().hedgeOfUnsourced('val', 'MS');
            expect(hedge.index.length).toBe(31);
            expect(new Set(hedge.q.toArray())).toEqual(new Set([24]));
            expect(new Set(hedge.p.toArray())).toEqual(new Set([50]));
        });

        test('sourceUnsourced closes the open position', () => {
            const state = dailyState().sourceUnsourced('val', 'MS');
            expect(state.unsourced.isZero()).toBe(true);
            expect(state.sourced.q.at(0)).toBe(24);
        });

        test('periods outside full products stay unsourced', () => {
            const state = dailyState(10).sourceUnsourced('vol', 'MS');
            expect(state.index.length).toBe(41);
            expect(state.unsourced.slice('2023-01-01', '2023-02-01').isZero()).toBe(true);
            expect(state.unsourced.slice('2023-02-01').q.toArray()).toEqual(Array(10).fill(24));
        });
    });
});
