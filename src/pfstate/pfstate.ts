/**
 * PfState - offtake, sourcing and market prices of one portfolio
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Stored:   offtake (VOLUME), unsourcedPrice (PRICE), sourced (COMPLETE)
 * Derived:  unsourced    = −(offtake + sourced volume) ∪ unsourcedPrice
 *           netPosition  = −unsourced
 *           pnlCost      = { sourced, unsourced }
 *
 * SIGN CONVENTION:
 * - volumes are positive when energy flows INTO the portfolio; offtake is ≤ 0
 * - revenues are positive when money flows OUT (costs)
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { getDefaultContext, PfContext } from '../context';
import { FlatPfLine, HedgeHow, isPfLine, NestedPfLine, PfLine, PfLineInput, TagValue, createPfLine } from '../pfline';
import { Series, ops } from '../series';
import { Freq, InstantLike, TimeIndex } from '../timeindex';
import * as arithmetic from './arithmetic';
import type { Factor, PfStateRatios } from './arithmetic';
import { makeLines, padWithZeros } from './helper';

export interface PfStateOptions {
    /** Defaults to the offtake line's context, else the default context */
    context?: PfContext;
}

/**
 * Timeseries for PfState.fromSeries. Offtake needs `qo` or `wo`; sourcing,
 * if any, needs two of (`qs` or `ws`), `ps`, `rs`.
 */
export interface PfStateSeries {
    pu: TagValue;
    qo?: TagValue;
    wo?: TagValue;
    qs?: TagValue;
    ws?: TagValue;
    ps?: TagValue;
    rs?: TagValue;
}

export class PfState {
    readonly offtake: PfLine;
    readonly unsourcedPrice: PfLine;
    readonly sourced: PfLine;
    readonly context: PfContext;
    private cachedUnsourced?: PfLine;

    constructor(
        offtake: PfLineInput,
        unsourcedPrice: PfLineInput,
        sourced?: PfLineInput | null,
        options: PfStateOptions = {}
    ) {
        const context = options.context ?? (isPfLine(offtake) ? offtake.context : getDefaultContext());
        const lines = makeLines(offtake, unsourcedPrice, sourced, context);
        this.offtake = lines.offtake;
        this.unsourcedPrice = lines.unsourcedPrice;
        this.sourced = lines.sourced;
        this.context = context;
    }

    static fromSeries(data: PfStateSeries, options: PfStateOptions = {}): PfState {
        const context = options.context ?? getDefaultContext();
        const { pu, qo, wo, qs, ws, ps, rs } = data;
        const hasSourced = [qs, ws, ps, rs].some((v) => v !== undefined);
        return new PfState(
            createPfLine({ q: qo, w: wo }, { context }),
            createPfLine({ p: pu }, { context }),
            hasSourced ? createPfLine({ q: qs, w: ws, p: ps, r: rs }, { context }) : null,
            { context }
        );
    }

    get index(): TimeIndex {
        return this.offtake.index;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // DERIVED LINES
    // ═══════════════════════════════════════════════════════════════════════════

    /** Volume still to be procured, at the unsourced price; always flat */
    get unsourced(): PfLine {
        if (!this.cachedUnsourced) {
            const volume = this.offtake.flatten().add(this.sourced.flatten().volume).neg();
            this.cachedUnsourced = volume.union(this.unsourcedPrice.flatten());
        }
        return this.cachedUnsourced;
    }

    /** Traders' view of the unsourced line: positive when long */
    get netPosition(): PfLine {
        return this.unsourced.neg();
    }

    /** Cost of the whole offtake: sourced part plus unsourced part */
    get pnlCost(): NestedPfLine {
        return NestedPfLine.fromChildren(
            [
                ['sourced', this.sourced],
                ['unsourced', this.unsourced],
            ],
            this.context
        );
    }

    /** −sourced / offtake; NaN where the offtake is zero */
    get sourcedFraction(): Series {
        const sourced = this.sourced.flatten().column('q');
        const offtake = this.offtake.flatten().column('q');
        return new Series(this.index, ops.scale(ops.divide(sourced, offtake), -1), '');
    }

    /** 1 − sourcedFraction; NaN where the offtake is zero */
    get unsourcedFraction(): Series {
        const sourced = this.sourcedFraction.values;
        return new Series(this.index, ops.subtract(ops.filled(sourced.length, 1), sourced), '');
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // NEW STATES
    // ═══════════════════════════════════════════════════════════════════════════

    setOfftake(offtake: PfLineInput): PfState {
        this.warnUnsourcedVolumeChange('offtake');
        return new PfState(offtake, this.unsourcedPrice, this.sourced, { context: this.context });
    }

    setUnsourcedPrice(unsourcedPrice: PfLineInput): PfState {
        return new PfState(this.offtake, unsourcedPrice, this.sourced, { context: this.context });
    }

    setSourced(sourced: PfLineInput): PfState {
        this.warnUnsourcedVolumeChange('sourced');
        return new PfState(this.offtake, this.unsourcedPrice, sourced, { context: this.context });
    }

    addSourced(extra: PfLineInput): PfState {
        return this.setSourced(this.sourced.add(createPfLine(extra, { context: this.context })));
    }

    /**
     * Same portfolio at another frequency. The unsourced price is taken from the
     * resampled unsourced line, so it stays weighted with the unsourced volume.
     */
    resample(freq: Freq): PfState {
        return new PfState(
            this.offtake.resample(freq).volume,
            this.unsourced.resample(freq).price,
            this.sourced.resample(freq),
            { context: this.context }
        );
    }

    slice(start?: InstantLike, end?: InstantLike): PfState {
        return new PfState(
            this.offtake.slice(start, end),
            this.unsourcedPrice.slice(start, end),
            this.sourced.slice(start, end),
            { context: this.context }
        );
    }

    restrictTo(index: TimeIndex): PfState {
        if (index.equals(this.index)) return this;
        return new PfState(this.offtake.restrictTo(index), this.unsourcedPrice, this.sourced, {
            context: this.context,
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // VALUATION AND HEDGING
    // ═══════════════════════════════════════════════════════════════════════════

    /** Value of the sourced volume at the current market (unsourced) price */
    mtmOfSourced(): PfLine {
        const spread = this.unsourcedPrice.flatten().sub(this.sourced.flatten().price);
        return this.sourced.volume.mul(spread);
    }

    hedgeOfUnsourced(how: HedgeHow = 'val', freq: Freq = 'MS'): FlatPfLine {
        return this.unsourced.volume.hedgeWith(this.unsourcedPrice, how, freq);
    }

    /**
     * State after buying the hedge of the unsourced volume at market prices.
     * Periods outside full product periods stay unsourced.
     */
    sourceUnsourced(how: HedgeHow = 'val', freq: Freq = 'MS'): PfState {
        const hedge = padWithZeros(this.hedgeOfUnsourced(how, freq), this.index);
        return new PfState(this.offtake, this.unsourcedPrice, this.sourced.add(hedge), { context: this.context });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // ARITHMETIC
    // ═══════════════════════════════════════════════════════════════════════════

    add(other: PfState): PfState {
        return arithmetic.add(this, other);
    }

    sub(other: PfState): PfState {
        return arithmetic.sub(this, other);
    }

    neg(): PfState {
        return arithmetic.neg(this);
    }

    mul(factor: Factor): PfState {
        return arithmetic.mul(this, factor);
    }

    div(other: PfState): PfStateRatios;
    div(other: Factor): PfState;
    div(other: PfState | Factor): PfState | PfStateRatios {
        return other instanceof PfState ? arithmetic.divStates(this, other) : arithmetic.divFactor(this, other);
    }

    equals(other: unknown): boolean {
        if (!(other instanceof PfState)) return false;
        return (
            this.offtake.equals(other.offtake) &&
            this.unsourced.equals(other.unsourced) &&
            this.sourced.equals(other.sourced)
        );
    }

    toString(): string {
        return `PfState(${this.index.describe()})`;
    }

    private warnUnsourcedVolumeChange(part: string): void {
        this.context.diagnostics.emit({
            code: 'changes-unsourced-volume',
            message:
                `Setting '${part}' changes the unsourced volume; its price is inaccurate ` +
                'if the portfolio frequency is longer than that of the spot market',
            context: { part, index: this.index.describe() },
        });
    }
}
