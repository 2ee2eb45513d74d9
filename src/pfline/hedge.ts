/**
 * Hedging a volume profile with base products
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Within each product period (day, month, quarter or year) the hedge has one
 * constant power and one price:
 *   price  duration-weighted average of the price curve
 *   power  'vol': duration-weighted average power  (same energy)
 *          'val': price×duration-weighted average  (same value at market prices)
 * Only product periods fully covered by both lines are hedged.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { PFLINE_CONFIG } from '../config/constants';
import { IndexError, ShapeError } from '../core/errors';
import { downsampleGroups } from '../resample';
import { ops } from '../series';
import { Freq } from '../timeindex';
import { FlatPfLine } from './flat';
import { hasColumn, Kind } from './kind';
import { HedgeHow, PfLine } from './types';

export function hedgeFlat(
    line: FlatPfLine,
    priceLine: PfLine,
    how: HedgeHow = PFLINE_CONFIG.HEDGE_DEFAULT_HOW,
    freq: Freq = PFLINE_CONFIG.HEDGE_DEFAULT_FREQ
): FlatPfLine {
    if (!hasColumn(line.kind, 'q')) {
        throw new ShapeError(`Cannot hedge a ${line.kind} line; it has no volume information`, { kind: line.kind });
    }
    if (!PFLINE_CONFIG.HEDGE_SOURCE_FREQUENCIES.some((f) => f === line.index.freq)) {
        throw new IndexError(`Can only hedge daily or (quarter)hourly values; got '${line.index.freq}'`, {
            freq: line.index.freq,
        });
    }
    if (!PFLINE_CONFIG.HEDGE_PRODUCT_FREQUENCIES.some((f) => f === freq)) {
        throw new IndexError(`Hedge products must be one of D, MS, QS, AS; got '${freq}'`, { freq });
    }
    if (how !== 'vol' && how !== 'val') {
        throw new ShapeError(`Hedge constraint must be 'vol' or 'val'; got '${String(how)}'`);
    }

    const prices = priceLine.flatten().price;
    const overlap = line.index.intersect(prices.index);
    const { groups } = downsampleGroups(overlap, freq);
    const index = overlap.subset(groups[0].from, groups[groups.length - 1].to);

    const offset = groups[0].from;
    const w = line.restrictTo(index).w.values;
    const p = prices.restrictTo(index).column('p');
    const durations = index.durations();
    const weights = how === 'vol' ? durations : ops.multiply(p, durations);

    const hedgeW = new Float64Array(index.length);
    const hedgeP = new Float64Array(index.length);
    for (const g of groups) {
        const from = g.from - offset;
        const to = g.to - offset;
        const pHedge = ops.weightedAverage(p.subarray(from, to), durations.subarray(from, to));
        const wHedge = ops.weightedAverage(w.subarray(from, to), weights.subarray(from, to));
        hedgeW.fill(wHedge, from, to);
        hedgeP.fill(pHedge, from, to);
    }

    const q = ops.multiply(hedgeW, durations);
    return FlatPfLine.fromColumns(Kind.COMPLETE, index, { q, p: hedgeP, r: ops.multiply(hedgeP, q) }, line.context);
}
