/**
 * PfState Arithmetic
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * RULES:
 * 1. state ± state: offtake and sourced follow PfLine addition; the unsourced
 *    price is the average of both prices, weighted with their unsourced volumes
 * 2. state × factor, state ÷ factor: volumes and revenues scale, prices do not
 * 3. state ÷ state: table of dimensionless ratios per part
 * States are first restricted to the overlap of their indices.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { ShapeError } from '../core/errors';
import { FlatPfLine, Kind, PfLine, ratio, scaleLine } from '../pfline';
import { Series, ops } from '../series';
import { isQuantity, Quantity } from '../units';
import { PfState } from './pfstate';

/** Dimensionless scaling value; unit-less numbers and series count as dimensionless */
export type Factor = number | Quantity | Series;

export interface PfStateRatios {
    offtake: { volume: Series };
    sourced: { volume: Series; price: Series };
    unsourced: { volume: Series; price: Series };
    pnlCost: { price: Series };
}

export function add(a: PfState, b: PfState): PfState {
    const index = a.index.intersect(b.index);
    const x = a.restrictTo(index);
    const y = b.restrictTo(index);

    const price = ops.weightedAverageRows(
        [x.unsourcedPrice.flatten().column('p'), y.unsourcedPrice.flatten().column('p')],
        [x.unsourced.flatten().column('q'), y.unsourced.flatten().column('q')]
    );
    return new PfState(
        x.offtake.add(y.offtake),
        FlatPfLine.fromColumns(Kind.PRICE, index, { p: price }, a.context),
        x.sourced.add(y.sourced),
        { context: a.context }
    );
}

export function sub(a: PfState, b: PfState): PfState {
    return add(a, neg(b));
}

export function neg(a: PfState): PfState {
    return new PfState(a.offtake.neg(), a.unsourcedPrice, a.sourced.neg(), { context: a.context });
}

export function mul(a: PfState, factor: Factor): PfState {
    const values = factorValues(a, factor);
    const index = a.index.intersect(values.index);
    return scaled(a.restrictTo(index), values.restrictTo(index).values);
}

export function divFactor(a: PfState, factor: Factor): PfState {
    const values = factorValues(a, factor);
    const index = a.index.intersect(values.index);
    return scaled(a.restrictTo(index), ops.reciprocal(values.restrictTo(index).values));
}

export function divStates(a: PfState, b: PfState): PfStateRatios {
    const index = a.index.intersect(b.index);
    const x = a.restrictTo(index);
    const y = b.restrictTo(index);
    const flat = (line: PfLine): FlatPfLine => line.flatten();

    return {
        offtake: { volume: ratio(flat(x.offtake).volume, flat(y.offtake).volume) },
        sourced: {
            volume: ratio(flat(x.sourced).volume, flat(y.sourced).volume),
            price: ratio(flat(x.sourced).price, flat(y.sourced).price),
        },
        unsourced: {
            volume: ratio(flat(x.unsourced).volume, flat(y.unsourced).volume),
            price: ratio(flat(x.unsourcedPrice).price, flat(y.unsourcedPrice).price),
        },
        pnlCost: { price: ratio(x.pnlCost.flatten().price, y.pnlCost.flatten().price) },
    };
}

function scaled(a: PfState, factor: Float64Array): PfState {
    return new PfState(scaleLine(a.offtake, factor), a.unsourcedPrice, scaleLine(a.sourced, factor), {
        context: a.context,
    });
}

/**
 * Factor as a dimensionless series; quantities and numbers broadcast onto the
 * state's index.
 */
function factorValues(a: PfState, factor: Factor): Series {
    const { units } = a.context;
    if (typeof factor === 'number') return Series.of(a.index, factor, '');
    if (isQuantity(factor)) {
        if (units.dimensionOf(factor.unit) !== 'dimensionless') {
            throw new ShapeError(`Can only scale a portfolio state by a dimensionless value; got '${factor.unit}'`, {
                unit: factor.unit,
            });
        }
        return Series.of(a.index, units.toCanonical(factor), '');
    }
    if (factor.unit !== null && units.dimensionOf(factor.unit) !== 'dimensionless') {
        throw new ShapeError(`Can only scale a portfolio state by a dimensionless value; got '${factor.unit}'`, {
            unit: factor.unit,
        });
    }
    return factor.withValues(factor.canonicalValues(units), '');
}
