/**
 * Flat line from canonical column arrays: kind inference, derivation of the
 * missing dimension and consistency checks of over-determined input.
 */

import { PfContext } from '../context';
import { ConsistencyError, InsufficientDataError } from '../core/errors';
import { ops } from '../series';
import { TimeIndex } from '../timeindex';
import { FlatPfLine } from './flat';
import { Dimension } from '../units';
import { Column, columnOfDimension, Kind } from './kind';

export type ColumnArrays = Partial<Record<Column, Float64Array>>;

export function buildFlat(index: TimeIndex, columns: ColumnArrays, context: PfContext): FlatPfLine {
    const { rtol, atol } = context;

    let q = columns.q;
    if (columns.w) {
        const fromPower = ops.multiply(columns.w, index.durations());
        if (q && !ops.allClose(q, fromPower, rtol, atol)) {
            throw new ConsistencyError('Values for power (w) and energy (q) are inconsistent', {
                index: index.describe(),
            });
        }
        q = q ?? fromPower;
    }
    const { p, r } = columns;

    if (q && p && r) {
        if (!ops.allClose(r, ops.multiply(p, q), rtol, atol)) {
            throw new ConsistencyError('Revenue (r) is not equal to price (p) × energy (q)', {
                index: index.describe(),
            });
        }
        return FlatPfLine.fromColumns(Kind.COMPLETE, index, { q, p, r }, context);
    }
    if (q && p) return FlatPfLine.fromColumns(Kind.COMPLETE, index, { q, p, r: ops.multiply(q, p) }, context);
    if (q && r) return FlatPfLine.fromColumns(Kind.COMPLETE, index, { q, p: ops.divide(r, q), r }, context);
    if (p && r) return FlatPfLine.fromColumns(Kind.COMPLETE, index, { q: ops.divide(r, p), p, r }, context);
    if (q) return FlatPfLine.fromColumns(Kind.VOLUME, index, { q }, context);
    if (p) return FlatPfLine.fromColumns(Kind.PRICE, index, { p }, context);
    if (r) return FlatPfLine.fromColumns(Kind.REVENUE, index, { r }, context);

    throw new InsufficientDataError('Need at least one of w, q, p, r to create a portfolio line');
}

/**
 * Single-dimension flat line holding `values` under the tag of `dimension`;
 * null for dimensionless values.
 */
export function lineOfDimension(
    index: TimeIndex,
    values: Float64Array,
    dimension: Dimension,
    context: PfContext
): FlatPfLine | null {
    const col = columnOfDimension(dimension);
    if (col === null) return null;
    const columns: ColumnArrays = {};
    columns[col] = values;
    return buildFlat(index, columns, context);
}
