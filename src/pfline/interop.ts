/**
 * Operand coercion
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Turns the right-hand side of an operation into one of:
 *   line    a portfolio line (given, or built from a dimensioned value)
 *   factor  a dimensionless series, canonical unit ''
 *   bare    a unit-less series; what it means depends on the operation
 * Quantities and numbers are broadcast onto the index of the left operand.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { Series, ops } from '../series';
import { TimeIndex } from '../timeindex';
import { Dimension } from '../units';
import { PfContext } from '../context';
import { lineOfDimension } from './build';
import { isPfLine } from './guards';
import { Operand, PfLine } from './types';

export type Coerced =
    | { type: 'line'; line: PfLine }
    | { type: 'factor'; series: Series }
    | { type: 'bare'; series: Series };

export function coerce(operand: Operand, reference: PfLine): Coerced {
    if (isPfLine(operand)) return { type: 'line', line: operand };

    const { context, index } = reference;
    if (typeof operand === 'number') {
        return { type: 'bare', series: Series.of(index, operand) };
    }
    if (operand instanceof Series) {
        if (operand.unit === null) return { type: 'bare', series: operand };
        const dimension = context.units.dimensionOf(operand.unit);
        return dimensioned(operand.index, operand.canonicalValues(context.units), dimension, context);
    }
    const dimension = context.units.dimensionOf(operand.unit);
    const magnitude = context.units.toCanonical(operand);
    return dimensioned(index, ops.filled(index.length, magnitude), dimension, context);
}

function dimensioned(index: TimeIndex, values: Float64Array, dimension: Dimension, context: PfContext): Coerced {
    const line = lineOfDimension(index, values, dimension, context);
    if (line === null) {
        return { type: 'factor', series: new Series(index, values, context.units.canonicalUnit(dimension)) };
    }
    return { type: 'line', line };
}
