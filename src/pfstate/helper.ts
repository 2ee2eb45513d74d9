/**
 * Input preparation for PfState: every part becomes a PfLine of the right kind
 * on the offtake's index.
 */

import { PfContext } from '../context';
import { IndexError, InvariantError, ShapeError } from '../core/errors';
import { createPfLine, FlatPfLine, Kind, PfLine, PfLineInput } from '../pfline';
import { ops } from '../series';
import { TimeIndex } from '../timeindex';

export interface StateLines {
    offtake: PfLine;
    unsourcedPrice: PfLine;
    sourced: PfLine;
}

export function makeLines(
    offtakeInput: PfLineInput,
    priceInput: PfLineInput,
    sourcedInput: PfLineInput | null | undefined,
    context: PfContext
): StateLines {
    const offtake = asVolume(createPfLine(offtakeInput, { context }), context);
    const index = offtake.index;
    const unsourcedPrice = fitTo(asPrice(createPfLine(priceInput, { context }), context), index, 'unsourcedPrice');

    let sourced: PfLine;
    if (sourcedInput === null || sourcedInput === undefined) {
        sourced = zeroComplete(index, context);
    } else {
        sourced = createPfLine(sourcedInput, { context });
        if (sourced.kind !== Kind.COMPLETE) {
            throw new ShapeError(`'sourced' must contain volume and price; got a ${sourced.kind} line`, {
                kind: sourced.kind,
            });
        }
        sourced = fitTo(sourced, index, 'sourced');
    }
    return { offtake, unsourcedPrice, sourced };
}

function asVolume(line: PfLine, context: PfContext): PfLine {
    if (line.kind === Kind.VOLUME) return line;
    if (line.kind === Kind.COMPLETE) {
        context.diagnostics.emit({
            code: 'discarded-information',
            message: "'offtake' also contains price information; only its volume is kept",
            context: { part: 'offtake' },
        });
        return line.volume;
    }
    throw new ShapeError(`'offtake' must contain volume; got a ${line.kind} line`, { kind: line.kind });
}

function asPrice(line: PfLine, context: PfContext): PfLine {
    if (line.kind === Kind.PRICE) return line;
    if (line.kind === Kind.COMPLETE) {
        context.diagnostics.emit({
            code: 'discarded-information',
            message: "'unsourcedPrice' also contains volume information; only its price is kept",
            context: { part: 'unsourcedPrice' },
        });
        return line.price;
    }
    throw new ShapeError(`'unsourcedPrice' must contain prices; got a ${line.kind} line`, { kind: line.kind });
}

/**
 * Line restricted to `index`, which it must cover entirely.
 */
function fitTo(line: PfLine, index: TimeIndex, part: string): PfLine {
    if (!line.index.isCompatible(index)) {
        throw new IndexError(`'${part}' has an index that is not compatible with the offtake; resample first`, {
            part,
            offtake: index.describe(),
            actual: line.index.describe(),
        });
    }
    if (!line.index.covers(index)) {
        throw new InvariantError(`'${part}' does not cover the entire delivery period of the offtake`, {
            part,
            offtake: index.describe(),
            actual: line.index.describe(),
        });
    }
    return line.restrictTo(index);
}

export function zeroComplete(index: TimeIndex, context: PfContext): FlatPfLine {
    const zeros = ops.filled(index.length, 0);
    return FlatPfLine.fromColumns(Kind.COMPLETE, index, { q: zeros, p: zeros, r: zeros }, context);
}

/**
 * Complete line on `index`, with the values of `line` where it has them and
 * zeros elsewhere.
 */
export function padWithZeros(line: FlatPfLine, index: TimeIndex): FlatPfLine {
    if (line.index.equals(index)) return line;
    const offset = index.indexOf(line.index.first);
    if (offset === -1 || !index.covers(line.index)) {
        throw new IndexError('Line does not lie within the target index', {
            line: line.index.describe(),
            target: index.describe(),
        });
    }
    const padded = (values: Float64Array): Float64Array => {
        const out = ops.filled(index.length, 0);
        out.set(values, offset);
        return out;
    };
    return FlatPfLine.fromColumns(
        Kind.COMPLETE,
        index,
        { q: padded(line.column('q')), p: padded(line.column('p')), r: padded(line.column('r')) },
        line.context
    );
}
