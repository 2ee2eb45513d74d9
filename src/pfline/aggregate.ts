import { PfContext } from '../context';
import { ops } from '../series';
import { TimeIndex } from '../timeindex';
import { FlatPfLine } from './flat';
import { Kind } from './kind';

/**
 * Sum of flat lines of one kind on one index.
 *
 * Volumes and revenues add up; prices of PRICE lines are components and add up
 * too. For COMPLETE lines the price is total revenue over total volume (the
 * volume-weighted average of the prices), never a sum or plain average of prices.
 */
export function sumFlatLines(
    kind: Kind,
    index: TimeIndex,
    lines: readonly FlatPfLine[],
    context: PfContext
): FlatPfLine {
    switch (kind) {
        case Kind.VOLUME:
            return FlatPfLine.fromColumns(kind, index, { q: ops.sumAll(lines.map((l) => l.column('q'))) }, context);
        case Kind.PRICE:
            return FlatPfLine.fromColumns(kind, index, { p: ops.sumAll(lines.map((l) => l.column('p'))) }, context);
        case Kind.REVENUE:
            return FlatPfLine.fromColumns(kind, index, { r: ops.sumAll(lines.map((l) => l.column('r'))) }, context);
        case Kind.COMPLETE: {
            const volumes = lines.map((l) => l.column('q'));
            const q = ops.sumAll(volumes);
            const r = ops.sumAll(lines.map((l) => l.column('r')));
            const p = ops.priceFromParts(q, r, lines.map((l) => l.column('p')), volumes);
            return FlatPfLine.fromColumns(kind, index, { q, p, r }, context);
        }
    }
}
