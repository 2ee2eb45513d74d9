import { InsufficientDataError, ShapeError } from '../core/errors';
import { ops } from '../series';
import { TimeIndex } from '../timeindex';
import { FlatColumns, FlatPfLine } from './flat';
import { KIND_INFO } from './kind';
import { NestedPfLine } from './nested';
import { PfLine } from './types';

/**
 * Join lines that follow each other in time into one line.
 *
 * Lines must share kind and structure, and their indices must be compatible and
 * adjacent, in the order given. Nested lines need the same child names; their
 * children are concatenated name by name.
 */
export function concat(lines: readonly PfLine[]): PfLine {
    if (lines.length === 0) {
        throw new InsufficientDataError('Nothing to concatenate');
    }
    const [first] = lines;
    for (const line of lines) {
        if (line.kind !== first.kind || line.structure !== first.structure) {
            throw new ShapeError('Can only concatenate lines of one kind and structure', {
                lines: lines.map((l) => `${l.structure} ${l.kind}`),
            });
        }
    }
    const index = TimeIndex.concat(lines.map((l) => l.index));

    const flats = lines.flatMap((l) => (l.structure === 'flat' ? [l] : []));
    if (flats.length === lines.length) {
        const columns: FlatColumns = {};
        for (const col of KIND_INFO[first.kind].stored) {
            columns[col] = ops.concatAll(flats.map((l) => l.column(col)));
        }
        return FlatPfLine.fromColumns(first.kind, index, columns, first.context);
    }

    const nested = lines.flatMap((l) => (l.structure === 'nested' ? [l] : []));
    const names = nested[0].names();
    const expected = [...names].sort().join('\u0000');
    for (const line of nested) {
        if ([...line.names()].sort().join('\u0000') !== expected) {
            throw new ShapeError('Can only concatenate nested lines with the same children', {
                expected: names,
                actual: line.names(),
            });
        }
    }
    return NestedPfLine.fromChildren(
        names.map((name): [string, PfLine] => [name, concat(nested.map((l) => l.child(name)))]),
        first.context
    );
}
