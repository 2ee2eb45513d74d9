/**
 * PfLine Arithmetic
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Dispatch over {kind, structure} of both operands.
 *
 * RULES:
 * 1. Operands are aligned to the overlap of their (compatible) indices
 * 2. + − need equal kinds. flat+flat → flat, nested+nested → merged by child
 *    name, flat+nested → nested side flattened (diagnostic, or ShapeError when
 *    the context has strictShapes)
 * 3. × ÷ by a dimensionless value scale volumes and revenues; COMPLETE prices
 *    stay as they are; nesting is kept
 * 4. VOLUME × PRICE → REVENUE, REVENUE ÷ PRICE → VOLUME, REVENUE ÷ VOLUME →
 *    PRICE; one side may be nested and its tree is kept
 * 5. Equal non-COMPLETE kinds divide into a dimensionless Series (flat only)
 * 6. union of two flat lines of distinct single kinds → COMPLETE
 *
 * Anything else throws a typed error.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { AmbiguousDimensionError, ShapeError } from '../core/errors';
import { Series, ops } from '../series';
import { sumFlatLines } from './aggregate';
import { buildFlat, ColumnArrays, lineOfDimension } from './build';
import { FlatColumns, FlatPfLine } from './flat';
import { Coerced, coerce } from './interop';
import { Kind, KIND_INFO, productKind, quotientKind, StoredColumn, unionKind } from './kind';
import { NestedPfLine } from './nested';
import { Operand, PfLine } from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// ADDITION
// ═══════════════════════════════════════════════════════════════════════════════

export function add(a: PfLine, other: Operand): PfLine {
    return addCoerced(a, coerce(other, a));
}

export function sub(a: PfLine, other: Operand): PfLine {
    return addCoerced(a, negate(coerce(other, a)));
}

function negate(c: Coerced): Coerced {
    if (c.type === 'line') return { type: 'line', line: c.line.neg() };
    return { ...c, series: c.series.withValues(ops.scale(c.series.values, -1)) };
}

function addCoerced(a: PfLine, c: Coerced): PfLine {
    switch (c.type) {
        case 'line':
            return addLines(a, c.line);
        case 'factor':
            throw new ShapeError(`Cannot add a dimensionless value to a ${a.kind} line`, { kind: a.kind });
        case 'bare':
            return addLines(a, bareAsLine(a, c.series));
    }
}

/**
 * Unit-less values only make sense next to a single-unit line: read them in
 * the canonical price or revenue unit.
 */
function bareAsLine(a: PfLine, s: Series): FlatPfLine {
    if (a.kind === Kind.PRICE) return buildFlat(s.index, { p: s.values }, a.context);
    if (a.kind === Kind.REVENUE) return buildFlat(s.index, { r: s.values }, a.context);
    throw new AmbiguousDimensionError(`Cannot add a unit-less value to a ${a.kind} line; give it a unit`, {
        kind: a.kind,
    });
}

function addLines(a: PfLine, b: PfLine): PfLine {
    if (a.kind !== b.kind) {
        throw new ShapeError(`Cannot add a ${b.kind} line to a ${a.kind} line`, { left: a.kind, right: b.kind });
    }
    const [x, y] = aligned(a, b);
    return addAligned(x, y);
}

function addAligned(x: PfLine, y: PfLine): PfLine {
    if (x.structure === 'flat' && y.structure === 'flat') {
        return sumFlatLines(x.kind, x.index, [x, y], x.context);
    }
    if (x.structure === 'nested' && y.structure === 'nested') {
        const merged = x.children().map(([name, child]): [string, PfLine] => [
            name,
            y.has(name) ? addAligned(child, y.child(name)) : child,
        ]);
        for (const [name, child] of y.children()) {
            if (!x.has(name)) merged.push([name, child]);
        }
        return NestedPfLine.fromChildren(merged, x.context);
    }

    const { context } = x;
    const children = childNames(x).concat(childNames(y));
    if (context.strictShapes) {
        throw new ShapeError(`Cannot add flat and nested ${x.kind} lines; flatten the nested one first`, {
            kind: x.kind,
            children,
        });
    }
    context.diagnostics.emit({
        code: 'flatten-on-shape-mismatch',
        message: `Added flat and nested ${x.kind} lines; children [${children.join(', ')}] were flattened`,
        context: { kind: x.kind, children, index: x.index.describe() },
    });
    return sumFlatLines(x.kind, x.index, [x.flatten(), y.flatten()], context);
}

// ═══════════════════════════════════════════════════════════════════════════════
// SCALING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Line times a dimensionless factor (aligned with the line's index).
 */
export function scaleLine(line: PfLine, factor: Float64Array): PfLine {
    if (line.structure === 'nested') return line.mapChildren((child) => scaleLine(child, factor));
    return scaleFlat(line, factor);
}

export function scaleFlat(line: FlatPfLine, factor: Float64Array): FlatPfLine {
    const columns: FlatColumns = {};
    for (const col of KIND_INFO[line.kind].stored) {
        const keep = line.kind === Kind.COMPLETE && col === 'p';
        columns[col] = keep ? line.column(col) : ops.multiply(line.column(col), factor);
    }
    return FlatPfLine.fromColumns(line.kind, line.index, columns, line.context);
}

export function negFlat(line: FlatPfLine): FlatPfLine {
    return scaleFlat(line, ops.filled(line.index.length, -1));
}

// ═══════════════════════════════════════════════════════════════════════════════
// MULTIPLICATION AND DIVISION
// ═══════════════════════════════════════════════════════════════════════════════

export function mul(a: PfLine, other: Operand): PfLine {
    const c = coerce(other, a);
    if (c.type === 'line') return multiplyLines(a, c.line);
    const index = a.index.intersect(c.series.index);
    return scaleLine(a.restrictTo(index), c.series.restrictTo(index).values);
}

export function div(a: PfLine, other: Operand): PfLine | Series {
    const c = coerce(other, a);
    if (c.type === 'line') return divideLines(a, c.line);
    const index = a.index.intersect(c.series.index);
    return scaleLine(a.restrictTo(index), ops.reciprocal(c.series.restrictTo(index).values));
}

function multiplyLines(a: PfLine, b: PfLine): PfLine {
    if (productKind(a.kind, b.kind) === null) {
        throw new ShapeError(`Cannot multiply a ${a.kind} line with a ${b.kind} line`, {
            left: a.kind,
            right: b.kind,
        });
    }
    if (a.structure === 'nested' && b.structure === 'nested') {
        throw new ShapeError('Cannot multiply two nested lines; flatten one of them first', {
            left: a.names(),
            right: b.names(),
        });
    }
    const [x, y] = aligned(a, b);
    return combine(x, y, (f, g) =>
        fromProduct(f.series(storedColumn(f)).times(g.series(storedColumn(g)), f.context.units), f)
    );
}

function divideLines(a: PfLine, b: PfLine): PfLine | Series {
    if (a.kind === b.kind) {
        if (a.kind === Kind.COMPLETE) {
            throw new ShapeError('Cannot divide COMPLETE lines; divide their volume, price or revenue instead');
        }
        return ratio(a, b);
    }
    if (quotientKind(a.kind, b.kind) === null) {
        throw new ShapeError(`Cannot divide a ${a.kind} line by a ${b.kind} line`, { left: a.kind, right: b.kind });
    }
    if (a.structure === 'nested' && b.structure === 'nested') {
        throw new ShapeError('Cannot divide two nested lines; flatten one of them first', {
            left: a.names(),
            right: b.names(),
        });
    }
    const [x, y] = aligned(a, b);
    return combine(x, y, (f, g) =>
        fromProduct(f.series(storedColumn(f)).dividedBy(g.series(storedColumn(g)), f.context.units), f)
    );
}

/**
 * Dimensionless ratio of two flat lines of one single-dimension kind.
 */
export function ratio(a: PfLine, b: PfLine): Series {
    if (a.kind !== b.kind || a.kind === Kind.COMPLETE) {
        throw new ShapeError(`Ratio needs two lines of one kind, not COMPLETE; got ${a.kind} and ${b.kind}`, {
            left: a.kind,
            right: b.kind,
        });
    }
    if (a.structure === 'nested' || b.structure === 'nested') {
        throw new ShapeError(`Ratio of ${a.kind} lines needs two flat lines; flatten first`, { kind: a.kind });
    }
    const index = a.index.intersect(b.index);
    const col = storedColumn(a);
    return a.restrictTo(index).series(col).dividedBy(b.restrictTo(index).series(col), a.context.units);
}

/**
 * Apply a flat operation under the tree of whichever operand is nested.
 */
function combine(x: PfLine, y: PfLine, fn: (f: FlatPfLine, g: FlatPfLine) => FlatPfLine): PfLine {
    if (x.structure === 'nested') return x.mapChildren((child) => combine(child, y, fn));
    if (y.structure === 'nested') return y.mapChildren((child) => combine(x, child, fn));
    return fn(x, y);
}

function fromProduct(s: Series, reference: FlatPfLine): FlatPfLine {
    const dimension = s.dimension(reference.context.units);
    const line = dimension === null ? null : lineOfDimension(s.index, s.values, dimension, reference.context);
    if (line === null) {
        throw new ShapeError(`Result in '${s.unit ?? ''}' is not a portfolio line dimension`, { unit: s.unit });
    }
    return line;
}

// ═══════════════════════════════════════════════════════════════════════════════
// UNION
// ═══════════════════════════════════════════════════════════════════════════════

export function union(a: PfLine, other: Operand): PfLine {
    const c = coerce(other, a);
    if (c.type === 'bare') {
        throw new AmbiguousDimensionError('Cannot form a union with a unit-less value; give it a unit');
    }
    if (c.type === 'factor') {
        throw new ShapeError('Cannot form a union with a dimensionless value');
    }
    const b = c.line;
    if (a.structure === 'nested' || b.structure === 'nested') {
        throw new ShapeError('Union needs two flat lines; flatten first', { left: a.structure, right: b.structure });
    }
    if (unionKind(a.kind, b.kind) === null) {
        throw new ShapeError(`Union needs two lines of distinct kind, neither COMPLETE; got ${a.kind} and ${b.kind}`, {
            left: a.kind,
            right: b.kind,
        });
    }
    const index = a.index.intersect(b.index);
    const columns: ColumnArrays = {};
    for (const line of [a.restrictTo(index), b.restrictTo(index)]) {
        for (const col of KIND_INFO[line.kind].stored) columns[col] = line.column(col);
    }
    return buildFlat(index, columns, a.context);
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function aligned(a: PfLine, b: PfLine): [PfLine, PfLine] {
    const index = a.index.intersect(b.index);
    return [a.restrictTo(index), b.restrictTo(index)];
}

function storedColumn(line: FlatPfLine): StoredColumn {
    return KIND_INFO[line.kind].stored[0];
}

function childNames(line: PfLine): string[] {
    return line.structure === 'nested' ? line.names() : [];
}
