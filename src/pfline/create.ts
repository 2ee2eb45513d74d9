/**
 * createPfLine - single entry point for building portfolio lines
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Accepts:
 *   - a PfLine                          returned as is
 *   - { w?, q?, p?, r? }                flat line, kind inferred from the tags
 *   - { name: input, ... }              nested line, children built recursively
 *   - a Series or Quantity with a unit  tag inferred from the unit's dimension
 *
 * Values are converted to canonical units here; nothing downstream sees any
 * other unit. Scalars are broadcast onto the index of the series next to them,
 * or onto `options.index`.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { getDefaultContext, PfContext } from '../context';
import {
    AmbiguousDimensionError,
    IndexError,
    InsufficientDataError,
    ShapeError,
} from '../core/errors';
import { Series, ops } from '../series';
import { TimeIndex } from '../timeindex';
import { isQuantity, Quantity } from '../units';
import { buildFlat, ColumnArrays } from './build';
import { isPfLine, isPfLineInput, isTagValue } from './guards';
import { Column, COLUMN_DIMENSION, columnOfDimension, COLUMNS, isColumn } from './kind';
import { NestedPfLine } from './nested';
import { PfLine, PfLineInput, TagValue } from './types';

export interface CreateOptions {
    /** Index to broadcast scalars onto when no series is given */
    index?: TimeIndex;

    /** Defaults to the shared default context; a given line keeps its own */
    context?: PfContext;
}

type Tags = Partial<Record<Column, TagValue>>;

export function createPfLine(data: PfLineInput, options: CreateOptions = {}): PfLine {
    if (isPfLine(data)) return data;
    const context = options.context ?? getDefaultContext();

    if (data instanceof Series || isQuantity(data)) {
        return fromSingle(data, options.index, context);
    }

    const entries: Array<[string, unknown]> = Object.entries(data).filter(
        ([, value]) => value !== undefined && value !== null
    );
    if (entries.length === 0) {
        throw new InsufficientDataError('No data to create a portfolio line from');
    }

    const tagKeys = entries.map(([key]) => key).filter(isColumn);
    if (tagKeys.length === entries.length) {
        const tags: Tags = {};
        for (const [key, value] of entries) {
            if (!isColumn(key)) continue;
            if (!isTagValue(value)) {
                throw new ShapeError(`Value under '${key}' must be a number, Quantity or Series`, { tag: key });
            }
            tags[key] = value;
        }
        return fromTags(tags, options.index, context);
    }
    if (tagKeys.length > 0) {
        throw new ShapeError('Cannot mix dimension tags and child names', {
            tags: tagKeys,
            keys: entries.map(([key]) => key),
        });
    }

    const children = entries.map(([name, value]): [string, PfLine] => {
        if (!isPfLineInput(value)) {
            throw new ShapeError(`Child '${name}' cannot be turned into a portfolio line`, { child: name });
        }
        return [name, createPfLine(value, { ...options, context })];
    });
    return NestedPfLine.fromChildren(children, context);
}

/**
 * Series or quantity without tag: its unit decides the tag.
 */
function fromSingle(value: Series | Quantity, index: TimeIndex | undefined, context: PfContext): PfLine {
    const unit = value.unit;
    if (unit === null) {
        throw new AmbiguousDimensionError('Value has no unit and no dimension tag; cannot infer what it is');
    }
    const col = columnOfDimension(context.units.dimensionOf(unit));
    if (col === null) {
        throw new AmbiguousDimensionError(`'${unit}' is dimensionless; give a dimension tag (w, q, p or r)`, {
            unit,
        });
    }
    const tags: Tags = {};
    tags[col] = value;
    return fromTags(tags, index, context);
}

function fromTags(tags: Tags, given: TimeIndex | undefined, context: PfContext): PfLine {
    const index = resolveIndex(tags, given);
    const columns: ColumnArrays = {};
    for (const col of COLUMNS) {
        const value = tags[col];
        if (value !== undefined) columns[col] = toCanonical(col, value, index, context);
    }
    return buildFlat(index, columns, context);
}

function resolveIndex(tags: Tags, given: TimeIndex | undefined): TimeIndex {
    let index = given;
    for (const col of COLUMNS) {
        const value = tags[col];
        if (!(value instanceof Series)) continue;
        if (index === undefined) {
            index = value.index;
        } else if (!index.equals(value.index)) {
            throw new IndexError(`Series under '${col}' has another index than the rest`, {
                expected: index.describe(),
                actual: value.index.describe(),
            });
        }
    }
    if (index === undefined) {
        throw new InsufficientDataError('Scalars need a series or an explicit index to be broadcast onto', {
            tags: Object.keys(tags),
        });
    }
    return index;
}

function toCanonical(col: Column, value: TagValue, index: TimeIndex, context: PfContext): Float64Array {
    const dimension = COLUMN_DIMENSION[col];
    if (typeof value === 'number') {
        assertBareAllowed(col, context);
        return ops.filled(index.length, value);
    }
    if (value instanceof Series) {
        if (value.unit === null) {
            assertBareAllowed(col, context);
            return value.values.slice();
        }
        return context.units.valuesToCanonical(value.values, value.unit, dimension);
    }
    return ops.filled(index.length, context.units.toCanonical(value, dimension));
}

/**
 * Unit-less input is read in the canonical unit of its tag, if allowed.
 */
function assertBareAllowed(col: Column, context: PfContext): void {
    if (context.bareNumbers !== 'canonical') {
        throw new AmbiguousDimensionError(
            `Value under '${col}' has no unit; give it one, or allow bare numbers in the context`,
            { tag: col, canonicalUnit: context.units.canonicalUnit(COLUMN_DIMENSION[col]) }
        );
    }
}
