/**
 * NestedPfLine - named children of one kind on one index
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * The aggregate (flat) view is computed from the children on first use and
 * cached; nothing else is stored. Children may themselves be nested.
 *
 * INVARIANTS:
 * - at least one child
 * - names are non-empty and none is a dimension tag (w, q, p, r)
 * - all children share this line's kind and index
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { PfContext } from '../context';
import { IndexError, InvariantError, KeyError, ShapeError } from '../core/errors';
import { PFLINE_CONFIG } from '../config/constants';
import { Series } from '../series';
import { Freq, InstantLike, TimeIndex } from '../timeindex';
import { sumFlatLines } from './aggregate';
import * as arithmetic from './arithmetic';
import { isZeroLine, linesEqual, Tolerance } from './compare';
import { FlatPfLine } from './flat';
import { Kind } from './kind';
import { HedgeHow, Operand, PfLine } from './types';

export type ChildEntries = Iterable<readonly [string, PfLine]>;

export class NestedPfLine {
    readonly structure = 'nested' as const;
    readonly kind: Kind;
    readonly index: TimeIndex;
    readonly context: PfContext;
    private readonly childMap: ReadonlyMap<string, PfLine>;
    private aggregate?: FlatPfLine;

    private constructor(childMap: ReadonlyMap<string, PfLine>, kind: Kind, index: TimeIndex, context: PfContext) {
        this.childMap = childMap;
        this.kind = kind;
        this.index = index;
        this.context = context;
    }

    /**
     * Nested line from named children. Uses the context of the first child
     * unless one is given.
     */
    static fromChildren(children: ChildEntries | Readonly<Record<string, PfLine>>, context?: PfContext): NestedPfLine {
        const entries = isIterable(children) ? [...children] : Object.entries(children);
        if (entries.length === 0) {
            throw new InvariantError('A nested portfolio line needs at least one child');
        }

        const [, first] = entries[0];
        const map = new Map<string, PfLine>();
        for (const [name, child] of entries) {
            assertChildName(name);
            if (map.has(name)) {
                throw new ShapeError(`Child name '${name}' is used twice`, { name });
            }
            if (child.kind !== first.kind) {
                throw new ShapeError('All children of a nested line must be of one kind', {
                    kinds: entries.map(([n, c]) => `${n}: ${c.kind}`),
                });
            }
            if (!child.index.equals(first.index)) {
                throw new ShapeError('All children of a nested line must share one index', {
                    child: name,
                    expected: first.index.describe(),
                    actual: child.index.describe(),
                });
            }
            map.set(name, child);
        }
        return new NestedPfLine(map, first.kind, first.index, context ?? first.context);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // CHILDREN
    // ═══════════════════════════════════════════════════════════════════════════

    get isNested(): true {
        return true;
    }

    get size(): number {
        return this.childMap.size;
    }

    names(): string[] {
        return [...this.childMap.keys()];
    }

    children(): Array<[string, PfLine]> {
        return [...this.childMap.entries()];
    }

    has(name: string): boolean {
        return this.childMap.has(name);
    }

    child(name: string): PfLine {
        const found = this.childMap.get(name);
        if (!found) {
            throw new KeyError(`No child named '${name}'`, { name, children: this.names() });
        }
        return found;
    }

    /**
     * New line with `name` added or replaced.
     */
    setChild(name: string, line: PfLine): NestedPfLine {
        if (line.kind !== this.kind || !line.index.equals(this.index)) {
            throw new ShapeError(`Child '${name}' must be a ${this.kind} line on the parent index`, {
                name,
                expected: `${this.kind} ${this.index.describe()}`,
                actual: `${line.kind} ${line.index.describe()}`,
            });
        }
        const entries = this.children();
        const at = entries.findIndex(([n]) => n === name);
        if (at === -1) entries.push([name, line]);
        else entries[at] = [name, line];
        return NestedPfLine.fromChildren(entries, this.context);
    }

    dropChild(name: string): NestedPfLine {
        if (!this.has(name)) {
            throw new KeyError(`No child named '${name}'`, { name, children: this.names() });
        }
        if (this.size === 1) {
            throw new InvariantError(`Cannot drop '${name}': it is the only child`, { name });
        }
        return NestedPfLine.fromChildren(
            this.children().filter(([n]) => n !== name),
            this.context
        );
    }

    mapChildren(fn: (child: PfLine, name: string) => PfLine): NestedPfLine {
        return NestedPfLine.fromChildren(
            this.children().map(([name, child]): [string, PfLine] => [name, fn(child, name)]),
            this.context
        );
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // DIMENSIONS
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Aggregate of all children (recursively).
     */
    flatten(): FlatPfLine {
        if (!this.aggregate) {
            const flats = this.children().map(([, child]) => child.flatten());
            this.aggregate = sumFlatLines(this.kind, this.index, flats, this.context);
        }
        return this.aggregate;
    }

    get w(): Series {
        return this.flatten().w;
    }

    get q(): Series {
        return this.flatten().q;
    }

    get p(): Series {
        return this.flatten().p;
    }

    get r(): Series {
        return this.flatten().r;
    }

    /** Volume part of every child; keeps the tree */
    get volume(): PfLine {
        if (this.kind === Kind.VOLUME) return this;
        if (this.kind !== Kind.COMPLETE) return this.flatten().volume;
        return this.mapChildren((child) => child.volume);
    }

    /** Aggregate price; a price is not additive over children of a complete line */
    get price(): PfLine {
        if (this.kind === Kind.PRICE) return this;
        return this.flatten().price;
    }

    get revenue(): PfLine {
        if (this.kind === Kind.REVENUE) return this;
        if (this.kind !== Kind.COMPLETE) return this.flatten().revenue;
        return this.mapChildren((child) => child.revenue);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // ARITHMETIC
    // ═══════════════════════════════════════════════════════════════════════════

    add(other: Operand): PfLine {
        return arithmetic.add(this, other);
    }

    sub(other: Operand): PfLine {
        return arithmetic.sub(this, other);
    }

    mul(other: Operand): PfLine {
        return arithmetic.mul(this, other);
    }

    div(other: Operand): PfLine | Series {
        return arithmetic.div(this, other);
    }

    union(other: Operand): PfLine {
        return arithmetic.union(this, other);
    }

    neg(): NestedPfLine {
        return this.mapChildren((child) => child.neg());
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // TIME
    // ═══════════════════════════════════════════════════════════════════════════

    resample(freq: Freq): NestedPfLine {
        return this.mapChildren((child) => child.resample(freq));
    }

    slice(start?: InstantLike, end?: InstantLike): NestedPfLine {
        return this.mapChildren((child) => child.slice(start, end));
    }

    restrictTo(index: TimeIndex): NestedPfLine {
        if (index.equals(this.index)) return this;
        if (!this.index.covers(index)) {
            throw new IndexError('Target index is not part of the line index', {
                line: this.index.describe(),
                target: index.describe(),
            });
        }
        return this.mapChildren((child) => child.restrictTo(index));
    }

    /** Hedges the aggregate */
    hedgeWith(price: PfLine, how: HedgeHow = 'val', freq?: Freq): FlatPfLine {
        return this.flatten().hedgeWith(price, how, freq);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // COMPARISON
    // ═══════════════════════════════════════════════════════════════════════════

    equals(other: unknown, tolerance?: Tolerance): boolean {
        return linesEqual(this, other, tolerance);
    }

    isZero(): boolean {
        return isZeroLine(this);
    }

    toString(): string {
        return `NestedPfLine(${this.kind}, [${this.names().join(', ')}], ${this.index.describe()})`;
    }
}

function assertChildName(name: string): void {
    if (name.trim() === '') {
        throw new ShapeError('Child names must not be empty');
    }
    if (PFLINE_CONFIG.RESERVED_CHILD_NAMES.some((reserved) => reserved === name)) {
        throw new ShapeError(`'${name}' is a dimension tag and cannot name a child`, { name });
    }
}

function isIterable(value: ChildEntries | Readonly<Record<string, PfLine>>): value is ChildEntries {
    return Symbol.iterator in value;
}
