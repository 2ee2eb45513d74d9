/**
 * FlatPfLine - a single bundle of aligned series
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Stores only the columns of its kind, in canonical units:
 *   VOLUME q · PRICE p · REVENUE r · COMPLETE q, p, r
 * Power is derived on access (w = q / duration in hours).
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { PfContext } from '../context';
import { IndexError, ShapeError } from '../core/errors';
import { Series, ops } from '../series';
import { Freq, InstantLike, TimeIndex } from '../timeindex';
import * as arithmetic from './arithmetic';
import { resampleFlat } from './changefreq';
import { isZeroLine, linesEqual, Tolerance } from './compare';
import { hedgeFlat } from './hedge';
import { Column, COLUMN_DIMENSION, hasColumn, Kind, KIND_INFO, StoredColumn } from './kind';
import { HedgeHow, Operand, PfLine } from './types';

export type FlatColumns = Partial<Record<StoredColumn, Float64Array>>;

export class FlatPfLine {
    readonly structure = 'flat' as const;
    readonly kind: Kind;
    readonly index: TimeIndex;
    readonly context: PfContext;
    private readonly columns: Readonly<FlatColumns>;

    private constructor(kind: Kind, index: TimeIndex, columns: Readonly<FlatColumns>, context: PfContext) {
        this.kind = kind;
        this.index = index;
        this.columns = columns;
        this.context = context;
        Object.freeze(this);
    }

    /**
     * Line from canonical arrays; `columns` must hold exactly what `kind` stores.
     * @internal use createPfLine
     */
    static fromColumns(kind: Kind, index: TimeIndex, columns: FlatColumns, context: PfContext): FlatPfLine {
        const kept: FlatColumns = {};
        for (const col of KIND_INFO[kind].stored) {
            const values = columns[col];
            if (!values) {
                throw new ShapeError(`A ${kind} line needs values for '${col}'`, { kind, column: col });
            }
            if (values.length !== index.length) {
                throw new IndexError(`Column '${col}' has ${values.length} values for ${index.length} periods`, {
                    column: col,
                });
            }
            kept[col] = values;
        }
        return new FlatPfLine(kind, index, Object.freeze(kept), context);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // DIMENSIONS
    // ═══════════════════════════════════════════════════════════════════════════

    get isNested(): false {
        return false;
    }

    /** Raw canonical values of a stored column; do not mutate. */
    column(col: StoredColumn): Float64Array {
        const values = this.columns[col];
        if (!values) {
            throw new ShapeError(`A ${this.kind} line has no '${col}' values`, { kind: this.kind, column: col });
        }
        return values;
    }

    /** Copy of one column as a series in its canonical unit */
    series(col: Column): Series {
        if (!hasColumn(this.kind, col)) {
            throw new ShapeError(`A ${this.kind} line has no ${COLUMN_DIMENSION[col]} information ('${col}')`, {
                kind: this.kind,
                column: col,
            });
        }
        const unit = this.context.units.canonicalUnit(COLUMN_DIMENSION[col]);
        if (col === 'w') {
            return new Series(this.index, ops.divide(this.column('q'), this.index.durations()), unit);
        }
        return new Series(this.index, this.column(col).slice(), unit);
    }

    get w(): Series {
        return this.series('w');
    }

    get q(): Series {
        return this.series('q');
    }

    get p(): Series {
        return this.series('p');
    }

    get r(): Series {
        return this.series('r');
    }

    get volume(): FlatPfLine {
        return this.view(Kind.VOLUME, 'q');
    }

    get price(): FlatPfLine {
        return this.view(Kind.PRICE, 'p');
    }

    get revenue(): FlatPfLine {
        return this.view(Kind.REVENUE, 'r');
    }

    flatten(): FlatPfLine {
        return this;
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

    neg(): FlatPfLine {
        return arithmetic.negFlat(this);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // TIME
    // ═══════════════════════════════════════════════════════════════════════════

    resample(freq: Freq): FlatPfLine {
        return resampleFlat(this, freq);
    }

    slice(start?: InstantLike, end?: InstantLike): FlatPfLine {
        const [from, to] = this.index.locate(start, end);
        return this.subset(from, to);
    }

    /** Same line restricted to `index`, a contiguous part of this index */
    restrictTo(index: TimeIndex): FlatPfLine {
        if (index.equals(this.index)) return this;
        const from = this.index.indexOf(index.first);
        if (!this.index.isCompatible(index) || from === -1 || from + index.length > this.index.length) {
            throw new IndexError('Target index is not part of the line index', {
                line: this.index.describe(),
                target: index.describe(),
            });
        }
        return this.subset(from, from + index.length);
    }

    hedgeWith(price: PfLine, how: HedgeHow = 'val', freq?: Freq): FlatPfLine {
        return hedgeFlat(this, price, how, freq);
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
        return `FlatPfLine(${this.kind}, ${this.index.describe()})`;
    }

    private subset(from: number, to: number): FlatPfLine {
        const index = this.index.subset(from, to);
        if (index === this.index) return this;
        const columns: FlatColumns = {};
        for (const col of KIND_INFO[this.kind].stored) columns[col] = this.column(col).slice(from, to);
        return new FlatPfLine(this.kind, index, Object.freeze(columns), this.context);
    }

    private view(kind: Kind.VOLUME | Kind.PRICE | Kind.REVENUE, col: StoredColumn): FlatPfLine {
        if (this.kind === kind) return this;
        if (this.kind !== Kind.COMPLETE) {
            throw new ShapeError(`A ${this.kind} line has no ${COLUMN_DIMENSION[col]} information`, {
                kind: this.kind,
                requested: kind,
            });
        }
        const columns: FlatColumns = {};
        columns[col] = this.column(col);
        return FlatPfLine.fromColumns(kind, this.index, columns, this.context);
    }
}
