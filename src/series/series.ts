/**
 * Series - a dimensioned timeseries
 *
 * Values over a TimeIndex, tagged with a unit string (or null when unit-less).
 * Inside the algebra, series always carry canonical units. The value array is
 * never mutated after construction; treat `values` as read-only.
 */

import { IndexError } from '../core/errors';
import { InstantLike, TimeIndex } from '../timeindex';
import { Dimension, UnitRegistry } from '../units';
import * as ops from './ops';

export class Series {
    readonly index: TimeIndex;
    readonly values: Float64Array;
    readonly unit: string | null;

    constructor(index: TimeIndex, values: Float64Array, unit: string | null = null) {
        if (values.length !== index.length) {
            throw new IndexError(`Series has ${values.length} values for an index of ${index.length} periods`, {
                values: values.length,
                index: index.length,
            });
        }
        this.index = index;
        this.values = values;
        this.unit = unit;
    }

    /**
     * Series from an array (copied) or a scalar (broadcast).
     */
    static of(index: TimeIndex, values: ArrayLike<number> | number, unit: string | null = null): Series {
        const array =
            typeof values === 'number' ? ops.filled(index.length, values) : Float64Array.from(values);
        return new Series(index, array, unit);
    }

    get length(): number {
        return this.values.length;
    }

    at(position: number): number {
        return this.values[position];
    }

    toArray(): number[] {
        return Array.from(this.values);
    }

    withValues(values: Float64Array, unit: string | null = this.unit): Series {
        return new Series(this.index, values, unit);
    }

    /**
     * Part of the series whose periods start in [start, end).
     */
    slice(start?: InstantLike, end?: InstantLike): Series {
        const [from, to] = this.index.locate(start, end);
        return new Series(this.index.subset(from, to), this.values.slice(from, to), this.unit);
    }

    /**
     * Part of the series on `index`, which must be a contiguous subset of this index.
     */
    restrictTo(index: TimeIndex): Series {
        if (index.equals(this.index)) return this;
        const from = this.index.indexOf(index.first);
        if (!this.index.isCompatible(index) || from === -1 || from + index.length > this.length) {
            throw new IndexError('Target index is not part of the series index', {
                series: this.index.describe(),
                target: index.describe(),
            });
        }
        return new Series(index, this.values.slice(from, from + index.length), this.unit);
    }

    /**
     * Dimension of the unit; null for unit-less series.
     */
    dimension(registry: UnitRegistry): Dimension | null {
        return this.unit === null ? null : registry.dimensionOf(this.unit);
    }

    /**
     * Product with another series on the same index; the unit of the result is
     * the canonical unit of the derived dimension.
     */
    times(other: Series, registry: UnitRegistry): Series {
        const dimension = registry.multiply(this.requireDimension(registry), other.requireDimension(registry));
        return new Series(
            this.index,
            ops.multiply(this.canonicalValues(registry), other.aligned(this.index).canonicalValues(registry)),
            registry.canonicalUnit(dimension)
        );
    }

    dividedBy(other: Series, registry: UnitRegistry): Series {
        const dimension = registry.divide(this.requireDimension(registry), other.requireDimension(registry));
        return new Series(
            this.index,
            ops.divide(this.canonicalValues(registry), other.aligned(this.index).canonicalValues(registry)),
            registry.canonicalUnit(dimension)
        );
    }

    /**
     * Values converted to the canonical unit of their dimension.
     */
    canonicalValues(registry: UnitRegistry): Float64Array {
        if (this.unit === null) return this.values;
        return registry.valuesToCanonical(this.values, this.unit);
    }

    private requireDimension(registry: UnitRegistry): Dimension {
        return this.dimension(registry) ?? 'dimensionless';
    }

    private aligned(index: TimeIndex): Series {
        if (!this.index.equals(index)) {
            throw new IndexError('Series must share one index', {
                left: index.describe(),
                right: this.index.describe(),
            });
        }
        return this;
    }
}
