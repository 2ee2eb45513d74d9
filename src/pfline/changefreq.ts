import { resampleClassOf, resampleSeries } from '../resample';
import { ops } from '../series';
import { Freq } from '../timeindex';
import { FlatColumns, FlatPfLine } from './flat';
import { COLUMN_DIMENSION, Kind, KIND_INFO } from './kind';

/**
 * Flat line at another frequency.
 *
 * Single-dimension lines resample their one column by its class. COMPLETE lines
 * resample q and r (both summable) and recompute p = r / q, which equals the
 * energy-weighted price; where the resampled volume is zero, the price comes
 * from the derived (energy-weighted, else duration-weighted) average.
 */
export function resampleFlat(line: FlatPfLine, freq: Freq): FlatPfLine {
    if (line.index.freq === freq) return line;
    const { context } = line;

    if (line.kind !== Kind.COMPLETE) {
        const [col] = KIND_INFO[line.kind].stored;
        const how = resampleClassOf(COLUMN_DIMENSION[col], false);
        const out = resampleSeries(line.series(col), freq, how);
        const columns: FlatColumns = {};
        columns[col] = out.values;
        return FlatPfLine.fromColumns(line.kind, out.index, columns, context);
    }

    const q = resampleSeries(line.q, freq, resampleClassOf('energy', true));
    const r = resampleSeries(line.r, freq, resampleClassOf('revenue', true));
    const fallback = resampleSeries(line.p, freq, resampleClassOf('price', true), line.q);
    const p = ops.divideOr(r.values, q.values, fallback.values);
    return FlatPfLine.fromColumns(Kind.COMPLETE, q.index, { q: q.values, p, r: r.values }, context);
}
