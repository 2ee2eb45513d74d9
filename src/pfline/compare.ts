import { ops } from '../series';
import { isPfLine } from './guards';
import { KIND_INFO } from './kind';
import { PfLine } from './types';

export interface Tolerance {
    rtol?: number;
    atol?: number;
}

/**
 * Same kind, structure and index, and values within tolerance. Nested lines
 * must have the same child names (in any order) with equal children.
 */
export function linesEqual(a: PfLine, b: unknown, tolerance: Tolerance = {}): boolean {
    if (!isPfLine(b)) return false;
    if (a === b) return true;
    if (a.kind !== b.kind || !a.index.equals(b.index)) return false;

    if (a.structure === 'nested' && b.structure === 'nested') {
        if (a.size !== b.size) return false;
        return a.children().every(([name, child]) => b.has(name) && linesEqual(child, b.child(name), tolerance));
    }
    if (a.structure === 'flat' && b.structure === 'flat') {
        const rtol = tolerance.rtol ?? a.context.rtol;
        const atol = tolerance.atol ?? a.context.atol;
        return KIND_INFO[a.kind].stored.every((col) => ops.allClose(a.column(col), b.column(col), rtol, atol));
    }
    return false;
}

/**
 * All volumes and revenues (or, for PRICE lines, all prices) are zero.
 */
export function isZeroLine(line: PfLine): boolean {
    const flat = line.flatten();
    return KIND_INFO[flat.kind].summable.every((col) => ops.isAllZero(flat.column(col), flat.context.atol));
}
