/**
 * Kind - which dimensions a portfolio line carries
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * VOLUME    w, q        (q stored, w = q / duration)
 * PRICE     p
 * REVENUE   r
 * COMPLETE  w, q, p, r  (q, p, r stored; any two determine the third, r = p × q)
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { Dimension } from '../units';

export enum Kind {
    VOLUME = 'VOLUME',
    PRICE = 'PRICE',
    REVENUE = 'REVENUE',
    COMPLETE = 'COMPLETE',
}

/** Dimension tag */
export type Column = 'w' | 'q' | 'p' | 'r';

/** Columns a flat line keeps in memory */
export type StoredColumn = 'q' | 'p' | 'r';

export const COLUMNS: readonly Column[] = ['w', 'q', 'p', 'r'];

export const COLUMN_DIMENSION: Readonly<Record<Column, Dimension>> = {
    w: 'power',
    q: 'energy',
    p: 'price',
    r: 'revenue',
};

interface KindInfo {
    /** Columns that can be read from a line of this kind */
    available: readonly Column[];

    /** Columns stored by a flat line of this kind */
    stored: readonly StoredColumn[];

    /** Columns that add up when lines (or children) are summed */
    summable: readonly StoredColumn[];
}

export const KIND_INFO: Readonly<Record<Kind, KindInfo>> = {
    [Kind.VOLUME]: { available: ['w', 'q'], stored: ['q'], summable: ['q'] },
    [Kind.PRICE]: { available: ['p'], stored: ['p'], summable: ['p'] },
    [Kind.REVENUE]: { available: ['r'], stored: ['r'], summable: ['r'] },
    [Kind.COMPLETE]: { available: ['w', 'q', 'p', 'r'], stored: ['q', 'p', 'r'], summable: ['q', 'r'] },
};

export function isColumn(value: string): value is Column {
    return COLUMNS.some((col) => col === value);
}

export function hasColumn(kind: Kind, column: Column): boolean {
    return KIND_INFO[kind].available.includes(column);
}

/**
 * Kind of a single-dimension line with the given dimension.
 */
export function kindOfDimension(dimension: Dimension): Kind | null {
    switch (dimension) {
        case 'power':
        case 'energy':
            return Kind.VOLUME;
        case 'price':
            return Kind.PRICE;
        case 'revenue':
            return Kind.REVENUE;
        case 'dimensionless':
            return null;
    }
}

/** Tag under which a dimension is supplied */
export function columnOfDimension(dimension: Dimension): Column | null {
    switch (dimension) {
        case 'power':
            return 'w';
        case 'energy':
            return 'q';
        case 'price':
            return 'p';
        case 'revenue':
            return 'r';
        case 'dimensionless':
            return null;
    }
}

/**
 * Kind produced by multiplying or dividing single-dimension kinds; null if the
 * operation changes no kind (or is undefined).
 */
export function productKind(a: Kind, b: Kind): Kind | null {
    const pair = new Set([a, b]);
    return pair.size === 2 && pair.has(Kind.VOLUME) && pair.has(Kind.PRICE) ? Kind.REVENUE : null;
}

export function quotientKind(numerator: Kind, denominator: Kind): Kind | null {
    if (numerator !== Kind.REVENUE) return null;
    if (denominator === Kind.PRICE) return Kind.VOLUME;
    if (denominator === Kind.VOLUME) return Kind.PRICE;
    return null;
}

/**
 * Kind of the union of two distinct single-dimension kinds.
 */
export function unionKind(a: Kind, b: Kind): Kind | null {
    if (a === b || a === Kind.COMPLETE || b === Kind.COMPLETE) return null;
    return Kind.COMPLETE;
}
