import type { Series } from '../series';
import type { Quantity } from '../units';
import type { FlatPfLine } from './flat';
import type { Column } from './kind';
import type { NestedPfLine } from './nested';

/**
 * A portfolio line: flat (one series bundle) or nested (named children).
 * Switch on `structure` to tell them apart.
 */
export type PfLine = FlatPfLine | NestedPfLine;

export type Structure = PfLine['structure'];

/** Value supplied under a dimension tag */
export type TagValue = number | Quantity | Series;

export type TagMapping = { readonly [C in Column]?: TagValue | null };

export interface ChildMapping {
    readonly [name: string]: PfLineInput;
}

/**
 * Anything a portfolio line can be created from.
 */
export type PfLineInput = PfLine | Series | Quantity | TagMapping | ChildMapping;

/**
 * Right-hand side of an arithmetic operation.
 */
export type Operand = PfLine | Series | Quantity | number;

export type HedgeHow = 'vol' | 'val';
