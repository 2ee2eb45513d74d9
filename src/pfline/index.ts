/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * PORTFOLIO LINES
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Flat and nested lines of volume, price and revenue, their construction,
 * arithmetic, resampling, concatenation and hedging.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export type { PfLine, Structure, TagValue, TagMapping, ChildMapping, PfLineInput, Operand, HedgeHow } from './types';
export type { CreateOptions } from './create';
export type { FlatColumns } from './flat';
export type { ChildEntries } from './nested';
export type { Tolerance } from './compare';

export { Kind, KIND_INFO, COLUMNS, COLUMN_DIMENSION, hasColumn } from './kind';
export type { Column, StoredColumn } from './kind';
export { FlatPfLine } from './flat';
export { NestedPfLine } from './nested';
export { createPfLine } from './create';
export { isPfLine } from './guards';
export { ratio, scaleLine } from './arithmetic';
export { concat } from './concat';
