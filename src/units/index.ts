export type { Dimension, Quantity, UnitDefinition } from './types';
export { CANONICAL_UNITS, DEFAULT_UNIT_DEFINITIONS } from './definitions';
export { UnitRegistry } from './registry';
export { quantity, isQuantity, parseQuantity } from './quantity';
