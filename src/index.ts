/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * PFLINE ALGEBRA: PUBLIC API
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Typed algebra for energy portfolio timeseries: volume, price and revenue
 * lines, their arithmetic and frequency conversion, and portfolio states.
 *
 * RULES:
 * 1. NO runtime work at import time (the default context is built lazily)
 * 2. Everything is immutable; operations return new instances
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

// Errors
export {
    PfError,
    InsufficientDataError,
    ConsistencyError,
    AmbiguousDimensionError,
    ShapeError,
    InvariantError,
    IndexError,
    KeyError,
    UnitError,
} from './core/errors';
export type { PfErrorCode } from './core/errors';

// Configuration and context
export { PFLINE_CONFIG } from './config/constants';
export { DEFAULT_CONFIG, createConfig } from './config/default';
export type { DefaultConfig, BareNumberPolicy } from './config/default';
export { createContext, getDefaultContext } from './context';
export type { PfContext, ContextOptions } from './context';

// Diagnostics
export { loggerSink, silentSink, collectingSink, teeSink } from './diagnostics';
export type { Diagnostic, DiagnosticCode, DiagnosticSink, CollectingSink } from './diagnostics';

// Units
export { UnitRegistry, quantity, isQuantity, parseQuantity, CANONICAL_UNITS, DEFAULT_UNIT_DEFINITIONS } from './units';
export type { Dimension, Quantity, UnitDefinition } from './units';

// Time
export { TimeIndex, FREQUENCIES, isFreq, upOrDown } from './timeindex';
export type { Freq, InstantLike, TimeIndexSpec } from './timeindex';
export { Series, ops } from './series';

// Resampling
export { resampleIndex, resampleSeries, summable, averagable, derived, resampleClassOf } from './resample';
export type { ResampleClass } from './resample';

// Portfolio lines and states
export {
    Kind,
    FlatPfLine,
    NestedPfLine,
    createPfLine,
    isPfLine,
    concat,
} from './pfline';
export type { PfLine, PfLineInput, Operand, Column, CreateOptions, HedgeHow, Tolerance } from './pfline';
export { PfState } from './pfstate';
export type { PfStateOptions, PfStateSeries, PfStateRatios, Factor } from './pfstate';
