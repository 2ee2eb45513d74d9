/**
 * Error taxonomy
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Every failure raised by the portfolio-line algebra is a caller-input error.
 * Nothing is retried and nothing is partially recovered: errors are thrown at the
 * point of violation and carry a machine-readable code plus a context record.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export type PfErrorCode =
    | 'INSUFFICIENT_DATA'
    | 'CONSISTENCY'
    | 'AMBIGUOUS_DIMENSION'
    | 'SHAPE'
    | 'INVARIANT'
    | 'INDEX'
    | 'KEY'
    | 'UNIT';

/**
 * Base class; `reason` is the human-readable part of the message.
 */
export class PfError extends Error {
    constructor(
        public readonly code: PfErrorCode,
        public readonly reason: string,
        public readonly context: Record<string, unknown> = {}
    ) {
        super(`[${code}] ${reason}`);
        this.name = 'PfError';
    }
}

/** Construction input under-determines the kind. */
export class InsufficientDataError extends PfError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super('INSUFFICIENT_DATA', reason, context);
        this.name = 'InsufficientDataError';
    }
}

/** Over-determined input is internally inconsistent beyond tolerance. */
export class ConsistencyError extends PfError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super('CONSISTENCY', reason, context);
        this.name = 'ConsistencyError';
    }
}

/** The dimension of a value cannot be resolved for the requested operation. */
export class AmbiguousDimensionError extends PfError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super('AMBIGUOUS_DIMENSION', reason, context);
        this.name = 'AmbiguousDimensionError';
    }
}

/** Operation outside its {kind, flat/nested} domain. */
export class ShapeError extends PfError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super('SHAPE', reason, context);
        this.name = 'ShapeError';
    }
}

/** Operation would break a structural invariant. */
export class InvariantError extends PfError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super('INVARIANT', reason, context);
        this.name = 'InvariantError';
    }
}

/** Inputs do not share one regular, gapless, left-bound index. */
export class IndexError extends PfError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super('INDEX', reason, context);
        this.name = 'IndexError';
    }
}

export class KeyError extends PfError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super('KEY', reason, context);
        this.name = 'KeyError';
    }
}

/** Unknown unit, or a unit that belongs to another dimension than expected. */
export class UnitError extends PfError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super('UNIT', reason, context);
        this.name = 'UnitError';
    }
}
