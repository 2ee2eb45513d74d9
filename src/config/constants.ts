// Configuration Constants for the portfolio-line algebra

export const PFLINE_CONFIG = {
    // Tolerances: a and b are close when |a - b| <= ATOL + RTOL * |b|
    RTOL: 1e-5,
    ATOL: 1e-8,

    // Child names that would shadow a dimension tag
    RESERVED_CHILD_NAMES: ['w', 'q', 'p', 'r'] as const,

    // ═══════════════════════════════════════════════════════════════════════════
    // FREQUENCIES
    // Ordered from shortest to longest period
    // ═══════════════════════════════════════════════════════════════════════════
    FREQUENCIES: ['15T', 'H', 'D', 'MS', 'QS', 'AS'] as const,

    // Fixed-length periods (ms); the others follow the calendar of the index's timezone
    FIXED_PERIOD_MS: {
        '15T': 15 * 60 * 1000,
        H: 60 * 60 * 1000,
    } as const,

    MS_PER_HOUR: 60 * 60 * 1000,

    // ═══════════════════════════════════════════════════════════════════════════
    // HEDGING
    // Hedged lines must have daily (or shorter) values; products are base products
    // ═══════════════════════════════════════════════════════════════════════════
    HEDGE_SOURCE_FREQUENCIES: ['15T', 'H', 'D'] as const,
    HEDGE_PRODUCT_FREQUENCIES: ['D', 'MS', 'QS', 'AS'] as const,
    HEDGE_DEFAULT_HOW: 'val' as const,
    HEDGE_DEFAULT_FREQ: 'MS' as const,
};
