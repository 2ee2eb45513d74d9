/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * PF CONTEXT: UNIT REGISTRY, TOLERANCES AND DIAGNOSTICS
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * RULES:
 * 1. A context is immutable once created
 * 2. The default context is built from DEFAULT_CONFIG on first use, then reused
 * 3. Lines remember their context; binary operations use the left operand's
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { DEFAULT_CONFIG } from '../config/default';
import { loggerSink } from '../diagnostics';
import { UnitRegistry } from '../units';
import logger from '../utils/logger';
import { ContextOptions, PfContext } from './types';

export type { PfContext, ContextOptions } from './types';

let defaultContext: PfContext | null = null;

export function createContext(options: ContextOptions = {}): PfContext {
    return Object.freeze({
        units: options.units ?? new UnitRegistry(),
        rtol: options.rtol ?? DEFAULT_CONFIG.RTOL,
        atol: options.atol ?? DEFAULT_CONFIG.ATOL,
        strictShapes: options.strictShapes ?? DEFAULT_CONFIG.STRICT_SHAPES,
        bareNumbers: options.bareNumbers ?? DEFAULT_CONFIG.BARE_NUMBERS,
        diagnostics: options.diagnostics ?? loggerSink,
    });
}

/**
 * Shared context used whenever none is passed explicitly.
 */
export function getDefaultContext(): PfContext {
    if (!defaultContext) {
        defaultContext = createContext();
        logger.debug(
            `[CONTEXT] Default context created (rtol=${defaultContext.rtol}, atol=${defaultContext.atol}, ` +
                `strictShapes=${defaultContext.strictShapes}, bareNumbers=${defaultContext.bareNumbers})`
        );
    }
    return defaultContext;
}
