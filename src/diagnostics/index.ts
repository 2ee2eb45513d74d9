/**
 * Diagnostics Module
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * PURPOSE: Make the lossy-but-allowed paths of the algebra observable without a
 * global warning stream. The sink is part of the PfContext a line is built with.
 *
 * CODES:
 * - flatten-on-shape-mismatch: flat and nested operands were added; the nested
 *   one was flattened and the result is flat
 * - changes-unsourced-volume: a PfState setter changed the unsourced volume
 * - discarded-information: a PfState input carried dimensions that were dropped
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export type {
    Diagnostic,
    DiagnosticCode,
    DiagnosticSink,
    CollectingSink,
} from './types';

export {
    loggerSink,
    silentSink,
    collectingSink,
    teeSink,
} from './sinks';
