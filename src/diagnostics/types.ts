/**
 * Diagnostics - Type Definitions
 *
 * A diagnostic reports an operation that succeeded but lost or replaced
 * information. It is never an error; hard failures are thrown (see core/errors).
 */

export type DiagnosticCode =
    | 'flatten-on-shape-mismatch'   // flat + nested: the nested operand was flattened
    | 'changes-unsourced-volume'    // PfState setter changed the unsourced volume
    | 'discarded-information';      // input carried dimensions that were dropped

export interface Diagnostic {
    code: DiagnosticCode;
    message: string;
    context?: Record<string, unknown>;
}

export interface DiagnosticSink {
    emit(diagnostic: Diagnostic): void;
}

/**
 * Sink that keeps everything it receives.
 */
export interface CollectingSink extends DiagnosticSink {
    readonly diagnostics: readonly Diagnostic[];
    codes(): DiagnosticCode[];
    clear(): void;
}
