import logger from '../utils/logger';
import { CollectingSink, Diagnostic, DiagnosticSink } from './types';

/**
 * Default sink: every diagnostic becomes a winston warning.
 */
export const loggerSink: DiagnosticSink = {
    emit(diagnostic: Diagnostic): void {
        logger.warn(`[${diagnostic.code.toUpperCase()}] ${diagnostic.message}`, diagnostic.context ?? {});
    },
};

export const silentSink: DiagnosticSink = {
    emit(): void {
        // discard
    },
};

export function collectingSink(): CollectingSink {
    const received: Diagnostic[] = [];
    return {
        get diagnostics(): readonly Diagnostic[] {
            return received;
        },
        emit(diagnostic: Diagnostic): void {
            received.push(diagnostic);
        },
        codes() {
            return received.map((d) => d.code);
        },
        clear() {
            received.length = 0;
        },
    };
}

/**
 * Forward every diagnostic to each of the given sinks.
 */
export function teeSink(...sinks: DiagnosticSink[]): DiagnosticSink {
    return {
        emit(diagnostic: Diagnostic): void {
            for (const sink of sinks) sink.emit(diagnostic);
        },
    };
}
