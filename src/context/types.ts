import { BareNumberPolicy } from '../config/default';
import { DiagnosticSink } from '../diagnostics';
import { UnitRegistry } from '../units';

/**
 * Everything the algebra needs from its surroundings. Built once, then frozen;
 * every line keeps a reference to the context it was built with.
 */
export interface PfContext {
    readonly units: UnitRegistry;

    /** Relative and absolute tolerance for consistency checks and comparisons */
    readonly rtol: number;
    readonly atol: number;

    /** Throw ShapeError instead of flattening when flat and nested lines are added */
    readonly strictShapes: boolean;

    /** Treatment of unit-less values under a dimension tag */
    readonly bareNumbers: BareNumberPolicy;

    readonly diagnostics: DiagnosticSink;
}

export type ContextOptions = Partial<PfContext>;
