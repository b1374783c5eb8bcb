/**
 * Where and what a traced callable is. Captured once at bind time and
 * shared read-only by every invocation.
 */
export interface TraceContext {
    readonly declarationFile: string;
    readonly declarationLine: number;
    /** Enclosing class or object name; absent for top-level callables. */
    readonly scopeName?: string;
    readonly functionName: string;
}

/**
 * Call-site metadata supplied at registration. Any field left out is
 * filled in: file and line from the registering call site, the function
 * name from the target, parameters from the target's source text.
 */
export interface TraceSite {
    file?: string;
    line?: number;
    scope?: string;
    name?: string;
    /** Parameter names in declaration order; a leading `...` marks a rest parameter. */
    params?: readonly string[];
}

/** One declared parameter of a traced callable. */
export interface ParameterSpec {
    readonly name: string;
    /** Source text of the default value, if the parameter has one. */
    readonly defaultText?: string;
    readonly rest: boolean;
}

/** Per-callable overrides of the tracer's `default*` and `exception*` settings. */
export interface TraceOptions {
    traceArgs?: boolean;
    traceReturnValue?: boolean;
    traceReturnType?: boolean;
    exceptionWarn?: boolean;
    exceptionTraceToSink?: boolean;
    exceptionTraceToErrorStream?: boolean;
    exceptionForceExit?: boolean;
}

/** Anything text can be written to: a Node stream, a test buffer. */
export interface TextStream {
    write(text: string): unknown;
}

/** Clock source; milliseconds since the epoch. */
export type Clock = () => number;
