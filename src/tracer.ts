/**
 * The tracer: one configuration, one sink, one stack scope.
 *
 * ```ts
 * const tracer = createTracer({ config: resolveConfig({ sinkTarget: 'app.trace' }) });
 * const add = tracer.bind(function add(a: number, b: number) { return a + b; }, { file: 'math.ts', line: 3 });
 * add.fn(2, 3); // writes "-> ENTRY: a = 2, b = 3" and "<- EXIT : 5"
 * ```
 */

import { captureCallSite } from './callsite';
import { loadConfigFromEnv, type TraceConfig } from './config';
import { TraceUsageError } from './errors';
import { formatTraceLine } from './format';
import { Instrumentation, type TraceableFunction, type TraceHost } from './instrument';
import { createLogger, type ILogger } from './logger';
import { parameterSpecsFrom, parseParameters } from './params';
import { renderValue, typeName } from './render';
import { FileSink, NoOpSink, type TraceSink } from './sinks';
import { AsyncStackScope, TOP_LEVEL_SCOPE, type StackScope } from './stack';
import type { Clock, TextStream, TraceContext, TraceOptions, TraceSite } from './types';

/* ---------------------------------- Types ---------------------------------- */

export type TracerOptions = {
    /** Validated settings. Default: resolved from `LINETRACE_SETTINGS` or the built-in defaults. */
    config?: TraceConfig;
    /** Where trace blocks go. Default: a FileSink on `config.sinkTarget` (a NoOpSink when disabled). */
    sink?: TraceSink;
    /**
     * Stack lookup. Default: AsyncStackScope, one stack per async call chain.
     * SharedStackScope skips the fork per call but only suits a single chain.
     */
    scope?: StackScope;
    /** Receives the library's own warnings. Default: Node process warnings. */
    logger?: ILogger;
    /** Receives exception stack traces when `exceptionTraceToErrorStream` is set. Default: process.stderr */
    errorStream?: TextStream;
    /** Clock source. Default: Date.now */
    now?: Clock;
    /** Ends the process under `exceptionForceExit`. Default: process.exit */
    terminate?: (code: number) => never;
};

/** Creates instrumentations with a fixed set of trace options. */
export interface Binder {
    /**
     * Bind exactly one callable. `site` supplies declaration file, line, scope
     * and name; anything missing is taken from the registering call site and
     * the target itself.
     */
    bind<A extends unknown[], R, T = unknown>(target: TraceableFunction<A, R, T>, site?: TraceSite): Instrumentation<A, R, T>;
}

export const WARNING_TYPE = 'TraceWarning';

const OPTION_KEYS: ReadonlyArray<keyof TraceOptions> = [
    'traceArgs',
    'traceReturnValue',
    'traceReturnType',
    'exceptionWarn',
    'exceptionTraceToSink',
    'exceptionTraceToErrorStream',
    'exceptionForceExit',
];

/* --------------------------------- Tracer ---------------------------------- */

export class Tracer implements TraceHost, Binder {
    readonly config: TraceConfig;
    readonly scope: StackScope;
    readonly sink: TraceSink;
    readonly logger: ILogger;
    private readonly errorStream: TextStream;
    private readonly now: Clock;
    private readonly terminate: (code: number) => never;

    constructor(options: TracerOptions = {}) {
        this.config = options.config ?? loadConfigFromEnv();
        this.now = options.now ?? Date.now;
        this.logger = options.logger ?? createLogger({
            sinks: { warn: (msg) => process.emitWarning(msg, WARNING_TYPE) },
        });
        this.sink = options.sink ?? (this.config.enabled
            ? new FileSink(this.config.sinkTarget, { now: this.now, logger: this.logger })
            : new NoOpSink());
        this.scope = options.scope ?? new AsyncStackScope();
        this.errorStream = options.errorStream ?? process.stderr;
        this.terminate = options.terminate ?? ((code: number) => process.exit(code));

        if (!this.config.qualifyByScope) this.scope.disable();
    }

    get enabled(): boolean {
        return this.config.enabled;
    }

    bind<A extends unknown[], R, T = unknown>(target: TraceableFunction<A, R, T>, site?: TraceSite): Instrumentation<A, R, T> {
        return this.bindWith({}, target, site, this.bind);
    }

    /** Binder whose instrumentations use `options` over the configured defaults. */
    withOptions(options: TraceOptions): Binder {
        const overrides = validateOptions(options);
        const binder: Binder = {
            bind: (target, site) => this.bindWith(overrides, target, site, binder.bind),
        };
        return binder;
    }

    /**
     * Write a free-form message. The function column shows `site.name`, or the
     * calling function, qualified by the scope of the innermost traced call.
     */
    trace(message: unknown, site: TraceSite = {}): void {
        if (!this.enabled) return;

        const captured = site.file === undefined || site.line === undefined || site.name === undefined
            ? captureCallSite(this.trace)
            : undefined;
        const context: TraceContext = {
            declarationFile: site.file ?? captured?.file ?? '<unknown>',
            declarationLine: site.line ?? captured?.line ?? 0,
            functionName: site.name ?? captured?.functionName ?? TOP_LEVEL_SCOPE,
        };
        const text = typeof message === 'string' ? message : renderValue(message, {
            collapseSequences: this.config.collapseSequences,
            collapseMappings: this.config.collapseMappings,
            maskKeys: this.config.maskKeys,
        });
        this.emit(context, text);
    }

    close(): void {
        this.sink.close();
    }

    /* ------------------------------- TraceHost ------------------------------- */

    emit(context: TraceContext, message: string): void {
        const line = formatTraceLine(this.config, context, this.scope.current().peek(), message, new Date(this.now()));
        this.sink.write(line);
    }

    warn(message: string): void {
        this.logger.warn(message);
    }

    writeError(text: string): void {
        this.errorStream.write(text);
    }

    forceExit(): never {
        this.logger.warn('Exit forced by exceptionForceExit');
        this.sink.close();
        return this.terminate(1);
    }

    /* -------------------------------- Binding -------------------------------- */

    private bindWith<A extends unknown[], R, T>(
        overrides: TraceOptions,
        target: TraceableFunction<A, R, T>,
        site: TraceSite | undefined,
        entry: (...args: never[]) => unknown,
    ): Instrumentation<A, R, T> {
        // Untyped callers can still pass anything here.
        const candidate: unknown = target;
        if (!isCallable(candidate)) {
            throw new TraceUsageError(`bind() needs exactly one callable target, got ${typeName(candidate)}`);
        }
        const meta = validateSite(site);

        const captured = meta.file === undefined || meta.line === undefined ? captureCallSite(entry) : undefined;
        const context: TraceContext = Object.freeze({
            declarationFile: meta.file ?? captured?.file ?? '<unknown>',
            declarationLine: meta.line ?? captured?.line ?? 0,
            scopeName: meta.scope,
            functionName: meta.name ?? (target.name || '<anonymous>'),
        });
        const parameters = Object.freeze(meta.params ? parameterSpecsFrom(meta.params) : parseParameters(target));

        return new Instrumentation(this, target, context, parameters, Object.freeze({
            traceArgs: overrides.traceArgs ?? this.config.defaultTraceArgs,
            traceReturnValue: overrides.traceReturnValue ?? this.config.defaultTraceReturnValue,
            traceReturnType: overrides.traceReturnType ?? this.config.defaultTraceReturnType,
            exceptionWarn: overrides.exceptionWarn ?? this.config.exceptionWarn,
            exceptionTraceToSink: overrides.exceptionTraceToSink ?? this.config.exceptionTraceToSink,
            exceptionTraceToErrorStream: overrides.exceptionTraceToErrorStream ?? this.config.exceptionTraceToErrorStream,
            exceptionForceExit: overrides.exceptionForceExit ?? this.config.exceptionForceExit,
        }));
    }
}

/** Create a tracer; see TracerOptions for the defaults. */
export function createTracer(options?: TracerOptions): Tracer {
    return new Tracer(options);
}

/**
 * Bind every own method of `ctor.prototype` in place, with the class name as
 * scope. Getters, setters and the constructor are left alone.
 */
export function traceMethods(
    binder: Binder,
    ctor: abstract new (...args: never[]) => object,
    site: Pick<TraceSite, 'file' | 'line'> = {},
): void {
    const captured = site.file === undefined || site.line === undefined ? captureCallSite(traceMethods) : undefined;
    const proto: object = ctor.prototype;

    for (const key of Object.getOwnPropertyNames(proto)) {
        if (key === 'constructor') continue;
        const desc = Object.getOwnPropertyDescriptor(proto, key);
        const method: unknown = desc?.value;
        if (!desc || !isCallable(method)) continue;

        const bound = binder.bind(method, {
            file: site.file ?? captured?.file ?? '<unknown>',
            line: site.line ?? captured?.line ?? 0,
            scope: ctor.name,
            name: key,
        });
        Object.defineProperty(proto, key, { ...desc, value: bound.fn });
    }
}

/* -------------------------------- Validation ------------------------------- */

function isCallable(v: unknown): v is TraceableFunction {
    return typeof v === 'function';
}

function validateSite(site: unknown): TraceSite {
    if (site === undefined) return {};
    if (typeof site === 'function') {
        throw new TraceUsageError('bind() takes a single target; got a second callable where call-site metadata was expected');
    }
    if (typeof site !== 'object' || site === null) {
        throw new TraceUsageError(`bind() call-site metadata must be an object, got ${typeName(site)}`);
    }

    return {
        file: optionalString(site, 'file'),
        line: optionalLine(site),
        scope: optionalString(site, 'scope'),
        name: optionalString(site, 'name'),
        params: optionalParams(site),
    };
}

function optionalString(site: object, field: string): string | undefined {
    const value: unknown = Reflect.get(site, field);
    if (value === undefined || typeof value === 'string') return value;
    throw siteError(field, 'a string', value);
}

function optionalLine(site: object): number | undefined {
    const value: unknown = Reflect.get(site, 'line');
    if (value === undefined) return undefined;
    if (typeof value === 'number' && Number.isInteger(value) && value >= 0) return value;
    throw siteError('line', 'a non-negative integer', value);
}

function optionalParams(site: object): string[] | undefined {
    const value: unknown = Reflect.get(site, 'params');
    if (value === undefined) return undefined;
    if (Array.isArray(value) && value.every((p) => typeof p === 'string')) return value.map(String);
    throw siteError('params', 'an array of strings', value);
}

function siteError(field: string, expected: string, got: unknown): TraceUsageError {
    return new TraceUsageError(`Invalid call-site ${field}: should be ${expected}, is ${renderValue(got, {
        collapseSequences: false,
        collapseMappings: false,
    })}`, { field });
}

function validateOptions(options: unknown): TraceOptions {
    if (typeof options !== 'object' || options === null || Array.isArray(options)) {
        throw new TraceUsageError(`Trace options must be an object, got ${typeName(options)}`);
    }

    const out: TraceOptions = {};
    for (const key of Object.keys(options)) {
        const option = OPTION_KEYS.find((k) => k === key);
        if (option === undefined) {
            throw new TraceUsageError(`Unrecognised trace option: ${key}`, { option: key });
        }
        const value: unknown = Reflect.get(options, key);
        if (typeof value !== 'boolean') {
            throw new TraceUsageError(`Invalid type for ${key} - should be bool, is type ${typeName(value)}`, { option: key });
        }
        out[option] = value;
    }
    return out;
}
