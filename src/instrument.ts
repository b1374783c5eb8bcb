// src/instrument.ts
// Per-callable wrapper: entry, body, then exit or exception.

import type { TraceConfig } from './config';
import { renderValue, typeName, type RenderOptions } from './render';
import { TOP_LEVEL_SCOPE, type CallContextStack, type StackScope } from './stack';
import type { ParameterSpec, TraceContext, TraceOptions } from './types';

/* ---------------------------------- Types ---------------------------------- */

/** Any callable: `A` its arguments, `R` its result, `T` its receiver. */
export type TraceableFunction<A extends unknown[] = never[], R = unknown, T = unknown> =
    (this: T, ...args: A) => R;

/** What an instrumentation needs from the tracer that created it. */
export interface TraceHost {
    readonly config: TraceConfig;
    readonly enabled: boolean;
    readonly scope: StackScope;
    /** Format `message` for `context` (qualified by the current stack top) and write it. */
    emit(context: TraceContext, message: string): void;
    warn(message: string): void;
    writeError(text: string): void;
    /** Flush and end the process. */
    forceExit(): never;
}

export type InstrumentationState = 'bound' | 'active';

export const ENTRY = '-> ENTRY';
export const EXIT = '<- EXIT ';
/** Stands in for arguments or return values that are not traced. */
export const NOT_TRACED = '---';
export const EXCEPTION_OPEN = '--- EXCEPTION ---';
export const EXCEPTION_CLOSE = '-----------------';

/* ----------------------------- Instrumentation ----------------------------- */

/**
 * A callable bound for tracing. Created once per target; every call through
 * `fn`, `invoke` or `call` writes an ENTRY record, runs the target and writes
 * an EXIT record (or an exception record before re-throwing the same fault).
 *
 * Reentrant: recursive and overlapping calls each push and pop their own
 * stack entry; the context is shared read-only.
 */
export class Instrumentation<A extends unknown[], R, T = unknown> {
    /** Drop-in replacement for the target, receiver included. */
    readonly fn: TraceableFunction<A, R, T>;
    private active = 0;

    constructor(
        private readonly host: TraceHost,
        private readonly target: TraceableFunction<A, R, T>,
        readonly context: TraceContext,
        readonly parameters: readonly ParameterSpec[],
        readonly options: Readonly<Required<TraceOptions>>,
    ) {
        const call = this.call.bind(this);
        const fn = function (this: T, ...args: A): R {
            return call(this, ...args);
        };
        Object.defineProperty(fn, 'name', { value: context.functionName });
        this.fn = fn;
    }

    /** 'active' while at least one invocation has not finished. */
    get state(): InstrumentationState {
        return this.active > 0 ? 'active' : 'bound';
    }

    /** Call the target without a receiver. */
    invoke(this: Instrumentation<A, R, undefined>, ...args: A): R {
        return this.call(undefined, ...args);
    }

    /** Call the target with `receiver` as `this`. */
    call(receiver: T, ...args: A): R {
        if (!this.host.enabled) return Reflect.apply(this.target, receiver, args);
        return this.host.scope.run(() => this.run(receiver, args));
    }

    private run(receiver: T, args: A): R {
        const stack = this.host.scope.current();
        stack.push(this.context.scopeName ?? TOP_LEVEL_SCOPE);
        try {
            this.host.emit(this.context, this.entryMessage(receiver, args));
        } catch (err) {
            stack.pop();
            throw err;
        }

        this.active++;
        let result: R;
        try {
            result = Reflect.apply(this.target, receiver, args);
        } catch (err) {
            return this.fail(err, stack);
        }

        if (isThenable(result)) {
            return result.then(
                (value: unknown) => {
                    this.exit(value, stack);
                    return value;
                },
                (err: unknown) => this.fail(err, stack),
            ) as R;
        }

        this.exit(result, stack);
        return result;
    }

    private exit(value: unknown, stack: CallContextStack): void {
        try {
            this.host.emit(this.context, this.exitMessage(value));
        } finally {
            this.active--;
            stack.pop();
        }
    }

    /** Record the fault, then re-throw it (or end the process under force-exit). */
    private fail(err: unknown, stack: CallContextStack): never {
        const category = typeName(err);
        const core = `${category} RAISED`;
        const text = err instanceof Error ? err.message : renderValue(err, this.renderOptions());

        let msg = `${EXIT}: ${core}`;
        if (text !== '') msg += ` - ${text}`;

        try {
            if (this.options.exceptionWarn) this.host.warn(core);

            const trace = stackText(err, category, text);
            if (this.options.exceptionTraceToSink) {
                msg += `\n${EXCEPTION_OPEN}\n${trace}\n${EXCEPTION_CLOSE}`;
            }
            if (this.options.exceptionTraceToErrorStream) {
                this.host.writeError(`${EXCEPTION_OPEN}\n${trace}\n${EXCEPTION_CLOSE}\n`);
            }

            this.host.emit(this.context, msg);
        } catch (sinkErr) {
            this.active--;
            stack.pop();
            throw sinkErr;
        }

        // The process ends here; the stack entry is left in place.
        if (this.options.exceptionForceExit) this.host.forceExit();

        this.active--;
        stack.pop();
        throw err;
    }

    private entryMessage(receiver: unknown, args: readonly unknown[]): string {
        const showReceiver = this.host.config.traceOwningInstanceArg && receiver !== undefined && receiver !== globalThis;
        if (args.length === 0 && !showReceiver) return ENTRY;
        if (!this.options.traceArgs) return `${ENTRY}: ${NOT_TRACED}`;

        const render = this.renderOptions();
        const pairs: string[] = [];
        if (showReceiver) pairs.push(`this = ${renderValue(receiver, render)}`);

        let i = 0;
        for (const param of this.parameters) {
            if (param.rest) {
                pairs.push(`${param.name} = ${renderValue(args.slice(i), render)}`);
                i = args.length;
                break;
            }
            if (i < args.length) pairs.push(`${param.name} = ${renderValue(args[i], render)}`);
            else pairs.push(`${param.name} = ${param.defaultText ?? 'undefined'}`);
            i++;
        }
        for (; i < args.length; i++) pairs.push(`arg${i} = ${renderValue(args[i], render)}`);

        return pairs.length > 0 ? `${ENTRY}: ${pairs.join(', ')}` : ENTRY;
    }

    private exitMessage(value: unknown): string {
        if (value === undefined) return EXIT;

        let msg = `${EXIT}: ${this.options.traceReturnValue ? renderValue(value, this.renderOptions()) : NOT_TRACED}`;
        if (this.options.traceReturnType) msg += ` (type: ${typeName(value)})`;
        return msg;
    }

    private renderOptions(): RenderOptions {
        const config = this.host.config;
        return {
            collapseSequences: config.collapseSequences,
            collapseMappings: config.collapseMappings,
            maskKeys: config.maskKeys,
        };
    }
}

/* -------------------------------- Helpers ---------------------------------- */

function isThenable(v: unknown): v is PromiseLike<unknown> {
    return (typeof v === 'object' || typeof v === 'function') && v !== null && typeof Reflect.get(v, 'then') === 'function';
}

function stackText(err: unknown, category: string, text: string): string {
    if (err instanceof Error && typeof err.stack === 'string' && err.stack !== '') return err.stack;
    return text === '' ? category : `${category}: ${text}`;
}
