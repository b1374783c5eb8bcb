// src/errors.ts
// Typed faults raised by linetrace itself. Faults thrown by traced callables
// are never wrapped: they are recorded and re-thrown as they are.

export enum ErrorCategory {
    /** Invalid binding arguments or trace options, raised at bind time. */
    USAGE = 'USAGE',
    /** Invalid settings (unknown option, wrong type, out of range), raised at load time. */
    CONFIG = 'CONFIG',
}

export class LinetraceError extends Error {
    readonly category: ErrorCategory;
    readonly context: Record<string, unknown>;

    constructor(message: string, category: ErrorCategory, context?: Record<string, unknown>) {
        super(message);
        this.name = 'LinetraceError';
        this.category = category;
        this.context = context ?? {};

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            message: this.message,
            category: this.category,
            context: this.context,
        };
    }

    /** One-line form for diagnostics output. */
    toLogString(): string {
        const ctx = Object.keys(this.context).length > 0 ? ` context=${JSON.stringify(this.context)}` : '';
        return `[${this.name}] (${this.category}) ${this.message}${ctx}`;
    }
}

/** Wrong use of the binding API: no target, a non-callable target, bad site or options. */
export class TraceUsageError extends LinetraceError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, ErrorCategory.USAGE, context);
        this.name = 'TraceUsageError';
    }
}

/** A settings value failed its type or range check. */
export class ConfigError extends LinetraceError {
    readonly option?: string;
    readonly source: string;

    constructor(message: string, source: string, option?: string) {
        super(message, ErrorCategory.CONFIG, option ? { option, source } : { source });
        this.name = 'ConfigError';
        this.option = option;
        this.source = source;
    }
}

export function isLinetraceError(err: unknown): err is LinetraceError {
    return err instanceof LinetraceError;
}
