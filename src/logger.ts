// src/logger.ts
// Diagnostics logger for linetrace itself (not the trace file).
// - Tiny, predictable, pluggable sinks with console fallback.
// - Strict level gating with a separate WARN gate, so warnings stay visible
//   when the base level is ERROR.

/* ---------------------------------- Types ---------------------------------- */

/**
 * Output function signature used by sinks.
 * The logger calls a sink with a final, display-ready message and an optional structured payload.
 */
export type Sink = (msg: string, data?: unknown) => void;

export enum LogLevel {
    NONE = 0,
    ERROR = 1,
    INFO = 2,
    DEBUG = 3,
}

export interface ILogger {
    /**
     * Gets the current effective level.
     * Specified or resolved from `CreateLoggerOptions.level` or environment (`DEBUG_MODE` → `LOG_LEVEL` → `NODE_ENV`).
     * Note: WARN uses its own gate (`warnLevel` - default ERROR).
     */
    readonly level: LogLevel;

    /** Set the runtime level. Returns true if changed. */
    setLevel(l: LogLevel): boolean;

    /** Log an error (visible when `level >= ERROR`). */
    error(msg: string, data?: unknown): void;

    /** Log a warning; visible when `level >= warnLevel`. */
    warn(msg: string, data?: unknown): void;

    /** Log info (visible when `level >= INFO`). */
    info(msg: string, data?: unknown): void;

    /** Log debug (visible when `level >= DEBUG`). */
    debug(msg: string, data?: unknown): void;
}

export type CreateLoggerOptions = {
    /**
     * Optional custom sinks, per level.
     * Levels without a sink fall back to console.error / warn / info / debug.
     * `null` makes a no-op logger.
     */
    sinks?: {
        error?: Sink;
        warn?: Sink;
        info?: Sink;
        debug?: Sink;
    } | null;

    /**
     * Explicit base level for ERROR/INFO/DEBUG gating (WARN uses `warnLevel`).
     * If omitted, resolves from env:
     * - `DEBUG_MODE=1|true|yes|on` => DEBUG
     * - `LOG_LEVEL=NONE|ERROR|INFO|DEBUG|0..3`
     * - Otherwise: `NODE_ENV=production` => `prodDefault` (default ERROR), else INFO.
     */
    level?: LogLevel;

    /** Optional prefixes applied to message text, e.g. `[linetrace]`. */
    levelTags?: {
        error?: string;
        warn?: string;
        info?: string;
        debug?: string;
    } | null;

    /** Separate gate for `warn()`. Default: ERROR. */
    warnLevel?: LogLevel;

    /** Environment bag used for level resolution; defaults to `process.env`. */
    env?: Record<string, string | undefined>;

    /** Base level under `NODE_ENV=production`. Default: ERROR. */
    prodDefault?: LogLevel;
};

/* ------------------------------- Env helpers ------------------------------- */

/**
 * Resolve a string into a `LogLevel`.
 * Accepts: 'NONE'|'ERROR'|'INFO'|'DEBUG' or a 0..3 number as string.
 */
export function parseLogLevel(s?: string): LogLevel | undefined {
    if (!s) return undefined;
    switch (s.trim().toUpperCase()) {
        case 'NONE': return LogLevel.NONE;
        case 'ERROR': return LogLevel.ERROR;
        case 'INFO': return LogLevel.INFO;
        case 'DEBUG': return LogLevel.DEBUG;
    }
    const n = Number(s);
    if (!Number.isFinite(n)) return undefined;
    const clamped = Math.max(0, Math.min(3, Math.trunc(n)));
    return clamped === 0 ? LogLevel.NONE : clamped === 1 ? LogLevel.ERROR : clamped === 2 ? LogLevel.INFO : LogLevel.DEBUG;
}

/**
 * Resolve the base level in the following order:
 * 1) Explicit `level`
 * 2) `DEBUG_MODE=1|true|yes|on` → DEBUG
 * 3) `LOG_LEVEL=<NONE|ERROR|INFO|DEBUG|0..3>` ('WARN' means use `warnLevel`)
 * 4) `NODE_ENV=production` → `prodDefault` (default ERROR), else INFO
 */
export function resolveLevel(
    explicit: LogLevel | undefined,
    warnLevel: LogLevel,
    env?: Record<string, string | undefined>,
    prodDefault?: LogLevel,
): LogLevel {
    if (explicit !== undefined) return explicit;

    const dm = env?.DEBUG_MODE?.trim().toLowerCase();
    if (dm === '1' || dm === 'true' || dm === 'yes' || dm === 'on') return LogLevel.DEBUG;

    const level = env?.LOG_LEVEL?.trim().toUpperCase() === 'WARN' ? warnLevel : parseLogLevel(env?.LOG_LEVEL);
    if (level !== undefined) return level;

    return env?.NODE_ENV?.trim().toLowerCase() === 'production' ? (prodDefault ?? LogLevel.ERROR) : LogLevel.INFO;
}

/* --------------------------------- Factory --------------------------------- */

/**
 * Create a diagnostics logger.
 * - If `sinks` is null => no-op logger.
 * - Custom sinks are used for their levels; other levels fall back to console.*.
 */
export function createLogger(options?: CreateLoggerOptions): ILogger {
    const opts: CreateLoggerOptions = options ?? {};

    const s = opts.sinks;
    const nullSink: Sink = () => {};
    const error: Sink = s === null ? nullSink : s?.error ?? console.error;
    const warn: Sink = s === null ? nullSink : s?.warn ?? console.warn;
    const info: Sink = s === null ? nullSink : s?.info ?? console.info;
    const debug: Sink = s === null ? nullSink : s?.debug ?? console.debug;

    const env = opts.env ?? process.env;
    const warnLevel = opts.warnLevel ?? LogLevel.ERROR;
    let level = resolveLevel(opts.level, warnLevel, env, opts.prodDefault);

    const labels = opts.levelTags;
    const fmt = (tag?: string) => (tag ? (m: string) => `${tag} ${m}` : (m: string) => m);
    const msgError = fmt(labels?.error);
    const msgWarn = fmt(labels?.warn);
    const msgInfo = fmt(labels?.info);
    const msgDebug = fmt(labels?.debug);

    const out = (sink: Sink, msg: string, data: unknown) => {
        if (data === undefined) sink(msg);
        else sink(msg, data);
    };

    return {
        get level() { return level; },
        setLevel(l: LogLevel): boolean {
            if (level === l) return false;
            level = l;
            return true;
        },
        error(msg, data) { if (level >= LogLevel.ERROR) out(error, msgError(msg), data); },
        warn(msg, data) { if (level >= warnLevel) out(warn, msgWarn(msg), data); },
        info(msg, data) { if (level >= LogLevel.INFO) out(info, msgInfo(msg), data); },
        debug(msg, data) { if (level >= LogLevel.DEBUG) out(debug, msgDebug(msg), data); },
    };
}
