/**
 * Settings for linetrace.
 *
 * Every option has a built-in default. User settings come from a JSON object
 * file (or a plain object in code), are merged over the defaults and validated
 * as a whole; a value of the wrong type or outside its range is rejected with
 * a ConfigError naming the option, never coerced.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError } from './errors';

/** Environment variable holding the path of the user settings file. */
export const SETTINGS_ENV_VAR = 'LINETRACE_SETTINGS';

const INLINE_SOURCE = '<inline settings>';

export const TraceConfigSchema = z
    .object({
        enabled: z.boolean(),
        sinkTarget: z.string(),

        exceptionWarn: z.boolean(),
        exceptionTraceToSink: z.boolean(),
        exceptionTraceToErrorStream: z.boolean(),
        exceptionForceExit: z.boolean(),

        timeEnabled: z.boolean(),
        timeFormatPattern: z.string(),
        fileColumnEnabled: z.boolean(),
        fileColumnWidth: z.number().int().positive(),
        lineColumnEnabled: z.boolean(),
        lineColumnMinWidth: z.number().int().nonnegative(),
        functionColumnEnabled: z.boolean(),
        functionColumnWidth: z.number().int().positive(),
        qualifyByScope: z.boolean(),

        messageColumnEnabled: z.boolean(),
        messageWidth: z.number().int().nonnegative(),
        messageWrap: z.boolean(),
        messageMarkTruncation: z.boolean(),

        traceOwningInstanceArg: z.boolean(),
        collapseSequences: z.boolean(),
        collapseMappings: z.boolean(),
        maskKeys: z.array(z.string()),

        defaultTraceArgs: z.boolean(),
        defaultTraceReturnValue: z.boolean(),
        defaultTraceReturnType: z.boolean(),
    })
    .strict();

type ParsedConfig = z.infer<typeof TraceConfigSchema>;

/** Validated, frozen option set shared by a tracer, its formatter and its instrumentations. */
export type TraceConfig = Readonly<Omit<ParsedConfig, 'maskKeys'> & { maskKeys: readonly string[] }>;

export const DEFAULT_CONFIG: TraceConfig = Object.freeze({
    enabled: true,
    sinkTarget: 'linetrace.log',

    exceptionWarn: true,
    exceptionTraceToSink: true,
    exceptionTraceToErrorStream: false,
    exceptionForceExit: false,

    timeEnabled: true,
    timeFormatPattern: '%Y-%m-%d %H:%M:%S.%f',
    fileColumnEnabled: true,
    fileColumnWidth: 20,
    lineColumnEnabled: true,
    lineColumnMinWidth: 4,
    functionColumnEnabled: true,
    functionColumnWidth: 32,
    qualifyByScope: true,

    messageColumnEnabled: true,
    messageWidth: 0,
    messageWrap: false,
    messageMarkTruncation: true,

    traceOwningInstanceArg: false,
    collapseSequences: false,
    collapseMappings: false,
    maskKeys: Object.freeze([]),

    defaultTraceArgs: true,
    defaultTraceReturnValue: true,
    defaultTraceReturnType: false,
});

/**
 * Merge `overrides` over the defaults and validate the result.
 * `source` names where the overrides came from and is reported in errors.
 */
export function resolveConfig(overrides: Record<string, unknown> = {}, source: string = INLINE_SOURCE): TraceConfig {
    const result = TraceConfigSchema.safeParse({ ...DEFAULT_CONFIG, ...overrides });
    if (!result.success) {
        throw toConfigError(result.error, source);
    }
    const data = result.data;
    return Object.freeze({ ...data, maskKeys: Object.freeze([...data.maskKeys]) });
}

/** Read a JSON settings file and resolve it over the defaults. */
export function loadConfig(path: string): TraceConfig {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigError(`Could not load settings from ${path}: ${reason}`, path);
    }

    if (!isRecord(raw)) {
        const kind = Array.isArray(raw) ? 'array' : raw === null ? 'null' : typeof raw;
        throw new ConfigError(`Settings in ${path} must be a JSON object, got ${kind}`, path);
    }

    return resolveConfig(raw, path);
}

/**
 * Resolve settings from the file named by `LINETRACE_SETTINGS`, or the
 * defaults when the variable is unset or blank.
 */
export function loadConfigFromEnv(env: Record<string, string | undefined> = process.env): TraceConfig {
    const path = env[SETTINGS_ENV_VAR]?.trim();
    return path ? loadConfig(path) : resolveConfig();
}

/* -------------------------------- Internals -------------------------------- */

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function toConfigError(error: z.ZodError, source: string): ConfigError {
    const issue = error.issues[0];
    if (!issue) {
        return new ConfigError(`Invalid settings in ${source}`, source);
    }

    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
        return new ConfigError(`Unrecognised option in ${source}: ${issue.keys.join(', ')}`, source, issue.keys[0]);
    }

    const option = issue.path.length > 0 ? String(issue.path[0]) : undefined;
    if (option === undefined) {
        return new ConfigError(`Invalid settings in ${source} - ${issue.message}`, source);
    }
    return new ConfigError(`Invalid type/value for ${option} in ${source} - ${issue.message}`, source, option);
}
