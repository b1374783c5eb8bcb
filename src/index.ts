/**
 * linetrace: entry/exit tracing of functions and methods into a
 * fixed-column, human-readable trace file.
 */

export { Tracer, createTracer, traceMethods, WARNING_TYPE } from './tracer';
export type { Binder, TracerOptions } from './tracer';
export {
    Instrumentation,
    ENTRY,
    EXIT,
    NOT_TRACED,
    EXCEPTION_OPEN,
    EXCEPTION_CLOSE,
} from './instrument';
export type { InstrumentationState, TraceableFunction, TraceHost } from './instrument';
export { CallContextStack, SharedStackScope, AsyncStackScope, TOP_LEVEL_SCOPE } from './stack';
export type { StackScope } from './stack';
export {
    formatTraceLine,
    formatMessage,
    formatTimestamp,
    qualifyName,
    splitLines,
    wrapText,
    TRUNCATION_MARKER,
} from './format';
export type { MessageLayout } from './format';
export { renderValue, typeName } from './render';
export type { RenderOptions } from './render';
export { parseParameters, parameterSpecsFrom } from './params';
export { captureCallSite, parseStackFrame } from './callsite';
export type { CallSite } from './callsite';
export {
    DEFAULT_CONFIG,
    SETTINGS_ENV_VAR,
    TraceConfigSchema,
    loadConfig,
    loadConfigFromEnv,
    resolveConfig,
} from './config';
export type { TraceConfig } from './config';
export { FileSink, StreamSink, MemorySink, NoOpSink, fileHeader } from './sinks';
export type { TraceSink, FileSinkOptions } from './sinks';
export { createLogger, LogLevel, parseLogLevel } from './logger';
export type { ILogger, CreateLoggerOptions, Sink } from './logger';
export { LinetraceError, TraceUsageError, ConfigError, ErrorCategory, isLinetraceError } from './errors';
export type { TraceContext, TraceSite, TraceOptions, ParameterSpec, TextStream, Clock } from './types';

// Default export
import { createTracer, traceMethods } from './tracer';
import { resolveConfig } from './config';

export default {
    createTracer,
    traceMethods,
    resolveConfig,
};
