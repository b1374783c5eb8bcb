// src/callsite.ts
// Fallback call-site capture for registrations that do not name their file
// and line. Reads the V8 stack text; explicit metadata always wins.

export interface CallSite {
    file: string;
    line: number;
    functionName?: string;
}

const FRAME = /^\s*at\s+(?:(.*?)\s+\()?(.+?):(\d+):\d+\)?\s*$/;

/**
 * Call site of whoever called `above`. Frames of `above` and everything it
 * called are skipped. Returns `undefined` when no frame can be read.
 */
export function captureCallSite(above: (...args: never[]) => unknown): CallSite | undefined {
    const holder: { stack?: string } = {};
    Error.captureStackTrace(holder, above);

    for (const frame of (holder.stack ?? '').split('\n').slice(1)) {
        const site = parseStackFrame(frame);
        if (site) return site;
    }
    return undefined;
}

/** Parse one `    at fn (file:line:col)` line of a V8 stack trace. */
export function parseStackFrame(frame: string): CallSite | undefined {
    const m = FRAME.exec(frame);
    if (!m) return undefined;

    const file = m[2].replace(/^file:\/\//, '');
    const line = Number(m[3]);
    const functionName = m[1] ? simpleName(m[1]) : undefined;

    return functionName ? { file, line, functionName } : { file, line };
}

function simpleName(raw: string): string | undefined {
    const name = raw.replace(/^(?:async|new)\s+/, '').split(' ')[0];
    const last = name.split('.').pop();
    return !last || last === '<anonymous>' ? undefined : last;
}
