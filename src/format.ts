import type { TraceConfig } from './config';
import { TOP_LEVEL_SCOPE } from './stack';
import type { TraceContext } from './types';

/* -------------------------------- Constants -------------------------------- */

/** Replaces the last kept character of a truncated message line. */
export const TRUNCATION_MARKER = '\\';

const TAB_SIZE = 8;

const DAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];
const MONTH_NAMES = [
    'January', 'February', 'March', 'April', 'May', 'June',
    'July', 'August', 'September', 'October', 'November', 'December',
];

/* ------------------------------- Formatters -------------------------------- */

/**
 * Render one trace event as text.
 *
 * Columns, each optional: time, file base name (fixed width), declaration line
 * (zero-padded), function name qualified by `qualifier` (fixed width) and the
 * message. Message lines after the first are indented to the message column.
 * The returned block always ends with a line break.
 */
export function formatTraceLine(
    config: TraceConfig,
    context: TraceContext,
    qualifier: string | undefined,
    message: string,
    now: Date = new Date(),
): string {
    let prefix = '';

    if (config.timeEnabled) {
        prefix += formatTimestamp(now, config.timeFormatPattern) + '  ';
    }
    if (config.fileColumnEnabled) {
        prefix += fitColumn(baseName(context.declarationFile), config.fileColumnWidth) + '  ';
    }
    if (config.lineColumnEnabled) {
        prefix += String(context.declarationLine).padStart(config.lineColumnMinWidth, '0') + ': ';
    }
    if (config.functionColumnEnabled) {
        prefix += fitColumn(qualifyName(context.functionName, qualifier), config.functionColumnWidth) + '  ';
    }

    if (!config.messageColumnEnabled) return prefix + '\n';

    return prefix + formatMessage(message, {
        width: config.messageWidth,
        wrap: config.messageWrap,
        markTruncation: config.messageMarkTruncation,
        indent: textWidth(prefix),
    });
}

export interface MessageLayout {
    /** Maximum visible width of a message line; 0 means unlimited. */
    width: number;
    /** Emit every wrapped sub-line (true) or only the first of each line (false). */
    wrap: boolean;
    /** In truncate mode, end a cut line with the truncation marker. */
    markTruncation: boolean;
    /** Columns of padding in front of every message line but the first. */
    indent: number;
}

/**
 * Lay out the message column. The message is split on line breaks first;
 * each line is then wrapped or truncated on its own. Every physical line ends
 * with `\n`, and an empty message still yields one (empty) line.
 */
export function formatMessage(message: string, layout: MessageLayout): string {
    const { width, wrap, markTruncation } = layout;
    const pad = ' '.repeat(layout.indent);
    let out = '';

    splitLines(message).forEach((line, idx) => {
        if (idx !== 0) out += pad;

        if (width === 0) {
            out += line;
        } else {
            const wrapped = wrapText(line, width);
            if (wrapped.length === 0) wrapped.push('');

            if (wrap) {
                out += wrapped[0];
                for (const rest of wrapped.slice(1)) out += '\n' + pad + rest;
            } else if (markTruncation && wrapped.length > 1) {
                if (width > 1) {
                    const kept = wrapText(wrapped[0], width - 1)[0] ?? '';
                    out += padColumn(kept, width - 1) + TRUNCATION_MARKER;
                } else {
                    out += TRUNCATION_MARKER;
                }
            } else {
                out += wrapped[0];
            }
        }

        out += '\n';
    });

    return out;
}

/**
 * Greedy word wrap of a single line to `width` columns, counted in code
 * points so a surrogate pair is never split.
 * - Tabs expand to the next multiple of eight; other whitespace becomes a space.
 * - Words are never split unless one alone is wider than `width`.
 * - Trailing whitespace of every sub-line and leading whitespace of
 *   continuation sub-lines are dropped; a blank line yields no sub-lines.
 */
export function wrapText(text: string, width: number): string[] {
    const chunks = (normaliseWhitespace(text).match(/ +|[^ ]+/g) ?? []).reverse();
    const lines: string[] = [];

    while (chunks.length > 0) {
        const current: string[] = [];
        let currentLen = 0;

        if (lines.length > 0 && isBlank(chunks[chunks.length - 1])) chunks.pop();

        while (chunks.length > 0) {
            const next = chunks[chunks.length - 1];
            const len = textWidth(next);
            if (currentLen + len > width) break;
            current.push(next);
            currentLen += len;
            chunks.pop();
        }

        // Hard-break a word wider than a whole line.
        if (chunks.length > 0 && textWidth(chunks[chunks.length - 1]) > width) {
            const long = Array.from(chunks[chunks.length - 1]);
            const spaceLeft = width < 1 ? 1 : width - currentLen;
            current.push(long.slice(0, spaceLeft).join(''));
            chunks[chunks.length - 1] = long.slice(spaceLeft).join('');
        }

        if (current.length > 0 && isBlank(current[current.length - 1])) current.pop();
        if (current.length > 0) lines.push(current.join(''));
    }

    return lines;
}

/** Split on line breaks; a trailing break adds no empty line, an empty message is one empty line. */
export function splitLines(message: string): string[] {
    if (message === '') return [''];
    const lines = message.split(/\r\n|[\n\r\u2028\u2029]/);
    if (lines.length > 1 && lines[lines.length - 1] === '') lines.pop();
    return lines;
}

/** `scope.name` unless the qualifier is absent or the top-level scope. */
export function qualifyName(functionName: string, qualifier: string | undefined): string {
    return qualifier !== undefined && qualifier !== TOP_LEVEL_SCOPE ? `${qualifier}.${functionName}` : functionName;
}

/**
 * strftime-style timestamp in local time.
 * Supported: %Y %y %m %d %j %H %I %M %S %f %p %a %A %b %B %z %%; anything
 * else is copied through.
 */
export function formatTimestamp(date: Date, pattern: string): string {
    return pattern.replace(/%(.)/g, (match: string, code: string) => {
        switch (code) {
            case 'Y': return String(date.getFullYear()).padStart(4, '0');
            case 'y': return pad2(date.getFullYear() % 100);
            case 'm': return pad2(date.getMonth() + 1);
            case 'd': return pad2(date.getDate());
            case 'j': return String(dayOfYear(date)).padStart(3, '0');
            case 'H': return pad2(date.getHours());
            case 'I': return pad2(date.getHours() % 12 || 12);
            case 'M': return pad2(date.getMinutes());
            case 'S': return pad2(date.getSeconds());
            case 'f': return String(date.getMilliseconds() * 1000).padStart(6, '0');
            case 'p': return date.getHours() < 12 ? 'AM' : 'PM';
            case 'a': return DAY_NAMES[date.getDay()].slice(0, 3);
            case 'A': return DAY_NAMES[date.getDay()];
            case 'b': return MONTH_NAMES[date.getMonth()].slice(0, 3);
            case 'B': return MONTH_NAMES[date.getMonth()];
            case 'z': return utcOffset(date);
            case '%': return '%';
            default: return match;
        }
    });
}

/* ----------------------------- Format helpers ------------------------------ */

/** Width of `text` in code points. */
function textWidth(text: string): number {
    return Array.from(text).length;
}

function padColumn(text: string, width: number): string {
    return text + ' '.repeat(Math.max(0, width - textWidth(text)));
}

function fitColumn(text: string, width: number): string {
    const chars = Array.from(text);
    return chars.length > width ? chars.slice(0, width).join('') : padColumn(text, width);
}

function baseName(file: string): string {
    const parts = file.split(/[\\/]/);
    return parts[parts.length - 1];
}

function normaliseWhitespace(text: string): string {
    let out = '';
    let column = 0;
    for (const ch of text) {
        if (ch === '\t') {
            const fill = TAB_SIZE - (column % TAB_SIZE);
            out += ' '.repeat(fill);
            column += fill;
        } else {
            out += /\s/.test(ch) ? ' ' : ch;
            column++;
        }
    }
    return out;
}

function isBlank(chunk: string): boolean {
    return chunk.trim() === '';
}

function pad2(n: number): string {
    return String(n).padStart(2, '0');
}

function dayOfYear(date: Date): number {
    const start = Date.UTC(date.getFullYear(), 0, 1);
    const today = Date.UTC(date.getFullYear(), date.getMonth(), date.getDate());
    return (today - start) / 86_400_000 + 1;
}

function utcOffset(date: Date): string {
    const offset = -date.getTimezoneOffset();
    const sign = offset >= 0 ? '+' : '-';
    const abs = Math.abs(offset);
    return `${sign}${pad2(Math.floor(abs / 60))}${pad2(abs % 60)}`;
}
