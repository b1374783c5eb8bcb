// src/params.ts
// Declared parameters of a traced callable, read from its source text or
// from an explicit list given at registration.

import type { ParameterSpec } from './types';

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;
const BARE_ARROW = /^(?:async\s+)?([A-Za-z_$][\w$]*)\s*=>/;

/**
 * Parameters of `fn` in declaration order. Destructured parameters get the
 * positional name `arg<i>`. Native, bound and class sources yield none.
 */
export function parseParameters(fn: (...args: never[]) => unknown): ParameterSpec[] {
    const source = stripComments(Function.prototype.toString.call(fn)).trim();
    if (source.startsWith('class') || source.includes('[native code]')) return [];

    const bare = BARE_ARROW.exec(source);
    if (bare) return [{ name: bare[1], rest: false }];

    const list = extractParameterList(source);
    return list === undefined ? [] : toSpecs(splitTopLevel(list));
}

/** Parameters from an explicit list such as `['a', 'b = 2', '...rest']`. */
export function parameterSpecsFrom(names: readonly string[]): ParameterSpec[] {
    return toSpecs(names);
}

function toSpecs(pieces: readonly string[]): ParameterSpec[] {
    const specs: ParameterSpec[] = [];
    for (const raw of pieces) {
        const piece = raw.trim();
        if (piece === '') continue;

        const rest = piece.startsWith('...');
        const body = rest ? piece.slice(3).trim() : piece;
        const eq = findDefaultOperator(body);
        const target = (eq < 0 ? body : body.slice(0, eq)).trim();
        const name = IDENTIFIER.test(target) ? target : `arg${specs.length}`;

        specs.push(eq < 0 ? { name, rest } : { name, rest, defaultText: body.slice(eq + 1).trim() });
    }
    return specs;
}

/* -------------------------------- Scanning --------------------------------- */

function extractParameterList(source: string): string | undefined {
    const open = source.indexOf('(');
    if (open < 0) return undefined;

    let depth = 0;
    let quote: string | undefined;
    for (let i = open; i < source.length; i++) {
        const ch = source[i];
        if (quote) {
            if (ch === '\\') i++;
            else if (ch === quote) quote = undefined;
            continue;
        }
        if (ch === '"' || ch === "'" || ch === '`') quote = ch;
        else if (ch === '(' || ch === '[' || ch === '{') depth++;
        else if (ch === ')' || ch === ']' || ch === '}') {
            depth--;
            if (depth === 0) return source.slice(open + 1, i);
        }
    }
    return undefined;
}

/** Split on commas that are not nested in brackets or string literals. */
function splitTopLevel(text: string): string[] {
    const parts: string[] = [];
    let depth = 0;
    let quote: string | undefined;
    let start = 0;

    for (let i = 0; i < text.length; i++) {
        const ch = text[i];
        if (quote) {
            if (ch === '\\') i++;
            else if (ch === quote) quote = undefined;
            continue;
        }
        if (ch === '"' || ch === "'" || ch === '`') quote = ch;
        else if (ch === '(' || ch === '[' || ch === '{') depth++;
        else if (ch === ')' || ch === ']' || ch === '}') depth--;
        else if (ch === ',' && depth === 0) {
            parts.push(text.slice(start, i));
            start = i + 1;
        }
    }
    parts.push(text.slice(start));
    return parts;
}

/** Index of the `=` introducing a default value, or -1. */
function findDefaultOperator(piece: string): number {
    let depth = 0;
    for (let i = 0; i < piece.length; i++) {
        const ch = piece[i];
        if (ch === '(' || ch === '[' || ch === '{') depth++;
        else if (ch === ')' || ch === ']' || ch === '}') depth--;
        else if (ch === '=' && depth === 0) return i;
    }
    return -1;
}

function stripComments(source: string): string {
    return source.replace(/\/\*[\s\S]*?\*\//g, '').replace(/\/\/[^\n]*/g, '');
}
