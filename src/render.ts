// src/render.ts
// Text form of argument and return values in trace records.

/* ---------------------------------- Types ---------------------------------- */

export type RenderOptions = {
    /** Render arrays and sets as `[ len=N ]`. */
    collapseSequences: boolean;
    /** Render plain objects and maps as `{ len=N }`. */
    collapseMappings: boolean;
    /** Property and map keys whose values are replaced by `mask`. */
    maskKeys?: readonly string[];
    /** Replacement for masked values; default '***' */
    mask?: string;
    /** Max nesting rendered; deeper values show as '[DepthLimit]'. Default: 8 */
    maxDepth?: number;
};

type RenderState = {
    seen: WeakSet<object>;
    maskSet: ReadonlySet<string>;
    mask: string;
    maxDepth: number;
    collapseSequences: boolean;
    collapseMappings: boolean;
};

/* ------------------------------- Render core ------------------------------- */

/**
 * Render a value for a trace record. Top-level strings are written raw;
 * strings nested in containers are single-quoted.
 */
export function renderValue(value: unknown, opts: RenderOptions): string {
    const state: RenderState = {
        seen: new WeakSet<object>(),
        maskSet: new Set(opts.maskKeys ?? []),
        mask: opts.mask ?? '***',
        maxDepth: opts.maxDepth ?? 8,
        collapseSequences: opts.collapseSequences,
        collapseMappings: opts.collapseMappings,
    };
    return typeof value === 'string' ? value : renderNode(value, state, 0);
}

/** Runtime type name shown by `(type: ...)` annotations. */
export function typeName(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'Array';
    if (typeof value === 'function') return 'Function';
    if (typeof value === 'object') return constructorName(value) ?? 'Object';
    return typeof value;
}

function renderNode(value: unknown, s: RenderState, depth: number): string {
    if (value === null) return 'null';
    if (typeof value !== 'object') return renderPrimitive(value);

    // Leaf objects first: no recursion, no cycle bookkeeping.
    if (value instanceof Date) return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
    if (value instanceof Error) return value.message ? `${value.name}: ${value.message}` : value.name;
    if (value instanceof ArrayBuffer || value instanceof DataView) {
        const name = constructorName(value) ?? 'ArrayBuffer';
        return `[${name} ${value.byteLength} bytes]`;
    }

    if (depth >= s.maxDepth) return '[DepthLimit]';
    if (s.seen.has(value)) return '[Circular]';
    s.seen.add(value);

    try {
        if (Array.isArray(value)) {
            if (s.collapseSequences) return `[ len=${value.length} ]`;
            const items: unknown[] = value;
            return `[${items.map((item) => renderNode(item, s, depth + 1)).join(', ')}]`;
        }
        if (isTypedArray(value)) {
            if (s.collapseSequences) return `[ len=${value.length} ]`;
            return `[${Array.from(value, (item) => renderPrimitive(item)).join(', ')}]`;
        }
        if (value instanceof Set) {
            if (s.collapseSequences) return `[ len=${value.size} ]`;
            const items: string[] = [];
            for (const item of value) items.push(renderNode(item, s, depth + 1));
            return `[${items.join(', ')}]`;
        }
        if (value instanceof Map) {
            if (s.collapseMappings) return `{ len=${value.size} }`;
            const pairs: string[] = [];
            for (const [k, v] of value) {
                const masked = typeof k === 'string' && s.maskSet.has(k);
                pairs.push(`${renderNode(k, s, depth + 1)}: ${masked ? s.mask : renderNode(v, s, depth + 1)}`);
            }
            return `{${pairs.join(', ')}}`;
        }

        const plain = isPlainObject(value);
        const keys = Object.keys(value);
        if (plain && s.collapseMappings) return `{ len=${keys.length} }`;

        const fields: string[] = [];
        for (const k of keys) {
            let text: string;
            try {
                text = s.maskSet.has(k) ? s.mask : renderNode(Reflect.get(value, k), s, depth + 1);
            } catch {
                text = '[GetterError]';
            }
            fields.push(`${k}: ${text}`);
        }
        const body = `{${fields.join(', ')}}`;
        return plain ? body : `${constructorName(value) ?? 'Object'} ${body}`;
    } finally {
        // Shared references that are not cycles render in full each time.
        s.seen.delete(value);
    }
}

/* ------------------------------- Internals --------------------------------- */

function renderPrimitive(value: unknown): string {
    switch (typeof value) {
        case 'string': return quote(value);
        case 'bigint': return `${value}n`;
        case 'symbol': return value.toString();
        case 'function': return `[Function ${value.name || '(anonymous)'}]`;
        default: return String(value);
    }
}

function quote(s: string): string {
    return `'${s.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/** Typed arrays; DataView is handled with the raw buffers. */
function isTypedArray(v: object): v is ArrayLike<number | bigint> {
    return ArrayBuffer.isView(v) && !(v instanceof DataView);
}

/** Fast plain-object detection (no prototype or direct Object prototype) */
function isPlainObject(v: object): boolean {
    const proto: unknown = Object.getPrototypeOf(v);
    return proto === Object.prototype || proto === null;
}

function constructorName(obj: object): string | undefined {
    const ctor: unknown = Reflect.get(obj, 'constructor');
    return typeof ctor === 'function' && ctor.name ? ctor.name : undefined;
}
