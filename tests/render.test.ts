import { describe, it, expect } from 'vitest';
import { renderValue, typeName, type RenderOptions } from '../src/render';

const open: RenderOptions = { collapseSequences: false, collapseMappings: false };
const collapsed: RenderOptions = { collapseSequences: true, collapseMappings: true };

describe('renderValue', () => {
    it('writes a top-level string raw', () => {
        expect(renderValue('hello', open)).toBe('hello');
    });

    it('quotes strings inside containers', () => {
        expect(renderValue(['a', 1, null, undefined, true], open)).toBe("['a', 1, null, undefined, true]");
        expect(renderValue(["it's"], open)).toBe("['it\\'s']");
    });

    it('renders nested plain objects', () => {
        expect(renderValue({ a: 1, b: { c: 'x' } }, open)).toBe("{a: 1, b: {c: 'x'}}");
    });

    it('renders maps and sets', () => {
        expect(renderValue(new Map<unknown, unknown>([['k', 1], [2, 'v']]), open)).toBe("{'k': 1, 2: 'v'}");
        expect(renderValue(new Set([1, 2]), open)).toBe('[1, 2]');
        expect(renderValue(new Uint8Array([7, 8]), open)).toBe('[7, 8]');
    });

    it('prefixes class instances with the class name', () => {
        class Point {
            x = 1;
            y = 2;
        }
        expect(renderValue(new Point(), open)).toBe('Point {x: 1, y: 2}');
    });

    it('collapses sequences and mappings to their length', () => {
        expect(renderValue([1, 2, 3], collapsed)).toBe('[ len=3 ]');
        expect(renderValue(new Set(['a', 'b']), collapsed)).toBe('[ len=2 ]');
        expect(renderValue({ a: 1, b: 2 }, collapsed)).toBe('{ len=2 }');
        expect(renderValue(new Map([['k', 1]]), collapsed)).toBe('{ len=1 }');
        expect(renderValue(new Uint8Array([1, 2]), collapsed)).toBe('[ len=2 ]');
    });

    it('collapses only the kind that is switched on', () => {
        const opts: RenderOptions = { collapseSequences: true, collapseMappings: false };
        expect(renderValue({ list: [1, 2] }, opts)).toBe('{list: [ len=2 ]}');
    });

    it('marks cycles', () => {
        const node: Record<string, unknown> = { name: 'n' };
        node.self = node;
        expect(renderValue(node, open)).toBe("{name: 'n', self: [Circular]}");
    });

    it('renders a shared reference in full each time', () => {
        const shared = { v: 1 };
        expect(renderValue([shared, shared], open)).toBe('[{v: 1}, {v: 1}]');
    });

    it('stops at the depth limit', () => {
        expect(renderValue({ a: { b: { c: 1 } } }, { ...open, maxDepth: 2 })).toBe('{a: {b: [DepthLimit]}}');
    });

    it('masks configured keys', () => {
        const opts: RenderOptions = { ...open, maskKeys: ['password', 'token'] };
        expect(renderValue({ user: 'bob', password: 'test-secret' }, opts)).toBe("{user: 'bob', password: ***}");
        expect(renderValue(new Map([['token', 'test-token']]), opts)).toBe("{'token': ***}");
        expect(renderValue({ password: 'x' }, { ...opts, mask: '<hidden>' })).toBe('{password: <hidden>}');
    });

    it('reports throwing getters instead of failing', () => {
        const value = {
            get boom(): number {
                throw new Error('no');
            },
        };
        expect(renderValue(value, open)).toBe('{boom: [GetterError]}');
    });

    it('renders leaf objects and primitives', () => {
        expect(renderValue(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)), open)).toBe('2024-01-02T03:04:05.000Z');
        expect(renderValue(new TypeError('bad'), open)).toBe('TypeError: bad');
        expect(renderValue(new ArrayBuffer(4), open)).toBe('[ArrayBuffer 4 bytes]');
        expect(renderValue(10n, open)).toBe('10n');
        expect(renderValue(Symbol('s'), open)).toBe('Symbol(s)');
        expect(renderValue(function named() {}, open)).toBe('[Function named]');
        expect(renderValue(undefined, open)).toBe('undefined');
        expect(renderValue(2.5, open)).toBe('2.5');
    });
});

describe('typeName', () => {
    it('names runtime types', () => {
        expect(typeName(null)).toBe('null');
        expect(typeName(undefined)).toBe('undefined');
        expect(typeName(5)).toBe('number');
        expect(typeName('x')).toBe('string');
        expect(typeName([])).toBe('Array');
        expect(typeName(() => 1)).toBe('Function');
        expect(typeName({})).toBe('Object');
        expect(typeName(Object.create(null))).toBe('Object');
        expect(typeName(new Map())).toBe('Map');
        expect(typeName(new RangeError('r'))).toBe('RangeError');
    });
});
