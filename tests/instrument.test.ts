import { describe, it, expect } from 'vitest';
import { resolveConfig, type TraceConfig } from '../src/config';
import { Instrumentation, type TraceHost } from '../src/instrument';
import { SharedStackScope, type StackScope } from '../src/stack';
import type { TraceContext, TraceOptions } from '../src/types';

class RecordingHost implements TraceHost {
    readonly records: Array<{ qualifier: string | undefined; message: string }> = [];
    readonly warnings: string[] = [];
    readonly errors: string[] = [];
    readonly scope: StackScope = new SharedStackScope();
    enabled = true;

    constructor(readonly config: TraceConfig = resolveConfig()) {}

    emit(_context: TraceContext, message: string): void {
        this.records.push({ qualifier: this.scope.current().peek(), message });
    }

    warn(message: string): void {
        this.warnings.push(message);
    }

    writeError(text: string): void {
        this.errors.push(text);
    }

    forceExit(): never {
        throw new Error('forced exit');
    }
}

const context: TraceContext = { declarationFile: 'box.ts', declarationLine: 3, scopeName: 'Box', functionName: 'put' };

const options = (over: TraceOptions = {}): Required<TraceOptions> => ({
    traceArgs: true,
    traceReturnValue: true,
    traceReturnType: false,
    exceptionWarn: true,
    exceptionTraceToSink: false,
    exceptionTraceToErrorStream: false,
    exceptionForceExit: false,
    ...over,
});

describe('Instrumentation', () => {
    it('pushes its scope around the call and pops it after', () => {
        const host = new RecordingHost();
        let depthInside = -1;
        const inst = new Instrumentation(host, (x: number) => {
            depthInside = host.scope.current().depth;
            return x + 1;
        }, context, [{ name: 'x', rest: false }], options());

        expect(inst.invoke(1)).toBe(2);
        expect(depthInside).toBe(1);
        expect(host.scope.current().depth).toBe(0);
        expect(host.records).toEqual([
            { qualifier: 'Box', message: '-> ENTRY: x = 1' },
            { qualifier: 'Box', message: '<- EXIT : 2' },
        ]);
    });

    it('is active only while a call is running', () => {
        const host = new RecordingHost();
        let during: string | undefined;
        const inst: Instrumentation<[], void> = new Instrumentation(host, () => {
            during = inst.state;
        }, context, [], options());

        expect(inst.state).toBe('bound');
        inst.invoke();
        expect(during).toBe('active');
        expect(inst.state).toBe('bound');
    });

    it('names the traced function after the context', () => {
        const inst = new Instrumentation(new RecordingHost(), () => 1, context, [], options());
        expect(inst.fn.name).toBe('put');
    });

    it('passes the receiver through call', () => {
        const host = new RecordingHost(resolveConfig({ traceOwningInstanceArg: true }));
        const inst = new Instrumentation(host, function (this: { id: number }, n: number) {
            return this.id + n;
        }, context, [{ name: 'n', rest: false }], options());

        expect(inst.call({ id: 10 }, 5)).toBe(15);
        expect(host.records[0].message).toBe('-> ENTRY: this = {id: 10}, n = 5');
    });

    it('records the type of the return value when asked', () => {
        const host = new RecordingHost();
        const inst = new Instrumentation(host, () => [1, 2], context, [], options({ traceReturnType: true }));

        inst.invoke();
        expect(host.records[1].message).toBe('<- EXIT : [1, 2] (type: Array)');
    });

    it('pops the stack and re-throws the same fault', () => {
        const host = new RecordingHost();
        const fault = new RangeError('out of range');
        const inst = new Instrumentation(host, () => {
            throw fault;
        }, context, [], options());

        expect(() => inst.invoke()).toThrow(fault);
        expect(host.scope.current().depth).toBe(0);
        expect(inst.state).toBe('bound');
        expect(host.warnings).toEqual(['RangeError RAISED']);
        expect(host.records[1].message).toBe('<- EXIT : RangeError RAISED - out of range');
    });

    it('does not run the target when the entry record cannot be written', () => {
        const host = new RecordingHost();
        host.emit = () => {
            throw new Error('disk full');
        };
        let ran = false;
        const inst = new Instrumentation(host, () => {
            ran = true;
        }, context, [], options());

        expect(() => inst.invoke()).toThrow('disk full');
        expect(ran).toBe(false);
        expect(host.scope.current().depth).toBe(0);
    });

    it('bypasses tracing entirely when the host is disabled', () => {
        const host = new RecordingHost();
        host.enabled = false;
        const inst = new Instrumentation(host, (a: number) => a * 3, context, [], options());

        expect(inst.invoke(2)).toBe(6);
        expect(host.records).toEqual([]);
    });
});
