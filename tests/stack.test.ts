import { describe, it, expect } from 'vitest';
import { AsyncStackScope, CallContextStack, SharedStackScope, TOP_LEVEL_SCOPE } from '../src/stack';

describe('CallContextStack', () => {
    it('returns the most recent scope on peek', () => {
        const stack = new CallContextStack();
        stack.push('Outer');
        stack.push('Inner');

        expect(stack.peek()).toBe('Inner');
        expect(stack.depth).toBe(2);

        stack.pop();
        expect(stack.peek()).toBe('Outer');
    });

    it('peeks undefined on an empty stack', () => {
        expect(new CallContextStack().peek()).toBeUndefined();
    });

    it('ignores a pop on an empty stack', () => {
        const stack = new CallContextStack();
        stack.pop();
        expect(stack.depth).toBe(0);
    });

    it('keeps the top-level marker like any other entry', () => {
        const stack = new CallContextStack();
        stack.push(TOP_LEVEL_SCOPE);
        expect(stack.peek()).toBe('<module>');
    });

    it('turns every operation into a no-op once disabled', () => {
        const stack = new CallContextStack();
        stack.push('Before');
        stack.disable();

        expect(stack.isDisabled).toBe(true);
        expect(stack.depth).toBe(0);

        stack.push('After');
        expect(stack.peek()).toBeUndefined();
        expect(stack.depth).toBe(0);
    });

    it('forks an independent copy', () => {
        const stack = new CallContextStack();
        stack.push('A');

        const copy = stack.fork();
        copy.push('B');

        expect(stack.peek()).toBe('A');
        expect(copy.peek()).toBe('B');
        expect(copy.depth).toBe(2);
    });
});

describe('SharedStackScope', () => {
    it('hands out the same stack inside and outside run', () => {
        const scope = new SharedStackScope();
        const outer = scope.current();
        const inner = scope.run(() => scope.current());
        expect(inner).toBe(outer);
    });

    it('disables its stack', () => {
        const scope = new SharedStackScope();
        scope.disable();
        expect(scope.current().isDisabled).toBe(true);
    });
});

describe('AsyncStackScope', () => {
    it('gives each run a fork of the caller stack', () => {
        const scope = new AsyncStackScope();
        scope.current().push('Root');

        const seen = scope.run(() => {
            scope.current().push('Child');
            return scope.current().peek();
        });

        expect(seen).toBe('Child');
        expect(scope.current().peek()).toBe('Root');
    });

    it('keeps concurrent async chains apart', async () => {
        const scope = new AsyncStackScope();
        const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

        const chain = (name: string) =>
            scope.run(async () => {
                scope.current().push(name);
                await tick();
                return scope.current().peek();
            });

        const [a, b] = await Promise.all([chain('A'), chain('B')]);
        expect(a).toBe('A');
        expect(b).toBe('B');
        expect(scope.current().depth).toBe(0);
    });

    it('disables the stack of the running chain too', () => {
        const scope = new AsyncStackScope();
        const seen = scope.run(() => {
            scope.current().push('Inner');
            scope.disable();
            return { disabled: scope.current().isDisabled, top: scope.current().peek() };
        });

        expect(seen).toEqual({ disabled: true, top: undefined });
        expect(scope.current().isDisabled).toBe(true);
    });

    it('disables the root stack and every later fork', () => {
        const scope = new AsyncStackScope();
        scope.disable();
        const forked = scope.run(() => scope.current());
        expect(forked.isDisabled).toBe(true);
    });
});
