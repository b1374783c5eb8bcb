// src/stack.ts
// Scope names of the traced calls currently executing, innermost last.
// The top entry qualifies the function column of the line being formed.

import { AsyncLocalStorage } from 'node:async_hooks';

/** Scope name of callables registered outside any class; never used as a qualifier. */
export const TOP_LEVEL_SCOPE = '<module>';

export class CallContextStack {
    private readonly entries: string[];
    private disabled: boolean;

    constructor(entries: readonly string[] = [], disabled = false) {
        this.entries = disabled ? [] : [...entries];
        this.disabled = disabled;
    }

    get depth(): number {
        return this.entries.length;
    }

    get isDisabled(): boolean {
        return this.disabled;
    }

    push(scopeName: string): void {
        if (this.disabled) return;
        this.entries.push(scopeName);
    }

    /** Remove the top entry; a no-op on an empty stack. */
    pop(): void {
        if (this.disabled) return;
        this.entries.pop();
    }

    /** Top entry, or `undefined` when empty or disabled. */
    peek(): string | undefined {
        if (this.disabled) return undefined;
        return this.entries[this.entries.length - 1];
    }

    /**
     * Turn every operation into a no-op for good. Used when scope
     * qualification is off so no bookkeeping is done on each call.
     */
    disable(): void {
        this.disabled = true;
        this.entries.length = 0;
    }

    /** Independent copy holding the same entries and disabled state. */
    fork(): CallContextStack {
        return new CallContextStack(this.entries, this.disabled);
    }
}

/**
 * Where a tracer finds the stack for the call chain it is running on.
 * `run` wraps one traced invocation; `current` is read inside it.
 */
export interface StackScope {
    current(): CallContextStack;
    run<T>(fn: () => T): T;
    disable(): void;
}

/** One stack for the whole tracer: a single synchronous call chain. */
export class SharedStackScope implements StackScope {
    private readonly stack = new CallContextStack();

    current(): CallContextStack {
        return this.stack;
    }

    run<T>(fn: () => T): T {
        return fn();
    }

    disable(): void {
        this.stack.disable();
    }
}

/**
 * One stack per asynchronous call chain.
 *
 * Every traced invocation runs on a fork of its caller's stack, bound with
 * AsyncLocalStorage, so work scheduled by concurrent chains (timers, awaited
 * promises) sees only the scopes of its own chain.
 */
export class AsyncStackScope implements StackScope {
    private readonly storage = new AsyncLocalStorage<CallContextStack>();
    private readonly root = new CallContextStack();

    current(): CallContextStack {
        return this.storage.getStore() ?? this.root;
    }

    run<T>(fn: () => T): T {
        return this.storage.run(this.current().fork(), fn);
    }

    /** Disables the root and the stack of the chain it is called from. */
    disable(): void {
        this.root.disable();
        this.storage.getStore()?.disable();
    }
}
