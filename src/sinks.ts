import { closeSync, openSync, writeSync } from 'node:fs';
import { formatTimestamp } from './format';
import type { ILogger } from './logger';
import type { Clock, TextStream } from './types';

/**
 * Destination of rendered trace blocks. Writes are synchronous and unbuffered
 * so a block is complete on disk before the next one starts.
 */
export interface TraceSink {
    write(text: string): void;
    close(): void;
}

export const HEADER_TIME_PATTERN = '%Y-%m-%d %H:%M:%S.%f';

/** The line a trace file starts with, followed by a blank line. */
export function fileHeader(now: Date): string {
    return `=== Log initialised at ${formatTimestamp(now, HEADER_TIME_PATTERN)} ===\n\n`;
}

export type FileSinkOptions = {
    /** Clock for the header timestamp. Default: Date.now */
    now?: Clock;
    /** Receives the warning for closing a file that was never opened. */
    logger?: ILogger;
};

/**
 * Trace file sink. The file is opened (and truncated) on the first write,
 * which also writes the header. Write failures are not caught.
 */
export class FileSink implements TraceSink {
    private fd: number | undefined;
    private closed = false;
    private readonly now: Clock;
    private readonly logger?: ILogger;

    constructor(readonly path: string, options: FileSinkOptions = {}) {
        this.now = options.now ?? Date.now;
        this.logger = options.logger;
    }

    get isOpen(): boolean {
        return this.fd !== undefined;
    }

    write(text: string): void {
        writeSync(this.open(), text);
    }

    close(): void {
        if (this.fd === undefined) {
            this.logger?.warn(`Trace file ${this.path} is not open - nothing to close`);
            return;
        }
        closeSync(this.fd);
        this.fd = undefined;
        this.closed = true;
    }

    private open(): number {
        if (this.fd !== undefined) return this.fd;
        if (this.closed) throw new Error(`Trace file ${this.path} has been closed`);

        const fd = openSync(this.path, 'w');
        writeSync(fd, fileHeader(new Date(this.now())));
        this.fd = fd;
        return fd;
    }
}

/**
 * Stream sink for Node.js writable streams (stderr by default)
 */
export class StreamSink implements TraceSink {
    constructor(private readonly stream: TextStream = process.stderr) {}

    write(text: string): void {
        this.stream.write(text);
    }

    close(): void {
        // The stream belongs to the caller.
    }
}

/**
 * Memory sink for testing or buffering trace output
 */
export class MemorySink implements TraceSink {
    public chunks: string[] = [];
    public closed = false;

    write(text: string): void {
        this.chunks.push(text);
    }

    close(): void {
        this.closed = true;
    }

    /** Everything written so far. */
    get text(): string {
        return this.chunks.join('');
    }

    /** Written text split into physical lines, without the final empty one. */
    lines(): string[] {
        const lines = this.text.split('\n');
        if (lines[lines.length - 1] === '') lines.pop();
        return lines;
    }

    clear(): void {
        this.chunks = [];
    }
}

/**
 * No-op sink that discards all output
 */
export class NoOpSink implements TraceSink {
    write(_text: string): void {
        // Intentionally empty
    }

    close(): void {
        // Intentionally empty
    }
}
