import type { Writable } from 'node:stream';
import type { Sink } from './types.js';

/**
 * Collects everything written into one string.
 */
export class StringSink implements Sink {
    private chunks: string[] = [];
    private flushes = 0;

    write(text: string): void {
        this.chunks.push(text);
    }

    flush(): void {
        this.flushes++;
    }

    /** Number of flush() calls received. */
    get flushCount(): number {
        return this.flushes;
    }

    toString(): string {
        return this.chunks.join('');
    }
}

/**
 * Adapts a Node writable. Writes are held back (corked) until flush().
 *
 * The stream is corked again after every flush, so whatever is written after
 * the last flush() is not delivered. Flush once the document is complete.
 */
export function createStreamSink(stream: Writable): Sink {
    stream.cork();
    return {
        write(text) {
            stream.write(text);
        },
        flush() {
            stream.uncork();
            stream.cork();
        },
    };
}
