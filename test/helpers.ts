import { CallbackSelectorTransformer } from '../src/transformer.js';
import { StringSink } from '../src/sink.js';
import { TextWriteStream } from '../src/writer.js';
import type { LogEntry, Logger } from '../src/logger.js';
import type { Path } from '../src/types.js';
import type { Value } from '../src/value.js';

/**
 * Helper to create an async iterable from an array of strings
 */
export async function* toStream(chunks: string[]): AsyncIterable<string> {
    for (const chunk of chunks) {
        yield chunk;
    }
}

/**
 * Helper to create a text writer over a fresh string sink
 */
export function textWriter(indent = 0, logger?: Logger): { stream: TextWriteStream; sink: StringSink } {
    const sink = new StringSink();
    return { stream: new TextWriteStream(sink, { indent, logger }), sink };
}

/**
 * Helper to record every (path, value) the selector reports, in order
 */
export function collectSelections(text: string): { path: Path; value: Value }[] {
    const seen: { path: Path; value: Value }[] = [];
    new CallbackSelectorTransformer((path, value) => {
        seen.push({ path, value });
        return value;
    }).transform(text);
    return seen;
}

/**
 * Helper to capture log entries
 */
export function captureLogs(): { logger: Logger; entries: LogEntry[] } {
    const entries: LogEntry[] = [];
    return { logger: entry => entries.push(entry), entries };
}

/**
 * Helper to get whatever a function throws
 */
export function thrown(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('expected the call to throw');
}

/**
 * Helper to get a thrown error of a given class
 */
export function thrownAs<E extends Error>(type: abstract new (...args: never[]) => E, fn: () => unknown): E {
    const error = thrown(fn);
    if (!(error instanceof type)) {
        throw new Error(`expected ${type.name}, got ${String(error)}`);
    }
    return error;
}

/**
 * Helper to join expected output lines
 */
export function lines(...parts: string[]): string {
    return parts.join('\n');
}
