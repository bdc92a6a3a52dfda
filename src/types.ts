import type { Value } from './value.js';

/**
 * Location of a value inside a document: object keys and 0-based array
 * positions, outermost first. The root has the empty path.
 */
export type Path = readonly (string | number)[];

/**
 * Ordered text output consumed by the text writer.
 */
export interface Sink {
    write(text: string): void;

    /** Force delivery of anything buffered. */
    flush(): void;
}

/**
 * Replaces the value reduced at `path`. Returning the argument unchanged
 * keeps the node as parsed.
 */
export type SelectorCallback = (path: Path, value: Value) => Value;

/**
 * The capability every selector transformer provides.
 */
export interface Selector {
    value(path: Path, value: Value): Value;
}

/**
 * Reduction events delivered bottom-up, left to right, by an event source.
 */
export type ReductionEvent =
    | { type: 'object_start' }
    | { type: 'object_end' }
    | { type: 'array_start' }
    | { type: 'array_end' }
    | { type: 'key'; key: string }
    | { type: 'scalar'; value: null | boolean | number | string };
