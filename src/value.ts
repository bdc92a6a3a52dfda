import { ValueEncodingError } from './errors.js';
import type { Path } from './types.js';

// ============ Value Model ============

/**
 * A complex number leaf. Carried on the wire only through a codec.
 */
export class Complex {
    constructor(
        readonly real: number,
        readonly imag: number,
    ) {}

    toString(): string {
        const sign = this.imag < 0 || Object.is(this.imag, -0) ? '-' : '+';
        return `${this.real}${sign}${Math.abs(this.imag)}i`;
    }
}

export type DType = 'float64' | 'complex128';

export const DTYPES: readonly DType[] = ['float64', 'complex128'];

export function isDType(tag: string): tag is DType {
    return (DTYPES as readonly string[]).includes(tag);
}

/**
 * Multi-dimensional numeric array leaf, stored flat in row-major order.
 * For `complex128` the data holds real/imag components interleaved, so
 * `data.length` is twice the element count.
 */
export class NDArray {
    readonly dtype: DType;
    readonly shape: readonly number[];
    readonly data: Float64Array;

    constructor(dtype: DType, shape: readonly number[], data: Float64Array | readonly number[]) {
        for (const dim of shape) {
            if (!Number.isInteger(dim) || dim < 0) {
                throw new ValueEncodingError(`invalid ndarray dimension: ${dim}`);
            }
        }
        const expected = shapeSize(shape) * (dtype === 'complex128' ? 2 : 1);
        if (data.length !== expected) {
            throw new ValueEncodingError(
                `ndarray of shape [${shape.join(', ')}] and dtype ${dtype} needs ${expected} components, got ${data.length}`
            );
        }
        this.dtype = dtype;
        this.shape = [...shape];
        this.data = data instanceof Float64Array ? data : Float64Array.from(data);
    }

    static fromComplex(shape: readonly number[], values: readonly Complex[]): NDArray {
        const data = new Float64Array(values.length * 2);
        values.forEach((c, i) => {
            data[2 * i] = c.real;
            data[2 * i + 1] = c.imag;
        });
        return new NDArray('complex128', shape, data);
    }

    /** Number of elements (not components). */
    get size(): number {
        return shapeSize(this.shape);
    }

    /** Element at a flat row-major index. */
    at(index: number): number | Complex {
        if (this.dtype === 'complex128') {
            return new Complex(this.data[2 * index], this.data[2 * index + 1]);
        }
        return this.data[index];
    }
}

export function shapeSize(shape: readonly number[]): number {
    return shape.reduce((n, dim) => n * dim, 1);
}

/**
 * Ordered-key object. A Map keeps insertion order for every key,
 * integer-like ones included.
 */
export type ValueObject = Map<string, Value>;

export type Value =
    | null
    | boolean
    | number
    | string
    | Value[]
    | ValueObject
    | Complex
    | NDArray;

export type ValueKind = 'null' | 'boolean' | 'number' | 'string' | 'array' | 'object' | 'complex' | 'ndarray';

export function kindOf(value: Value): ValueKind {
    if (value === null) return 'null';
    if (typeof value === 'boolean') return 'boolean';
    if (typeof value === 'number') return 'number';
    if (typeof value === 'string') return 'string';
    if (Array.isArray(value)) return 'array';
    if (value instanceof Map) return 'object';
    if (value instanceof Complex) return 'complex';
    return 'ndarray';
}

export function isValueObject(value: Value): value is ValueObject {
    return value instanceof Map;
}

/** Build a ValueObject from entries, keeping their order. */
export function obj(entries: Iterable<readonly [string, Value]> = []): ValueObject {
    const result: ValueObject = new Map();
    for (const [key, value] of entries) {
        result.set(key, value);
    }
    return result;
}

// ============ Equality ============

function sameNumber(a: number, b: number): boolean {
    return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

/**
 * Structural equality. Object entries are compared in order.
 */
export function valueEquals(a: Value, b: Value): boolean {
    if (a === null || b === null) return a === b;
    if (typeof a === 'number' || typeof b === 'number') {
        return typeof a === 'number' && typeof b === 'number' && sameNumber(a, b);
    }
    if (typeof a !== 'object' || typeof b !== 'object') return a === b;

    if (Array.isArray(a)) {
        return Array.isArray(b) && a.length === b.length && a.every((item, i) => valueEquals(item, b[i]));
    }
    if (a instanceof Map) {
        if (!(b instanceof Map) || a.size !== b.size) return false;
        const left = [...a];
        const right = [...b];
        return left.every(([key, item], i) => key === right[i][0] && valueEquals(item, right[i][1]));
    }
    if (a instanceof Complex) {
        return b instanceof Complex && sameNumber(a.real, b.real) && sameNumber(a.imag, b.imag);
    }
    if (!(b instanceof NDArray)) return false;
    return (
        a.dtype === b.dtype &&
        a.shape.length === b.shape.length &&
        a.shape.every((dim, i) => dim === b.shape[i]) &&
        a.data.every((x, i) => sameNumber(x, b.data[i]))
    );
}

// ============ Copying ============

/**
 * Deep copy. Containers and ndarray data are fresh; the copy shares nothing
 * mutable with the source.
 */
export function cloneValue(value: Value): Value {
    if (Array.isArray(value)) return value.map(cloneValue);
    if (value instanceof Map) {
        const result: ValueObject = new Map();
        for (const [key, item] of value) {
            result.set(key, cloneValue(item));
        }
        return result;
    }
    if (value instanceof NDArray) return new NDArray(value.dtype, value.shape, value.data.slice());
    return value;
}

// ============ Traversal ============

/**
 * Depth-first walk, children before parents. This is the order in which
 * the selector transformer reports values.
 */
export function walkValue(value: Value, visit: (path: Path, value: Value) => void): void {
    const path: (string | number)[] = [];

    const walk = (node: Value): void => {
        if (Array.isArray(node)) {
            node.forEach((item, i) => {
                path.push(i);
                walk(item);
                path.pop();
            });
        } else if (node instanceof Map) {
            for (const [key, item] of node) {
                path.push(key);
                walk(item);
                path.pop();
            }
        }
        visit([...path], node);
    };

    walk(value);
}

// ============ Plain JSON Interop ============

export type PlainJson = null | boolean | number | string | PlainJson[] | { [key: string]: PlainJson };

/**
 * Convert to the platform's JSON value shape. Integer-like keys will be
 * reordered by the JS object model; extension leaves are rejected.
 */
export function toPlain(value: Value): PlainJson {
    if (value === null || typeof value !== 'object') return value;
    if (Array.isArray(value)) return value.map(toPlain);
    if (value instanceof Map) {
        const result: { [key: string]: PlainJson } = {};
        for (const [key, item] of value) {
            result[key] = toPlain(item);
        }
        return result;
    }
    throw new ValueEncodingError(`${kindOf(value)} has no plain JSON form without a codec`);
}

export function fromPlain(input: unknown): Value {
    if (input === null || typeof input === 'boolean' || typeof input === 'number' || typeof input === 'string') {
        return input;
    }
    if (input instanceof Complex || input instanceof NDArray) return input;
    if (Array.isArray(input)) return input.map(fromPlain);
    if (input instanceof Map) {
        const result: ValueObject = new Map();
        for (const [key, item] of input) {
            if (typeof key !== 'string') {
                throw new ValueEncodingError(`object keys must be strings, got ${typeof key}`);
            }
            result.set(key, fromPlain(item));
        }
        return result;
    }
    if (typeof input === 'object') {
        const proto: unknown = Object.getPrototypeOf(input);
        if (proto === Object.prototype || proto === null) {
            return new Map(Object.entries(input).map(([key, item]): [string, Value] => [key, fromPlain(item)]));
        }
    }
    throw new ValueEncodingError(`cannot represent ${describe(input)} as a JSON value`);
}

function describe(input: unknown): string {
    if (typeof input === 'object' && input !== null) {
        return input.constructor?.name ?? 'object';
    }
    return typeof input;
}
