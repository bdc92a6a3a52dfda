import { UnsupportedDType, ValueEncodingError } from './errors.js';
import { Complex, NDArray, isDType, type Value, type ValueObject } from './value.js';

/**
 * Pluggable leaf converter. `encode` maps values the base grammar cannot
 * carry to a JSON-safe replacement (or `undefined` when it does not apply);
 * `decode` is applied to every reduced object and may return a richer value.
 */
export interface ValueCodec {
    encode(value: Value): Value | undefined;
    decode(object: ValueObject): Value;
}

/**
 * Deep encode: each node is offered to the codec once, then its
 * (possibly replaced) children are visited.
 */
export function encodeValue(value: Value, codec: ValueCodec): Value {
    const replaced = codec.encode(value);
    const node = replaced === undefined ? value : replaced;
    if (Array.isArray(node)) return node.map(item => encodeValue(item, codec));
    if (node instanceof Map) {
        const result: ValueObject = new Map();
        for (const [key, item] of node) {
            result.set(key, encodeValue(item, codec));
        }
        return result;
    }
    return node;
}

/** Bottom-up decode, children before their object. */
export function decodeValue(value: Value, codec: ValueCodec): Value {
    if (Array.isArray(value)) return value.map(item => decodeValue(item, codec));
    if (value instanceof Map) {
        const result: ValueObject = new Map();
        for (const [key, item] of value) {
            result.set(key, decodeValue(item, codec));
        }
        return codec.decode(result);
    }
    return value;
}

// ============ Numeric Codec ============

/**
 * Complex numbers as `{"real", "imag"}` and ndarrays as `{"dtype", "array"}`.
 *
 * Decoding is keyed on field names alone: a hand-written object with exactly
 * the fields `real` and `imag` holding numbers comes back as a Complex.
 */
export const numericCodec: ValueCodec = {
    encode(value) {
        if (value instanceof Complex) {
            return new Map<string, Value>([['real', value.real], ['imag', value.imag]]);
        }
        if (value instanceof NDArray) {
            return new Map<string, Value>([['dtype', value.dtype], ['array', nest(value)]]);
        }
        return undefined;
    },

    decode(object) {
        if (hasExactKeys(object, 'real', 'imag')) {
            const real = object.get('real');
            const imag = object.get('imag');
            if (typeof real === 'number' && typeof imag === 'number') {
                return new Complex(real, imag);
            }
            return object;
        }
        if (hasExactKeys(object, 'dtype', 'array')) {
            const dtype = object.get('dtype');
            const array = object.get('array');
            if (typeof dtype !== 'string' || array === undefined) return object;
            if (!isDType(dtype)) throw new UnsupportedDType(dtype);
            return unnest(dtype, array);
        }
        return object;
    },
};

function hasExactKeys(object: ValueObject, a: string, b: string): boolean {
    return object.size === 2 && object.has(a) && object.has(b);
}

/**
 * Nested lists shaped by the array's shape. Complex data is written as its
 * interleaved components, which doubles the last axis.
 *
 * Axes after a zero-length axis leave no trace in the lists: shape [0, 2]
 * is written as `[]` and reads back as shape [0].
 */
function nest(array: NDArray): Value {
    let shape: readonly number[] = array.shape;
    if (array.dtype === 'complex128') {
        if (shape.length === 0) {
            throw new ValueEncodingError('a 0-d complex128 array has no interleaved form');
        }
        shape = [...shape.slice(0, -1), shape[shape.length - 1] * 2];
    }

    const strides = shape.map((_, axis) => shape.slice(axis + 1).reduce((n, dim) => n * dim, 1));

    const build = (offset: number, axis: number): Value => {
        if (axis === shape.length) return array.data[offset];
        const items: Value[] = [];
        for (let i = 0; i < shape[axis]; i++) {
            items.push(build(offset + i * strides[axis], axis + 1));
        }
        return items;
    };

    return build(0, 0);
}

function unnest(dtype: NDArray['dtype'], nested: Value): NDArray {
    const shape = shapeOf(nested);
    const data: number[] = [];
    flatten(nested, data);

    if (dtype === 'complex128') {
        const last = shape[shape.length - 1];
        if (shape.length === 0 || last % 2 !== 0) {
            throw new ValueEncodingError('complex128 data needs an even-length last axis');
        }
        return new NDArray(dtype, [...shape.slice(0, -1), last / 2], data);
    }
    return new NDArray(dtype, shape, data);
}

function shapeOf(node: Value): number[] {
    if (typeof node === 'number') return [];
    if (!Array.isArray(node)) {
        throw new ValueEncodingError('ndarray data must be nested lists of numbers');
    }
    if (node.length === 0) return [0];

    const inner = shapeOf(node[0]);
    for (let i = 1; i < node.length; i++) {
        const other = shapeOf(node[i]);
        if (other.length !== inner.length || other.some((dim, axis) => dim !== inner[axis])) {
            throw new ValueEncodingError('ndarray data is ragged');
        }
    }
    return [node.length, ...inner];
}

function flatten(node: Value, out: number[]): void {
    if (typeof node === 'number') {
        out.push(node);
    } else if (Array.isArray(node)) {
        for (const item of node) flatten(item, out);
    }
}
