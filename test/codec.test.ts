import { describe, it, expect } from 'vitest';
import { decodeValue, encodeValue, numericCodec, type ValueCodec } from '../src/codec.js';
import { UnsupportedDType, ValueEncodingError } from '../src/errors.js';
import { Complex, NDArray, obj, toPlain, valueEquals, type Value } from '../src/value.js';
import { textWriter, thrownAs } from './helpers.js';

describe('numericCodec', () => {
    describe('encode', () => {
        it('writes a complex number as real and imag fields', () => {
            const encoded = numericCodec.encode(new Complex(1.5, -2));

            expect(encoded === undefined ? undefined : toPlain(encoded)).toEqual({ real: 1.5, imag: -2 });
        });

        it('writes an ndarray as nested lists under its dtype', () => {
            const encoded = numericCodec.encode(new NDArray('float64', [2, 3], [1, 2, 3, 4, 5, 6]));

            expect(encoded === undefined ? undefined : toPlain(encoded)).toEqual({
                dtype: 'float64',
                array: [[1, 2, 3], [4, 5, 6]],
            });
        });

        it('interleaves complex components along the last axis', () => {
            const array = NDArray.fromComplex([2], [new Complex(1, 2), new Complex(3, -4)]);
            const encoded = numericCodec.encode(array);

            expect(encoded === undefined ? undefined : toPlain(encoded)).toEqual({
                dtype: 'complex128',
                array: [1, 2, 3, -4],
            });
        });

        it('writes a 0-d float array as a bare number', () => {
            const encoded = numericCodec.encode(new NDArray('float64', [], [5]));

            expect(encoded === undefined ? undefined : toPlain(encoded)).toEqual({ dtype: 'float64', array: 5 });
        });

        it('writes an empty array', () => {
            const encoded = numericCodec.encode(new NDArray('float64', [2, 0], []));

            expect(encoded === undefined ? undefined : toPlain(encoded)).toEqual({ dtype: 'float64', array: [[], []] });
        });

        it('drops axes that follow a zero-length axis', () => {
            const encoded = numericCodec.encode(new NDArray('float64', [0, 2], []));
            const decoded = encoded instanceof Map ? numericCodec.decode(encoded) : null;

            expect(encoded instanceof Map ? toPlain(encoded) : null).toEqual({ dtype: 'float64', array: [] });
            expect(decoded instanceof NDArray ? decoded.shape : null).toEqual([0]);
        });

        it('refuses a 0-d complex array', () => {
            const zeroD = NDArray.fromComplex([], [new Complex(1, 1)]);

            expect(() => numericCodec.encode(zeroD)).toThrow(ValueEncodingError);
        });

        it('passes other values through', () => {
            expect(numericCodec.encode(1)).toBeUndefined();
            expect(numericCodec.encode('real')).toBeUndefined();
            expect(numericCodec.encode(obj([['real', 1]]))).toBeUndefined();
        });
    });

    describe('decode', () => {
        it('reads a complex number from exactly real and imag', () => {
            const decoded = numericCodec.decode(obj([['imag', 4], ['real', 3]]));

            expect(valueEquals(decoded, new Complex(3, 4))).toBe(true);
        });

        it('leaves look-alikes alone', () => {
            const extra = obj([['real', 1], ['imag', 2], ['unit', 'V']]);
            const text = obj([['real', 1], ['imag', 'two']]);
            const untagged = obj([['dtype', 5], ['array', [1]]]);

            expect(numericCodec.decode(extra)).toBe(extra);
            expect(numericCodec.decode(text)).toBe(text);
            expect(numericCodec.decode(untagged)).toBe(untagged);
        });

        it('reads an ndarray back to its shape', () => {
            const decoded = numericCodec.decode(obj([['dtype', 'float64'], ['array', [[1, 2], [3, 4], [5, 6]]]]));

            expect(decoded).toBeInstanceOf(NDArray);
            expect(valueEquals(decoded, new NDArray('float64', [3, 2], [1, 2, 3, 4, 5, 6]))).toBe(true);
        });

        it('halves the last axis of complex data', () => {
            const decoded = numericCodec.decode(obj([['dtype', 'complex128'], ['array', [[1, 2, 3, 4]]]]));

            expect(decoded instanceof NDArray ? [decoded.shape, decoded.at(1)] : []).toEqual([[1, 2], new Complex(3, 4)]);
        });

        it('reads a 0-d array from a bare number', () => {
            const decoded = numericCodec.decode(obj([['dtype', 'float64'], ['array', 2.5]]));

            expect(decoded instanceof NDArray ? [decoded.shape, decoded.size, decoded.at(0)] : []).toEqual([[], 1, 2.5]);
        });

        it('reads an empty array', () => {
            const decoded = numericCodec.decode(obj([['dtype', 'float64'], ['array', []]]));

            expect(decoded instanceof NDArray ? decoded.shape : []).toEqual([0]);
        });

        it('rejects an unknown dtype', () => {
            const error = thrownAs(UnsupportedDType, () =>
                numericCodec.decode(obj([['dtype', 'int8'], ['array', [1]]]))
            );

            expect(error.dtype).toBe('int8');
            expect(error.message).toBe('unsupported dtype: "int8"');
        });

        it('rejects ragged data', () => {
            expect(() => numericCodec.decode(obj([['dtype', 'float64'], ['array', [[1], [1, 2]]]])))
                .toThrow('ndarray data is ragged');
        });

        it('rejects non-numeric data', () => {
            expect(() => numericCodec.decode(obj([['dtype', 'float64'], ['array', ['a']]])))
                .toThrow(ValueEncodingError);
        });

        it('rejects complex data with an odd last axis', () => {
            expect(() => numericCodec.decode(obj([['dtype', 'complex128'], ['array', [1, 2, 3]]])))
                .toThrow('complex128 data needs an even-length last axis');
        });
    });
});

describe('encodeValue', () => {
    it('offers every node to the codec once, parents first', () => {
        const offered: string[] = [];
        const recording: ValueCodec = {
            encode(value) {
                offered.push(Array.isArray(value) ? 'array' : value instanceof Map ? 'object' : String(value));
                return numericCodec.encode(value);
            },
            decode: object => object,
        };

        const encoded = encodeValue(obj([['z', [new Complex(1, 2)]]]), recording);

        expect(offered).toEqual(['object', 'array', '1+2i', '1', '2']);
        expect(toPlain(encoded)).toEqual({ z: [{ real: 1, imag: 2 }] });
    });
});

describe('decodeValue', () => {
    it('decodes nested objects bottom-up', () => {
        const wire: Value = obj([
            ['z', obj([['real', 0], ['imag', 1]])],
            ['list', [obj([['dtype', 'float64'], ['array', [7]]])]],
        ]);

        const decoded = decodeValue(wire, numericCodec);

        expect(valueEquals(decoded, obj([
            ['z', new Complex(0, 1)],
            ['list', [new NDArray('float64', [1], [7])]],
        ]))).toBe(true);
    });
});

describe('codec with the text writer', () => {
    it('writes an encoded ndarray as one compact leaf', () => {
        const { stream, sink } = textWriter(0);
        stream.writeValue(new NDArray('float64', [2, 2], [1, 2, 3, 4]), numericCodec);

        expect(sink.toString()).toBe('{"dtype":"float64","array":[[1,2],[3,4]]}');
    });

    it('refuses extension values without a codec', () => {
        const { stream } = textWriter(0);

        expect(() => stream.writeValue(new NDArray('float64', [1], [1]))).toThrow(
            'ndarray values need a codec to be written'
        );
    });
});
