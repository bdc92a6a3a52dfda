import { describe, it, expect } from 'vitest';
import { numericCodec } from '../src/codec.js';
import { parseTransformerOptions } from '../src/config.js';
import { scan } from '../src/core/scanner.js';
import { InvalidOptionsError, JsonSyntaxError, JsonwrightError } from '../src/errors.js';
import {
    CallbackSelectorTransformer,
    LoggingSelectorTransformer,
    formatSelector,
    parse,
} from '../src/transformer.js';
import { Complex, kindOf, obj, toPlain, valueEquals, walkValue, type Value } from '../src/value.js';
import { captureLogs, collectSelections, thrownAs, toStream } from './helpers.js';

describe('SelectorTransformer', () => {
    describe('paths', () => {
        it('reports every value with its path, children before parents', () => {
            const seen = collectSelections('{"a": [1, {"b": 2}]}');

            expect(seen.map(s => s.path)).toEqual([
                ['a', 0],
                ['a', 1, 'b'],
                ['a', 1],
                ['a'],
                [],
            ]);
            expect(seen.map(s => kindOf(s.value))).toEqual(['number', 'number', 'object', 'array', 'object']);
            expect(seen[0].value).toBe(1);
            expect(seen[1].value).toBe(2);
            expect(toPlain(seen[2].value)).toEqual({ b: 2 });
            expect(toPlain(seen[3].value)).toEqual([1, { b: 2 }]);
        });

        it('indexes nested arrays independently', () => {
            const seen = collectSelections('[[1], [2, 3]]');

            expect(seen.map(s => s.path)).toEqual([[0, 0], [0], [1, 0], [1, 1], [1], []]);
        });

        it('reports empty containers at their own path', () => {
            const seen = collectSelections('{"e": [], "o": {}}');

            expect(seen.map(s => s.path)).toEqual([['e'], ['o'], []]);
        });

        it('reports a root scalar at the empty path', () => {
            const seen = collectSelections(' 42 ');

            expect(seen).toEqual([{ path: [], value: 42 }]);
        });

        it('keeps path length equal to nesting depth', () => {
            const seen = collectSelections('{"a": {"b": {"c": [true]}}}');

            expect(seen.map(s => s.path.length)).toEqual([4, 3, 2, 1, 0]);
        });

        it('matches the canonical traversal order', () => {
            const text = '{"x": [1, [2, {"y": null}]], "z": "s"}';
            const walked: (readonly (string | number)[])[] = [];
            walkValue(parse(text), path => walked.push(path));

            expect(collectSelections(text).map(s => s.path)).toEqual(walked);
        });

        it('reports both writes of a repeated key', () => {
            const seen = collectSelections('{"a": 1, "b": 2, "a": 3}');

            expect(seen.map(s => [s.path, s.value])).toEqual([
                [['a'], 1],
                [['b'], 2],
                [['a'], 3],
                [[], obj([['a', 3], ['b', 2]])],
            ]);
        });
    });

    describe('substitution', () => {
        it('replaces nodes with the callback result', () => {
            const doubled = new CallbackSelectorTransformer((_path, value) =>
                typeof value === 'number' ? value * 2 : value
            ).transform('{"a": [1, {"b": 2}]}');

            expect(toPlain(doubled)).toEqual({ a: [2, { b: 4 }] });
        });

        it('hands parents their already-substituted children', () => {
            const arrays: Value[] = [];
            new CallbackSelectorTransformer((path, value) => {
                if (Array.isArray(value)) arrays.push(value);
                return typeof value === 'number' ? value + 1 : value;
            }).transform('[1, 2]');

            expect(arrays).toEqual([[2, 3]]);
        });

        it('replaces a whole subtree', () => {
            const result = new CallbackSelectorTransformer((path, value) =>
                path.length === 1 && path[0] === 'secret' ? '***' : value
            ).transform('{"secret": {"k": [1, 2]}, "open": 1}');

            expect(toPlain(result)).toEqual({ secret: '***', open: 1 });
        });

        it('keeps key order, integer-like keys included', () => {
            const result = parse('{"b": 1, "2": 2, "a": 3}');

            expect(result instanceof Map ? [...result.keys()] : []).toEqual(['b', '2', 'a']);
        });

        it('lets the last write of a repeated key win in its first position', () => {
            const result = parse('{"a": 1, "b": 2, "a": 3}');

            expect(result instanceof Map ? [...result.entries()] : []).toEqual([['a', 3], ['b', 2]]);
        });
    });

    describe('codec', () => {
        it('decodes objects before the callback sees them', () => {
            const seen: [string, string][] = [];
            new CallbackSelectorTransformer(
                (path, value) => {
                    seen.push([formatSelector(path), kindOf(value)]);
                    return value;
                },
                { codec: numericCodec },
            ).transform('{"z": {"real": 3.0, "imag": 4.0}}');

            expect(seen).toEqual([
                ['.z.real', 'number'],
                ['.z.imag', 'number'],
                ['.z', 'complex'],
                ['.', 'object'],
            ]);
        });

        it('rejects a codec without decode()', () => {
            const error = thrownAs(InvalidOptionsError, () => parseTransformerOptions({ codec: { encode: () => undefined } }));

            expect(error.message).toBe('codec: codec must provide encode() and decode()');
        });
    });

    describe('failures', () => {
        it('propagates a callback failure unchanged', () => {
            const boom = new Error('stop at 2');
            const transformer = new CallbackSelectorTransformer((_path, value) => {
                if (value === 2) throw boom;
                return value;
            });

            expect(() => transformer.transform('[1, 2, 3]')).toThrow(boom);
        });

        it('starts the next pass from scratch after a failure', () => {
            const transformer = new CallbackSelectorTransformer((_path, value) => {
                if (value === 'fail') throw new Error('nope');
                return value;
            });

            expect(() => transformer.transform('{"a": ["fail"]}')).toThrow('nope');
            expect(toPlain(transformer.transform('{"b": [1]}'))).toEqual({ b: [1] });
        });

        it('logs the failure', () => {
            const { logger, entries } = captureLogs();
            const transformer = new CallbackSelectorTransformer(() => {
                throw new Error('bad');
            }, { logger });

            expect(() => transformer.transform('1')).toThrow('bad');
            expect(entries.map(e => [e.level, e.event])).toEqual([
                ['debug', 'transform:start'],
                ['error', 'transform:failed'],
            ]);
        });

        it('rejects malformed text', () => {
            expect(() => parse('{"a": }')).toThrow(JsonSyntaxError);
        });
    });

    describe('incremental input', () => {
        it('accepts text split at any point', () => {
            const transformer = new CallbackSelectorTransformer((_path, value) => value);
            const result = transformer.write('{"a": 1').write('2, "b": tr').write('ue}').end();

            expect(toPlain(result)).toEqual({ a: 12, b: true });
        });

        it('consumes an async stream of chunks', async () => {
            const transformer = new CallbackSelectorTransformer((_path, value) => value);
            const result = await transformer.transformStream(toStream(['[{"k":', ' "v"}, ', '3.5]']));

            expect(toPlain(result)).toEqual([{ k: 'v' }, 3.5]);
        });

        it('starts over after the source fails mid-stream', async () => {
            async function* dropped(): AsyncIterable<string> {
                yield '{"a": [1, ';
                throw new Error('connection lost');
            }
            const { logger, entries } = captureLogs();
            const transformer = new CallbackSelectorTransformer((_path, value) => value, { logger });

            await expect(transformer.transformStream(dropped())).rejects.toThrow('connection lost');
            expect(entries.map(e => e.event)).toEqual(['transform:start', 'transform:failed']);
            expect(toPlain(transformer.transform('[7]'))).toEqual([7]);
        });

        it('can be driven by events from another source', () => {
            const transformer = new CallbackSelectorTransformer((_path, value) => value);
            const result = transformer.consume(scan('{"a": [1, {"b": 2}]}'));

            expect(toPlain(result)).toEqual({ a: [1, { b: 2 }] });
        });

        it('rejects an event stream that stops early', () => {
            const transformer = new CallbackSelectorTransformer((_path, value) => value);

            expect(() => transformer.consume([{ type: 'array_start' }, { type: 'scalar', value: 1 }]))
                .toThrow(JsonwrightError);
        });

        it('rejects events that break the nesting', () => {
            const transformer = new CallbackSelectorTransformer((_path, value) => value);

            expect(() => transformer.consume([{ type: 'array_start' }, { type: 'key', key: 'k' }]))
                .toThrow(JsonwrightError);
        });
    });

    describe('LoggingSelectorTransformer', () => {
        it('logs a selector for every value and returns the document unchanged', () => {
            const { logger, entries } = captureLogs();
            const result = new LoggingSelectorTransformer({ logger }).transform('{"x": [true]}');

            expect(entries.filter(e => e.level === 'info').map(e => e.data)).toEqual([
                { selector: '.x.0', kind: 'boolean' },
                { selector: '.x', kind: 'array' },
                { selector: '.', kind: 'object' },
            ]);
            expect(toPlain(result)).toEqual({ x: [true] });
        });
    });

    describe('parse', () => {
        it('builds the value model', () => {
            const result = parse('[null, true, -1.5e2, "s", {}]');

            expect(valueEquals(result, [null, true, -150, 's', new Map()])).toBe(true);
        });

        it('decodes extension values with a codec', () => {
            const result = parse('[{"real": 1.5, "imag": -2.0}]', { codec: numericCodec });

            expect(valueEquals(result, [new Complex(1.5, -2)])).toBe(true);
        });
    });
});
