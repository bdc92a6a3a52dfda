/**
 * Numeric Codec Example
 *
 * Writes complex numbers and ndarrays through the numeric codec and
 * reads them back.
 * Run: npx tsx examples/04-numeric-codec.ts
 */

import { Complex, NDArray, StringSink, TextWriteStream, numericCodec, obj, parse, valueEquals, writeTree } from '../src/index.js';

function main() {
    console.log('--- Numeric Codec Example ---\n');

    const document = obj([
        ['impedance', new Complex(50, -12.5)],
        ['field', new NDArray('float64', [2, 2], [0.1, 0.2, 0.3, 0.4])],
        ['modes', NDArray.fromComplex([2], [new Complex(1, 0), new Complex(0, 1)])],
    ]);

    const sink = new StringSink();
    writeTree(new TextWriteStream(sink, { indent: 2 }), document, numericCodec);
    console.log(sink.toString());

    const decoded = parse(sink.toString(), { codec: numericCodec });
    console.log(`\n[Codec] round trip equal: ${valueEquals(decoded, document)}`);
}

main();
