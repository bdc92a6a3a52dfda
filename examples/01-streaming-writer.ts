/**
 * Streaming Writer Example
 *
 * Writes a simulation report piece by piece as results become available.
 * Run: npx tsx examples/01-streaming-writer.ts
 */

import { StringSink, TextWriteStream, obj } from '../src/index.js';

function main() {
    console.log('--- Streaming Writer Example ---\n');

    const sink = new StringSink();
    const stream = new TextWriteStream(sink, { indent: 2 });

    stream.wrapObject(() => {
        stream.writePair('model', obj([['L', 16], ['J', 1.5]]));
        stream.writeKey('sweeps');
        stream.wrapArray(() => {
            for (let sweep = 1; sweep <= 3; sweep++) {
                stream.writeValue(obj([['sweep', sweep], ['energy', -1 / sweep]]));
                console.log(`[Writer] sweep ${sweep} written, state=${stream.state}, depth=${stream.depth}`);
            }
        });
        stream.writePair('done', true);
    });

    console.log('\n--- Output ---');
    console.log(sink.toString());
}

main();
