/**
 * Memory Writer Example
 *
 * Drives the same calls into an in-memory back-end and shows how a failed
 * scope is unwound into a complete document.
 * Run: npx tsx examples/02-memory-writer.ts
 */

import { consoleLogger, createWriteStream, toPlain } from '../src/index.js';

function main() {
    console.log('--- Memory Writer Example ---\n');

    const stream = createWriteStream({ kind: 'memory', logger: consoleLogger });

    stream.enterObject();
    stream.writePair('job', 'fit');
    stream.writeKey('points');
    try {
        stream.wrapArray(() => {
            stream.writeValue(1);
            stream.enterObject();
            stream.writeKey('residual');
            throw new Error('solver diverged');
        });
    } catch (error) {
        console.log(`[Writer] body failed: ${String(error)}`);
    }
    stream.unwind();

    console.log('\n--- Document ---');
    console.log(JSON.stringify(toPlain(stream.value), null, 2));
}

main();
