/**
 * Stream Transform Example
 *
 * Feeds a document that arrives in chunks through a selector transformer.
 * Run: npx tsx examples/05-stream-transform.ts
 */

import { CallbackSelectorTransformer, toPlain } from '../src/index.js';

// Mock a streaming source (simulates a file or socket delivering chunks)
async function* mockStream(): AsyncIterable<string> {
    const chunks = ['{"readings": [12', '.5, 13.', '25, 11', '], "unit": "C"}'];

    for (const chunk of chunks) {
        await new Promise(resolve => setTimeout(resolve, 100));
        console.log(`[Stream] Received chunk: ${JSON.stringify(chunk)}`);
        yield chunk;
    }
}

async function main() {
    console.log('--- Stream Transform Example ---\n');

    const toFahrenheit = new CallbackSelectorTransformer((path, value) => {
        if (path[0] === 'readings' && typeof value === 'number') return value * 1.8 + 32;
        if (path[0] === 'unit') return 'F';
        return value;
    });

    const result = await toFahrenheit.transformStream(mockStream());

    console.log('\n--- Result ---');
    console.log(JSON.stringify(toPlain(result)));
}

main().catch(error => {
    console.error(error);
    process.exitCode = 1;
});
