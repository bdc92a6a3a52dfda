/**
 * Selector Paths Example
 *
 * Reports every value in a document with its path, children first, and
 * redacts a field on the way.
 * Run: npx tsx examples/03-selector-paths.ts
 */

import { CallbackSelectorTransformer, LoggingSelectorTransformer, consoleLogger, formatSelector, toPlain } from '../src/index.js';

const text = '{"user": {"name": "ada", "token": "test-secret"}, "scores": [3, 5]}';

function main() {
    console.log('--- Selector Paths Example ---\n');

    new LoggingSelectorTransformer({ logger: consoleLogger }).transform(text);

    const redacted = new CallbackSelectorTransformer((path, value) => {
        if (path[path.length - 1] === 'token') {
            console.log(`[Selector] redacting ${formatSelector(path)}`);
            return '***';
        }
        return value;
    }).transform(text);

    console.log('\n--- Redacted ---');
    console.log(JSON.stringify(toPlain(redacted)));
}

main();
