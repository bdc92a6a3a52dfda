import type { ValueCodec } from './codec.js';
import { type TransformerOptions, parseTransformerOptions } from './config.js';
import { type ResultState, createResultState, reduce } from './core/reducer.js';
import { Scanner } from './core/scanner.js';
import { failure } from './errors.js';
import { type Logger, log, noopLogger } from './logger.js';
import type { Path, ReductionEvent, Selector, SelectorCallback } from './types.js';
import { kindOf, type Value } from './value.js';

/**
 * Pushdown automaton over reduction events. Tracks the path to each value
 * and lets `value()` replace every node, children before parents.
 *
 * One pass at a time: feed text with `write()` and finish with `end()`,
 * or use `transform()` / `transformStream()` / `consume()`.
 */
export abstract class SelectorTransformer implements Selector {
    protected readonly logger: Logger;
    private readonly codec?: ValueCodec;
    private readonly scanner: Scanner;
    private state: ResultState = createResultState();
    private started = false;

    constructor(options: TransformerOptions = {}) {
        const { codec, logger } = parseTransformerOptions(options);
        this.codec = codec;
        this.logger = logger ?? noopLogger;
        this.scanner = new Scanner(event => this.apply(event));
    }

    /**
     * Replacement for the value reduced at `path`.
     */
    abstract value(path: Path, value: Value): Value;

    write(chunk: string): this {
        this.guard(() => {
            this.begin();
            this.scanner.write(chunk);
        });
        return this;
    }

    /** Finish the pass and return the transformed root. */
    end(): Value {
        return this.guard(() => {
            this.begin();
            this.scanner.end();
            return this.finish();
        });
    }

    transform(text: string): Value {
        return this.write(text).end();
    }

    async transformStream(stream: AsyncIterable<string>): Promise<Value> {
        try {
            for await (const chunk of stream) {
                this.write(chunk);
            }
        } catch (error) {
            // write() has already abandoned the pass if it was the one that failed
            if (this.started) this.abandon(error);
            throw error;
        }
        return this.end();
    }

    /**
     * Drive the pass from events produced elsewhere instead of text.
     */
    consume(events: Iterable<ReductionEvent>): Value {
        return this.guard(() => {
            this.begin();
            for (const event of events) {
                this.apply(event);
            }
            return this.finish();
        });
    }

    private apply(event: ReductionEvent): void {
        const codec = this.codec;
        this.state = reduce({
            state: this.state,
            event,
            options: {
                select: (path, value) => this.value(path, value),
                decode: codec ? object => codec.decode(object) : undefined,
            },
        });
    }

    private begin(): void {
        if (!this.started) {
            this.started = true;
            log(this.logger, 'debug', 'transform:start');
        }
    }

    private finish(): Value {
        const root = this.state.root;
        if (root === undefined) {
            failure('events ended before the root value was complete');
        }
        log(this.logger, 'debug', 'transform:end', { kind: kindOf(root) });
        this.reset();
        return root;
    }

    private reset(): void {
        this.state = createResultState();
        this.scanner.reset();
        this.started = false;
    }

    /** Any failure abandons the pass: nothing partial survives it. */
    private guard<T>(step: () => T): T {
        try {
            return step();
        } catch (error) {
            this.abandon(error);
            throw error;
        }
    }

    private abandon(error: unknown): void {
        log(this.logger, 'error', 'transform:failed', { error: String(error) });
        this.reset();
    }
}

/**
 * Binds a plain function as the selector.
 */
export class CallbackSelectorTransformer extends SelectorTransformer {
    private readonly callback: SelectorCallback;

    constructor(callback: SelectorCallback, options: TransformerOptions = {}) {
        super(options);
        this.callback = callback;
    }

    value(path: Path, value: Value): Value {
        return this.callback(path, value);
    }
}

/**
 * Identity selector: the pass yields the document as parsed.
 */
export class DefaultTransformer extends SelectorTransformer {
    value(_path: Path, value: Value): Value {
        return value;
    }
}

/**
 * Logs `.a.0`-style selectors for every value and changes nothing.
 */
export class LoggingSelectorTransformer extends SelectorTransformer {
    value(path: Path, value: Value): Value {
        log(this.logger, 'info', 'transform:value', { selector: formatSelector(path), kind: kindOf(value) });
        return value;
    }
}

export function formatSelector(path: Path): string {
    return '.' + path.join('.');
}

/**
 * Parse a document into a Value. With a codec, extension values are
 * decoded on the way up.
 */
export function parse(text: string, options: TransformerOptions = {}): Value {
    return new DefaultTransformer(options).transform(text);
}
