import type { ValueCodec } from './codec.js';
import {
    parseTextWriterOptions,
    parseWriterOptions,
    type TextWriterOptions,
    type WriterOptions,
} from './config.js';
import { type BuildState, build, createBuildState } from './core/builder.js';
import { renderAction } from './core/format.js';
import {
    type Action,
    type Context,
    type StreamState,
    type WriteEvent,
    createContext,
    currentState,
    depthOf,
    mutate,
} from './core/writer-machine.js';
import { ProtocolViolation } from './errors.js';
import { type Logger, log, noopLogger } from './logger.js';
import type { Sink } from './types.js';
import type { Value } from './value.js';

/**
 * Accepts a JSON document as a sequence of nested events.
 */
export interface WriteStream {
    /** Top of the state stack. */
    readonly state: StreamState;

    /** Number of open scopes. */
    readonly depth: number;

    /** Ask the output to deliver anything buffered. */
    flush(): void;

    enterArray(): void;
    exitArray(): void;
    enterObject(): void;
    exitObject(): void;

    /**
     * Run `body` inside an array scope. The scope is closed on every exit
     * path; scopes the body leaves open on failure are unwound first.
     */
    wrapArray<T>(body: () => T): T;

    /** Like {@link wrapArray}, for an object scope. */
    wrapObject<T>(body: () => T): T;

    writeKey(key: string): void;

    /**
     * Write a leaf (or a whole value as one unit). A codec encodes
     * extension values before they are written.
     */
    writeValue(value: Value, codec?: ValueCodec): void;

    /**
     * Key then value. If the value cannot be written, `null` is written in
     * its place and the original error is rethrown.
     */
    writePair(key: string, value: Value, codec?: ValueCodec): void;

    /** Close everything down to the document root. */
    unwind(): void;
}

// ============ Automaton-backed Streams ============

/**
 * Drives the writer state machine and hands each resulting action to a
 * back-end. An action that fails to apply leaves the state unchanged.
 */
export abstract class AutomatonWriteStream implements WriteStream {
    private ctx: Context = createContext();
    protected readonly logger: Logger;

    constructor(logger: Logger = noopLogger) {
        this.logger = logger;
    }

    get state(): StreamState {
        return currentState(this.ctx);
    }

    get depth(): number {
        return depthOf(this.ctx);
    }

    abstract flush(): void;

    protected abstract apply(action: Action): void;

    private dispatch(event: WriteEvent): void {
        const { ctx, action } = mutate({ ctx: this.ctx, event });
        this.apply(action);
        this.ctx = ctx;
    }

    enterArray(): void {
        this.dispatch({ type: 'enter_array' });
    }

    exitArray(): void {
        this.dispatch({ type: 'exit_array' });
    }

    enterObject(): void {
        this.dispatch({ type: 'enter_object' });
    }

    exitObject(): void {
        this.dispatch({ type: 'exit_object' });
    }

    wrapArray<T>(body: () => T): T {
        this.enterArray();
        return this.scoped(body, () => this.exitArray());
    }

    wrapObject<T>(body: () => T): T {
        this.enterObject();
        return this.scoped(body, () => this.exitObject());
    }

    writeKey(key: string): void {
        this.dispatch({ type: 'key', key });
    }

    writeValue(value: Value, codec?: ValueCodec): void {
        this.dispatch({ type: 'value', value, codec });
    }

    writePair(key: string, value: Value, codec?: ValueCodec): void {
        this.writeKey(key);
        try {
            this.writeValue(value, codec);
        } catch (error) {
            log(this.logger, 'warn', 'writer:pair-recovered', { key, error: String(error) });
            this.writeValue(null);
            throw error;
        }
    }

    unwind(): void {
        if (this.depth > 0) {
            log(this.logger, 'debug', 'writer:unwind', { depth: this.depth, state: this.state });
        }
        this.unwindTo(0);
    }

    private scoped<T>(body: () => T, exit: () => void): T {
        const depth = this.depth;
        let result: T;
        try {
            result = body();
        } catch (error) {
            if (this.depth >= depth) {
                this.unwindTo(depth);
                exit();
            }
            throw error;
        }
        exit();
        return result;
    }

    /**
     * Finish a pending pair with null and close scopes until `depth` is
     * reached. At depth 0 the top is PRE_DOC or POST_DOC and nothing happens.
     */
    private unwindTo(depth: number): void {
        while (this.depth > depth || this.state === 'IN_PAIR') {
            switch (this.state) {
                case 'IN_PAIR':
                    this.writeValue(null);
                    break;
                case 'IN_ARRAY':
                case 'POST_ELEM':
                    this.exitArray();
                    break;
                case 'IN_OBJECT':
                case 'POST_PAIR':
                    this.exitObject();
                    break;
                default:
                    return;
            }
        }
    }
}

/**
 * Serializes events as JSON text to a sink.
 */
export class TextWriteStream extends AutomatonWriteStream {
    private readonly sink: Sink;
    readonly indent: number;

    constructor(sink: Sink, options: TextWriterOptions = {}) {
        const { indent, logger } = parseTextWriterOptions(options);
        super(logger);
        this.sink = sink;
        this.indent = indent;
    }

    flush(): void {
        this.sink.flush();
    }

    protected apply(action: Action): void {
        this.sink.write(renderAction(action, this.indent));
    }
}

/**
 * Builds the document as an in-memory Value.
 */
export class MemoryWriteStream extends AutomatonWriteStream {
    private built: BuildState = createBuildState();

    flush(): void {}

    protected apply(action: Action): void {
        this.built = build({ state: this.built, action });
    }

    /** The root value. Throws until something has been written. */
    get value(): Value {
        const root = this.built.root;
        if (root === undefined) {
            throw new ProtocolViolation(this.state, 'value');
        }
        return root;
    }
}

// ============ Null Stream ============

/**
 * Accepts every call and keeps nothing. No state is tracked, so nothing
 * is validated either.
 */
export class NullWriteStream implements WriteStream {
    readonly state: StreamState = 'PRE_DOC';
    readonly depth = 0;

    flush(): void {}
    enterArray(): void {}
    exitArray(): void {}
    enterObject(): void {}
    exitObject(): void {}
    writeKey(_key: string): void {}
    writeValue(_value: Value, _codec?: ValueCodec): void {}
    writePair(_key: string, _value: Value, _codec?: ValueCodec): void {}
    unwind(): void {}

    wrapArray<T>(body: () => T): T {
        return body();
    }

    wrapObject<T>(body: () => T): T {
        return body();
    }
}

// ============ Factory ============

export function createWriteStream(options: Extract<WriterOptions, { kind: 'text' }>): TextWriteStream;
export function createWriteStream(options: Extract<WriterOptions, { kind: 'memory' }>): MemoryWriteStream;
export function createWriteStream(options: Extract<WriterOptions, { kind: 'null' }>): NullWriteStream;
export function createWriteStream(options: WriterOptions): WriteStream;
export function createWriteStream(options: WriterOptions): WriteStream {
    const parsed = parseWriterOptions(options);
    switch (parsed.kind) {
        case 'text':
            return new TextWriteStream(parsed.sink, { indent: parsed.indent, logger: parsed.logger });
        case 'memory':
            return new MemoryWriteStream(parsed.logger);
        case 'null':
            return new NullWriteStream();
    }
}

// ============ Tree Emission ============

/**
 * Replay a value through a stream as structural events: containers become
 * enter/exit pairs, everything else is written as a leaf.
 */
export function writeTree(stream: WriteStream, value: Value, codec?: ValueCodec): void {
    if (Array.isArray(value)) {
        stream.wrapArray(() => {
            for (const item of value) writeTree(stream, item, codec);
        });
    } else if (value instanceof Map) {
        stream.wrapObject(() => {
            for (const [key, item] of value) {
                stream.writeKey(key);
                writeTree(stream, item, codec);
            }
        });
    } else {
        stream.writeValue(value, codec);
    }
}
