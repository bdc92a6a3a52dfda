/**
 * JSON Scanner State Machine
 *
 * Turns JSON text, fed one character at a time, into the bottom-up
 * reduction events the selector reducer consumes. Strict: anything outside
 * the JSON grammar is a JsonSyntaxError carrying the character offset.
 *
 *                           ┌──────────────┐
 *                           │ EXPECT_ROOT  │
 *                           └──────┬───────┘
 *                                  │
 *          ┌───────────┬───────────┼───────────┬──────────┐
 *          ▼           ▼           ▼           ▼          ▼
 *        "...        { ...       [ ...       0-9/-      t/f/n
 *          │           │           │           │          │
 *          ▼           ▼           ▼           ▼          ▼
 *     IN_STRING   EXPECT_KEY_  EXPECT_VALUE_  IN_NUMBER  IN_KEYWORD
 *                 OR_CLOSE     OR_CLOSE
 *                    │ "            │ value
 *                    ▼              ▼
 *              IN_STRING (key)   EXPECT_COMMA_OR_CLOSE_ARRAY ──,──▶ EXPECT_VALUE
 *                    │ "
 *                    ▼
 *              EXPECT_COLON ──:──▶ EXPECT_VALUE ──value──▶ EXPECT_COMMA_OR_CLOSE_OBJECT
 *                                                              │ ,
 *                                                              ▼
 *                                                          EXPECT_KEY
 *
 *   Closing the last open container (or finishing a root scalar) moves to
 *   DONE, where only whitespace is accepted.
 *
 *   IN_STRING ──\──▶ IN_STRING_ESCAPE ──u──▶ IN_STRING_UNICODE (4 hex digits)
 */

import { JsonSyntaxError } from '../errors.js';
import type { ReductionEvent } from '../types.js';

// ============ Token Types ============

export type Token =
    | { type: 'char'; value: string }
    | { type: 'eof' };

// ============ State Types ============

export type State =
    | 'EXPECT_ROOT'
    | 'EXPECT_VALUE'
    | 'EXPECT_VALUE_OR_CLOSE'
    | 'EXPECT_KEY'
    | 'EXPECT_KEY_OR_CLOSE'
    | 'EXPECT_COLON'
    | 'EXPECT_COMMA_OR_CLOSE_OBJECT'
    | 'EXPECT_COMMA_OR_CLOSE_ARRAY'
    | 'IN_STRING'
    | 'IN_STRING_ESCAPE'
    | 'IN_STRING_UNICODE'
    | 'IN_NUMBER'
    | 'IN_KEYWORD'
    | 'DONE';

// ============ Context ============

export interface Context {
    state: State;
    stack: ('object' | 'array')[];
    buffer: string;
    /** Hex digits of a \u escape in progress */
    unicode: string;
    isParsingKey: boolean;
    /** Character to reprocess (number termination) */
    pending: string | null;
    /** Offset of the next character to consume */
    offset: number;
}

/**
 * Create initial context
 */
export function createContext(): Context {
    return {
        state: 'EXPECT_ROOT',
        stack: [],
        buffer: '',
        unicode: '',
        isParsingKey: false,
        pending: null,
        offset: 0,
    };
}

// ============ Mutate Function ============

export type MutateResult = {
    ctx: Context;
    action: ReductionEvent | null;
};

/**
 * Pure state machine transition function.
 * Takes current context and a token, returns new context and optional event.
 */
export function mutate({ ctx, token }: { ctx: Context; token: Token }): MutateResult {
    if (token.type === 'eof') {
        return handleEof(ctx);
    }

    const result = dispatch(ctx, token.value);

    // A character handed back for reprocessing has not been consumed yet
    if (result.ctx.pending !== null) {
        return result;
    }
    return { ...result, ctx: { ...result.ctx, offset: ctx.offset + 1 } };
}

function dispatch(ctx: Context, char: string): MutateResult {
    switch (ctx.state) {
        case 'EXPECT_ROOT':
        case 'EXPECT_VALUE':
            return handleExpectValue(ctx, char);
        case 'EXPECT_VALUE_OR_CLOSE':
            return handleExpectValueOrClose(ctx, char);
        case 'EXPECT_KEY':
            return handleExpectKey(ctx, char);
        case 'EXPECT_KEY_OR_CLOSE':
            return handleExpectKeyOrClose(ctx, char);
        case 'EXPECT_COLON':
            return handleExpectColon(ctx, char);
        case 'EXPECT_COMMA_OR_CLOSE_OBJECT':
            return handleExpectCommaOrCloseObject(ctx, char);
        case 'EXPECT_COMMA_OR_CLOSE_ARRAY':
            return handleExpectCommaOrCloseArray(ctx, char);
        case 'IN_STRING':
            return handleInString(ctx, char);
        case 'IN_STRING_ESCAPE':
            return handleInStringEscape(ctx, char);
        case 'IN_STRING_UNICODE':
            return handleInStringUnicode(ctx, char);
        case 'IN_NUMBER':
            return handleInNumber(ctx, char);
        case 'IN_KEYWORD':
            return handleInKeyword(ctx, char);
        case 'DONE':
            return handleDone(ctx, char);
    }
}

// ============ State Handlers ============

function isWhitespace(c: string): boolean {
    return c === ' ' || c === '\t' || c === '\n' || c === '\r';
}

function isDigit(c: string): boolean {
    return c >= '0' && c <= '9';
}

function isHexDigit(c: string): boolean {
    return isDigit(c) || (c >= 'a' && c <= 'f') || (c >= 'A' && c <= 'F');
}

function unexpected(ctx: Context, char: string): JsonSyntaxError {
    return new JsonSyntaxError(`unexpected character ${JSON.stringify(char)}`, ctx.offset);
}

function handleExpectValue(ctx: Context, char: string): MutateResult {
    if (isWhitespace(char)) {
        return { ctx, action: null };
    }

    if (char === '"') {
        return {
            ctx: { ...ctx, state: 'IN_STRING', buffer: '', isParsingKey: false },
            action: null,
        };
    }

    if (char === '{') {
        return {
            ctx: { ...ctx, state: 'EXPECT_KEY_OR_CLOSE', stack: [...ctx.stack, 'object'] },
            action: { type: 'object_start' },
        };
    }

    if (char === '[') {
        return {
            ctx: { ...ctx, state: 'EXPECT_VALUE_OR_CLOSE', stack: [...ctx.stack, 'array'] },
            action: { type: 'array_start' },
        };
    }

    if (char === '-' || isDigit(char)) {
        return {
            ctx: { ...ctx, state: 'IN_NUMBER', buffer: char },
            action: null,
        };
    }

    if (char === 't' || char === 'f' || char === 'n') {
        return {
            ctx: { ...ctx, state: 'IN_KEYWORD', buffer: char },
            action: null,
        };
    }

    throw unexpected(ctx, char);
}

function handleExpectValueOrClose(ctx: Context, char: string): MutateResult {
    if (char === ']') {
        return closeContainer(ctx, 'array');
    }
    return handleExpectValue(ctx, char);
}

function handleExpectKey(ctx: Context, char: string): MutateResult {
    if (isWhitespace(char)) {
        return { ctx, action: null };
    }

    if (char === '"') {
        return {
            ctx: { ...ctx, state: 'IN_STRING', buffer: '', isParsingKey: true },
            action: null,
        };
    }

    throw unexpected(ctx, char);
}

function handleExpectKeyOrClose(ctx: Context, char: string): MutateResult {
    if (char === '}') {
        return closeContainer(ctx, 'object');
    }
    return handleExpectKey(ctx, char);
}

function handleExpectColon(ctx: Context, char: string): MutateResult {
    if (isWhitespace(char)) {
        return { ctx, action: null };
    }

    if (char === ':') {
        return {
            ctx: { ...ctx, state: 'EXPECT_VALUE' },
            action: null,
        };
    }

    throw unexpected(ctx, char);
}

function handleExpectCommaOrCloseObject(ctx: Context, char: string): MutateResult {
    if (isWhitespace(char)) {
        return { ctx, action: null };
    }

    if (char === ',') {
        return {
            ctx: { ...ctx, state: 'EXPECT_KEY' },
            action: null,
        };
    }

    if (char === '}') {
        return closeContainer(ctx, 'object');
    }

    throw unexpected(ctx, char);
}

function handleExpectCommaOrCloseArray(ctx: Context, char: string): MutateResult {
    if (isWhitespace(char)) {
        return { ctx, action: null };
    }

    if (char === ',') {
        return {
            ctx: { ...ctx, state: 'EXPECT_VALUE' },
            action: null,
        };
    }

    if (char === ']') {
        return closeContainer(ctx, 'array');
    }

    throw unexpected(ctx, char);
}

function handleInString(ctx: Context, char: string): MutateResult {
    if (char === '"') {
        if (ctx.isParsingKey) {
            return {
                ctx: { ...ctx, state: 'EXPECT_COLON', buffer: '', isParsingKey: false },
                action: { type: 'key', key: ctx.buffer },
            };
        }
        return {
            ctx: { ...ctx, state: afterValue(ctx.stack), buffer: '' },
            action: { type: 'scalar', value: ctx.buffer },
        };
    }

    if (char === '\\') {
        return {
            ctx: { ...ctx, state: 'IN_STRING_ESCAPE' },
            action: null,
        };
    }

    if (char.charCodeAt(0) < 0x20) {
        throw new JsonSyntaxError('unescaped control character in string', ctx.offset);
    }

    return {
        ctx: { ...ctx, buffer: ctx.buffer + char },
        action: null,
    };
}

const ESCAPES: Record<string, string> = {
    'n': '\n', 'r': '\r', 't': '\t', 'b': '\b', 'f': '\f',
    '\\': '\\', '"': '"', '/': '/',
};

function handleInStringEscape(ctx: Context, char: string): MutateResult {
    if (char === 'u') {
        return {
            ctx: { ...ctx, state: 'IN_STRING_UNICODE', unicode: '' },
            action: null,
        };
    }

    const escaped = ESCAPES[char];
    if (escaped === undefined) {
        throw new JsonSyntaxError(`invalid escape \\${char}`, ctx.offset);
    }

    return {
        ctx: { ...ctx, state: 'IN_STRING', buffer: ctx.buffer + escaped },
        action: null,
    };
}

function handleInStringUnicode(ctx: Context, char: string): MutateResult {
    if (!isHexDigit(char)) {
        throw new JsonSyntaxError(`invalid hex digit ${JSON.stringify(char)} in \\u escape`, ctx.offset);
    }

    const unicode = ctx.unicode + char;
    if (unicode.length < 4) {
        return { ctx: { ...ctx, unicode }, action: null };
    }

    // Surrogate halves are appended one code unit at a time and pair up in the buffer
    return {
        ctx: {
            ...ctx,
            state: 'IN_STRING',
            unicode: '',
            buffer: ctx.buffer + String.fromCharCode(parseInt(unicode, 16)),
        },
        action: null,
    };
}

const NUMBER_PATTERN = /^-?(0|[1-9]\d*)(\.\d+)?([eE][+-]?\d+)?$/;

function handleInNumber(ctx: Context, char: string): MutateResult {
    if (isDigit(char) || char === '.' || char === 'e' || char === 'E' || char === '+' || char === '-') {
        return {
            ctx: { ...ctx, buffer: ctx.buffer + char },
            action: null,
        };
    }

    // Number complete; the terminating character is reprocessed
    const result = finishNumber(ctx);
    return { ...result, ctx: { ...result.ctx, pending: char } };
}

function finishNumber(ctx: Context): MutateResult {
    if (!NUMBER_PATTERN.test(ctx.buffer)) {
        throw new JsonSyntaxError(`invalid number ${JSON.stringify(ctx.buffer)}`, ctx.offset);
    }
    return {
        ctx: { ...ctx, state: afterValue(ctx.stack), buffer: '' },
        action: { type: 'scalar', value: Number(ctx.buffer) },
    };
}

const KEYWORDS: Record<string, boolean | null> = { true: true, false: false, null: null };

function handleInKeyword(ctx: Context, char: string): MutateResult {
    const buffer = ctx.buffer + char;

    if (Object.hasOwn(KEYWORDS, buffer)) {
        return {
            ctx: { ...ctx, state: afterValue(ctx.stack), buffer: '' },
            action: { type: 'scalar', value: KEYWORDS[buffer] },
        };
    }

    if (!Object.keys(KEYWORDS).some(keyword => keyword.startsWith(buffer))) {
        throw new JsonSyntaxError(`invalid literal ${JSON.stringify(buffer)}`, ctx.offset);
    }

    return {
        ctx: { ...ctx, buffer },
        action: null,
    };
}

function handleDone(ctx: Context, char: string): MutateResult {
    if (isWhitespace(char)) {
        return { ctx, action: null };
    }
    throw new JsonSyntaxError(`unexpected ${JSON.stringify(char)} after document`, ctx.offset);
}

function handleEof(ctx: Context): MutateResult {
    if (ctx.state === 'IN_NUMBER') {
        return finishNumber(ctx);
    }
    if (ctx.state !== 'DONE') {
        throw new JsonSyntaxError('unexpected end of input', ctx.offset);
    }
    return { ctx, action: null };
}

// ============ Helpers ============

function closeContainer(ctx: Context, type: 'object' | 'array'): MutateResult {
    const stack = ctx.stack.slice(0, -1);
    return {
        ctx: { ...ctx, state: afterValue(stack), stack },
        action: { type: type === 'object' ? 'object_end' : 'array_end' },
    };
}

function afterValue(stack: Context['stack']): State {
    if (stack.length === 0) {
        return 'DONE';
    }
    return stack[stack.length - 1] === 'object' ? 'EXPECT_COMMA_OR_CLOSE_OBJECT' : 'EXPECT_COMMA_OR_CLOSE_ARRAY';
}

// ============ Driver ============

/**
 * Feeds chunks through the state machine and forwards every event.
 * Numbers and literals may be split across chunk boundaries.
 */
export class Scanner {
    private ctx: Context = createContext();
    private readonly emit: (event: ReductionEvent) => void;

    constructor(emit: (event: ReductionEvent) => void) {
        this.emit = emit;
    }

    write(chunk: string): void {
        for (const char of chunk) {
            this.process({ type: 'char', value: char });
        }
    }

    /** Signal end of input. Throws unless exactly one complete document was read. */
    end(): void {
        this.process({ type: 'eof' });
        if (this.ctx.state !== 'DONE') {
            throw new JsonSyntaxError('unexpected end of input', this.ctx.offset);
        }
    }

    reset(): void {
        this.ctx = createContext();
    }

    private process(token: Token): void {
        const { ctx: newCtx, action } = mutate({ ctx: this.ctx, token });
        this.ctx = newCtx;

        if (action) {
            this.emit(action);
        }

        // Handle pending character (reprocess)
        while (this.ctx.pending) {
            const pending = this.ctx.pending;
            this.ctx = { ...this.ctx, pending: null };
            this.process({ type: 'char', value: pending });
        }
    }
}

/**
 * Scan a complete document into its reduction events.
 */
export function scan(text: string): ReductionEvent[] {
    const events: ReductionEvent[] = [];
    const scanner = new Scanner(event => events.push(event));
    scanner.write(text);
    scanner.end();
    return events;
}
