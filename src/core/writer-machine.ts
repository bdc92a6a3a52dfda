/**
 * Streaming Writer State Machine
 *
 * ┌─────────────────────────────────────────────────────────────────────────────┐
 * │                           TRANSITION TABLE                                  │
 * └─────────────────────────────────────────────────────────────────────────────┘
 *
 *   Each scope owns one slot on the state stack. Entering a scope marks the
 *   parent slot as "value written" and pushes a fresh slot; exiting pops it.
 *
 *   top state   │ value / enter_*           │ key       │ exit_array │ exit_object
 *   ────────────┼───────────────────────────┼───────────┼────────────┼────────────
 *   PRE_DOC     │ → POST_DOC   (root)       │     ✗     │     ✗      │     ✗
 *   POST_DOC    │ ✗                         │     ✗     │     ✗      │     ✗
 *   IN_ARRAY    │ → POST_ELEM  (first)      │     ✗     │ pop        │     ✗
 *   POST_ELEM   │ → POST_ELEM  (',' first)  │     ✗     │ pop        │     ✗
 *   IN_OBJECT   │ ✗                         │ → IN_PAIR │     ✗      │ pop
 *   IN_PAIR     │ → POST_PAIR               │     ✗     │     ✗      │     ✗
 *   POST_PAIR   │ ✗                         │ → IN_PAIR │     ✗      │ pop
 *
 *   enter_array / enter_object additionally push IN_ARRAY / IN_OBJECT.
 *   ✗ is a ProtocolViolation.
 */

import { ProtocolViolation } from '../errors.js';
import type { ValueCodec } from '../codec.js';
import type { Value } from '../value.js';

// ============ State Types ============

export type StreamState =
    | 'PRE_DOC'     // Nothing written yet
    | 'POST_DOC'    // Root value finished
    | 'IN_ARRAY'    // After '[', no element yet
    | 'IN_OBJECT'   // After '{', no pair yet
    | 'IN_PAIR'     // Key written, value pending
    | 'POST_PAIR'   // Pair finished, before ',' or '}'
    | 'POST_ELEM';  // Element finished, before ',' or ']'

export type Container = 'array' | 'object';

// ============ Events ============

export type WriteEvent =
    | { type: 'enter_array' }
    | { type: 'exit_array' }
    | { type: 'enter_object' }
    | { type: 'exit_object' }
    | { type: 'key'; key: string }
    | { type: 'value'; value: Value; codec?: ValueCodec };

const OPERATIONS: Record<WriteEvent['type'], string> = {
    enter_array: 'enterArray',
    exit_array: 'exitArray',
    enter_object: 'enterObject',
    exit_object: 'exitObject',
    key: 'writeKey',
    value: 'writeValue',
};

// ============ Actions ============

/**
 * Where a value (leaf or container) lands relative to its parent.
 */
export type Position =
    | 'root'    // Document root
    | 'first'   // First element of an array
    | 'next'    // Later element of an array, separator required
    | 'pair';   // Value of a key-value pair

/**
 * What a back-end has to produce for one transition. `depth` is the
 * nesting depth the output belongs to: the enclosing depth for opens,
 * values and keys, the parent depth for closes.
 */
export type Action =
    | { type: 'open'; container: Container; position: Position; depth: number }
    | { type: 'close'; container: Container; empty: boolean; depth: number }
    | { type: 'key'; key: string; first: boolean; depth: number }
    | { type: 'value'; value: Value; codec?: ValueCodec; position: Position; depth: number };

// ============ Context ============

export interface Context {
    /** Never empty; the last entry is the current state. */
    stack: readonly StreamState[];
}

export function createContext(): Context {
    return { stack: ['PRE_DOC'] };
}

export function currentState(ctx: Context): StreamState {
    return ctx.stack[ctx.stack.length - 1];
}

export function depthOf(ctx: Context): number {
    return ctx.stack.length - 1;
}

// ============ Mutate Function ============

export type MutateResult = {
    ctx: Context;
    action: Action;
};

/**
 * Pure transition function. Throws ProtocolViolation for any event the
 * current state does not accept; the input context is never modified.
 */
export function mutate({ ctx, event }: { ctx: Context; event: WriteEvent }): MutateResult {
    switch (event.type) {
        case 'enter_array':
            return handleEnter(ctx, event, 'array');
        case 'enter_object':
            return handleEnter(ctx, event, 'object');
        case 'exit_array':
            return handleExit(ctx, event, 'array');
        case 'exit_object':
            return handleExit(ctx, event, 'object');
        case 'key':
            return handleKey(ctx, event);
        case 'value':
            return handleValue(ctx, event);
    }
}

// ============ Event Handlers ============

function handleEnter(ctx: Context, event: WriteEvent, container: Container): MutateResult {
    const position = positionFor(ctx, event);
    const inner: StreamState = container === 'array' ? 'IN_ARRAY' : 'IN_OBJECT';
    return {
        ctx: { stack: [...replaceTop(ctx, afterValue(currentState(ctx))).stack, inner] },
        action: { type: 'open', container, position, depth: depthOf(ctx) },
    };
}

function handleExit(ctx: Context, event: WriteEvent, container: Container): MutateResult {
    const state = currentState(ctx);
    const [open, filled]: StreamState[] = container === 'array'
        ? ['IN_ARRAY', 'POST_ELEM']
        : ['IN_OBJECT', 'POST_PAIR'];

    if (state !== open && state !== filled) {
        throw violation(ctx, event);
    }

    const stack = ctx.stack.slice(0, -1);
    return {
        ctx: { stack },
        action: { type: 'close', container, empty: state === open, depth: stack.length - 1 },
    };
}

function handleKey(ctx: Context, event: Extract<WriteEvent, { type: 'key' }>): MutateResult {
    const state = currentState(ctx);
    if (state !== 'IN_OBJECT' && state !== 'POST_PAIR') {
        throw violation(ctx, event);
    }
    return {
        ctx: replaceTop(ctx, 'IN_PAIR'),
        action: { type: 'key', key: event.key, first: state === 'IN_OBJECT', depth: depthOf(ctx) },
    };
}

function handleValue(ctx: Context, event: Extract<WriteEvent, { type: 'value' }>): MutateResult {
    const position = positionFor(ctx, event);
    return {
        ctx: replaceTop(ctx, afterValue(currentState(ctx))),
        action: { type: 'value', value: event.value, codec: event.codec, position, depth: depthOf(ctx) },
    };
}

// ============ Helpers ============

/**
 * Where the next value goes, or a violation if the state takes no value.
 */
function positionFor(ctx: Context, event: WriteEvent): Position {
    switch (currentState(ctx)) {
        case 'PRE_DOC':
            return 'root';
        case 'IN_ARRAY':
            return 'first';
        case 'POST_ELEM':
            return 'next';
        case 'IN_PAIR':
            return 'pair';
        default:
            throw violation(ctx, event);
    }
}

function afterValue(state: StreamState): StreamState {
    switch (state) {
        case 'PRE_DOC':
            return 'POST_DOC';
        case 'IN_PAIR':
            return 'POST_PAIR';
        default:
            return 'POST_ELEM';
    }
}

function replaceTop(ctx: Context, state: StreamState): Context {
    return { stack: [...ctx.stack.slice(0, -1), state] };
}

function violation(ctx: Context, event: WriteEvent): ProtocolViolation {
    return new ProtocolViolation(currentState(ctx), OPERATIONS[event.type]);
}
