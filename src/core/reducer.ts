import { failure } from '../errors.js';
import type { ReductionEvent, SelectorCallback } from '../types.js';
import type { Value, ValueObject } from '../value.js';

// ============ Result State ============

export interface ResultState {
    /** Set once the root value has been reduced. */
    root: Value | undefined;
    stack: ResultFrame[];
    /** Keys and array positions leading to the value being reduced. */
    path: (string | number)[];
}

type ResultFrame =
    | { type: 'array'; ref: Value[] }
    | { type: 'object'; ref: ValueObject; key?: string };

export interface ReduceOptions {
    select: SelectorCallback;

    /** Applied to every reduced object before `select` sees it. */
    decode?: (object: ValueObject) => Value;
}

/**
 * Create initial result state
 */
export function createResultState(): ResultState {
    return {
        root: undefined,
        stack: [],
        path: [],
    };
}

// ============ Reduce Function ============

export function reduce({ state, event, options }: {
    state: ResultState;
    event: ReductionEvent;
    options: ReduceOptions;
}): ResultState {
    if (state.root !== undefined) {
        failure(`${event.type} event after the root value was reduced`);
    }

    switch (event.type) {
        case 'object_start':
            return { ...state, stack: [...state.stack, { type: 'object', ref: new Map() }] };
        case 'array_start':
            return {
                ...state,
                stack: [...state.stack, { type: 'array', ref: [] }],
                path: [...state.path, 0],
            };
        case 'key':
            return handleKey(state, event.key);
        case 'scalar':
            return reduceValue(state, event.value, options);
        case 'array_end':
            return handleArrayEnd(state, options);
        case 'object_end':
            return handleObjectEnd(state, options);
    }
}

// ============ Event Handlers ============

function handleKey(state: ResultState, key: string): ResultState {
    const top = state.stack[state.stack.length - 1];
    if (top?.type !== 'object' || top.key !== undefined) {
        failure(`unexpected key ${JSON.stringify(key)}`);
    }
    return {
        ...state,
        stack: [...state.stack.slice(0, -1), { ...top, key }],
        path: [...state.path, key],
    };
}

function handleArrayEnd(state: ResultState, options: ReduceOptions): ResultState {
    const top = state.stack[state.stack.length - 1];
    if (top?.type !== 'array') {
        failure('array_end without an open array');
    }
    return reduceValue(
        { ...state, stack: state.stack.slice(0, -1), path: state.path.slice(0, -1) },
        top.ref,
        options,
    );
}

function handleObjectEnd(state: ResultState, options: ReduceOptions): ResultState {
    const top = state.stack[state.stack.length - 1];
    if (top?.type !== 'object' || top.key !== undefined) {
        failure('object_end without an open object');
    }
    const value = options.decode ? options.decode(top.ref) : top.ref;
    return reduceValue({ ...state, stack: state.stack.slice(0, -1) }, value, options);
}

/**
 * A value is complete: report it at the current path, then attach the
 * callback's replacement to the parent and advance the path.
 */
function reduceValue(state: ResultState, value: Value, options: ReduceOptions): ResultState {
    const replaced = options.select([...state.path], value);

    if (state.stack.length === 0) {
        return { ...state, root: replaced };
    }

    const top = state.stack[state.stack.length - 1];
    if (top.type === 'array') {
        top.ref.push(replaced);
        const index = state.path[state.path.length - 1];
        if (typeof index !== 'number') {
            failure('array element without an index on the path');
        }
        return { ...state, path: [...state.path.slice(0, -1), index + 1] };
    }

    if (top.key === undefined) {
        failure('object value without a key');
    }
    top.ref.set(top.key, replaced);

    // Pair reduced: drop its key
    return {
        ...state,
        stack: [...state.stack.slice(0, -1), { type: 'object', ref: top.ref }],
        path: state.path.slice(0, -1),
    };
}
