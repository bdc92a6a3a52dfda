import { encodeValue } from '../codec.js';
import { failure } from '../errors.js';
import { cloneValue, type Value, type ValueObject } from '../value.js';
import type { Action } from './writer-machine.js';

// ============ Build State ============

export interface BuildState {
    root: Value | undefined;
    stack: BuildFrame[];
}

type BuildFrame =
    | { type: 'array'; ref: Value[] }
    | { type: 'object'; ref: ValueObject; key?: string };

/**
 * Create initial build state
 */
export function createBuildState(): BuildState {
    return {
        root: undefined,
        stack: [],
    };
}

// ============ Build Function ============

/**
 * Apply one writer action to the tree under construction. Containers are
 * attached to their parent on open, through the same path a leaf takes.
 */
export function build({ state, action }: { state: BuildState; action: Action }): BuildState {
    switch (action.type) {
        case 'open': {
            const frame: BuildFrame = action.container === 'array'
                ? { type: 'array', ref: [] }
                : { type: 'object', ref: new Map() };
            const attached = attach(state, frame.ref);
            return { ...attached, stack: [...attached.stack, frame] };
        }
        case 'close':
            return { ...state, stack: state.stack.slice(0, -1) };
        case 'key':
            return handleKey(state, action.key);
        case 'value': {
            // The tree owns its nodes: nothing the caller keeps may alias them
            const value = action.codec ? encodeValue(action.value, action.codec) : action.value;
            return attach(state, cloneValue(value));
        }
    }
}

function handleKey(state: BuildState, key: string): BuildState {
    const top = state.stack[state.stack.length - 1];
    if (top?.type !== 'object') {
        failure('key outside of an object');
    }
    return { ...state, stack: [...state.stack.slice(0, -1), { ...top, key }] };
}

function attach(state: BuildState, value: Value): BuildState {
    if (state.stack.length === 0) {
        return { ...state, root: value };
    }

    const top = state.stack[state.stack.length - 1];
    if (top.type === 'array') {
        top.ref.push(value);
        return state;
    }

    if (top.key === undefined) {
        failure('value in an object without a pending key');
    }
    top.ref.set(top.key, value);
    return { ...state, stack: [...state.stack.slice(0, -1), { type: 'object', ref: top.ref }] };
}
