import { encodeValue } from '../codec.js';
import { ValueEncodingError } from '../errors.js';
import { kindOf, type Value } from '../value.js';
import type { Action, Position } from './writer-machine.js';

// ============ Leaf Formatting ============

/**
 * Format a value as one unit: compact when `indent` is 0, otherwise one
 * member per line, `JSON.stringify` style. `level` is the nesting level
 * the first line starts at.
 */
export function formatValue(value: Value, indent: number, level = 0): string {
    if (value === null) return 'null';
    if (typeof value === 'boolean') return value ? 'true' : 'false';
    if (typeof value === 'string') return JSON.stringify(value);
    if (typeof value === 'number') {
        if (!Number.isFinite(value)) {
            throw new ValueEncodingError(`${value} is not representable in JSON`);
        }
        return JSON.stringify(value);
    }

    if (Array.isArray(value)) {
        if (value.length === 0) return '[]';
        return joinMembers('[', ']', value.map(item => formatValue(item, indent, level + 1)), indent, level);
    }

    if (value instanceof Map) {
        if (value.size === 0) return '{}';
        const separator = indent > 0 ? ': ' : ':';
        const members = [...value].map(
            ([key, item]) => JSON.stringify(key) + separator + formatValue(item, indent, level + 1)
        );
        return joinMembers('{', '}', members, indent, level);
    }

    throw new ValueEncodingError(`${kindOf(value)} values need a codec to be written`);
}

function joinMembers(open: string, close: string, members: string[], indent: number, level: number): string {
    if (indent === 0) return open + members.join(',') + close;
    const inner = '\n' + ' '.repeat((level + 1) * indent);
    return open + inner + members.join(',' + inner) + '\n' + ' '.repeat(level * indent) + close;
}

// ============ Action Rendering ============

/**
 * Text for one writer transition. Computed in full before anything is
 * written, so a formatting failure leaves the sink untouched.
 */
export function renderAction(action: Action, indent: number): string {
    const pad = (depth: number) => ' '.repeat(depth * indent);

    switch (action.type) {
        case 'open':
            return prefix(action.position, pad(action.depth)) + (action.container === 'array' ? '[' : '{\n');

        case 'close':
            if (action.container === 'array') {
                return action.empty ? ']' : '\n' + pad(action.depth) + ']';
            }
            return (action.empty ? '' : '\n') + pad(action.depth) + '}';

        case 'key':
            return (action.first ? '' : ',\n') + pad(action.depth) + JSON.stringify(action.key) + ': ';

        case 'value': {
            const value = action.codec ? encodeValue(action.value, action.codec) : action.value;
            const text = formatValue(value, indent).replace(/\n/g, '\n' + pad(action.depth));
            return prefix(action.position, pad(action.depth)) + text;
        }
    }
}

function prefix(position: Position, padding: string): string {
    switch (position) {
        case 'first':
            return '\n' + padding;
        case 'next':
            return ',\n' + padding;
        default:
            return '';
    }
}
