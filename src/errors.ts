import type { StreamState } from './core/writer-machine.js';

/**
 * Base class for every error raised by this package.
 */
export class JsonwrightError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;

        // Set the prototype explicitly for better instanceof support
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * The writer automaton was driven outside its legal transition set.
 * Always a caller defect: nothing is written and the state is unchanged.
 */
export class ProtocolViolation extends JsonwrightError {
    readonly state: StreamState;
    readonly operation: string;

    constructor(state: StreamState, operation: string) {
        super(`${operation} is not allowed in state ${state}`);
        this.state = state;
        this.operation = operation;
    }
}

/**
 * An encoded ndarray carried a dtype tag the numeric codec does not know.
 */
export class UnsupportedDType extends JsonwrightError {
    readonly dtype: string;

    constructor(dtype: string) {
        super(`unsupported dtype: ${JSON.stringify(dtype)}`);
        this.dtype = dtype;
    }
}

/**
 * A value has no JSON representation, e.g. NaN or an ndarray written
 * without a codec.
 */
export class ValueEncodingError extends JsonwrightError {}

/**
 * Malformed JSON text was fed to the scanner.
 */
export class JsonSyntaxError extends JsonwrightError {
    readonly offset: number;

    constructor(message: string, offset: number) {
        super(`${message} at offset ${offset}`);
        this.offset = offset;
    }
}

/**
 * Options failed schema validation.
 */
export class InvalidOptionsError extends JsonwrightError {}

export function failure(message: string): never {
    throw new JsonwrightError(message);
}
