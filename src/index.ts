export {
    type WriteStream,
    AutomatonWriteStream,
    TextWriteStream,
    MemoryWriteStream,
    NullWriteStream,
    createWriteStream,
    writeTree,
} from './writer.js';
export {
    SelectorTransformer,
    CallbackSelectorTransformer,
    DefaultTransformer,
    LoggingSelectorTransformer,
    formatSelector,
    parse,
} from './transformer.js';
export { type ValueCodec, numericCodec, encodeValue, decodeValue } from './codec.js';
export {
    Complex,
    NDArray,
    DTYPES,
    isDType,
    kindOf,
    isValueObject,
    obj,
    valueEquals,
    cloneValue,
    walkValue,
    toPlain,
    fromPlain,
    shapeSize,
    type DType,
    type Value,
    type ValueObject,
    type ValueKind,
    type PlainJson,
} from './value.js';
export { StringSink, createStreamSink } from './sink.js';
export { Scanner, scan } from './core/scanner.js';
export { formatValue } from './core/format.js';
export { type StreamState } from './core/writer-machine.js';
export {
    JsonwrightError,
    ProtocolViolation,
    UnsupportedDType,
    ValueEncodingError,
    JsonSyntaxError,
    InvalidOptionsError,
} from './errors.js';
export { type Logger, type LogEntry, type LogLevel, noopLogger, consoleLogger } from './logger.js';
export {
    WriterOptionsSchema,
    TextWriterOptionsSchema,
    TransformerOptionsSchema,
    type WriterOptions,
    type TextWriterOptions,
    type TransformerOptions,
} from './config.js';
export type { Path, Sink, Selector, SelectorCallback, ReductionEvent } from './types.js';
