import { z } from 'zod';
import type { ValueCodec } from './codec.js';
import { InvalidOptionsError } from './errors.js';
import type { Logger } from './logger.js';
import type { Sink } from './types.js';

// ============ Schemas ============

function isSink(value: unknown): value is Sink {
    return (
        typeof value === 'object' &&
        value !== null &&
        'write' in value &&
        typeof value.write === 'function' &&
        'flush' in value &&
        typeof value.flush === 'function'
    );
}

function isCodec(value: unknown): value is ValueCodec {
    return (
        typeof value === 'object' &&
        value !== null &&
        'encode' in value &&
        typeof value.encode === 'function' &&
        'decode' in value &&
        typeof value.decode === 'function'
    );
}

const LoggerSchema = z.custom<Logger>(value => typeof value === 'function', {
    message: 'logger must be a function',
});

const SinkSchema = z.custom<Sink>(isSink, {
    message: 'sink must provide write() and flush()',
});

const CodecSchema = z.custom<ValueCodec>(isCodec, {
    message: 'codec must provide encode() and decode()',
});

/** Spaces per nesting level; 0 keeps leaves compact. */
const IndentSchema = z.number().int().min(0).default(0);

export const TextWriterOptionsSchema = z.object({
    indent: IndentSchema,
    logger: LoggerSchema.optional(),
});

export const WriterOptionsSchema = z.discriminatedUnion('kind', [
    TextWriterOptionsSchema.extend({ kind: z.literal('text'), sink: SinkSchema }),
    z.object({ kind: z.literal('memory'), logger: LoggerSchema.optional() }),
    z.object({ kind: z.literal('null') }),
]);

export const TransformerOptionsSchema = z.object({
    codec: CodecSchema.optional(),
    logger: LoggerSchema.optional(),
});

export type TextWriterOptions = z.input<typeof TextWriterOptionsSchema>;
export type WriterOptions = z.input<typeof WriterOptionsSchema>;
export type TransformerOptions = z.input<typeof TransformerOptionsSchema>;

// ============ Parsing ============

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}

export function parseTextWriterOptions(input: unknown): z.output<typeof TextWriterOptionsSchema> {
    const result = TextWriterOptionsSchema.safeParse(input);
    if (!result.success) throw new InvalidOptionsError(formatIssues(result.error));
    return result.data;
}

export function parseWriterOptions(input: unknown): z.output<typeof WriterOptionsSchema> {
    const result = WriterOptionsSchema.safeParse(input);
    if (!result.success) throw new InvalidOptionsError(formatIssues(result.error));
    return result.data;
}

export function parseTransformerOptions(input: unknown): z.output<typeof TransformerOptionsSchema> {
    const result = TransformerOptionsSchema.safeParse(input);
    if (!result.success) throw new InvalidOptionsError(formatIssues(result.error));
    return result.data;
}
