import type { z } from 'zod';
import type { Message, MessageType, RegularMessage, ServiceMessage } from '../types';
import { MissingFieldError, UnhandledMessageTypeError } from '../utils/errors';
import { normaliseText } from './entity-normaliser';
import { RegularRecordSchema, ServiceRecordSchema } from './telegram.schema';

// ============================================================================
// MESSAGE FACTORY
// ============================================================================

type MessageBuilder = (record: unknown, index: number) => Message;

/**
 * Describes where a record sits in the export, for error messages.
 */
function describeRecord(record: unknown, index: number): string {
    if (typeof record === 'object' && record !== null && 'id' in record) {
        return `Record #${index} (id ${String(record.id)})`;
    }
    return `Record #${index}`;
}

/**
 * Parses a record against a variant schema, turning the first zod issue into
 * a MissingFieldError.
 */
function parseRecord<T extends z.ZodTypeAny>(schema: T, record: unknown, index: number): z.infer<T> {
    const result = schema.safeParse(record);
    if (result.success) {
        return result.data;
    }

    const [issue] = result.error.issues;
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : '<record>';
    throw new MissingFieldError(field, describeRecord(record, index), issue?.message);
}

function buildRegularMessage(record: unknown, index: number): RegularMessage {
    const raw = parseRecord(RegularRecordSchema, record, index);
    return Object.freeze({
        type: raw.type,
        id: raw.id,
        date: raw.date,
        dateUnixtime: raw.date_unixtime,
        text: normaliseText(raw.text),
        from: raw.from,
    });
}

function buildServiceMessage(record: unknown, index: number): ServiceMessage {
    const raw = parseRecord(ServiceRecordSchema, record, index);
    return Object.freeze({
        type: raw.type,
        id: raw.id,
        date: raw.date,
        dateUnixtime: raw.date_unixtime,
        text: normaliseText(raw.text),
        action: raw.action,
    });
}

const MESSAGE_BUILDERS: Readonly<Record<MessageType, MessageBuilder>> = Object.freeze({
    message: buildRegularMessage,
    service: buildServiceMessage,
});

export function isKnownMessageType(value: string): value is MessageType {
    return Object.hasOwn(MESSAGE_BUILDERS, value);
}

/**
 * Builds the Message variant named by the record's `type` field.
 *
 * @param index - position of the record in the export, used in error messages
 * @throws UnhandledMessageTypeError when `type` is not a known variant
 * @throws MissingFieldError when `type` or a field the variant requires is absent
 */
export function createMessage(record: unknown, index: number = 0): Message {
    if (typeof record !== 'object' || record === null || !('type' in record)) {
        throw new MissingFieldError('type', describeRecord(record, index));
    }

    const messageType = record.type;
    if (typeof messageType !== 'string') {
        throw new MissingFieldError('type', describeRecord(record, index), 'expected a string');
    }
    if (!isKnownMessageType(messageType)) {
        throw new UnhandledMessageTypeError(messageType, index);
    }

    return MESSAGE_BUILDERS[messageType](record, index);
}
