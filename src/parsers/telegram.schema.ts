/**
 * Zod schemas for Telegram Desktop "Export chat history" JSON.
 *
 * result.json looks roughly like:
 * {
 *   "name": "Group Name",
 *   "id": 1234567890,
 *   "messages": [ { "id": 1, "type": "message", "text": ..., ... } ]
 * }
 *
 * Keys not listed here are stripped on parse.
 */

import { z } from 'zod';

// ── Text field ──────────────────────────────────────────

/**
 * Inline entity inside a `text` array, e.g. { "type": "mention", "text": "@alice" }.
 * Some entity types carry no text of their own.
 */
export const TextEntitySchema = z.object({
    type: z.string(),
    text: z.string().optional(),
});

export const RawTextSchema = z.union([
    z.string(),
    z.array(z.union([z.string(), TextEntitySchema])),
]);

export type RawTextEntity = z.infer<typeof TextEntitySchema>;
export type RawText = z.infer<typeof RawTextSchema>;

// ── Records ─────────────────────────────────────────────

const RecordBaseSchema = z.object({
    id: z.number().int(),
    date: z.string(),
    date_unixtime: z.union([z.string(), z.number()]),
    text: RawTextSchema,
});

export const RegularRecordSchema = RecordBaseSchema.extend({
    type: z.literal('message'),
    from: z.string().nullable(),
});

export const ServiceRecordSchema = RecordBaseSchema.extend({
    type: z.literal('service'),
    action: z.string(),
});

export type RegularRecord = z.infer<typeof RegularRecordSchema>;
export type ServiceRecord = z.infer<typeof ServiceRecordSchema>;

// ── Export root ─────────────────────────────────────────

export const ChatExportDocumentSchema = z.object({
    name: z.string(),
    id: z.number().int(),
    // Records are checked one by one by the message factory
    messages: z.array(z.unknown()),
});

export type ChatExportDocument = z.infer<typeof ChatExportDocumentSchema>;
