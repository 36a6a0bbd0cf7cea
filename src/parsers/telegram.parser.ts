import type { ChatExport } from '../types';
import { ChatLoadError, MissingFieldError } from '../utils/errors';
import { createMessage } from './message.factory';
import { ChatExportDocumentSchema } from './telegram.schema';

// ============================================================================
// TELEGRAM EXPORT PARSER
// ============================================================================

/**
 * Builds the chat model from an already-parsed export document.
 *
 * Every record goes through the message factory; the first record that fails
 * aborts the load, so a ChatExport is either complete or not produced at all.
 * The document itself is left untouched.
 */
export function loadChatExport(document: unknown): ChatExport {
    const result = ChatExportDocumentSchema.safeParse(document);
    if (!result.success) {
        const [issue] = result.error.issues;
        const field = issue && issue.path.length > 0 ? String(issue.path[0]) : '<document>';
        throw new MissingFieldError(field, 'Chat export', issue?.message);
    }

    const { name, id, messages: records } = result.data;
    const messages = records.map((record, index) => createMessage(record, index));

    return Object.freeze({
        name,
        id,
        messages: Object.freeze(messages),
    });
}

/**
 * Parses Telegram export JSON text into the chat model
 */
export function parseChatExport(chatJson: string, source?: string): ChatExport {
    let document: unknown;
    try {
        document = JSON.parse(chatJson);
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        throw new ChatLoadError(`Invalid JSON${source ? ` in ${source}` : ''}: ${detail}`, {
            filePath: source,
            cause: error,
        });
    }
    return loadChatExport(document);
}
