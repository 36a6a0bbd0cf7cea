/**
 * Error Types
 */

// ============================================================================
// BASE ERROR
// ============================================================================

export type ChatExportErrorCode =
    | 'UNHANDLED_MESSAGE_TYPE'
    | 'MISSING_FIELD'
    | 'INVALID_SEARCH_TERM'
    | 'CHAT_LOAD_FAILED'
    | 'COMMAND_USAGE';

/**
 * Root of every error this package raises on purpose. Anything else reaching
 * the CLI is a bug and is left to propagate.
 */
export class ChatExportError extends Error {
    readonly code: ChatExportErrorCode;

    constructor(code: ChatExportErrorCode, message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

export function isChatExportError(error: unknown): error is ChatExportError {
    return error instanceof ChatExportError;
}

// ============================================================================
// LOAD ERRORS
// ============================================================================

export class UnhandledMessageTypeError extends ChatExportError {
    readonly messageType: string;
    readonly recordIndex?: number;

    constructor(messageType: string, recordIndex?: number) {
        const where = recordIndex === undefined ? '' : ` (record #${recordIndex})`;
        super('UNHANDLED_MESSAGE_TYPE', `Unhandled message type: ${messageType}${where}`);
        this.messageType = messageType;
        this.recordIndex = recordIndex;
    }
}

export class MissingFieldError extends ChatExportError {
    readonly field: string;

    constructor(field: string, context: string, detail?: string) {
        super('MISSING_FIELD', `${context} is missing field "${field}"${detail ? `: ${detail}` : ''}`);
        this.field = field;
    }
}

export class ChatLoadError extends ChatExportError {
    readonly filePath?: string;

    constructor(message: string, options?: { filePath?: string; cause?: unknown }) {
        super('CHAT_LOAD_FAILED', message, { cause: options?.cause });
        this.filePath = options?.filePath;
    }
}

// ============================================================================
// QUERY & COMMAND ERRORS
// ============================================================================

export class InvalidSearchTermError extends ChatExportError {
    constructor(message = 'Search term must not be empty') {
        super('INVALID_SEARCH_TERM', message);
    }
}

export class CommandUsageError extends ChatExportError {
    readonly usage: string;

    constructor(message: string, usage: string) {
        super('COMMAND_USAGE', message);
        this.usage = usage;
    }
}
