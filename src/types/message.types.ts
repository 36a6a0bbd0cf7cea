/**
 * Message and Chat Type Definitions
 */

// ============================================================================
// TEXT CONTENT
// ============================================================================

/**
 * One unit of a message body: literal text, or an inline entity (link,
 * mention, code span...) that may or may not carry its own display text.
 */
export type TextSegment =
    | { readonly kind: 'plain'; readonly text: string }
    | { readonly kind: 'entity'; readonly type: string; readonly text?: string };

/**
 * Normalised message body. Exports write `text` either as a bare string or as
 * a list mixing strings and entity objects; both forms are kept apart here.
 */
export type TextContent =
    | { readonly form: 'plain'; readonly text: string }
    | { readonly form: 'entities'; readonly segments: readonly TextSegment[] };

// ============================================================================
// MESSAGES
// ============================================================================

export type MessageType = 'message' | 'service';

type MessageBase = {
    readonly id: number;
    readonly date: string;
    /** Epoch seconds, as the export wrote them (string in current exports). */
    readonly dateUnixtime: string | number;
    readonly text: TextContent;
};

/**
 * Message sent by a user. `from` is null when the sender's account was deleted.
 */
export type RegularMessage = MessageBase & {
    readonly type: 'message';
    readonly from: string | null;
};

/**
 * Chat event such as a member joining or a title change.
 */
export type ServiceMessage = MessageBase & {
    readonly type: 'service';
    readonly action: string;
};

export type Message = RegularMessage | ServiceMessage;

// ============================================================================
// CHAT
// ============================================================================

export type ChatExport = {
    readonly name: string;
    readonly id: number;
    readonly messages: readonly Message[];
};
