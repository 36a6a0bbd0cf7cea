import type { ChatExport, UserMessageCount } from '../types';
import { isRegularMessage, senderLabel } from '../utils/message.utils';

// ============================================================================
// MESSAGE COUNTS
// ============================================================================

export function countMessages(chat: ChatExport): number {
    return chat.messages.length;
}

/**
 * Messages sent by each user, fewest first. Users with equal counts keep the
 * order in which they first appear; service messages are not attributed.
 */
export function countMessagesPerUser(chat: ChatExport): UserMessageCount[] {
    const counts = new Map<string, number>();

    for (const message of chat.messages) {
        if (!isRegularMessage(message)) continue;
        const sender = senderLabel(message);
        counts.set(sender, (counts.get(sender) ?? 0) + 1);
    }

    return Array.from(counts.entries()).sort((a, b) => a[1] - b[1]);
}
