import type { ChatExport, SearchOptions, UserWordCounts, WordCounts } from '../types';
import { countOccurrences } from '../parsers/entity-normaliser';
import { InvalidSearchTermError } from '../utils/errors';
import { isRegularMessage, senderLabel } from '../utils/message.utils';

// ============================================================================
// WORD COUNTS
// ============================================================================

/**
 * Drops repeated search words, keeping first-seen order.
 *
 * @throws InvalidSearchTermError if any word is empty
 */
export function uniqueWords(words: readonly string[]): string[] {
    if (words.some(word => word.length === 0)) {
        throw new InvalidSearchTermError();
    }
    return Array.from(new Set(words));
}

/**
 * Occurrences of each word across every message, service messages included.
 * Words that never occur are reported with a count of 0.
 */
export function countWords(chat: ChatExport, words: readonly string[], options: SearchOptions = {}): WordCounts {
    const counts: WordCounts = new Map();
    const searchWords = uniqueWords(words);

    for (const word of searchWords) {
        counts.set(word, 0);
    }

    for (const message of chat.messages) {
        for (const word of searchWords) {
            const count = countOccurrences(message.text, word, options);
            counts.set(word, (counts.get(word) ?? 0) + count);
        }
    }

    return counts;
}

/**
 * Occurrences of each word per sender. Service messages have no sender and
 * are skipped; only words a sender actually used are recorded.
 */
export function countWordsPerUser(chat: ChatExport, words: readonly string[], options: SearchOptions = {}): UserWordCounts {
    const userCounts: UserWordCounts = new Map();
    const searchWords = uniqueWords(words);

    for (const message of chat.messages) {
        if (!isRegularMessage(message)) continue;

        for (const word of searchWords) {
            const count = countOccurrences(message.text, word, options);
            if (count === 0) continue;

            const sender = senderLabel(message);
            let counts = userCounts.get(sender);
            if (!counts) {
                counts = new Map();
                userCounts.set(sender, counts);
            }
            counts.set(word, (counts.get(word) ?? 0) + count);
        }
    }

    return userCounts;
}
