/**
 * Query Type Definitions
 */

import type { Message } from './message.types';

export type SearchOptions = {
    caseSensitive?: boolean;
};

/**
 * Occurrences of each search word, keyed by word.
 */
export type WordCounts = Map<string, number>;

/**
 * Word counts per sender, senders in order of their first matching message.
 */
export type UserWordCounts = Map<string, WordCounts>;

export type GrepHit = {
    word: string;
    message: Message;
};

export type UserMessageCount = [sender: string, count: number];
