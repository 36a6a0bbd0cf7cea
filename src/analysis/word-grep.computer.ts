import type { ChatExport, GrepHit, SearchOptions } from '../types';
import { countOccurrences } from '../parsers/entity-normaliser';
import { uniqueWords } from './word-count.computer';

/**
 * Messages containing any of the words, in chat order. A message matching
 * several words yields one hit per word, in the order the words were given.
 */
export function grepMessages(chat: ChatExport, words: readonly string[], options: SearchOptions = {}): GrepHit[] {
    const hits: GrepHit[] = [];
    const searchWords = uniqueWords(words);

    for (const message of chat.messages) {
        for (const word of searchWords) {
            if (countOccurrences(message.text, word, options) > 0) {
                hits.push({ word, message });
            }
        }
    }

    return hits;
}
