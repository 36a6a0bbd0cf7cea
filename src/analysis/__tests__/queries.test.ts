import { describe, it, expect } from 'vitest';

import { countWords, countWordsPerUser, uniqueWords } from '../word-count.computer';
import { grepMessages } from '../word-grep.computer';
import { countMessages, countMessagesPerUser } from '../message-count.computer';
import { loadChatExport } from '../../parsers/telegram.parser';
import { InvalidSearchTermError } from '../../utils/errors';
import { exportDocument, regularRecord, sampleChat, serviceRecord } from '../../__tests__/sample-chat';

describe('word counts', () => {
  // ── countWords ───────────────────────────────────────────────────

  describe('countWords', () => {
    it('should count across regular and service messages, ignoring case', () => {
      // 1 + 1 (link text) + 2 + 1 (mention skipped) + 1 (service) + 1 (deleted account)
      expect(countWords(sampleChat(), ['hello'])).toEqual(new Map([['hello', 7]]));
    });

    it('should count exact case when case sensitive', () => {
      expect(countWords(sampleChat(), ['hello'], { caseSensitive: true }).get('hello')).toBe(5);
    });

    it('should report every word once, in argument order, with zero counts kept', () => {
      const counts = countWords(sampleChat(), ['hello', 'bye', 'zzz', 'hello']);

      expect(Array.from(counts)).toEqual([
        ['hello', 7],
        ['bye', 1],
        ['zzz', 0],
      ]);
    });

    it('should propagate an empty search word', () => {
      expect(() => countWords(sampleChat(), [''])).toThrow(InvalidSearchTermError);
    });
  });

  // ── countWordsPerUser ────────────────────────────────────────────

  describe('countWordsPerUser', () => {
    it('should group counts by sender and skip service messages', () => {
      const counts = countWordsPerUser(sampleChat(), ['hello', 'bye']);

      expect(Array.from(counts.keys())).toEqual(['Alice', 'Bob', 'Deleted Account']);
      expect(counts.get('Alice')).toEqual(new Map([['hello', 3], ['bye', 1]]));
      expect(counts.get('Bob')).toEqual(new Map([['hello', 2]]));
      expect(counts.get('Deleted Account')).toEqual(new Map([['hello', 1]]));
    });

    it('should leave out senders who never used the words', () => {
      expect(countWordsPerUser(sampleChat(), ['bye'])).toEqual(new Map([['Alice', new Map([['bye', 1]])]]));
    });
  });

  it('should dedupe words keeping first-seen order', () => {
    expect(uniqueWords(['b', 'a', 'b'])).toEqual(['b', 'a']);
  });

  it('should reject an empty word even when no message would be searched', () => {
    const chat = loadChatExport(exportDocument([serviceRecord(1, 'create_group')]));

    expect(() => countWordsPerUser(chat, ['ok', ''])).toThrow(InvalidSearchTermError);
  });
});

describe('grepMessages', () => {
  it('should return one hit per matching word in chat order', () => {
    const hits = grepMessages(sampleChat(), ['hello', 'bye']);

    expect(hits.map(hit => [hit.message.id, hit.word])).toEqual([
      [1, 'hello'],
      [3, 'hello'],
      [4, 'hello'],
      [5, 'hello'],
      [6, 'hello'],
      [7, 'bye'],
      [8, 'hello'],
    ]);
  });

  it('should honour case sensitivity', () => {
    const hits = grepMessages(sampleChat(), ['HELLO'], { caseSensitive: true });

    expect(hits.map(hit => hit.message.id)).toEqual([5]);
  });

  it('should yield separate hits when one message matches two words', () => {
    const hits = grepMessages(sampleChat(), ['every', 'one']);

    expect(hits.map(hit => [hit.message.id, hit.word])).toEqual([
      [1, 'every'],
      [1, 'one'],
    ]);
  });
});

describe('message counts', () => {
  it('should count every message', () => {
    expect(countMessages(sampleChat())).toBe(8);
  });

  it('should count regular messages per sender, fewest first', () => {
    expect(countMessagesPerUser(sampleChat())).toEqual([
      ['Deleted Account', 1],
      ['Bob', 2],
      ['Alice', 3],
    ]);
  });

  it('should ignore interspersed service messages', () => {
    const chat = loadChatExport(exportDocument([
      regularRecord(1, 'A', 'one'),
      serviceRecord(2, 'invite_members'),
      regularRecord(3, 'B', 'two'),
      regularRecord(4, 'A', 'three'),
      serviceRecord(5, 'pin_message'),
      regularRecord(6, 'B', 'four'),
      regularRecord(7, 'A', 'five'),
    ]));

    expect(countMessagesPerUser(chat)).toEqual([
      ['B', 2],
      ['A', 3],
    ]);
  });

  it('should keep first-appearance order for equal counts', () => {
    const chat = loadChatExport(exportDocument([
      regularRecord(1, 'Carol', 'x'),
      regularRecord(2, 'Dave', 'y'),
      regularRecord(3, 'Erin', 'z'),
      regularRecord(4, 'Erin', 'z'),
    ]));

    expect(countMessagesPerUser(chat)).toEqual([
      ['Carol', 1],
      ['Dave', 1],
      ['Erin', 2],
    ]);
  });
});
