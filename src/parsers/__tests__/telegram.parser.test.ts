import { describe, it, expect } from 'vitest';

import { loadChatExport, parseChatExport } from '../telegram.parser';
import { renderText } from '../entity-normaliser';
import { ChatLoadError, MissingFieldError, UnhandledMessageTypeError } from '../../utils/errors';
import { exportDocument, regularRecord, sampleDocument, serviceRecord } from '../../__tests__/sample-chat';

describe('loadChatExport', () => {
  // ── Successful loads ─────────────────────────────────────────────

  it('should expose the chat name and id', () => {
    const chat = loadChatExport(sampleDocument());

    expect(chat.name).toBe('Test Group');
    expect(chat.id).toBe(4242);
  });

  it('should build one message per record in export order', () => {
    const chat = loadChatExport(sampleDocument());

    expect(chat.messages).toHaveLength(8);
    expect(chat.messages.map(message => message.id)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(chat.messages.map(message => message.type)).toEqual([
      'message', 'service', 'message', 'message', 'message', 'service', 'message', 'message',
    ]);
  });

  it('should normalise every text field', () => {
    const chat = loadChatExport(sampleDocument());

    expect(renderText(chat.messages[2].text)).toBe('Check hello.example out');
    expect(renderText(chat.messages[4].text)).toBe('<mention> HELLO');
  });

  it('should leave the source document untouched', () => {
    const document = sampleDocument();
    const before = JSON.stringify(document);

    loadChatExport(document);

    expect(JSON.stringify(document)).toBe(before);
  });

  it('should freeze the chat and its message list', () => {
    const chat = loadChatExport(sampleDocument());

    expect(Object.isFrozen(chat)).toBe(true);
    expect(Object.isFrozen(chat.messages)).toBe(true);
  });

  it('should load an export without messages', () => {
    expect(loadChatExport(exportDocument([])).messages).toEqual([]);
  });

  // ── Failed loads ─────────────────────────────────────────────────

  it('should abort the whole load on an unknown message type', () => {
    const document = exportDocument([
      regularRecord(1, 'Alice', 'first'),
      { ...regularRecord(2, 'Bob', 'Lunch?'), type: 'poll' },
      serviceRecord(3, 'invite_members'),
    ]);

    let chat: ReturnType<typeof loadChatExport> | undefined;
    expect(() => {
      chat = loadChatExport(document);
    }).toThrow(UnhandledMessageTypeError);
    expect(chat).toBeUndefined();
  });

  it('should report the index of the offending record', () => {
    const document = exportDocument([regularRecord(1, 'Alice', 'x'), { ...serviceRecord(2, 'x'), type: 'poll' }]);

    expect(() => loadChatExport(document)).toThrow('Unhandled message type: poll (record #1)');
  });

  it('should reject a document without a name', () => {
    const { name: _name, ...document } = sampleDocument();

    try {
      loadChatExport(document);
      expect.unreachable('loadChatExport should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(MissingFieldError);
      if (!(error instanceof MissingFieldError)) return;
      expect(error.field).toBe('name');
    }
  });

  it('should reject a document whose messages are not a list', () => {
    expect(() => loadChatExport({ name: 'x', id: 1, messages: {} })).toThrow(MissingFieldError);
  });

  it('should reject a value that is not a document', () => {
    expect(() => loadChatExport(null)).toThrow(MissingFieldError);
  });
});

describe('parseChatExport', () => {
  it('should parse JSON text into the chat model', () => {
    const chat = parseChatExport(JSON.stringify(sampleDocument()));

    expect(chat.messages).toHaveLength(8);
  });

  it('should wrap invalid JSON in a ChatLoadError', () => {
    try {
      parseChatExport('{"name": ', 'result.json');
      expect.unreachable('parseChatExport should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ChatLoadError);
      if (!(error instanceof ChatLoadError)) return;
      expect(error.code).toBe('CHAT_LOAD_FAILED');
      expect(error.message).toMatch(/^Invalid JSON in result\.json: /);
      expect(error.cause).toBeInstanceOf(SyntaxError);
    }
  });
});
