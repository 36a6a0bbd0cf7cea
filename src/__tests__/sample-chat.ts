import type { ChatExport } from '../types';
import { loadChatExport } from '../parsers/telegram.parser';

// ── Record builders ─────────────────────────────────────────────────

type RawText = string | Array<string | { type: string; text?: string; href?: string }>;

export function regularRecord(id: number, from: string | null, text: RawText) {
  return {
    id,
    type: 'message',
    date: `2024-03-01T10:${String(id).padStart(2, '0')}:00`,
    date_unixtime: String(1709287200 + id * 60),
    from,
    from_id: from === null ? null : `user${id}`,
    text,
  };
}

export function serviceRecord(id: number, action: string, text: RawText = '') {
  return {
    id,
    type: 'service',
    date: `2024-03-01T10:${String(id).padStart(2, '0')}:00`,
    date_unixtime: String(1709287200 + id * 60),
    actor: 'Alice',
    action,
    text,
  };
}

export function exportDocument(messages: unknown[]) {
  return { name: 'Test Group', type: 'private_group', id: 4242, messages };
}

// ── Shared sample ───────────────────────────────────────────────────

/**
 * Eight records: Alice 3, Bob 2, one deleted account, two service events.
 */
export function sampleDocument() {
  return exportDocument([
    regularRecord(1, 'Alice', 'Hello everyone'),
    serviceRecord(2, 'invite_members'),
    regularRecord(3, 'Bob', ['Check ', { type: 'link', text: 'hello.example' }, ' out']),
    regularRecord(4, 'Alice', 'hello hello'),
    regularRecord(5, 'Bob', [{ type: 'mention' }, ' HELLO']),
    serviceRecord(6, 'pin_message', 'hello pinned'),
    regularRecord(7, 'Alice', 'bye'),
    regularRecord(8, null, 'hello from the past'),
  ]);
}

export function sampleChat(): ChatExport {
  return loadChatExport(sampleDocument());
}
