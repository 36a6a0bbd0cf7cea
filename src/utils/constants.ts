/**
 * Constants and Configuration Values
 */

import type { MessageType } from '../types';

// ============================================================================
// LOADING
// ============================================================================

// Telegram Desktop writes UTF-8, sometimes with a byte-order mark
export const DEFAULT_ENCODING = 'utf8';

export const MESSAGE_TYPES: readonly MessageType[] = Object.freeze(['message', 'service']);

// ============================================================================
// QUERIES & OUTPUT
// ============================================================================

export const PROMPT = '(chat) ';

// Telegram exports `"from": null` for senders whose account no longer exists
export const DELETED_ACCOUNT_LABEL = 'Deleted Account';

export const PER_USER_INDENT = '- ';
