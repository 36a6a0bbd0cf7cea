/**
 * Message Variant Helpers
 */

import type { Message, RegularMessage, ServiceMessage } from '../types';
import { DELETED_ACCOUNT_LABEL } from './constants';
import { MissingFieldError } from './errors';

export function isRegularMessage(message: Message): message is RegularMessage {
    return message.type === 'message';
}

export function isServiceMessage(message: Message): message is ServiceMessage {
    return message.type === 'service';
}

/**
 * Sender of a message whose variant the caller has not checked.
 *
 * @throws MissingFieldError for service messages, which have no sender
 */
export function requireSender(message: Message): string | null {
    if (!isRegularMessage(message)) {
        throw new MissingFieldError('from', `Service message ${message.id}`);
    }
    return message.from;
}

/**
 * @throws MissingFieldError for regular messages, which have no action
 */
export function requireAction(message: Message): string {
    if (!isServiceMessage(message)) {
        throw new MissingFieldError('action', `Regular message ${message.id}`);
    }
    return message.action;
}

/**
 * Name a sender is grouped and printed under.
 */
export function senderLabel(message: RegularMessage): string {
    return message.from ?? DELETED_ACCOUNT_LABEL;
}
