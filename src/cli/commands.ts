import type { ChatExport, GrepHit, UserMessageCount, UserWordCounts, WordCounts } from '../types';
import { countWords, countWordsPerUser } from '../analysis/word-count.computer';
import { grepMessages } from '../analysis/word-grep.computer';
import { countMessages, countMessagesPerUser } from '../analysis/message-count.computer';
import { renderText } from '../parsers/entity-normaliser';
import { PER_USER_INDENT } from '../utils/constants';
import { CommandUsageError, isChatExportError } from '../utils/errors';
import { senderLabel } from '../utils/message.utils';
import { parseArguments, splitCommandLine, type ArgumentSpec, type FlagDefinition, type ParsedArguments } from './command-parser';

// ============================================================================
// FLAGS
// ============================================================================

const CASE_SENSITIVE: FlagDefinition = {
    name: 'case-sensitive',
    short: 'c',
    description: 'Case sensitive search',
};

const PER_USER: FlagDefinition = {
    name: 'per-user',
    short: 'u',
    description: 'Print stats for every user',
};

// ============================================================================
// OUTPUT FORMATTING
// ============================================================================

export function formatWordCounts(counts: WordCounts): string[] {
    return Array.from(counts, ([word, count]) => `${word}: ${count}`);
}

/**
 * One block per user: the name, then `- word: count` lines sorted by word.
 */
export function formatUserWordCounts(userCounts: UserWordCounts): string[] {
    const lines: string[] = [];
    for (const [user, counts] of userCounts) {
        lines.push(user);
        const words = Array.from(counts.keys()).sort();
        for (const word of words) {
            lines.push(`${PER_USER_INDENT}${word}: ${counts.get(word)}`);
        }
    }
    return lines;
}

export function formatGrepHit(hit: GrepHit): string {
    const { word, message } = hit;
    const label = message.type === 'message' ? senderLabel(message) : `service: ${message.action}`;
    return `${word}: [${label}] ${renderText(message.text)}`;
}

export function formatUserMessageCounts(counts: readonly UserMessageCount[]): string[] {
    return counts.map(([user, count]) => `${user}: ${count}`);
}

// ============================================================================
// COMMAND TABLE
// ============================================================================

export interface CommandDefinition extends ArgumentSpec {
    name: string;
    description: string;
    run(chat: ChatExport, args: ParsedArguments): string[];
}

export const COMMANDS: readonly CommandDefinition[] = [
    {
        name: 'wcount',
        description: 'Count how many times a string or strings appear in the chat history',
        usage: 'wcount [-c/--case-sensitive] [-u/--per-user] words [words ...]',
        flags: [CASE_SENSITIVE, PER_USER],
        words: true,
        run(chat, { words, flags }) {
            const options = { caseSensitive: flags.has(CASE_SENSITIVE.name) };
            return flags.has(PER_USER.name)
                ? formatUserWordCounts(countWordsPerUser(chat, words, options))
                : formatWordCounts(countWords(chat, words, options));
        },
    },
    {
        name: 'wgrep',
        description: 'Find messages that contain a certain word',
        usage: 'wgrep [-c/--case-sensitive] words [words ...]',
        flags: [CASE_SENSITIVE],
        words: true,
        run(chat, { words, flags }) {
            const hits = grepMessages(chat, words, { caseSensitive: flags.has(CASE_SENSITIVE.name) });
            return hits.map(formatGrepHit);
        },
    },
    {
        name: 'msgcount',
        description: 'How many messages were sent in the chat',
        usage: 'msgcount [-u/--per-user]',
        flags: [PER_USER],
        words: false,
        run(chat, { flags }) {
            return flags.has(PER_USER.name)
                ? formatUserMessageCounts(countMessagesPerUser(chat))
                : [String(countMessages(chat))];
        },
    },
];

export function findCommand(name: string): CommandDefinition | undefined {
    return COMMANDS.find(command => command.name === name);
}

// ============================================================================
// HELP
// ============================================================================

export function commandHelp(command: CommandDefinition): string[] {
    const lines = [command.description, '', `usage: ${command.usage}`];
    for (const flag of command.flags) {
        lines.push(`  -${flag.short}, --${flag.name}`.padEnd(26) + flag.description);
    }
    return lines;
}

export function helpLines(topic?: string): string[] {
    if (topic === 'q') {
        return ['Quit the program'];
    }
    if (topic) {
        const command = findCommand(topic);
        return command ? commandHelp(command) : [`*** No help on ${topic}`];
    }

    const lines = ['Commands:'];
    for (const command of COMMANDS) {
        lines.push(`  ${command.name.padEnd(10)}${command.description}`);
    }
    lines.push(`  ${'help'.padEnd(10)}List commands, or describe one: help <command>`);
    lines.push(`  ${'q'.padEnd(10)}Quit the program`);
    return lines;
}

// ============================================================================
// EXECUTION
// ============================================================================

export type CommandOutcome =
    | { status: 'ok'; lines: string[] }
    | { status: 'error'; message: string; usage?: string }
    | { status: 'exit' };

/**
 * Runs one line of input against the chat. Errors this package raises on
 * purpose (bad arguments, empty search words) become an error outcome;
 * anything else propagates.
 */
export function executeCommandLine(chat: ChatExport, line: string): CommandOutcome {
    const trimmed = line.trim();
    if (!trimmed) {
        return { status: 'ok', lines: [] };
    }

    const [name = ''] = trimmed.split(/\s+/, 1);
    const rest = trimmed.slice(name.length);

    if (name === 'q') {
        return { status: 'exit' };
    }
    if (name === 'help' || name === '?') {
        return { status: 'ok', lines: helpLines(rest.trim() || undefined) };
    }

    const command = findCommand(name);
    if (!command) {
        return { status: 'error', message: `*** Unknown syntax: ${trimmed}` };
    }

    try {
        const args = parseArguments(splitCommandLine(rest, command.usage), command);
        return { status: 'ok', lines: command.run(chat, args) };
    } catch (error) {
        if (!isChatExportError(error)) throw error;
        return {
            status: 'error',
            message: error.message,
            usage: error instanceof CommandUsageError ? error.usage : undefined,
        };
    }
}
