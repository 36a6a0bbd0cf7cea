/**
 * CLI Utilities for console output and prompting
 */

import * as readline from 'node:readline';

// ============================================================================
// BRANDING
// ============================================================================

export const BANNER = `
╔════════════════════════════════════════════════════════════╗
║                                                            ║
║                   T E L E G R A M   C H A T                ║
║                      Q U E R Y   T O O L                   ║
║                                                            ║
║        word counts  ·  message search  ·  activity         ║
║                                                            ║
╚════════════════════════════════════════════════════════════╝
`;

export const SUCCESS_ICON = "✓";
export const ERROR_ICON = "✗";
export const INFO_ICON = "ℹ";
export const WARNING_ICON = "⚠";

// ============================================================================
// COLOR UTILITIES
// ============================================================================

export const colors = {
    reset: '\x1b[0m',
    bright: '\x1b[1m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    gray: '\x1b[90m'
};

export function colorize(text: string, color: keyof typeof colors): string {
    return `${colors[color]}${text}${colors.reset}`;
}

// ============================================================================
// FORMATTING UTILITIES
// ============================================================================

export function formatNumber(num: number): string {
    return num.toLocaleString();
}

// ============================================================================
// MESSAGE UTILITIES
// ============================================================================

export function logSuccess(message: string): void {
    console.log(`${colorize(SUCCESS_ICON, 'green')} ${colorize(message, 'green')}`);
}

export function logError(message: string): void {
    console.log(`${colorize(ERROR_ICON, 'red')} ${colorize(message, 'red')}`);
}

export function logInfo(message: string): void {
    console.log(`${colorize(INFO_ICON, 'blue')} ${colorize(message, 'blue')}`);
}

export function logWarning(message: string): void {
    console.log(`${colorize(WARNING_ICON, 'yellow')} ${colorize(message, 'yellow')}`);
}

export function logHeader(message: string): void {
    const line = '═'.repeat(message.length + 4);
    console.log(`\n${colorize(line, 'cyan')}`);
    console.log(`${colorize('  ' + message + '  ', 'cyan')}`);
    console.log(`${colorize(line, 'cyan')}\n`);
}

// ============================================================================
// TABLE UTILITIES
// ============================================================================

export interface TableColumn {
    header: string;
    width: number;
    align?: 'left' | 'right' | 'center';
}

export function createTable(columns: TableColumn[], data: string[][]): void {
    const headerRow = columns.map(col => col.header.padEnd(col.width)).join(' │ ');
    const separator = columns.map(col => '─'.repeat(col.width)).join('─┼─');

    console.log(`┌─${separator}─┐`);
    console.log(`│ ${colorize(headerRow, 'bright')} │`);
    console.log(`├─${separator}─┤`);

    data.forEach(row => {
        const formattedRow = row.map((cell, i) => {
            const col = columns[i];
            const truncated = cell.length > col.width ? cell.substring(0, col.width - 3) + '...' : cell;

            switch (col.align) {
                case 'right':
                    return truncated.padStart(col.width);
                case 'center':
                    return truncated.padStart((col.width + truncated.length) / 2).padEnd(col.width);
                default:
                    return truncated.padEnd(col.width);
            }
        }).join(' │ ');

        console.log(`│ ${formattedRow} │`);
    });

    console.log(`└─${separator}─┘`);
}

// ============================================================================
// USAGE & ERRORS
// ============================================================================

export function showUsage(): void {
    console.log(BANNER);

    console.log(`${colorize('USAGE:', 'bright')}`);
    console.log(`  ${colorize('npx tsx src/index.ts', 'cyan')} ${colorize('--input-file', 'yellow')} ${colorize('<result.json>', 'yellow')} ${colorize('[--encoding <name>]', 'dim')}`);
    console.log();

    console.log(`${colorize('OPTIONS:', 'bright')}`);
    console.log(`  ${colorize('--input-file, -i', 'cyan')}    Telegram "Export chat history" JSON file (required)`);
    console.log(`  ${colorize('--encoding, -e', 'cyan')}      Text encoding of the file (default: utf8)`);
    console.log(`  ${colorize('--help, -h', 'cyan')}          Show this help message`);
    console.log();

    console.log(`${colorize('COMMANDS:', 'bright')}`);
    console.log(`  ${colorize('wcount', 'green')} words... [-c] [-u]   Count occurrences, optionally per user`);
    console.log(`  ${colorize('wgrep', 'green')} words... [-c]         Print messages containing the words`);
    console.log(`  ${colorize('msgcount', 'green')} [-u]               Count messages, optionally per user`);
    console.log(`  ${colorize('help', 'green')} [command]              Describe commands`);
    console.log(`  ${colorize('q', 'green')}                           Quit`);
    console.log();

    console.log(`${colorize('EXAMPLES:', 'bright')}`);
    console.log(`  ${colorize('npx tsx src/index.ts -i ./ChatExport/result.json', 'cyan')}`);
    console.log(`  ${colorize('(chat) wcount -u "good morning" hello', 'dim')}`);
    console.log(`  ${colorize('(chat) msgcount --per-user', 'dim')}`);
}

export function showError(message: string, details?: string): void {
    console.log();
    logError(message);
    if (details) {
        console.log(`${colorize('Details:', 'dim')} ${details}`);
    }
    console.log();
    console.log(`${colorize('Run with --help to see usage information.', 'dim')}`);
    console.log();
}

// ============================================================================
// INTERACTIVE CLI UTILITIES
// ============================================================================

export function createReadlineInterface(prompt: string): readline.Interface {
    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout
    });
    rl.setPrompt(prompt);
    return rl;
}

