import path from "node:path";
import type { ChatExport } from '../types';
import { loadChatFile } from '../utils/file.utils';
import { DEFAULT_ENCODING, MESSAGE_TYPES } from '../utils/constants';
import { CommandUsageError, isChatExportError } from '../utils/errors';
import {
    BANNER,
    colorize,
    createTable,
    formatNumber,
    logHeader,
    logSuccess,
    logWarning,
    showError,
    showUsage
} from './cli.utils';
import { runInteractiveCLI } from './interactive';

// ============================================================================
// ARGUMENT PARSING
// ============================================================================

export type CliOptions =
    | { help: true }
    | { help: false; inputFile: string; encoding: string };

const CLI_USAGE = '--input-file <path> [--encoding <name>]';

/**
 * Parses process arguments (without the node and script entries).
 * Accepts `--name value`, `--name=value` and `-x value`.
 */
export function parseCliArgs(args: readonly string[]): CliOptions {
    let inputFile: string | undefined;
    let encoding = DEFAULT_ENCODING;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--help' || arg === '-h') {
            return { help: true };
        }

        const equals = arg.startsWith('--') ? arg.indexOf('=') : -1;
        const flag = equals === -1 ? arg : arg.slice(0, equals);
        const inlineValue = equals === -1 ? undefined : arg.slice(equals + 1);

        const takeValue = (): string => {
            if (inlineValue !== undefined) return inlineValue;
            const value = args[++i];
            if (value === undefined) {
                throw new CommandUsageError(`argument ${flag}: expected one argument`, CLI_USAGE);
            }
            return value;
        };

        switch (flag) {
            case '--input-file':
            case '-i':
                inputFile = takeValue();
                break;
            case '--encoding':
            case '-e':
                encoding = takeValue();
                break;
            default:
                throw new CommandUsageError(`unrecognized arguments: ${arg}`, CLI_USAGE);
        }
    }

    if (!inputFile) {
        throw new CommandUsageError('the following arguments are required: --input-file/-i', CLI_USAGE);
    }

    return { help: false, inputFile, encoding };
}

// ============================================================================
// LOAD SUMMARY
// ============================================================================

export function summaryRows(chat: ChatExport): string[][] {
    const rows = [
        ['Chat', chat.name],
        ['Chat ID', String(chat.id)],
        ['Messages', formatNumber(chat.messages.length)],
    ];
    for (const type of MESSAGE_TYPES) {
        const count = chat.messages.filter(message => message.type === type).length;
        rows.push([`  ${type}`, formatNumber(count)]);
    }
    return rows;
}

// ============================================================================
// CLI MAIN LOGIC
// ============================================================================

/**
 * Main CLI execution function
 */
export async function runCLI(argv: string[]): Promise<void> {
    let options: CliOptions;
    try {
        options = parseCliArgs(argv.slice(2));
    } catch (error) {
        if (!(error instanceof CommandUsageError)) throw error;
        showError(error.message, `usage: ${error.usage}`);
        process.exit(2);
    }

    if (options.help) {
        showUsage();
        return;
    }

    console.log(BANNER);

    let chat: ChatExport;
    try {
        logHeader("LOADING CHAT EXPORT");
        chat = loadChatFile(options.inputFile, options.encoding);
    } catch (error) {
        if (!isChatExportError(error)) throw error;
        showError(`Could not load ${path.basename(options.inputFile)}`, error.message);
        process.exit(1);
    }

    logSuccess(`Loaded "${chat.name}" (${formatNumber(chat.messages.length)} messages)`);
    createTable(
        [
            { header: 'Field', width: 12, align: 'left' },
            { header: 'Value', width: 40, align: 'left' }
        ],
        summaryRows(chat)
    );
    if (chat.messages.length === 0) {
        logWarning("The export contains no messages; every count will be 0.");
    }

    console.log();
    await runInteractiveCLI(chat);
    console.log(`\n${colorize('Bye!', 'green')}`);
}
