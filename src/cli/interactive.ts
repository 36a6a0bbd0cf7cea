import type { ChatExport } from '../types';
import { PROMPT } from '../utils/constants';
import { colorize, createReadlineInterface, logError, logInfo } from './cli.utils';
import { executeCommandLine } from './commands';

// ============================================================================
// INTERACTIVE COMMAND LOOP
// ============================================================================

/**
 * Reads commands until `q` or end of input, printing each result.
 * Query output goes to stdout uncoloured so it can be piped.
 */
export async function runInteractiveCLI(chat: ChatExport): Promise<void> {
    const rl = createReadlineInterface(PROMPT);

    logInfo(`Type ${colorize('help', 'bright')} for a list of commands, ${colorize('q', 'bright')} to quit.`);
    rl.prompt();

    try {
        for await (const line of rl) {
            const outcome = executeCommandLine(chat, line);

            if (outcome.status === 'exit') {
                break;
            }

            if (outcome.status === 'error') {
                if (outcome.usage) {
                    console.log(colorize(`usage: ${outcome.usage}`, 'dim'));
                }
                logError(outcome.message);
            } else {
                for (const output of outcome.lines) {
                    console.log(output);
                }
            }

            rl.prompt();
        }
    } finally {
        rl.close();
    }
}
