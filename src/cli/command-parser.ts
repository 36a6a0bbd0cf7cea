import { CommandUsageError } from '../utils/errors';

// ============================================================================
// LINE SPLITTING
// ============================================================================

/**
 * Splits a command line into arguments the way a POSIX shell would:
 * whitespace separates, quotes group, a backslash escapes the next character
 * (inside double quotes only before `"` or `\`).
 */
export function splitCommandLine(line: string, usage: string = ''): string[] {
    const args: string[] = [];
    let current = '';
    let inArg = false;
    let quote: '"' | "'" | null = null;

    for (let i = 0; i < line.length; i++) {
        const char = line[i];

        if (quote === "'") {
            if (char === "'") quote = null;
            else current += char;
            continue;
        }

        if (quote === '"') {
            if (char === '"') {
                quote = null;
            } else if (char === '\\' && (line[i + 1] === '"' || line[i + 1] === '\\')) {
                current += line[++i];
            } else {
                current += char;
            }
            continue;
        }

        if (char === "'" || char === '"') {
            quote = char;
            inArg = true;
        } else if (char === '\\') {
            if (i + 1 >= line.length) {
                throw new CommandUsageError('No escaped character', usage);
            }
            current += line[++i];
            inArg = true;
        } else if (/\s/.test(char)) {
            if (inArg) {
                args.push(current);
                current = '';
                inArg = false;
            }
        } else {
            current += char;
            inArg = true;
        }
    }

    if (quote) {
        throw new CommandUsageError('No closing quotation', usage);
    }
    if (inArg) {
        args.push(current);
    }
    return args;
}

// ============================================================================
// ARGUMENT PARSING
// ============================================================================

export interface FlagDefinition {
    /** Long name without dashes, e.g. `case-sensitive` */
    name: string;
    short: string;
    description: string;
}

export interface ArgumentSpec {
    flags: readonly FlagDefinition[];
    /** Whether one or more positional words are required */
    words: boolean;
    usage: string;
}

export type ParsedArguments = {
    words: string[];
    flags: Set<string>;
};

function findFlag(spec: ArgumentSpec, predicate: (flag: FlagDefinition) => boolean, shown: string): FlagDefinition {
    const flag = spec.flags.find(predicate);
    if (!flag) {
        throw new CommandUsageError(`unrecognized arguments: ${shown}`, spec.usage);
    }
    return flag;
}

/**
 * Parses split arguments against a command's flags. Short flags may be
 * combined (`-cu`); everything after `--` is positional.
 */
export function parseArguments(args: readonly string[], spec: ArgumentSpec): ParsedArguments {
    const words: string[] = [];
    const flags = new Set<string>();
    let optionsEnded = false;

    for (const arg of args) {
        if (optionsEnded || arg === '-' || !arg.startsWith('-')) {
            words.push(arg);
        } else if (arg === '--') {
            optionsEnded = true;
        } else if (arg.startsWith('--')) {
            const name = arg.slice(2);
            flags.add(findFlag(spec, flag => flag.name === name, arg).name);
        } else {
            for (const short of arg.slice(1)) {
                flags.add(findFlag(spec, flag => flag.short === short, arg).name);
            }
        }
    }

    if (spec.words && words.length === 0) {
        throw new CommandUsageError('the following arguments are required: words', spec.usage);
    }
    if (!spec.words && words.length > 0) {
        throw new CommandUsageError(`unrecognized arguments: ${words.join(' ')}`, spec.usage);
    }

    return { words, flags };
}
