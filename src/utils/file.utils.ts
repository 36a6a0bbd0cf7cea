/**
 * File Utilities
 */

import fs from "node:fs";
import path from "node:path";
import * as iconv from 'iconv-lite';
import type { ChatExport } from '../types';
import { parseChatExport } from '../parsers/telegram.parser';
import { DEFAULT_ENCODING } from './constants';
import { ChatLoadError } from './errors';

// ============================================================================
// FILE READING
// ============================================================================

/**
 * Reads an export file and decodes it to text. iconv-lite strips a leading
 * byte-order mark, which some exports carry.
 */
export function readChatFile(filePath: string, encoding: string = DEFAULT_ENCODING): string {
    if (!iconv.encodingExists(encoding)) {
        throw new ChatLoadError(`Unknown encoding: ${encoding}`, { filePath });
    }

    const absolutePath = path.resolve(filePath);
    let buffer: Buffer;
    try {
        buffer = fs.readFileSync(absolutePath);
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        throw new ChatLoadError(`Cannot read ${absolutePath}: ${detail}`, { filePath: absolutePath, cause: error });
    }

    return iconv.decode(buffer, encoding);
}

/**
 * Reads, decodes and loads an export file into the chat model
 */
export function loadChatFile(filePath: string, encoding: string = DEFAULT_ENCODING): ChatExport {
    const content = readChatFile(filePath, encoding);
    return parseChatExport(content, path.basename(filePath));
}
