import type { TextContent, TextSegment } from '../types';
import { InvalidSearchTermError } from '../utils/errors';
import type { RawText, RawTextEntity } from './telegram.schema';

// ============================================================================
// NORMALISATION
// ============================================================================

/**
 * Converts a raw `text` field into a TextContent, keeping every element in
 * its original order.
 */
export function normaliseText(raw: RawText): TextContent {
    if (typeof raw === 'string') {
        return { form: 'plain', text: raw };
    }
    return { form: 'entities', segments: Object.freeze(raw.map(toSegment)) };
}

function toSegment(element: string | RawTextEntity): TextSegment {
    if (typeof element === 'string') {
        return { kind: 'plain', text: element };
    }
    return element.text === undefined
        ? { kind: 'entity', type: element.type }
        : { kind: 'entity', type: element.type, text: element.text };
}

/**
 * Ordered segments of a body. A plain body is a single plain segment.
 */
export function textSegments(content: TextContent): readonly TextSegment[] {
    return content.form === 'plain'
        ? [{ kind: 'plain', text: content.text }]
        : content.segments;
}

// ============================================================================
// RENDERING
// ============================================================================

/**
 * Display form of a segment; entities without text show as `<type>`.
 */
export function renderSegment(segment: TextSegment): string {
    if (segment.kind === 'plain') return segment.text;
    return segment.text ?? `<${segment.type}>`;
}

export function renderText(content: TextContent): string {
    if (content.form === 'plain') return content.text;
    return content.segments.map(renderSegment).join('');
}

// ============================================================================
// COUNTING
// ============================================================================

/**
 * Non-overlapping occurrences of `needle` in `haystack`, scanning left to right.
 */
export function countSubstring(haystack: string, needle: string): number {
    if (needle.length === 0) {
        throw new InvalidSearchTermError();
    }

    let count = 0;
    let from = haystack.indexOf(needle);
    while (from !== -1) {
        count++;
        from = haystack.indexOf(needle, from + needle.length);
    }
    return count;
}

/**
 * Counts `word` across the searchable segments of a body. Entities with no
 * text of their own (a bare mention, say) are not searched: their `<type>`
 * placeholder is display-only.
 */
export function countOccurrences(
    content: TextContent,
    word: string,
    options: { caseSensitive?: boolean } = {}
): number {
    if (word.length === 0) {
        throw new InvalidSearchTermError();
    }

    const caseSensitive = options.caseSensitive ?? false;
    const needle = caseSensitive ? word : word.toLowerCase();

    let total = 0;
    for (const segment of textSegments(content)) {
        const text = segment.text;
        if (text === undefined) continue;
        total += countSubstring(caseSensitive ? text : text.toLowerCase(), needle);
    }
    return total;
}
