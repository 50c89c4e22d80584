import type { DocumentMetadata, DocumentType } from '../types/index.js';

const CONVERSATION_PATTERNS: readonly RegExp[] = [
    /^[A-Z][a-z]+:/, // "Alice:"
    /^[a-zA-Z0-9_-]+:/, // "user123:"
    /^\*\*[^*]+\*\*:/, // "**Assistant**:"
    /^>\s/, // "> quoted text"
];

const MARKDOWN_PATTERNS: readonly RegExp[] = [
    /^#{1,6}\s/, // headers
    /^\*\s/, // lists
    /^\d+\.\s/, // numbered lists
    /^\[.*\]\(.*\)/, // links
    /`[^`]+`/, // inline code
    /^```/, // code fences
];

const STRUCTURED_PATTERNS: readonly RegExp[] = [
    /^\d+\./, // numbered items
    /^[A-Z][A-Z\s]+:/, // "SECTION HEADER:"
    /^-{3,}/, // horizontal rules
    /^\|/, // tables
];

/** Below this share of matching lines a document is treated as plain text */
const MIN_PATTERN_SHARE = 0.1;
const PLAIN_TEXT_CONFIDENCE = 0.5;
const TITLE_WORDS = 6;

function countMatchingLines(lines: readonly string[], patterns: readonly RegExp[]): number {
    return lines.filter((line) => patterns.some((pattern) => pattern.test(line))).length;
}

function firstWords(line: string): string {
    const words = line.trim().split(/\s+/).slice(0, TITLE_WORDS);
    return words.join(' ') + (words.length === TITLE_WORDS ? '...' : '');
}

function extractTitle(lines: readonly string[], type: DocumentType): string | undefined {
    if (type === 'markdown') {
        const header = lines.slice(0, 5).find((line) => line.startsWith('#'));
        if (header !== undefined) return header.replace(/^#+/, '').trim();
    }

    if (type === 'conversation') {
        // First substantial line that is not a speaker turn
        const line = lines.slice(0, 5).find((l) => l.trim().length > 10 && !l.slice(0, 50).includes(':'));
        if (line !== undefined) return firstWords(line);
    }

    const line = lines.slice(0, 3).find((l) => l.trim().length > 10);
    return line === undefined ? undefined : firstWords(line);
}

/**
 * Classify a document by line patterns and collect the numeric/boolean
 * features the triple builder records.
 */
export function classifyDocument(content: string): DocumentMetadata {
    const trimmed = content.trim();
    if (trimmed.length === 0) {
        return { type: 'random', confidence: 0, features: {} };
    }

    const lines = trimmed.split('\n');
    const totalLines = lines.length;

    const conversationMarkers = countMatchingLines(lines, CONVERSATION_PATTERNS);
    const markdownMarkers = countMatchingLines(lines, MARKDOWN_PATTERNS);
    const structuredMarkers = countMatchingLines(lines, STRUCTURED_PATTERNS);

    const scores: Array<[DocumentType, number]> = [
        ['conversation', conversationMarkers / totalLines],
        ['markdown', markdownMarkers / totalLines],
        ['structured', structuredMarkers / totalLines],
    ];

    // First highest score wins ties
    let [type, confidence]: [DocumentType, number] = ['conversation', -1];
    for (const [candidate, score] of scores) {
        if (score > confidence) {
            type = candidate;
            confidence = score;
        }
    }

    if (confidence < MIN_PATTERN_SHARE) {
        type = 'plain_text';
        confidence = PLAIN_TEXT_CONFIDENCE;
    }

    const features = {
        line_count: totalLines,
        avg_line_length: lines.reduce((sum, line) => sum + line.length, 0) / totalLines,
        conversation_markers: conversationMarkers,
        markdown_markers: markdownMarkers,
        structured_markers: structuredMarkers,
        has_headers: lines.some((line) => line.startsWith('#')),
        has_speakers: lines.slice(0, 10).some((line) => line.slice(0, 50).includes(':')),
    };

    const title = extractTitle(lines, type);

    return title === undefined ? { type, confidence, features } : { type, confidence, features, title };
}
