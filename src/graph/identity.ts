import { createHash } from 'node:crypto';
import { parse } from 'node:path';

/** Hex characters kept from a SHA-256 digest (64 bits) */
export const ID_DIGEST_LENGTH = 16;

function digest(input: string): string {
    return createHash('sha256').update(input, 'utf8').digest('hex').slice(0, ID_DIGEST_LENGTH);
}

/**
 * Document identifier. A stable name (e.g. a file stem) wins over content,
 * so re-using a name aliases documents; otherwise identical content always
 * maps to the same identifier.
 */
export function documentId(content: string, stableName?: string): string {
    if (stableName !== undefined && stableName.length > 0) {
        return `cg:doc-${encodeURIComponent(stableName)}`;
    }
    return `cg:doc-${digest(content)}`;
}

/**
 * Concept identifier from `(text, label)` only — case-sensitive, no
 * normalization. The same concept in two documents is one node.
 */
export function conceptId(text: string, label: string): string {
    // Unit separator keeps ("ab", "c") and ("a", "bc") apart
    return `cg:concept-${digest(`${text}\u001f${label}`)}`;
}

/**
 * Stable name for a document loaded from a file: its basename without extension.
 */
export function stableNameFromPath(filePath: string): string {
    return parse(filePath).name;
}
