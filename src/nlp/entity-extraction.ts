import type { RawSpan, SpanExtractor } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import builtInDictionary from './dictionaries/concepts.json';

/** Confidence for a match whose case equals the dictionary entry */
export const EXACT_MATCH_CONFIDENCE = 0.9;
/** Confidence for a case-insensitive match */
export const FOLDED_MATCH_CONFIDENCE = 0.6;

/**
 * Label → known surface forms.
 */
export type ConceptDictionary = Readonly<Record<string, readonly string[]>>;

/**
 * Built-in dictionaries for concept extraction, keyed by extraction label.
 */
export const DEFAULT_DICTIONARY: ConceptDictionary = builtInDictionary;

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Dictionary-backed span extractor. Finds every whole-word occurrence of
 * each known term for the requested labels and reports it as a raw span.
 * Overlaps between terms (and between labels sharing a term) are left for
 * the resolver.
 */
export class DictionaryExtractor implements SpanExtractor {
    constructor(private readonly dictionary: ConceptDictionary = DEFAULT_DICTIONARY) {}

    extract(content: string, labels: readonly string[]): RawSpan[] {
        const spans: RawSpan[] = [];

        for (const label of labels) {
            const terms = Object.hasOwn(this.dictionary, label) ? this.dictionary[label] : undefined;
            if (!terms) continue;

            for (const term of terms) {
                // Case-insensitive whole-word match
                const regex = new RegExp(`\\b${escapeRegExp(term)}\\b`, 'gi');

                for (const match of content.matchAll(regex)) {
                    if (match.index === undefined) continue;
                    const text = match[0];
                    spans.push({
                        text,
                        label,
                        start: match.index,
                        end: match.index + text.length,
                        confidence: text === term ? EXACT_MATCH_CONFIDENCE : FOLDED_MATCH_CONFIDENCE,
                    });
                }
            }
        }

        getLogger().debug({ spans: spans.length, labels: labels.length }, 'Dictionary extraction complete');
        return spans;
    }
}
