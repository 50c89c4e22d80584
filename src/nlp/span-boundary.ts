import { z } from 'zod';
import type { Span } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/** Characters of surrounding text kept with each span */
export const DEFAULT_CONTEXT_WINDOW = 50;

const rawSpanSchema = z.object({
    text: z.string(),
    label: z.string().min(1),
    start: z.number().int().nonnegative(),
    end: z.number().int().nonnegative(),
    confidence: z.number().finite().min(0).max(1),
});

/**
 * Excerpt of `content` around `[start, end)`, widened by `window` on each side.
 */
export function extractContext(content: string, start: number, end: number, window = DEFAULT_CONTEXT_WINDOW): string {
    const from = Math.max(0, start - window);
    const to = Math.min(content.length, end + window);
    return content.slice(from, to).trim();
}

/**
 * Validate raw extractor output against the document it came from.
 * Malformed entries (wrong shape, inverted or out-of-bounds offsets) are
 * dropped and logged; survivors get their context attached.
 */
export function normalizeSpans(
    raw: readonly unknown[],
    content: string,
    contextWindow = DEFAULT_CONTEXT_WINDOW
): { spans: Span[]; dropped: number } {
    const spans: Span[] = [];
    let dropped = 0;

    raw.forEach((entry, index) => {
        const parsed = rawSpanSchema.safeParse(entry);
        if (!parsed.success) {
            dropped++;
            getLogger().warn({ index, issues: parsed.error.issues.map((issue) => issue.message) }, 'Dropping malformed span');
            return;
        }

        const { start, end } = parsed.data;
        if (start > end || end > content.length) {
            dropped++;
            getLogger().warn({ index, start, end, length: content.length }, 'Dropping span with invalid offsets');
            return;
        }

        spans.push({
            ...parsed.data,
            context: extractContext(content, start, end, contextWindow),
        });
    });

    if (dropped > 0) {
        getLogger().info({ kept: spans.length, dropped }, 'Span validation complete');
    }

    return { spans, dropped };
}
