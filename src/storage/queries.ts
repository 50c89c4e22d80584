import { z } from 'zod';
import type { QueryDescriptor } from '../types/index.js';
import { TERMS, expandIdentifier, fullUri } from '../graph/vocabulary.js';

const limitSchema = z.number().int().positive().optional();

/**
 * Runtime shape of a query descriptor. Callers outside the type system
 * (CLI input, JSON) go through this before any SQL is built.
 */
export const queryDescriptorSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('documentsDiscussing'), concept: z.string().min(1), limit: limitSchema }).strict(),
    z.object({ kind: z.literal('coOccurringConcepts'), concept: z.string().min(1), limit: limitSchema }).strict(),
    z.object({ kind: z.literal('countByType'), types: z.array(z.string().min(1)).optional(), limit: limitSchema }).strict(),
]);

export type QueryParams = Record<string, string | number>;

export interface CompiledQuery {
    sql: string;
    params: QueryParams;
}

export type CompileResult = { success: true; query: CompiledQuery } | { success: false; message: string };

const PREDICATES = {
    type: fullUri(TERMS.type),
    label: fullUri(TERMS.label),
    title: fullUri(TERMS.title),
    discusses: fullUri(TERMS.discusses),
    coOccursWith: fullUri(TERMS.coOccursWith),
    typeConfidence: fullUri(TERMS.typeConfidence),
    primaryDomain: fullUri(TERMS.primaryDomain),
};

const DOCUMENTS_DISCUSSING_SQL = `
SELECT document, title, confidence, domain FROM (
  SELECT DISTINCT d.subject AS document,
    (SELECT t.object FROM statements t
      WHERE t.subject = d.subject AND t.predicate = @title LIMIT 1) AS title,
    (SELECT c.object FROM statements c
      WHERE c.subject = d.subject AND c.predicate = @typeConfidence LIMIT 1) AS confidence,
    (SELECT p.object FROM statements p
      WHERE p.subject = d.subject AND p.predicate = @primaryDomain LIMIT 1) AS domain
  FROM statements l
  JOIN statements d
    ON d.predicate = @discusses AND d.object = l.subject AND d.object_kind = 'node'
  WHERE l.predicate = @label AND l.object = @concept AND l.object_kind = 'literal'
)
ORDER BY CAST(confidence AS REAL) DESC, document
LIMIT @limit
`;

// Co-occurrence edges are followed in both directions
const CO_OCCURRING_CONCEPTS_SQL = `
WITH target AS (
  SELECT subject AS concept FROM statements
  WHERE predicate = @label AND object = @concept AND object_kind = 'literal'
),
neighbors AS (
  SELECT e.subject AS concept, e.object AS related
  FROM statements e JOIN target t ON e.subject = t.concept
  WHERE e.predicate = @coOccursWith AND e.object_kind = 'node'
  UNION
  SELECT e.object AS concept, e.subject AS related
  FROM statements e JOIN target t ON e.object = t.concept
  WHERE e.predicate = @coOccursWith AND e.object_kind = 'node'
)
SELECT rl.object AS concept, COUNT(DISTINCT d1.subject) AS frequency
FROM neighbors n
JOIN statements d1
  ON d1.predicate = @discusses AND d1.object = n.concept AND d1.object_kind = 'node'
JOIN statements d2
  ON d2.predicate = @discusses AND d2.object = n.related AND d2.subject = d1.subject AND d2.object_kind = 'node'
JOIN statements rl
  ON rl.subject = n.related AND rl.predicate = @label AND rl.object_kind = 'literal'
WHERE n.related <> n.concept
GROUP BY rl.object
ORDER BY frequency DESC, rl.object
LIMIT @limit
`;

function countByTypeSql(typeCount: number): string {
    const filter =
        typeCount > 0
            ? `AND object IN (${Array.from({ length: typeCount }, (_, i) => `@type${i}`).join(', ')})`
            : '';
    return `
SELECT object AS type, COUNT(DISTINCT subject) AS count
FROM statements
WHERE predicate = @rdfType AND object_kind = 'node' ${filter}
GROUP BY object
ORDER BY count DESC, object
LIMIT @limit
`;
}

/**
 * Turn a validated descriptor into SQL and named parameters.
 */
export function compileQuery(descriptor: QueryDescriptor, limit: number): CompileResult {
    switch (descriptor.kind) {
        case 'documentsDiscussing':
            return {
                success: true,
                query: {
                    sql: DOCUMENTS_DISCUSSING_SQL,
                    params: {
                        concept: descriptor.concept,
                        label: PREDICATES.label,
                        title: PREDICATES.title,
                        discusses: PREDICATES.discusses,
                        typeConfidence: PREDICATES.typeConfidence,
                        primaryDomain: PREDICATES.primaryDomain,
                        limit,
                    },
                },
            };

        case 'coOccurringConcepts':
            return {
                success: true,
                query: {
                    sql: CO_OCCURRING_CONCEPTS_SQL,
                    params: {
                        concept: descriptor.concept,
                        label: PREDICATES.label,
                        discusses: PREDICATES.discusses,
                        coOccursWith: PREDICATES.coOccursWith,
                        limit,
                    },
                },
            };

        case 'countByType': {
            const types = descriptor.types ?? [];
            const params: QueryParams = { rdfType: PREDICATES.type, limit };

            for (const [i, type] of types.entries()) {
                const expanded = expandIdentifier(type);
                if (expanded === null) {
                    return { success: false, message: `Unknown type identifier: ${type}` };
                }
                params[`type${i}`] = expanded;
            }

            return { success: true, query: { sql: countByTypeSql(types.length), params } };
        }
    }
}
