import { z } from 'zod';

/**
 * Boundary schemas for records returned by the Scite API.
 *
 * Every field is optional and wrapped in `.catch()` so that a value of the
 * wrong shape is dropped on its own instead of failing the whole record.
 */

const optionalText = z.string().min(1).optional().catch(undefined);

/** Non-negative safe integer, also accepted as a digit string. */
const count = z.union([
    z.number().int().nonnegative().safe(),
    z.string().regex(/^\d+$/).transform(Number).pipe(z.number().safe()),
]);

const optionalCount = count.nullable().optional().catch(undefined);

const year = z.union([
    z.number().int().positive(),
    z.string().regex(/^\d+$/).transform(Number).pipe(z.number().int().positive()),
]);

export const SciteAuthorSchema = z.object({
    authorName: optionalText,
    given: optionalText,
    family: optionalText,
    orcid: optionalText,
    author_orcid: optionalText,
    affiliation: optionalText,
    authorSequenceNumber: optionalCount,
});

export type SciteAuthor = z.infer<typeof SciteAuthorSchema>;

export const ScitePaperSchema = z.object({
    doi: optionalText,
    title: optionalText,
    abstract: optionalText,
    year: year.optional().catch(undefined),
    pmid: z
        .union([z.string().min(1), z.number().int()])
        .transform(String)
        .optional()
        .catch(undefined),
    issns: z
        .array(z.unknown())
        .transform((values) => values.filter((v): v is string => typeof v === 'string' && v.length > 0))
        .optional()
        .catch(undefined),
    slug: optionalText,
    // A null entry marks an author that was not an object
    authors: z.array(SciteAuthorSchema.nullable().catch(null)).optional().catch(undefined),
});

export type ScitePaper = z.infer<typeof ScitePaperSchema>;

export const CitationTallySchema = z.object({
    supporting: optionalCount,
    contradicting: optionalCount,
    mentioning: optionalCount,
    total: optionalCount,
});

export type CitationTally = z.infer<typeof CitationTallySchema>;

export const PapersResponseSchema = z.object({
    papers: z.record(z.string(), z.unknown()).default({}),
});

/**
 * Parse one raw paper entry. Returns null for anything that is not an object
 * (the API reports unknown DOIs as null).
 */
export function parsePaper(raw: unknown): ScitePaper | null {
    const result = ScitePaperSchema.safeParse(raw);
    return result.success ? result.data : null;
}

/**
 * Parse a raw tally body. An object with none of the four counts is treated
 * as no tally at all.
 */
export function parseTally(raw: unknown): CitationTally | null {
    const result = CitationTallySchema.safeParse(raw);
    if (!result.success) return null;

    const { supporting, contradicting, mentioning, total } = result.data;
    if (supporting == null && contradicting == null && mentioning == null && total == null) {
        return null;
    }
    return result.data;
}
