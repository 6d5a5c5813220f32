import type { SciteAuthor } from '../sources/schemas.js';

/**
 * One named place to look for a value.
 */
export interface ValueSource<T> {
    readonly name: string;
    read(record: T): string | undefined;
}

export interface ResolvedValue {
    value: string;
    /** Name of the source the value came from */
    source: string;
}

/**
 * Walk `chain` in order and return the first non-empty value.
 */
export function resolveFirst<T>(record: T, chain: readonly ValueSource<T>[]): ResolvedValue | undefined {
    for (const source of chain) {
        const value = source.read(record);
        if (value !== undefined && value.length > 0) {
            return { value, source: source.name };
        }
    }
    return undefined;
}

/**
 * `"<given> <family>"` with the outer whitespace trimmed. Nothing else about
 * the name is touched: it is used verbatim as an identity key.
 */
export function composeName(given: string | undefined, family: string | undefined): string | undefined {
    const name = `${given ?? ''} ${family ?? ''}`.trim();
    return name.length > 0 ? name : undefined;
}

/** Author display name: full name field, else given + family. */
export const AUTHOR_NAME_CHAIN: readonly ValueSource<SciteAuthor>[] = [
    { name: 'authorName', read: (a) => a.authorName },
    { name: 'given+family', read: (a) => composeName(a.given, a.family) },
];

/** Author ORCID: `orcid`, else `author_orcid`. */
export const ORCID_CHAIN: readonly ValueSource<SciteAuthor>[] = [
    { name: 'orcid', read: (a) => a.orcid },
    { name: 'author_orcid', read: (a) => a.author_orcid },
];
