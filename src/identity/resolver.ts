import { createHash } from 'node:crypto';
import type { NamedNode } from '../types/index.js';
import { namedNode } from '../rdf/terms.js';

/**
 * Namespace prefixes for every kind of generated individual.
 */
export const EntityPrefix = {
    Publication: 'pub-',
    Person: 'person-',
    Organization: 'org-',
    Position: 'position-',
    Authorship: 'authorship-',
    DateValue: 'date-',
} as const;

export type EntityPrefixValue = (typeof EntityPrefix)[keyof typeof EntityPrefix];

/**
 * Content-addressed IRI generator.
 *
 * `resolve(prefix, id)` is `base + prefix + md5(id)[0..hashLength)`. The same
 * arguments give the same IRI in every process. Two different identifiers can
 * still collide (48 bits at the default width); collisions are not detected.
 */
export class IdentityResolver {
    readonly base: string;
    readonly hashLength: number;

    constructor(options: { base: string; hashLength?: number }) {
        this.base = options.base;
        this.hashLength = options.hashLength ?? 12;

        if (!Number.isInteger(this.hashLength) || this.hashLength < 1 || this.hashLength > 32) {
            throw new RangeError(`hashLength must be an integer between 1 and 32, got ${this.hashLength}`);
        }
    }

    resolve(prefix: string, identifier: string): NamedNode {
        if (identifier.length === 0) {
            throw new TypeError(`Cannot resolve an empty identifier (prefix "${prefix}")`);
        }
        const hash = createHash('md5').update(identifier, 'utf8').digest('hex').slice(0, this.hashLength);
        return namedNode(`${this.base}${prefix}${hash}`);
    }
}
