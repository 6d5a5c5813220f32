import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { SerializationFormat, Triple } from '../types/index.js';
import { toNTriples, toTurtle } from '../rdf/serializers.js';
import { getLogger } from '../utils/logger.js';

/**
 * Serialize triples in the given format.
 */
export function serializeGraph(triples: Iterable<Triple>, format: SerializationFormat): string {
    switch (format) {
        case 'turtle':
            return toTurtle(triples);
        case 'ntriples':
            return toNTriples(triples);
        default:
            throw new Error(`Unsupported serialization format: ${String(format)}`);
    }
}

/**
 * Write a graph to disk. Returns the number of triples written.
 */
export function exportGraph(
    triples: Iterable<Triple>,
    outputPath: string,
    format: SerializationFormat = 'turtle'
): number {
    const list = [...triples];
    writeFileSync(outputPath, serializeGraph(list, format), 'utf-8');
    getLogger().info({ format, outputPath, triples: list.length }, 'Saved RDF');
    return list.length;
}

function pad(n: number): string {
    return String(n).padStart(2, '0');
}

/**
 * `scite_vivo_backup_YYYYMMDD_HHMMSS.ttl` in local time.
 */
export function backupFileName(now: Date): string {
    const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
    const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
    return `scite_vivo_backup_${date}_${time}.ttl`;
}

export function backupFilePath(dir: string, now: Date): string {
    return join(dir, backupFileName(now));
}
