import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { StopwordMetadata } from '../types/index.js';
import { SchemaError } from '../utils/errors.js';

const resourceEntrySchema = z
    .object({
        file: z.string().optional(),
        extends: z.union([z.string(), z.array(z.string())]).optional(),
        alias: z.string().optional(),
        description: z.string().optional(),
    })
    .passthrough();

export const metadataSchema = z
    .object({
        sets: z
            .record(z.string(), resourceEntrySchema)
            .refine((sets) => Object.keys(sets).length > 0, {
                message: "'sets' must be a non-empty map",
            }),
    })
    .passthrough();

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

/**
 * Read and validate a metadata document. No caching at this layer;
 * see `ResourceResolver.loadMetadata`.
 */
export function readMetadata(path: string): StopwordMetadata {
    let raw: string;
    try {
        raw = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new SchemaError(`Stopword metadata file not found at '${path}'.`, { cause: error });
    }

    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch (error) {
        throw new SchemaError(`Stopword metadata at '${path}' is not valid JSON.`, { cause: error });
    }

    const parsed = metadataSchema.safeParse(data);
    if (!parsed.success) {
        throw new SchemaError(
            `Stopword metadata at '${path}' is invalid: ${formatIssues(parsed.error)}`,
            { cause: parsed.error }
        );
    }
    return parsed.data;
}
