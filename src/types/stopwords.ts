/**
 * A single resource declaration inside the metadata document's `sets` map.
 */
export interface ResourceEntry {
    /** Word file, relative to the metadata document's directory */
    file?: string;
    /** Parent resources whose words are merged in */
    extends?: string | string[];
    /** Target resource this entry redirects to */
    alias?: string;
    description?: string;
    [field: string]: unknown;
}

/**
 * Parsed and validated metadata document.
 */
export interface StopwordMetadata {
    sets: Record<string, ResourceEntry>;
    [field: string]: unknown;
}

/**
 * Resolved word set of a resource. Shared between callers, never mutated.
 */
export type ResolvedSet = ReadonlySet<string>;

/**
 * Point-in-time copy of a StopwordManager's state.
 */
export interface StopwordSnapshot {
    readonly stopwords: ReadonlySet<string>;
    readonly keepWords: ReadonlySet<string>;
    readonly caseSensitive: boolean;
}

/**
 * Serializable form of a StopwordManager.
 */
export interface StopwordManagerJson {
    stopwords: string[];
    keepWords: string[];
    caseSensitive: boolean;
}

export type ExportFormat = 'txt' | 'json';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['txt', 'json'];
