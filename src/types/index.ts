/**
 * Barrel export for all shared types.
 */
export { DEFAULT_CONFIG, DEFAULT_STOPWORD_RESOURCE } from './config.js';
export type { StopgraphConfig, LogLevel } from './config.js';
export { EXPORT_FORMATS } from './stopwords.js';
export type {
    ResourceEntry,
    StopwordMetadata,
    ResolvedSet,
    StopwordSnapshot,
    StopwordManagerJson,
    ExportFormat,
} from './stopwords.js';
