/**
 * Public library surface.
 */
export {
    StopwordManager,
    isStopword,
    isExportFormat,
    listStopwords,
    loadStopwordResource,
    loadStopwordResources,
    removeStopwords,
} from './nlp/stopwords.js';
export type { StopwordManagerOptions, RemoveStopwordsOptions } from './nlp/stopwords.js';
export { normalizeCase, normalizeWord } from './nlp/normalize.js';
export { tokenize } from './nlp/tokenizer.js';
export {
    ResourceResolver,
    STOPWORD_METADATA_PATH,
    createResolver,
    getDefaultResolver,
} from './resources/resolver.js';
export type { ResolveOptions } from './resources/resolver.js';
export { readMetadata } from './resources/metadata.js';
export { resolveResourcePath } from './resources/paths.js';
export { loadWordFile } from './resources/word-file.js';
export {
    StopwordError,
    SchemaError,
    UnknownResourceError,
    CycleError,
    PathEscapeError,
    MissingFileError,
    AliasConflictError,
    ConfigurationError,
} from './utils/errors.js';
export * from './types/index.js';
