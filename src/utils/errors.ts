/**
 * Base class for every failure raised while loading, resolving or
 * managing stopword resources. Catch this to handle all of them at once.
 */
export class StopwordError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StopwordError';
    }
}

/**
 * Metadata document is missing, not JSON, or has the wrong shape.
 */
export class SchemaError extends StopwordError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SchemaError';
    }
}

export class UnknownResourceError extends StopwordError {
    constructor(public readonly resource: string) {
        super(`Unknown stopword resource '${resource}'.`);
        this.name = 'UnknownResourceError';
    }
}

/**
 * An `extends` or `alias` chain leads back to a resource still being resolved.
 */
export class CycleError extends StopwordError {
    constructor(public readonly chain: readonly string[]) {
        super(`Circular stopword resource chain: ${chain.join(' -> ')}`);
        this.name = 'CycleError';
    }
}

export class PathEscapeError extends StopwordError {
    constructor(
        public readonly path: string,
        public readonly baseDir: string
    ) {
        super(`Stopword resource path '${path}' escapes the data directory '${baseDir}'.`);
        this.name = 'PathEscapeError';
    }
}

export class MissingFileError extends StopwordError {
    constructor(
        public readonly path: string,
        options?: { cause?: unknown }
    ) {
        super(`Stopword file '${path}' not found.`, options);
        this.name = 'MissingFileError';
    }
}

/**
 * An alias entry also declares fields other than `description`.
 */
export class AliasConflictError extends StopwordError {
    constructor(
        public readonly resource: string,
        public readonly fields: readonly string[]
    ) {
        super(`Stopword alias '${resource}' cannot define additional fields: ${fields.join(', ')}.`);
        this.name = 'AliasConflictError';
    }
}

/**
 * Invalid option or option combination passed by the caller.
 */
export class ConfigurationError extends StopwordError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}
