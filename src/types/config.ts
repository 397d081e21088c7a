/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Full stopgraph configuration merged from CLI flags and config file.
 */
export interface StopgraphConfig {
    // Resources
    metadataPath?: string;
    resources: string[];
    caseSensitive: boolean;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Name of the resource used when a caller names none.
 */
export const DEFAULT_STOPWORD_RESOURCE = 'base/turkish';

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: StopgraphConfig = {
    resources: [DEFAULT_STOPWORD_RESOURCE],
    caseSensitive: false,
    logLevel: 'info',
    jsonLogs: false,
};
