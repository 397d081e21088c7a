import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type StopgraphConfig } from '../types/index.js';
import { getLogger } from './logger.js';

const configFileSchema = z.object({
    metadataPath: z.string().optional(),
    resources: z.union([z.string(), z.array(z.string())]).optional(),
    caseSensitive: z.boolean().optional(),
    logLevel: z.enum(['error', 'warn', 'info', 'debug']).optional(),
    jsonLogs: z.boolean().optional(),
});

/**
 * Load configuration from stopgraph.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<StopgraphConfig> | null> {
    const explorer = cosmiconfig('stopgraph', {
        searchPlaces: ['stopgraph.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            const parsed = configFileSchema.safeParse(result.config);
            if (!parsed.success) {
                getLogger().warn(
                    { path: result.filepath, issues: parsed.error.issues },
                    'Invalid config file, using defaults'
                );
                return null;
            }
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            const { resources, ...rest } = parsed.data;
            return {
                ...rest,
                resources: typeof resources === 'string' ? [resources] : resources,
            };
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Partial<StopgraphConfig>,
    searchFrom?: string
): Promise<StopgraphConfig> {
    const fileConfig = await loadConfigFile(searchFrom);

    return {
        metadataPath: cliFlags.metadataPath ?? fileConfig?.metadataPath ?? DEFAULT_CONFIG.metadataPath,
        resources: cliFlags.resources ?? fileConfig?.resources ?? DEFAULT_CONFIG.resources,
        caseSensitive: cliFlags.caseSensitive ?? fileConfig?.caseSensitive ?? DEFAULT_CONFIG.caseSensitive,
        logLevel: cliFlags.logLevel ?? fileConfig?.logLevel ?? DEFAULT_CONFIG.logLevel,
        jsonLogs: cliFlags.jsonLogs ?? fileConfig?.jsonLogs ?? DEFAULT_CONFIG.jsonLogs,
    };
}
