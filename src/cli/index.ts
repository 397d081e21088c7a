#!/usr/bin/env node
import { readFileSync, writeFileSync } from 'node:fs';
import { Command } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { StopwordManager, isExportFormat, listStopwords } from '../nlp/stopwords.js';
import { tokenize } from '../nlp/tokenizer.js';
import { createResolver } from '../resources/resolver.js';
import { loadWordFile } from '../resources/word-file.js';
import { EXPORT_FORMATS, type LogLevel, type StopgraphConfig } from '../types/index.js';

const VERSION = '0.3.0';

interface CommonOptions {
    resource?: string[];
    metadata?: string;
    caseSensitive?: boolean;
    logLevel?: string;
    jsonLogs?: boolean;
}

interface CustomizeOptions {
    add?: string[];
    keep?: string[];
    addFile?: string[];
    keepFile?: string[];
}

function isLogLevel(value: string | undefined): value is LogLevel {
    return value === 'error' || value === 'warn' || value === 'info' || value === 'debug';
}

/**
 * Resolve config from flags + stopgraph.config.json and start the logger.
 */
async function setup(opts: CommonOptions): Promise<StopgraphConfig> {
    const cliConfig: Partial<StopgraphConfig> = {
        resources: opts.resource,
        metadataPath: opts.metadata,
        caseSensitive: opts.caseSensitive,
        logLevel: isLogLevel(opts.logLevel) ? opts.logLevel : undefined,
        jsonLogs: opts.jsonLogs,
    };

    const config = await resolveConfig(cliConfig);
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

function managerFor(config: StopgraphConfig, extra: CustomizeOptions): StopwordManager {
    const resolver = createResolver({ metadataPath: config.metadataPath });
    const manager = StopwordManager.fromResources(config.resources, {
        additions: extra.add,
        keep: extra.keep,
        caseSensitive: config.caseSensitive,
        resolver,
    });
    for (const path of extra.addFile ?? []) {
        manager.loadAdditions(path);
    }
    for (const path of extra.keepFile ?? []) {
        manager.addKeepWords(loadWordFile(path, { caseSensitive: config.caseSensitive }));
    }
    return manager;
}

function withCommonOptions(command: Command): Command {
    return command
        .option('-r, --resource <names...>', 'Stopword resource name(s)')
        .option('--metadata <path>', 'Metadata document declaring the resources')
        .option('--case-sensitive', 'Match words case-sensitively')
        .option('--log-level <level>', 'Log level: debug | info | warn | error')
        .option('--json-logs', 'Output JSON logs');
}

const program = new Command();

program
    .name('stopgraph')
    .description('Resolve inheritable stopword resources and filter tokens against them.')
    .version(VERSION);

// ─── LIST command ─────────────────────────────────────────

withCommonOptions(
    program
        .command('list')
        .description('Print the sorted words of the selected resource(s)')
        .option('-f, --format <format>', 'Output format: txt | json', 'txt')
        .option('-o, --out <path>', 'Output file path (default: stdout)')
).action(async (opts: CommonOptions & { format: string; out?: string }) => {
    const format = opts.format.toLowerCase();
    if (!isExportFormat(format)) {
        console.error(`Invalid format: ${format}. Valid: ${EXPORT_FORMATS.join(', ')}`);
        process.exit(1);
    }

    const config = await setup(opts);
    try {
        const words = listStopwords({
            resource: config.resources,
            caseSensitive: config.caseSensitive,
            resolver: createResolver({ metadataPath: config.metadataPath }),
        });
        const result = format === 'json' ? JSON.stringify(words, null, 2) : words.join('\n');

        if (opts.out) {
            writeFileSync(opts.out, result + '\n', 'utf-8');
            console.log(`Stopwords written to ${opts.out}`);
        } else {
            console.log(result);
        }
    } catch (error) {
        getLogger().error({ error }, 'List failed');
        process.exit(1);
    }
});

// ─── CHECK command ────────────────────────────────────────

withCommonOptions(
    program
        .command('check')
        .description('Report whether each token is a stopword')
        .argument('<tokens...>', 'Tokens to check')
).action(async (tokens: string[], opts: CommonOptions) => {
    const config = await setup(opts);
    try {
        const manager = managerFor(config, {});
        for (const token of tokens) {
            console.log(`${token}\t${manager.isStopword(token)}`);
        }
    } catch (error) {
        getLogger().error({ error }, 'Check failed');
        process.exit(1);
    }
});

// ─── FILTER command ───────────────────────────────────────

withCommonOptions(
    program
        .command('filter')
        .description('Tokenize text and print the tokens that are not stopwords')
        .argument('[file]', 'Input text file (default: stdin)')
        .option('--add <words...>', 'Extra stopwords')
        .option('--keep <words...>', 'Words never treated as stopwords')
        .option('--add-file <paths...>', 'Word files with extra stopwords')
        .option('--keep-file <paths...>', 'Word files with keep-words')
).action(async (file: string | undefined, opts: CommonOptions & CustomizeOptions) => {
    const config = await setup(opts);
    try {
        const text = readFileSync(file ?? process.stdin.fd, 'utf-8');
        const manager = managerFor(config, opts);
        for (const token of tokenize(text)) {
            if (!manager.isStopword(token)) {
                console.log(token);
            }
        }
    } catch (error) {
        getLogger().error({ error }, 'Filter failed');
        process.exit(1);
    }
});

// ─── EXPORT command ───────────────────────────────────────

withCommonOptions(
    program
        .command('export')
        .description('Write a customized stopword set to a file')
        .requiredOption('-o, --out <path>', 'Output file path')
        .option('-f, --format <format>', 'Export format: txt | json', 'txt')
        .option('--add <words...>', 'Extra stopwords')
        .option('--keep <words...>', 'Words never treated as stopwords')
        .option('--add-file <paths...>', 'Word files with extra stopwords')
        .option('--keep-file <paths...>', 'Word files with keep-words')
).action(async (opts: CommonOptions & CustomizeOptions & { out: string; format: string }) => {
    const config = await setup(opts);
    try {
        managerFor(config, opts).export(opts.out, opts.format.toLowerCase());
        console.log(`Exported to ${opts.out}`);
    } catch (error) {
        getLogger().error({ error }, 'Export failed');
        process.exit(1);
    }
});

program.parseAsync().catch((error: unknown) => {
    getLogger().error({ error }, 'Command failed');
    process.exit(1);
});
