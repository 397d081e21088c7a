import { writeFileSync } from 'node:fs';
import {
    DEFAULT_STOPWORD_RESOURCE,
    EXPORT_FORMATS,
    type ExportFormat,
    type StopwordManagerJson,
    type StopwordSnapshot,
} from '../types/index.js';
import { getDefaultResolver, type ResourceResolver } from '../resources/resolver.js';
import { loadWordFile } from '../resources/word-file.js';
import { ConfigurationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { normalizeWord } from './normalize.js';

// ─── Resource lookups ───────────────────────────────────

interface ResourceOptions {
    metadataPath?: string;
    caseSensitive?: boolean;
    /** Resolver to use instead of the shared default one */
    resolver?: ResourceResolver;
}

/**
 * Load a stopword resource defined in metadata, applying inheritance.
 * Returns a copy the caller may mutate.
 */
export function loadStopwordResource(name: string, options: ResourceOptions = {}): Set<string> {
    const { resolver = getDefaultResolver(), ...resolveOptions } = options;
    return new Set(resolver.resolve(name, resolveOptions));
}

/**
 * Load and merge multiple stopword resources.
 */
export function loadStopwordResources(names: Iterable<string>, options: ResourceOptions = {}): Set<string> {
    const { resolver = getDefaultResolver(), ...resolveOptions } = options;
    return resolver.resolveMany(names, resolveOptions);
}

interface SelectOptions extends ResourceOptions {
    /** One resource name or several to merge; defaults to the base resource */
    resource?: string | Iterable<string>;
}

function selectStopwords(options: SelectOptions): ReadonlySet<string> {
    const { resource = DEFAULT_STOPWORD_RESOURCE, resolver = getDefaultResolver(), ...resolveOptions } = options;
    if (typeof resource === 'string') {
        return resolver.resolve(resource, resolveOptions);
    }
    return resolver.resolveMany(resource, resolveOptions);
}

/**
 * Check whether a single token is in the selected resource(s).
 */
export function isStopword(token: string | null | undefined, options: SelectOptions = {}): boolean {
    if (!token) return false;
    const normalized = normalizeWord(token, options.caseSensitive ?? false);
    if (!normalized) return false;
    return selectStopwords(options).has(normalized);
}

/**
 * List the words of the selected resource(s), sorted unless `sort` is false.
 */
export function listStopwords(options: SelectOptions & { sort?: boolean } = {}): string[] {
    const { sort = true, ...selectOptions } = options;
    const words = [...selectStopwords(selectOptions)];
    return sort ? words.sort() : words;
}

// ─── Manager ─────────────────────────────────────────────

export interface StopwordManagerOptions {
    /** Initial stopwords; defaults to the base resource */
    base?: Iterable<string>;
    additions?: Iterable<string>;
    /** Words never treated as stopwords */
    keep?: Iterable<string>;
    caseSensitive?: boolean;
    /** Resolver used to load the default base */
    resolver?: ResourceResolver;
}

export function isExportFormat(value: string): value is ExportFormat {
    return EXPORT_FORMATS.some((format) => format === value);
}

/**
 * Mutable stopword set with a keep-list override.
 *
 * Keep-words always win: a word on the keep-list is removed from the
 * stopwords and later `add` calls skip it. Not safe for concurrent
 * mutation; hand `snapshot()` results to other owners instead.
 */
export class StopwordManager {
    readonly caseSensitive: boolean;
    private readonly stopwordSet: Set<string>;
    private readonly keepWordSet = new Set<string>();

    constructor(options: StopwordManagerOptions = {}) {
        const { caseSensitive = false } = options;
        this.caseSensitive = caseSensitive;

        const base = options.base
            ?? (options.resolver ?? getDefaultResolver()).resolve(DEFAULT_STOPWORD_RESOURCE, { caseSensitive });
        this.stopwordSet = new Set<string>();
        for (const word of base) {
            this.stopwordSet.add(this.normalize(word));
        }

        if (options.additions) this.add(options.additions);
        if (options.keep) this.addKeepWords(options.keep);
    }

    /**
     * Build a manager over the default base, adding the words of every
     * `additions` file and keeping the words of every `keep` file.
     */
    static fromFiles(options: {
        additions?: Iterable<string>;
        keep?: Iterable<string>;
        caseSensitive?: boolean;
        base?: Iterable<string>;
        resolver?: ResourceResolver;
    } = {}): StopwordManager {
        const { additions = [], keep = [], ...managerOptions } = options;
        const manager = new StopwordManager(managerOptions);
        for (const path of additions) {
            manager.loadAdditions(path);
        }
        for (const path of keep) {
            manager.addKeepWords(loadWordFile(path, { caseSensitive: manager.caseSensitive }));
        }
        return manager;
    }

    /**
     * Build a manager whose base is the union of the named resources
     * (the base resource when none are named).
     */
    static fromResources(
        names: Iterable<string> = [],
        options: {
            metadataPath?: string;
            additions?: Iterable<string>;
            keep?: Iterable<string>;
            caseSensitive?: boolean;
            resolver?: ResourceResolver;
        } = {}
    ): StopwordManager {
        const { metadataPath, caseSensitive = false, resolver = getDefaultResolver() } = options;
        const requested = [...names];
        const resources = requested.length > 0 ? requested : [DEFAULT_STOPWORD_RESOURCE];
        const base = resolver.resolveMany(resources, { metadataPath, caseSensitive });

        getLogger().debug(
            { resources, words: base.size, caseSensitive },
            'Building stopword manager from resources'
        );

        return new StopwordManager({
            base,
            additions: options.additions,
            keep: options.keep,
            caseSensitive,
        });
    }

    get stopwords(): ReadonlySet<string> {
        return new Set(this.stopwordSet);
    }

    get keepWords(): ReadonlySet<string> {
        return new Set(this.keepWordSet);
    }

    isStopword(token: string | null | undefined): boolean {
        if (!token) return false;
        const normalized = this.normalize(token);
        if (!normalized || this.keepWordSet.has(normalized)) return false;
        return this.stopwordSet.has(normalized);
    }

    /**
     * Add words to the stopword set, skipping keep-list words.
     */
    add(words: Iterable<string>): void {
        for (const word of words) {
            const normalized = this.normalize(word);
            if (normalized && !this.keepWordSet.has(normalized)) {
                this.stopwordSet.add(normalized);
            }
        }
    }

    remove(words: Iterable<string>): void {
        for (const word of words) {
            this.stopwordSet.delete(this.normalize(word));
        }
    }

    /**
     * Add words to the keep-list and evict them from the stopword set.
     */
    addKeepWords(words: Iterable<string>): void {
        for (const word of words) {
            const normalized = this.normalize(word);
            if (normalized) {
                this.keepWordSet.add(normalized);
                this.stopwordSet.delete(normalized);
            }
        }
    }

    /**
     * Add the words of a newline-delimited word file.
     */
    loadAdditions(path: string): void {
        this.add(loadWordFile(path, { caseSensitive: this.caseSensitive }));
    }

    snapshot(): StopwordSnapshot {
        return Object.freeze({
            stopwords: new Set(this.stopwordSet),
            keepWords: new Set(this.keepWordSet),
            caseSensitive: this.caseSensitive,
        });
    }

    /**
     * Write the sorted stopwords (never the keep-list) as newline-delimited
     * text (`txt`) or a JSON array (`json`).
     */
    export(path: string, format: string = 'txt'): void {
        if (!isExportFormat(format)) {
            throw new ConfigurationError(
                `Unsupported export format '${format}'; use ${EXPORT_FORMATS.map((f) => `'${f}'`).join(' or ')}.`
            );
        }

        const words = [...this.stopwordSet].sort();
        const content = format === 'json'
            ? JSON.stringify(words, null, 2) + '\n'
            : words.join('\n') + '\n';

        writeFileSync(path, content, 'utf-8');
        getLogger().info({ format, path, words: words.length }, 'Stopwords exported');
    }

    toJSON(): StopwordManagerJson {
        return {
            stopwords: [...this.stopwordSet].sort(),
            keepWords: [...this.keepWordSet].sort(),
            caseSensitive: this.caseSensitive,
        };
    }

    private normalize(word: string): string {
        return normalizeWord(word, this.caseSensitive);
    }
}

// ─── Token filtering ─────────────────────────────────────

export interface RemoveStopwordsOptions {
    /** Shared manager; excludes `base`, `additions` and `keep` */
    manager?: StopwordManager;
    base?: Iterable<string>;
    additions?: Iterable<string>;
    keep?: Iterable<string>;
    caseSensitive?: boolean;
    resolver?: ResourceResolver;
}

/**
 * Return the tokens that are not stopwords, in their original order.
 */
export function removeStopwords(
    tokens: Iterable<string> | null | undefined,
    options: RemoveStopwordsOptions = {}
): string[] {
    if (!tokens) return [];

    const { manager: shared, base, additions, keep, caseSensitive, resolver } = options;
    let manager: StopwordManager;
    if (shared) {
        if (caseSensitive !== undefined && caseSensitive !== shared.caseSensitive) {
            throw new ConfigurationError('Provided caseSensitive does not match the supplied manager.');
        }
        if (base !== undefined || additions !== undefined || keep !== undefined) {
            throw new ConfigurationError('Cannot provide base/additions/keep when a manager instance is supplied.');
        }
        manager = shared;
    } else {
        manager = new StopwordManager({ base, additions, keep, caseSensitive, resolver });
    }

    const filtered: string[] = [];
    for (const token of tokens) {
        if (!manager.isStopword(token)) {
            filtered.push(token);
        }
    }
    return filtered;
}
