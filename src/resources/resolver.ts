import { dirname, resolve as resolvePath } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { ResolvedSet, ResourceEntry, StopwordMetadata } from '../types/index.js';
import {
    AliasConflictError,
    CycleError,
    SchemaError,
    StopwordError,
    UnknownResourceError,
} from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { readMetadata } from './metadata.js';
import { resolveResourcePath } from './paths.js';
import { loadWordFile } from './word-file.js';

/**
 * Metadata document bundled with the package.
 */
export const STOPWORD_METADATA_PATH = fileURLToPath(
    new URL('../../resources/tr/stopwords/metadata.json', import.meta.url)
);

export interface ResolveOptions {
    /** Metadata document to read; defaults to the resolver's own */
    metadataPath?: string;
    caseSensitive?: boolean;
}

/**
 * What a resource entry asks for once validated.
 * An alias only redirects; a merge unions its parents and its own file.
 */
type ResourcePlan =
    | { kind: 'alias'; target: string }
    | { kind: 'merge'; parents: readonly string[]; file: string | undefined };

type VisitState = 'unvisited' | 'in-progress' | 'resolved';

type Frame =
    | { phase: 'enter'; name: string }
    | { phase: 'exit'; name: string; plan: ResourcePlan };

/**
 * Word set handed out by the resolver. Cached sets are shared by every
 * caller, so they reject mutation at runtime as well as in their type.
 */
class FrozenWordSet extends Set<string> {
    private sealed = false;

    constructor(words: Iterable<string>) {
        super();
        for (const word of words) {
            super.add(word);
        }
        this.sealed = true;
        Object.freeze(this);
    }

    add(word: string): this {
        this.assertMutable();
        return super.add(word);
    }

    delete(word: string): boolean {
        this.assertMutable();
        return super.delete(word);
    }

    clear(): void {
        this.assertMutable();
        super.clear();
    }

    private assertMutable(): void {
        if (this.sealed) {
            throw new TypeError('Resolved stopword sets are read-only.');
        }
    }
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}

function lookupEntry(sets: StopwordMetadata['sets'], name: string): ResourceEntry {
    if (!Object.hasOwn(sets, name)) {
        throw new UnknownResourceError(name);
    }
    return sets[name];
}

function planFor(name: string, entry: ResourceEntry): ResourcePlan {
    if (entry.alias !== undefined) {
        if (!entry.alias.trim()) {
            throw new SchemaError(`Stopword resource '${name}' alias cannot be empty.`);
        }
        const extra = Object.keys(entry)
            .filter((field) => field !== 'alias' && field !== 'description')
            .sort();
        if (extra.length > 0) {
            throw new AliasConflictError(name, extra);
        }
        return { kind: 'alias', target: entry.alias };
    }

    if (entry.file === undefined && entry.extends === undefined) {
        throw new SchemaError(
            `Stopword resource '${name}' must declare 'file', 'extends', or 'alias'.`
        );
    }

    const parents = typeof entry.extends === 'string' ? [entry.extends] : (entry.extends ?? []);
    return { kind: 'merge', parents, file: entry.file };
}

/**
 * Resolves named stopword resources declared in metadata documents.
 *
 * A resource's words are the union of its `extends` parents and its own
 * `file`; an `alias` resolves to exactly its target's set. Metadata
 * documents are cached per absolute path and resolved sets per
 * (metadata path, case sensitivity) for the lifetime of the resolver.
 * Only fully resolved resources enter the cache, so a failing resource
 * leaves previously resolved ones intact.
 */
export class ResourceResolver {
    private readonly defaultMetadataPath: string;
    private readonly metadataCache = new Map<string, StopwordMetadata>();
    private readonly resolvedCache = new Map<string, Map<string, ResolvedSet>>();

    constructor(options: { metadataPath?: string } = {}) {
        this.defaultMetadataPath = resolvePath(options.metadataPath ?? STOPWORD_METADATA_PATH);
    }

    /**
     * Load (once) and return the validated metadata document at `path`.
     * The document is frozen; every caller sees the cached instance.
     */
    loadMetadata(path: string = this.defaultMetadataPath): StopwordMetadata {
        const absolute = resolvePath(path);
        const cached = this.metadataCache.get(absolute);
        if (cached) return cached;

        const metadata = deepFreeze(readMetadata(absolute));
        this.metadataCache.set(absolute, metadata);
        getLogger().debug(
            { metadataPath: absolute, resources: Object.keys(metadata.sets).length },
            'Loaded stopword metadata'
        );
        return metadata;
    }

    /**
     * Resolve one resource to its word set. Repeated calls with the same
     * metadata path and case sensitivity return the same read-only set.
     */
    resolve(name: string, options: ResolveOptions = {}): ResolvedSet {
        const metadataPath = resolvePath(options.metadataPath ?? this.defaultMetadataPath);
        const caseSensitive = options.caseSensitive ?? false;
        const cache = this.cacheFor(metadataPath, caseSensitive);

        const cached = cache.get(name);
        if (cached) return cached;

        const { sets } = this.loadMetadata(metadataPath);
        const baseDir = dirname(metadataPath);
        const inProgress = new Set<string>();
        const chain: string[] = [];

        const stateOf = (resource: string): VisitState => {
            if (cache.has(resource)) return 'resolved';
            if (inProgress.has(resource)) return 'in-progress';
            return 'unvisited';
        };

        const stack: Frame[] = [{ phase: 'enter', name }];
        for (let frame = stack.pop(); frame; frame = stack.pop()) {
            if (frame.phase === 'enter') {
                const state = stateOf(frame.name);
                if (state === 'resolved') continue;
                if (state === 'in-progress') {
                    throw new CycleError([...chain, frame.name]);
                }

                const plan = planFor(frame.name, lookupEntry(sets, frame.name));
                inProgress.add(frame.name);
                chain.push(frame.name);
                stack.push({ phase: 'exit', name: frame.name, plan });

                const dependencies = plan.kind === 'alias' ? [plan.target] : plan.parents;
                for (const dependency of [...dependencies].reverse()) {
                    stack.push({ phase: 'enter', name: dependency });
                }
                continue;
            }

            const words = this.collect(frame.plan, cache, baseDir, caseSensitive);
            cache.set(frame.name, words);
            inProgress.delete(frame.name);
            chain.pop();
            getLogger().debug(
                { resource: frame.name, words: words.size, caseSensitive, metadataPath },
                'Resolved stopword resource'
            );
        }

        return requireResolved(cache, name);
    }

    /**
     * Resolve several resources and return the union as a new set.
     */
    resolveMany(names: Iterable<string>, options: ResolveOptions = {}): Set<string> {
        const merged = new Set<string>();
        for (const name of names) {
            for (const word of this.resolve(name, options)) {
                merged.add(word);
            }
        }
        return merged;
    }

    private collect(
        plan: ResourcePlan,
        cache: Map<string, ResolvedSet>,
        baseDir: string,
        caseSensitive: boolean
    ): ResolvedSet {
        if (plan.kind === 'alias') {
            return requireResolved(cache, plan.target);
        }

        const words = new Set<string>();
        for (const parent of plan.parents) {
            for (const word of requireResolved(cache, parent)) {
                words.add(word);
            }
        }
        if (plan.file !== undefined) {
            const path = resolveResourcePath(plan.file, baseDir);
            for (const word of loadWordFile(path, { caseSensitive })) {
                words.add(word);
            }
        }
        return new FrozenWordSet(words);
    }

    private cacheFor(metadataPath: string, caseSensitive: boolean): Map<string, ResolvedSet> {
        const key = `${metadataPath}\u0000${caseSensitive ? 'cs' : 'ci'}`;
        let cache = this.resolvedCache.get(key);
        if (!cache) {
            cache = new Map();
            this.resolvedCache.set(key, cache);
        }
        return cache;
    }
}

function requireResolved(cache: Map<string, ResolvedSet>, name: string): ResolvedSet {
    const words = cache.get(name);
    if (!words) {
        throw new StopwordError(`Stopword resource '${name}' was not resolved.`);
    }
    return words;
}

/**
 * Shared resolver for the bundled resources.
 */
let resolverInstance: ResourceResolver | null = null;

/**
 * Get the shared resolver instance, creating it on first use.
 */
export function getDefaultResolver(): ResourceResolver {
    if (!resolverInstance) {
        resolverInstance = new ResourceResolver();
    }
    return resolverInstance;
}

/**
 * Create a new resolver with its own caches (for testing or custom metadata).
 */
export function createResolver(options?: { metadataPath?: string }): ResourceResolver {
    return new ResourceResolver(options);
}
