import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, symlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { loadWordFile } from '../resources/word-file.js';
import { resolveResourcePath } from '../resources/paths.js';
import { readMetadata } from '../resources/metadata.js';
import { ResourceResolver, createResolver } from '../resources/resolver.js';
import { normalizeCase } from '../nlp/normalize.js';
import {
    AliasConflictError,
    CycleError,
    MissingFileError,
    PathEscapeError,
    SchemaError,
    StopwordError,
    UnknownResourceError,
} from '../utils/errors.js';

let dir: string;

function writeTree(files: Record<string, string>): void {
    for (const [name, content] of Object.entries(files)) {
        const path = join(dir, name);
        mkdirSync(dirname(path), { recursive: true });
        writeFileSync(path, content, 'utf-8');
    }
}

function writeMetadata(sets: Record<string, unknown>, files: Record<string, string> = {}): string {
    writeTree({ ...files, 'metadata.json': JSON.stringify({ sets }) });
    return join(dir, 'metadata.json');
}

function sorted(words: Iterable<string>): string[] {
    return [...words].sort();
}

beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'stopgraph-resources-'));
});

afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
});

describe('loadWordFile', () => {
    it('should skip comments and blank lines and lowercase entries', () => {
        writeTree({ 'words.txt': '# comment\nServis\n\n   \n  veri  \nIrmak\nİstanbul\n' });
        const words = loadWordFile(join(dir, 'words.txt'));
        expect(sorted(words)).toEqual(['istanbul', 'servis', 'veri', 'ırmak']);
    });

    it('should keep entries verbatim in case-sensitive mode', () => {
        writeTree({ 'words.txt': 'Servis\n  veri\nIrmak\r\nİstanbul' });
        const words = loadWordFile(join(dir, 'words.txt'), { caseSensitive: true });
        expect(words).toEqual(new Set(['Servis', 'veri', 'Irmak', 'İstanbul']));
    });

    it('should treat indented # lines as comments', () => {
        writeTree({ 'words.txt': '   # indented comment\nve\n' });
        expect(loadWordFile(join(dir, 'words.txt'))).toEqual(new Set(['ve']));
    });

    it('should split on carriage returns and other line breaks', () => {
        writeTree({ 'cr.txt': 've\rama\r', 'mixed.txt': 'bir\r\niki\u2028üç\x85dört\n' });
        expect(sorted(loadWordFile(join(dir, 'cr.txt')))).toEqual(['ama', 've']);
        expect(sorted(loadWordFile(join(dir, 'mixed.txt')))).toEqual(['bir', 'dört', 'iki', 'üç']);
    });

    it('should throw MissingFileError for an absent file', () => {
        expect(() => loadWordFile(join(dir, 'absent.txt'))).toThrow(MissingFileError);
    });
});

describe('resolveResourcePath', () => {
    beforeEach(() => {
        writeTree({ 'sub/a.txt': 've\n', 'top.txt': 'ama\n' });
    });

    it('should resolve a nested file under the base directory', () => {
        expect(resolveResourcePath('sub/a.txt', dir)).toBe(resolve(dir, 'sub', 'a.txt'));
    });

    it('should allow .. segments that stay inside the base directory', () => {
        expect(resolveResourcePath('sub/../top.txt', dir)).toBe(resolve(dir, 'top.txt'));
    });

    it('should reject paths escaping the base directory', () => {
        expect(() => resolveResourcePath('../outside.txt', dir)).toThrow(PathEscapeError);
        expect(() => resolveResourcePath('sub/../../outside.txt', dir)).toThrow(PathEscapeError);
    });

    it('should reject absolute paths outside the base directory', () => {
        expect(() => resolveResourcePath(resolve(dir, '..', 'elsewhere.txt'), dir)).toThrow(PathEscapeError);
    });

    it('should name the offending path in the escape error', () => {
        expect(() => resolveResourcePath('../outside.txt', dir)).toThrow(
            `Stopword resource path '../outside.txt' escapes the data directory '${resolve(dir)}'.`
        );
    });

    it('should throw MissingFileError for absent files and directories', () => {
        expect(() => resolveResourcePath('sub/missing.txt', dir)).toThrow(MissingFileError);
        expect(() => resolveResourcePath('sub', dir)).toThrow(MissingFileError);
    });

    it('should reject symlinks that point outside the base directory', () => {
        writeTree({ 'data/words.txt': 've\n', 'secret.txt': 'gizli\n' });
        symlinkSync(join(dir, 'secret.txt'), join(dir, 'data', 'link.txt'));

        expect(() => resolveResourcePath('link.txt', join(dir, 'data'))).toThrow(PathEscapeError);
    });

    it('should accept symlinks that stay inside the base directory', () => {
        symlinkSync(join(dir, 'top.txt'), join(dir, 'linked.txt'));
        expect(resolveResourcePath('linked.txt', dir)).toBe(resolve(dir, 'linked.txt'));
    });

    it('should accept a symlinked base directory', () => {
        symlinkSync(join(dir, 'sub'), join(dir, 'linked'));
        expect(resolveResourcePath('a.txt', join(dir, 'linked'))).toBe(resolve(dir, 'linked', 'a.txt'));
    });

    it('should throw SchemaError for an empty reference', () => {
        expect(() => resolveResourcePath('', dir)).toThrow(SchemaError);
    });
});

describe('readMetadata', () => {
    it('should parse a valid document', () => {
        const path = writeMetadata({ base: { file: 'base.txt', description: 'Base' } });
        const metadata = readMetadata(path);
        expect(metadata.sets['base']).toEqual({ file: 'base.txt', description: 'Base' });
    });

    it('should fail when the file is missing', () => {
        expect(() => readMetadata(join(dir, 'none.json'))).toThrow(/not found/);
        expect(() => readMetadata(join(dir, 'none.json'))).toThrow(SchemaError);
    });

    it('should fail on invalid JSON', () => {
        writeTree({ 'metadata.json': '{ not json' });
        expect(() => readMetadata(join(dir, 'metadata.json'))).toThrow(/is not valid JSON/);
    });

    it('should fail when the document is not an object', () => {
        writeTree({ 'metadata.json': '["base"]' });
        expect(() => readMetadata(join(dir, 'metadata.json'))).toThrow(SchemaError);
    });

    it('should fail when sets is missing, empty, or not a map', () => {
        writeTree({ 'a.json': '{}', 'b.json': '{"sets": {}}', 'c.json': '{"sets": ["base"]}' });
        expect(() => readMetadata(join(dir, 'a.json'))).toThrow(SchemaError);
        expect(() => readMetadata(join(dir, 'b.json'))).toThrow(/'sets' must be a non-empty map/);
        expect(() => readMetadata(join(dir, 'c.json'))).toThrow(SchemaError);
    });

    it('should fail when a field has the wrong type', () => {
        writeTree({ 'metadata.json': '{"sets": {"a": {"extends": [1]}}}' });
        expect(() => readMetadata(join(dir, 'metadata.json'))).toThrow(/sets\.a\.extends/);
    });
});

describe('ResourceResolver', () => {
    let resolver: ResourceResolver;

    beforeEach(() => {
        resolver = createResolver();
    });

    it('should merge extends parents with the entry file', () => {
        const metadataPath = writeMetadata(
            {
                base: { file: 'base.txt' },
                social: { extends: ['base'], file: 'social.txt' },
            },
            { 'base.txt': 've\nama\n', 'social.txt': 'rt\ndm\n' }
        );

        const words = resolver.resolve('social', { metadataPath });
        expect(sorted(words)).toEqual(['ama', 'dm', 'rt', 've']);
    });

    it('should resolve an alias to the identical set of its target', () => {
        const metadataPath = writeMetadata(
            { a: { file: 'x.txt' }, b: { alias: 'a', description: 'Legacy name' } },
            { 'x.txt': 've\nile\n' }
        );

        const alias = resolver.resolve('b', { metadataPath });
        expect(alias).toBe(resolver.resolve('a', { metadataPath }));
        expect(sorted(alias)).toEqual(['ile', 've']);
    });

    it('should follow alias chains', () => {
        const metadataPath = writeMetadata(
            { a: { file: 'x.txt' }, b: { alias: 'a' }, c: { alias: 'b' } },
            { 'x.txt': 've\n' }
        );
        expect(resolver.resolve('c', { metadataPath })).toBe(resolver.resolve('a', { metadataPath }));
    });

    it('should accept extends given as a single name', () => {
        const metadataPath = writeMetadata(
            { a: { file: 'a.txt' }, b: { extends: 'a' } },
            { 'a.txt': 've\nama\n' }
        );
        expect(sorted(resolver.resolve('b', { metadataPath }))).toEqual(['ama', 've']);
    });

    it('should union every parent of a diamond regardless of order', () => {
        const metadataPath = writeMetadata(
            {
                root: { file: 'root.txt' },
                left: { extends: ['root'], file: 'left.txt' },
                right: { extends: ['root'], file: 'right.txt' },
                top: { extends: ['right', 'left'], file: 'top.txt' },
                flipped: { extends: ['left', 'right'], file: 'top.txt' },
            },
            {
                'root.txt': 've\n',
                'left.txt': 'sol\n',
                'right.txt': 'sağ\n',
                'top.txt': 'üst\n',
            }
        );

        const top = resolver.resolve('top', { metadataPath });
        expect(sorted(top)).toEqual(['sağ', 'sol', 've', 'üst']);
        expect(sorted(resolver.resolve('flipped', { metadataPath }))).toEqual(sorted(top));
    });

    it('should resolve an entry with an empty extends list to the empty set', () => {
        const metadataPath = writeMetadata({ empty: { extends: [] } });
        expect(resolver.resolve('empty', { metadataPath }).size).toBe(0);
    });

    it('should report a two-node cycle with its chain', () => {
        const metadataPath = writeMetadata({ x: { extends: ['y'] }, y: { extends: ['x'] } });

        expect(() => resolver.resolve('x', { metadataPath })).toThrow(CycleError);
        expect(() => resolver.resolve('x', { metadataPath })).toThrow(
            'Circular stopword resource chain: x -> y -> x'
        );
        expect(() => resolver.resolve('y', { metadataPath })).toThrow(
            'Circular stopword resource chain: y -> x -> y'
        );
    });

    it('should expose the cycle chain on the error', () => {
        const metadataPath = writeMetadata({ a: { alias: 'a' } });
        try {
            resolver.resolve('a', { metadataPath });
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(CycleError);
            if (error instanceof CycleError) {
                expect(error.chain).toEqual(['a', 'a']);
            }
        }
    });

    it('should detect cycles that pass through an alias', () => {
        const metadataPath = writeMetadata(
            { a: { extends: ['b'], file: 'a.txt' }, b: { alias: 'a' } },
            { 'a.txt': 've\n' }
        );
        expect(() => resolver.resolve('a', { metadataPath })).toThrow(
            'Circular stopword resource chain: a -> b -> a'
        );
    });

    it('should throw UnknownResourceError naming the missing resource', () => {
        const metadataPath = writeMetadata({ a: { extends: ['ghost'] } });

        expect(() => resolver.resolve('missing', { metadataPath })).toThrow(
            "Unknown stopword resource 'missing'."
        );
        expect(() => resolver.resolve('a', { metadataPath })).toThrow(UnknownResourceError);
        expect(() => resolver.resolve('a', { metadataPath })).toThrow("'ghost'");
    });

    it('should not treat Object prototype members as resources', () => {
        const metadataPath = writeMetadata({ a: { extends: [] } });
        expect(() => resolver.resolve('toString', { metadataPath })).toThrow(UnknownResourceError);
    });

    it('should reject aliases that declare other fields', () => {
        const metadataPath = writeMetadata(
            { a: { file: 'x.txt' }, b: { alias: 'a', file: 'x.txt', extends: ['a'] } },
            { 'x.txt': 've\n' }
        );

        expect(() => resolver.resolve('b', { metadataPath })).toThrow(AliasConflictError);
        expect(() => resolver.resolve('b', { metadataPath })).toThrow(
            "Stopword alias 'b' cannot define additional fields: extends, file."
        );
    });

    it('should reject blank alias targets', () => {
        const metadataPath = writeMetadata({ b: { alias: '  ' } });
        expect(() => resolver.resolve('b', { metadataPath })).toThrow(
            "Stopword resource 'b' alias cannot be empty."
        );
    });

    it('should reject entries that declare nothing to resolve', () => {
        const metadataPath = writeMetadata({ a: { description: 'nothing here' } });
        expect(() => resolver.resolve('a', { metadataPath })).toThrow(
            "Stopword resource 'a' must declare 'file', 'extends', or 'alias'."
        );
    });

    it('should reject resource files that escape the metadata directory', () => {
        const metadataPath = writeMetadata({ a: { file: '../outside.txt' } });
        expect(() => resolver.resolve('a', { metadataPath })).toThrow(PathEscapeError);
    });

    it('should not load word files reached through an escaping symlink', () => {
        writeTree({
            'secret.txt': 'gizli\n',
            'data/metadata.json': JSON.stringify({ sets: { a: { file: 'link.txt' } } }),
        });
        symlinkSync(join(dir, 'secret.txt'), join(dir, 'data', 'link.txt'));

        expect(() => resolver.resolve('a', { metadataPath: join(dir, 'data', 'metadata.json') }))
            .toThrow(PathEscapeError);
    });

    it('should reject resource files that do not exist', () => {
        const metadataPath = writeMetadata({ a: { file: 'missing.txt' } });
        expect(() => resolver.resolve('a', { metadataPath })).toThrow(MissingFileError);
    });

    it('should return the same cached set on repeated calls', () => {
        const metadataPath = writeMetadata({ a: { file: 'a.txt' } }, { 'a.txt': 've\n' });
        const first = resolver.resolve('a', { metadataPath });
        expect(resolver.resolve('a', { metadataPath })).toBe(first);
    });

    it('should serve cached sets after the word file is gone', () => {
        const metadataPath = writeMetadata({ a: { file: 'a.txt' } }, { 'a.txt': 've\n' });
        const first = resolver.resolve('a', { metadataPath });
        rmSync(join(dir, 'a.txt'));
        expect(resolver.resolve('a', { metadataPath })).toBe(first);
    });

    it('should keep separate caches per case sensitivity', () => {
        const metadataPath = writeMetadata({ a: { file: 'a.txt' } }, { 'a.txt': 'Ve\nAMA\nIşık\nve\n' });

        const sensitive = resolver.resolve('a', { metadataPath, caseSensitive: true });
        const insensitive = resolver.resolve('a', { metadataPath, caseSensitive: false });

        expect(sensitive).not.toBe(insensitive);
        expect(sorted(sensitive)).toEqual(['AMA', 'Işık', 'Ve', 've']);
        expect(sorted(insensitive)).toEqual(['ama', 've', 'ışık']);
    });

    it('should make the case-insensitive set the case-folded case-sensitive set', () => {
        const metadataPath = writeMetadata(
            { base: { file: 'base.txt' }, child: { extends: ['base'], file: 'child.txt' } },
            { 'base.txt': 'Ve\nİLE\nama\n', 'child.txt': 'IRMAK\nRT\nrt\n' }
        );

        const sensitive = resolver.resolve('child', { metadataPath, caseSensitive: true });
        const insensitive = resolver.resolve('child', { metadataPath });
        const folded = new Set([...sensitive].map((word) => normalizeCase(word)));

        expect(sorted(insensitive)).toEqual(sorted(folded));
    });

    it('should leave siblings usable after a failing resolution', () => {
        const metadataPath = writeMetadata(
            { good: { file: 'good.txt' }, bad: { extends: ['ghost', 'good'] } },
            { 'good.txt': 've\n' }
        );

        expect(() => resolver.resolve('bad', { metadataPath })).toThrow(UnknownResourceError);
        expect(sorted(resolver.resolve('good', { metadataPath }))).toEqual(['ve']);
        expect(() => resolver.resolve('bad', { metadataPath })).toThrow(UnknownResourceError);
    });

    it('should cache the metadata document per path', () => {
        const metadataPath = writeMetadata({ a: { extends: [] } });
        const first = resolver.loadMetadata(metadataPath);

        rmSync(metadataPath);
        expect(resolver.loadMetadata(metadataPath)).toBe(first);
        expect(resolver.resolve('a', { metadataPath }).size).toBe(0);
    });

    it('should freeze the cached metadata document', () => {
        const metadataPath = writeMetadata({ a: { extends: ['b'] }, b: { file: 'b.txt' } }, { 'b.txt': 've\n' });
        const metadata = resolver.loadMetadata(metadataPath);

        expect(Object.isFrozen(metadata)).toBe(true);
        expect(Object.isFrozen(metadata.sets)).toBe(true);
        expect(Object.isFrozen(metadata.sets['a'].extends)).toBe(true);
        expect(() => {
            metadata.sets['b'].file = 'other.txt';
        }).toThrow(TypeError);
        expect(sorted(resolver.resolve('a', { metadataPath }))).toEqual(['ve']);
    });

    it('should hand out resolved sets that reject mutation', () => {
        const metadataPath = writeMetadata({ a: { file: 'a.txt' }, b: { alias: 'a' } }, { 'a.txt': 've\n' });
        const words = resolver.resolve('b', { metadataPath });

        expect(words).toBeInstanceOf(Set);
        if (!(words instanceof Set)) return;
        expect(() => words.add('yeni')).toThrow('Resolved stopword sets are read-only.');
        expect(() => words.delete('ve')).toThrow(TypeError);
        expect(() => words.clear()).toThrow(TypeError);
        expect(sorted(resolver.resolve('a', { metadataPath }))).toEqual(['ve']);
    });

    it('should not share caches between resolver instances', () => {
        const metadataPath = writeMetadata({ a: { file: 'a.txt' } }, { 'a.txt': 've\n' });
        const other = new ResourceResolver({ metadataPath });

        expect(other.resolve('a')).not.toBe(resolver.resolve('a', { metadataPath }));
        expect(sorted(other.resolve('a'))).toEqual(['ve']);
    });

    it('should merge several resources with resolveMany', () => {
        const metadataPath = writeMetadata(
            { a: { file: 'a.txt' }, b: { file: 'b.txt' } },
            { 'a.txt': 've\nama\n', 'b.txt': 'ama\nrt\n' }
        );
        expect(sorted(resolver.resolveMany(['a', 'b'], { metadataPath }))).toEqual(['ama', 'rt', 've']);
    });

    it('should resolve deep extends chains without recursion limits', () => {
        const sets: Record<string, unknown> = { level0: { file: 'root.txt' } };
        for (let i = 1; i <= 5000; i++) {
            sets[`level${i}`] = { extends: [`level${i - 1}`] };
        }
        const metadataPath = writeMetadata(sets, { 'root.txt': 've\n' });

        expect(sorted(resolver.resolve('level5000', { metadataPath }))).toEqual(['ve']);
    });

    it('should raise errors that share the StopwordError base', () => {
        const metadataPath = writeMetadata({ a: { extends: ['a'] } });
        expect(() => resolver.resolve('a', { metadataPath })).toThrow(StopwordError);
    });
});
