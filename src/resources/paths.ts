import { existsSync, realpathSync, statSync } from 'node:fs';
import { isAbsolute, relative, resolve, sep } from 'node:path';
import { MissingFileError, PathEscapeError, SchemaError } from '../utils/errors.js';

function escapes(root: string, candidate: string): boolean {
    const rel = relative(root, candidate);
    return rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel);
}

/**
 * Resolve a resource's `file` reference against the metadata directory.
 * The result must stay inside `baseDir` and name an existing regular file,
 * both as written and once symlinks are followed.
 */
export function resolveResourcePath(relativePath: string, baseDir: string): string {
    if (!relativePath) {
        throw new SchemaError('Stopword resource entry is missing its \'file\'.');
    }

    const root = resolve(baseDir);
    const candidate = resolve(root, relativePath);

    if (escapes(root, candidate)) {
        throw new PathEscapeError(relativePath, root);
    }

    if (!existsSync(candidate) || !statSync(candidate).isFile()) {
        throw new MissingFileError(candidate);
    }

    if (escapes(realpathSync(root), realpathSync(candidate))) {
        throw new PathEscapeError(relativePath, root);
    }

    return candidate;
}
