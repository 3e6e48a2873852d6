import {promises as fs} from "fs";
import * as path from "path";

import type {MarkerKind} from "../core/types.js";

/**
 * Find the nearest directory at or above startDir that holds an entry
 * called `name` of the given kind.
 * Walks up the directory tree and checks the filesystem root as well.
 * @param name Entry name, joined onto each directory as is
 * @param kind "directory" matches only directories, "file" only regular files
 * @param startDir The directory to start searching from
 * @returns The path of the matched entry (resolved, not canonicalised) or null
 */
export async function findUpward(name: string, kind: MarkerKind, startDir: string): Promise<string | null> {
    let currentDir = path.resolve(startDir);

    while (true) {
        const entryPath = path.join(currentDir, name);
        if (await entryIs(entryPath, kind)) {
            return entryPath;
        }

        const parentDir = path.dirname(currentDir);
        if (parentDir === currentDir) {
            // We've reached the root
            return null;
        }

        currentDir = parentDir;
    }
}

async function entryIs(entryPath: string, kind: MarkerKind): Promise<boolean> {
    try {
        const stats = await fs.stat(entryPath);
        return kind === "directory" ? stats.isDirectory() : stats.isFile();
    } catch {
        return false;
    }
}

/**
 * Check whether a path exists and is a directory
 */
export async function isDirectory(dir: string): Promise<boolean> {
    return entryIs(dir, "directory");
}

/**
 * Resolve a path to its canonical absolute form, without a trailing
 * separator. Paths that cannot be resolved on disk are only made absolute.
 */
export async function canonicalPath(target: string): Promise<string> {
    try {
        // Resolve to handle symlinked temp dirs and Windows short paths
        return await fs.realpath(target);
    } catch {
        return path.resolve(target);
    }
}

/**
 * Whether `dir` is `target` or one of its ancestors. Both sides get a
 * trailing separator so /foo/bar is not taken as a prefix of /foo/barbaz.
 */
export function containsPath(dir: string, target: string): boolean {
    const withSep = (value: string): string => {
        const resolved = path.resolve(value);
        return resolved.endsWith(path.sep) ? resolved : resolved + path.sep;
    };

    return withSep(target).startsWith(withSep(dir));
}
