import * as path from "path";

import {canonicalPath, containsPath, findUpward} from "../utils/find-root.js";
import type {Logger} from "../utils/logger.js";
import {isSeparator, stripTrailingSeparators, validateMarkerPattern} from "../utils/validation.js";
import type {Marker, MarkerPattern, ResolvedRoot} from "./types.js";

/**
 * Split a marker pattern into the entry name and its kind.
 * A trailing separator makes it a directory marker.
 * @throws {ValidationError} When the pattern is empty
 */
export function parseMarker(pattern: MarkerPattern): Marker {
    validateMarkerPattern(pattern);

    const isDir = isSeparator(pattern.charAt(pattern.length - 1));
    return {
        name: isDir ? stripTrailingSeparators(pattern) : pattern,
        kind: isDir ? "directory" : "file",
    };
}

/**
 * Find the project root marked by `pattern`, searching `origin` and its
 * ancestors.
 *
 * A file marker resolves to the directory holding the file. A directory
 * marker normally resolves the same way, except when `origin` lies inside
 * the matched directory: the match itself is then the root.
 *
 * @param origin Absolute directory the search starts from
 * @param pattern Marker to look for, e.g. `package.json` or `.git/`
 * @returns The canonical root, or null when no ancestor holds the marker
 * @throws {ValidationError} When the pattern is empty
 */
export async function findMarkerRoot(
    origin: string,
    pattern: MarkerPattern,
    logger?: Logger,
): Promise<ResolvedRoot> {
    const marker = parseMarker(pattern);
    const start = path.resolve(origin);

    const match = await findUpward(marker.name, marker.kind, start);
    if (!match) {
        logger?.verbose(`No ${marker.kind} "${marker.name}" above ${start}`);
        return null;
    }

    logger?.verbose(`Found ${marker.kind} marker ${match}`);

    if (marker.kind === "directory" && containsPath(match, start)) {
        return canonicalPath(match);
    }

    return canonicalPath(path.dirname(match));
}

/**
 * Try each pattern in order and return the first root found
 */
export async function findFirstMarkerRoot(
    origin: string,
    patterns: readonly MarkerPattern[],
    logger?: Logger,
): Promise<ResolvedRoot> {
    for (const pattern of patterns) {
        const root = await findMarkerRoot(origin, pattern, logger);
        if (root) {
            return root;
        }
    }

    return null;
}
