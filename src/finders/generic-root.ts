import {searchPathFor} from "../core/buffers.js";
import type {BufferId, BufferSource, ResolvedRoot} from "../core/types.js";
import {canonicalPath, findUpward} from "../utils/find-root.js";
import type {Logger} from "../utils/logger.js";
import {stripTrailingSeparators, validateString} from "../utils/validation.js";

/**
 * Find the nearest directory named `dirName` at or above the buffer's
 * location. Unlike a marker lookup this returns the matched directory
 * itself, not the directory that holds it.
 * @returns The canonical path of the match, or null
 * @throws {ValidationError} When dirName is empty
 */
export async function findNearestDir(
    buffers: BufferSource,
    bufferId: BufferId,
    dirName: string,
    logger?: Logger,
): Promise<ResolvedRoot> {
    const name = validateString(stripTrailingSeparators(dirName), "Directory name", {
        sanitizer: (value) => value,
    });

    const start = await searchPathFor(buffers, bufferId);
    if (!start) {
        logger?.verbose(`Buffer ${String(bufferId)} has no path`);
        return null;
    }

    const match = await findUpward(name, "directory", start);
    if (!match) {
        logger?.verbose(`No directory "${name}" above ${start}`);
        return null;
    }

    return canonicalPath(match);
}
