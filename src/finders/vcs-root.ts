import {searchPathFor} from "../core/buffers.js";
import {VCS_MARKERS} from "../core/constants.js";
import {createGit, type Git} from "../core/git.js";
import {findFirstMarkerRoot} from "../core/marker-finder.js";
import type {BufferId, BufferSource, MarkerPattern, ResolvedRoot} from "../core/types.js";
import {getErrorMessage} from "../utils/error-handler.js";
import {GitError} from "../utils/errors.js";
import type {Logger} from "../utils/logger.js";
import {validateMarkerPattern} from "../utils/validation.js";

export interface VcsRootFinderOptions {
    /** Markers tried in order, defaults to `.git` then `.git/` */
    markers?: readonly MarkerPattern[];
    /** Builds the git wrapper used by the shell lookup */
    gitFactory?: (baseDir: string) => Git;
    logger?: Logger;
}

/**
 * Locates the version-control root of an editor buffer
 */
export class VcsRootFinder {
    private readonly markers: readonly MarkerPattern[];
    private readonly gitFactory: (baseDir: string) => Git;
    private readonly logger: Logger | undefined;

    constructor(private readonly buffers: BufferSource, options: VcsRootFinderOptions = {}) {
        const markers: readonly MarkerPattern[] = options.markers ?? VCS_MARKERS;
        this.markers = markers.map((marker) => validateMarkerPattern(marker));
        this.gitFactory = options.gitFactory ?? createGit;
        this.logger = options.logger;
    }

    /**
     * Walk up from the buffer's location and return the first root any
     * marker resolves to, or null.
     */
    async findRoot(bufferId: BufferId): Promise<ResolvedRoot> {
        const start = await searchPathFor(this.buffers, bufferId);
        if (!start) {
            this.logger?.verbose(`Buffer ${String(bufferId)} has no path`);
            return null;
        }

        return findFirstMarkerRoot(start, this.markers, this.logger);
    }

    /**
     * Like findRoot, but falls back to the current working directory
     */
    async rootOrDefault(bufferId: BufferId): Promise<string> {
        const root = await this.findRoot(bufferId);
        if (root) {
            return root;
        }

        const cwd = process.cwd();
        this.logger?.verbose(`No repository root found, using ${cwd}`);
        return cwd;
    }

    /**
     * Ask `git rev-parse --show-toplevel` in the current working directory.
     * Slower than findRoot since it spawns git.
     * @returns The top-level directory, or null when git fails
     */
    async gitRootViaShell(): Promise<ResolvedRoot> {
        try {
            return await this.gitFactory(process.cwd()).getRepoRoot();
        } catch(error) {
            if (error instanceof GitError) {
                this.logger?.verbose(getErrorMessage(error));
                return null;
            }

            throw error;
        }
    }
}
