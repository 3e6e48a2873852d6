/**
 * Core TypeScript interfaces and types for rootscout
 */

/**
 * A marker name as written by the caller. A trailing path separator marks
 * a directory marker, anything else is a file marker.
 */
export type MarkerPattern = string;

export type MarkerKind = "file" | "directory";

/**
 * A parsed marker pattern
 */
export interface Marker {
    /** Entry name to look for, without the trailing separator */
    name: string;
    kind: MarkerKind;
}

/**
 * Absolute canonical directory, or null when nothing was found
 */
export type ResolvedRoot = string | null;

/**
 * Opaque handle of an editor buffer
 */
export type BufferId = string | number;

/**
 * Resolves buffer handles to the path of the file they show
 */
export interface BufferSource {
    /**
     * Path associated with the buffer. Empty for buffers without a file
     * (or unknown ids). The path need not exist on disk.
     */
    bufferPath(id: BufferId): string;
}

/**
 * Configuration structure for rootscout
 */
export interface RootscoutConfig {
    /** Configuration version for future compatibility */
    version: string;
    /** Markers tried in order by the version-control root lookup */
    vcsMarkers: MarkerPattern[];
    /** Markers used by `find` when none are given on the command line */
    markers: MarkerPattern[];
    /** Fall back to the working directory when no root is found */
    fallbackToCwd: boolean;
}

/**
 * Logger verbosity levels
 */
export type LogLevel = "quiet" | "normal" | "verbose";

/**
 * Global CLI options
 */
export interface GlobalOptions {
    /** Verbosity level */
    verbose?: boolean;
    /** Suppress output */
    quiet?: boolean;
    /** Path to a configuration file */
    config?: string;
}

/**
 * Options for the find command
 */
export interface FindOptions extends GlobalOptions {
    /** Markers given on the command line */
    markers: MarkerPattern[];
    /** File or directory to start from */
    from?: string;
}

/**
 * Options for the nearest command
 */
export interface NearestOptions extends GlobalOptions {
    /** Directory name to look for */
    dir: string;
    from?: string;
}

/**
 * Options for the root command
 */
export interface RootOptions extends GlobalOptions {
    from?: string;
    /** Print the working directory when no root is found */
    default?: boolean;
    /** Ask git instead of walking the filesystem */
    shell?: boolean;
}
