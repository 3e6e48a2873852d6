export {BufferList, PathBufferSource, searchPathFor} from "./core/buffers.js";
export {getDefaultConfig, loadConfig} from "./core/config.js";
export {VCS_MARKERS} from "./core/constants.js";
export {createGit, Git} from "./core/git.js";
export {findFirstMarkerRoot, findMarkerRoot, parseMarker} from "./core/marker-finder.js";
export type {
    BufferId,
    BufferSource,
    Marker,
    MarkerKind,
    MarkerPattern,
    ResolvedRoot,
    RootscoutConfig,
} from "./core/types.js";
export {findNearestDir} from "./finders/generic-root.js";
export {VcsRootFinder} from "./finders/vcs-root.js";
export type {VcsRootFinderOptions} from "./finders/vcs-root.js";
export * from "./utils/errors.js";
export {getLogger, Logger} from "./utils/logger.js";
