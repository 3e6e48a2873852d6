export const ENV_VARS = {
    CONFIG_PATH: "ROOTSCOUT_CONFIG",
    VCS_MARKERS: "ROOTSCOUT_VCS_MARKERS",
} as const;

/**
 * Version-control markers in lookup order. The file form comes first so a
 * submodule or linked worktree, whose `.git` is a file, resolves to itself.
 */
export const VCS_MARKERS = [".git", ".git/"] as const;

export const VALIDATION = {
    EMPTY_STRING_ERROR: "cannot be empty",
} as const;

export const GIT_ERRORS = {
    NOT_A_REPO: "Not in a git repository",
} as const;

export const CONFIG_DEFAULTS = {
    VERSION: "1.0.0",
    CONFIG_FILE: ".rootscout.json",
} as const;
