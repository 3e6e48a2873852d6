/**
 * Custom error classes for rootscout
 */

/**
 * Base error class for all rootscout errors
 */
export class RootscoutError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly details?: unknown,
    ) {
        super(message);
        this.name = "RootscoutError";

        // Maintains proper stack trace for where error was thrown
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, RootscoutError);
        }
    }
}

/**
 * Error thrown when git operations fail
 */
export class GitError extends RootscoutError {
    constructor(message: string, details?: unknown) {
        super(message, "GIT_ERROR", details);
        this.name = "GitError";
    }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigError extends RootscoutError {
    constructor(message: string, details?: unknown) {
        super(message, "CONFIG_ERROR", details);
        this.name = "ConfigError";
    }
}

/**
 * Error thrown when file system operations fail
 */
export class FileSystemError extends RootscoutError {
    constructor(message: string, details?: unknown) {
        super(message, "FS_ERROR", details);
        this.name = "FileSystemError";
    }
}

/**
 * Error thrown when a marker, path or option is rejected
 */
export class ValidationError extends RootscoutError {
    constructor(message: string, details?: unknown) {
        super(message, "VALIDATION_ERROR", details);
        this.name = "ValidationError";
    }
}

/**
 * Helper to determine if an error is a RootscoutError
 */
export function isRootscoutError(error: unknown): error is RootscoutError {
    return error instanceof RootscoutError;
}
