import {isRootscoutError} from "./errors.js";
import type {Logger} from "./logger.js";

/**
 * Extract error message from any error type
 */
export function getErrorMessage(error: unknown): string {
    if (isRootscoutError(error)) {
        return error.message;
    }

    if (error instanceof Error) {
        return error.message;
    }

    return String(error);
}

export function handleCommandError(error: unknown, logger: Logger): never {
    if (isRootscoutError(error)) {
        logger.error(error.message);
        logger.verbose(`Error code: ${error.code}`);
    } else {
        logger.error(getErrorMessage(error));
    }

    process.exit(1);
}
