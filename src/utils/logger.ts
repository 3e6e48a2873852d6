import chalk from "chalk";

import type {GlobalOptions, LogLevel} from "../core/types.js";

export class Logger {
    private readonly level: LogLevel;

    constructor(options?: GlobalOptions) {
        if (options?.quiet) {
            this.level = "quiet";
        } else if (options?.verbose) {
            this.level = "verbose";
        } else {
            this.level = "normal";
        }
    }

    /**
     * Log an error message (always shown)
     */
    error(message: string): void {
        console.error(chalk.red(`✗ ${message}`));
    }

    /**
     * Log a verbose message (only shown in verbose mode)
     */
    verbose(message: string): void {
        if (this.level === "verbose") {
            console.error(chalk.gray(`• ${message}`));
        }
    }

    /**
     * Write a result line to stdout. Results are printed in every mode,
     * since scripts read them.
     */
    result(message: string): void {
        console.log(message);
    }
}

let instance: Logger | undefined;

/**
 * Get or create the logger instance
 */
export function getLogger(options?: GlobalOptions): Logger {
    if (!instance || options) {
        instance = new Logger(options);
    }

    return instance;
}
