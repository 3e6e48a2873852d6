import {Command} from "commander";

import {getLogger} from "../utils/logger.js";

// Kept in step with package.json by hand
const version = "0.1.0";

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
    const program = new Command();

    program
        .name("rootscout")
        .description("Find the project root that encloses a file")
        .version(version)
        .option("-v, --verbose", "enable verbose output")
        .option("-q, --quiet", "suppress output except errors and results")
        .option("-c, --config <file>", "configuration file (default: .rootscout.json)")
        .hook("preAction", (thisCommand) => {
            // Initialize logger with global options before any command runs
            getLogger(thisCommand.opts());
        });

    return program;
}

/**
 * Main program instance
 */
export const program = createProgram();
