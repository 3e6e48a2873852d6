import {PathBufferSource} from "../core/buffers.js";
import {loadConfig} from "../core/config.js";
import type {BufferSource, GlobalOptions, ResolvedRoot, RootscoutConfig} from "../core/types.js";
import {handleCommandError} from "../utils/error-handler.js";
import {getLogger, type Logger} from "../utils/logger.js";

export type CommandOptions = GlobalOptions;

export interface CommandContext {
    logger: Logger;
    config: RootscoutConfig;
    /** Buffers are plain paths on the command line */
    buffers: BufferSource;
}

/**
 * Shared flow of every lookup command: validate, load config, run the
 * lookup, print the root. A lookup that finds nothing prints nothing and
 * sets exit code 1.
 */
export abstract class BaseCommand<TOptions extends CommandOptions = CommandOptions> {
    protected abstract validateOptions(options: TOptions): void;
    protected abstract executeCommand(options: TOptions, context: CommandContext): Promise<ResolvedRoot>;

    async execute(options: TOptions): Promise<void> {
        const logger = getLogger(options);

        try {
            logger.verbose("Validating options...");
            this.validateOptions(options);

            logger.verbose("Loading configuration...");
            const config = await loadConfig(options.config);

            const context: CommandContext = {
                logger,
                config,
                buffers: new PathBufferSource(),
            };

            const root = await this.executeCommand(options, context);
            if (root) {
                logger.result(root);
            } else {
                logger.verbose("No root found");
                process.exitCode = 1;
            }
        } catch(error) {
            handleCommandError(error, logger);
        }
    }
}

/**
 * Starting point of a lookup: the --from path, or the working directory
 */
export function startPath(from: string | undefined): string {
    return from ?? process.cwd();
}
