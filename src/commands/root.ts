import {Command} from "commander";

import type {ResolvedRoot, RootOptions} from "../core/types.js";
import {VcsRootFinder} from "../finders/vcs-root.js";
import {ValidationError} from "../utils/errors.js";
import {BaseCommand, type CommandContext, startPath} from "./base.js";

/**
 * Root command - prints the version-control root
 */
export class RootCommand extends BaseCommand<RootOptions> {
    protected override validateOptions(options: RootOptions): void {
        if (options.shell && options.from !== undefined) {
            throw new ValidationError("--shell asks git from the working directory and cannot be combined with --from");
        }
    }

    protected override async executeCommand(options: RootOptions, context: CommandContext): Promise<ResolvedRoot> {
        const {logger, config, buffers} = context;
        const finder = new VcsRootFinder(buffers, {markers: config.vcsMarkers, logger});

        if (options.shell) {
            logger.verbose("Asking git for the top-level directory...");
            return finder.gitRootViaShell();
        }

        const bufferId = startPath(options.from);
        if (options.default ?? config.fallbackToCwd) {
            return finder.rootOrDefault(bufferId);
        }

        return finder.findRoot(bufferId);
    }
}

/**
 * Create the root command
 */
export const rootCommand = new Command("root")
    .description("Print the version-control root of a file or directory")
    .option("-f, --from <path>", "file or directory to start from (default: cwd)")
    .option("-d, --default", "print the working directory when no root is found")
    .option("-s, --shell", "ask git rev-parse instead of walking the filesystem")
    .action(async function(this: Command, options: RootOptions) {
        const command = new RootCommand();
        const parentOpts = this.parent?.opts() ?? {};
        await command.execute({... parentOpts, ... options});
    });
