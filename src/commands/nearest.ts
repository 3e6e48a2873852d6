import {Command} from "commander";

import type {NearestOptions, ResolvedRoot} from "../core/types.js";
import {findNearestDir} from "../finders/generic-root.js";
import {stripTrailingSeparators, validateString} from "../utils/validation.js";
import {BaseCommand, type CommandContext, startPath} from "./base.js";

/**
 * Nearest command - prints the closest enclosing directory with a given name
 */
export class NearestCommand extends BaseCommand<NearestOptions> {
    protected override validateOptions(options: NearestOptions): void {
        validateString(stripTrailingSeparators(options.dir), "Directory name", {sanitizer: (value) => value});
    }

    protected override async executeCommand(options: NearestOptions, context: CommandContext): Promise<ResolvedRoot> {
        return findNearestDir(context.buffers, startPath(options.from), options.dir, context.logger);
    }
}

/**
 * Create the nearest command
 */
export const nearestCommand = new Command("nearest")
    .description("Print the nearest directory with the given name")
    .argument("<dir>", "directory name to look for")
    .option("-f, --from <path>", "file or directory to start from (default: cwd)")
    .action(async function(this: Command, dir: string, options: Omit<NearestOptions, "dir">) {
        const command = new NearestCommand();
        const parentOpts = this.parent?.opts() ?? {};
        await command.execute({... parentOpts, ... options, dir});
    });
