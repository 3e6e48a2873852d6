import {Command} from "commander";

import {searchPathFor} from "../core/buffers.js";
import {findFirstMarkerRoot} from "../core/marker-finder.js";
import type {FindOptions, ResolvedRoot} from "../core/types.js";
import {validateMarkerPattern} from "../utils/validation.js";
import {BaseCommand, type CommandContext, startPath} from "./base.js";

/**
 * Find command - prints the root marked by the first marker found
 */
export class FindCommand extends BaseCommand<FindOptions> {
    protected override validateOptions(options: FindOptions): void {
        for (const marker of options.markers) {
            validateMarkerPattern(marker);
        }
    }

    protected override async executeCommand(options: FindOptions, context: CommandContext): Promise<ResolvedRoot> {
        const {logger, config, buffers} = context;
        const markers = options.markers.length > 0 ? options.markers : config.markers;

        const start = await searchPathFor(buffers, startPath(options.from));
        if (!start) {
            return null;
        }

        logger.verbose(`Searching for ${markers.join(", ")} from ${start}`);
        return findFirstMarkerRoot(start, markers, logger);
    }
}

/**
 * Create the find command
 */
export const findCommand = new Command("find")
    .description("Print the nearest root marked by a file or directory (trailing / for directories)")
    .argument("[markers...]", "markers to try in order (default: from config)")
    .option("-f, --from <path>", "file or directory to start from (default: cwd)")
    .action(async function(this: Command, markers: string[], options: Omit<FindOptions, "markers">) {
        const command = new FindCommand();
        const parentOpts = this.parent?.opts() ?? {};
        await command.execute({... parentOpts, ... options, markers});
    });
