#!/usr/bin/env node
import {program} from "./cli/program.js";
import {findCommand} from "./commands/find.js";
import {createHelpCommand} from "./commands/help.js";
import {nearestCommand} from "./commands/nearest.js";
import {rootCommand} from "./commands/root.js";

// Register commands
program.addCommand(findCommand);
program.addCommand(nearestCommand);
program.addCommand(rootCommand);
program.addCommand(createHelpCommand(program));

await program.parseAsync(process.argv);
