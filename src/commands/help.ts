import chalk from "chalk";
import {Command} from "commander";

/**
 * Execute the help command
 */
export function executeHelp(commandName?: string, program?: Command): void {
    if (commandName && program) {
        const command = program.commands.find((cmd) => cmd.name() === commandName);
        if (command) {
            console.log(command.helpInformation());
        } else {
            console.error(chalk.red(`Unknown command: ${commandName}`));
            console.error("Run 'rootscout help' to see available commands");
            process.exitCode = 1;
        }
    } else {
        showGeneralHelp();
    }
}

function showGeneralHelp(): void {
    console.log(chalk.bold("rootscout - find the project root of a file"));
    console.log();
    console.log("Usage: rootscout <command> [options]");
    console.log();
    console.log("Commands:");
    console.log("  find         Print the root marked by a file or directory marker");
    console.log("  nearest      Print the nearest enclosing directory with a given name");
    console.log("  root         Print the git root, optionally falling back to the cwd");
    console.log("  help         Display help information");
    console.log();
    console.log("Examples:");
    console.log("  rootscout find package.json          # Directory holding the nearest package.json");
    console.log("  rootscout find .hg/ .git/ -f src/a.ts # First of several markers");
    console.log("  rootscout nearest node_modules       # Path of the nearest node_modules");
    console.log("  rootscout root --default             # Git root, or the cwd");
    console.log("  rootscout root --shell               # Ask git rev-parse");
    console.log();
    console.log("Run 'rootscout help <command>' for more information on a specific command.");
}

/**
 * Create the help command
 */
export function createHelpCommand(program: Command): Command {
    return new Command("help")
        .argument("[command]", "Command to show help for")
        .description("Display help information")
        .action((commandName?: string) => {
            executeHelp(commandName, program);
        });
}
