import { Command, CommanderError } from "commander";
import { registerConfigCommands } from "./commands/config";
import { registerHexCommands } from "./commands/hex";
import { registerSizeCommand } from "./commands/size";
import { OutputFormatter } from "./lib/output";

export type GlobalOptions = {
  format?: string;
  verbose?: boolean;
  quiet?: boolean;
};

const CLEAN_EXIT_CODES = new Set(["commander.helpDisplayed", "commander.version", "commander.help"]);

export function createProgram(): Command {
  const program = new Command();

  program
    .name("bytetools")
    .description("Hex encoding and directory size utilities")
    .version("0.1.0")
    .option("-f, --format <type>", "output format: text|json|yaml|table", "text")
    .option("-v, --verbose", "verbose output")
    .option("-q, --quiet", "quiet mode");

  // Must precede registration so subcommands inherit it
  program.exitOverride();

  registerHexCommands(program);
  registerSizeCommand(program);
  registerConfigCommands(program);

  return program;
}

/**
 * Parse and run a command line.
 *
 * @param argv - Full argv including the node and script entries
 * @returns Process exit code
 */
export async function run(argv: string[]): Promise<number> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
    // If no subcommand is provided, show help
    if (argv.length <= 2) {
      program.outputHelp();
    }
    return 0;
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // Commander has already printed its own message
      return CLEAN_EXIT_CODES.has(error.code) ? 0 : error.exitCode;
    }
    // Global options may be the cause of the failure, so print with defaults
    const formatter = new OutputFormatter({ format: "text", quiet: false, verbose: false });
    formatter.error(error instanceof Error ? error.message : "An unexpected error occurred");
    return 1;
  }
}
