/**
 * Command definitions for the os-family CLI
 */

import { Command } from "commander";
import { logger } from "@os-family/core";
import { familiesCommand } from "./commands/families.js";
import { infoCommand, type InfoOptions } from "./commands/info.js";
import { isCommand, matchCommand, type MatchOptions } from "./commands/match.js";
import type { GlobalOptions } from "./utils/environment.js";

/**
 * Build the commander program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("os-family")
    .description("Query the operating-system family of this machine from scripts and build steps")
    .version("1.0.0")
    .option("-c, --config <path>", "Configuration file with environment overrides (or set OS_FAMILY_CONFIG)")
    .option("--verbose", "Log debug output to stderr");

  /**
   * Info command - Show the snapshot and its families
   */
  program
    .command("info")
    .description("Show the detected OS name, architecture, version and families")
    .option("--json", "Print the report as JSON")
    .action(async (_options: InfoOptions, command: Command) => {
      await infoCommand(command.optsWithGlobals<InfoOptions>());
    });

  /**
   * Families command - List the registered families
   */
  program
    .command("families")
    .description("List every OS family and mark the ones this machine belongs to")
    .action(async (_options: GlobalOptions, command: Command) => {
      await familiesCommand(command.optsWithGlobals<GlobalOptions>());
    });

  /**
   * Match command - Evaluate criteria, exit 0 on match and 1 otherwise
   */
  program
    .command("match")
    .description("Check the machine against every given criterion (exit code 0 = match, 1 = no match, 2 = error)")
    .option("-f, --family <family>", "OS family, e.g. windows, unix, mac, z/os")
    .option("-n, --name <name>", "Exact OS name, e.g. linux")
    .option("-a, --arch <arch>", "Exact architecture, e.g. amd64")
    .option("--os-version <version>", "Exact OS version")
    .option("-q, --quiet", "Print nothing, only set the exit code")
    .action(async (_options: MatchOptions, command: Command) => {
      process.exitCode = await matchCommand(command.optsWithGlobals<MatchOptions>());
    })
    .addHelpText(
      "after",
      `
Examples:
  $ os-family match --family windows
  $ os-family match --family unix --arch aarch64
  $ os-family match --name linux --quiet && echo "on linux"
  `
    );

  /**
   * Is command - Shorthand for match --family
   */
  program
    .command("is <family>")
    .description("Check whether the machine belongs to an OS family")
    .option("-q, --quiet", "Print nothing, only set the exit code")
    .action(async (family: string, _options: MatchOptions, command: Command) => {
      process.exitCode = await isCommand(family, command.optsWithGlobals<MatchOptions>());
    });

  return program;
}

/**
 * Parse and execute a command line. Unexpected failures are logged and exit with code 2.
 */
export async function run(argv: string[], program: Command = createProgram()): Promise<void> {
  try {
    await program.parseAsync(argv);
  } catch (error) {
    logger.error("CLI error", error);
    process.exitCode = 2;
  }
}
