/**
 * Info Command
 * Show the environment snapshot and the families it belongs to
 */

import chalk from "chalk";
import { OsDetector } from "@os-family/core";
import { resolveEnvironment, type GlobalOptions } from "../utils/environment.js";

export type InfoOptions = GlobalOptions & {
  json?: boolean;
};

/**
 * Info command handler
 */
export async function infoCommand(options: InfoOptions): Promise<void> {
  const snapshot = await resolveEnvironment(options);
  const report = OsDetector.describe(snapshot);

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  console.log(chalk.bold.cyan("\n🖥️  Operating System\n"));
  console.log(chalk.gray("─".repeat(50)));
  console.log(`Name:            ${chalk.cyan(snapshot.name)}`);
  console.log(`Architecture:    ${chalk.cyan(snapshot.arch)}`);
  console.log(`Version:         ${chalk.cyan(snapshot.version)}`);
  console.log(`Path separator:  ${chalk.cyan(snapshot.pathSeparator)}`);
  console.log(chalk.gray("─".repeat(50)));

  if (report.family === null) {
    console.log(`Family:          ${chalk.red("unsupported platform")}`);
  } else {
    console.log(`Family:          ${chalk.green(report.family)}`);
  }
  console.log(`Matching:        ${report.families.map((family) => chalk.green(family)).join(", ")}`);
  console.log();
}
