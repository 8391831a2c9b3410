/**
 * Families Command
 * List every registered family and mark the ones the host belongs to
 */

import chalk from "chalk";
import { FAMILY_PRIORITY, matchingFamilies } from "@os-family/core";
import { resolveEnvironment, type GlobalOptions } from "../utils/environment.js";

/**
 * Families command handler
 */
export async function familiesCommand(options: GlobalOptions): Promise<void> {
  const snapshot = await resolveEnvironment(options);
  const matching = new Set<string>(matchingFamilies(snapshot));

  for (const family of FAMILY_PRIORITY) {
    if (matching.has(family)) {
      console.log(`${chalk.green("✔")} ${chalk.bold(family)}`);
    } else {
      console.log(`  ${chalk.gray(family)}`);
    }
  }
}
