/**
 * Match Command
 * Evaluate family, name, architecture and version criteria against the host
 */

import chalk from "chalk";
import { hasCriteria, isOsFamilyError, logger, matches, type OsCriteria } from "@os-family/core";
import { resolveEnvironment, type GlobalOptions } from "../utils/environment.js";

export type MatchOptions = GlobalOptions & {
  family?: string;
  name?: string;
  arch?: string;
  osVersion?: string;
  quiet?: boolean;
};

/**
 * Exit codes: 0 when the criteria match, 1 when they don't, 2 on a usage error
 */
export const EXIT_MATCH = 0;
export const EXIT_NO_MATCH = 1;
export const EXIT_USAGE_ERROR = 2;

/**
 * Match command handler. Returns the exit code.
 */
export async function matchCommand(options: MatchOptions): Promise<number> {
  const criteria: OsCriteria = {
    family: options.family,
    name: options.name,
    arch: options.arch,
    version: options.osVersion,
  };

  if (!hasCriteria(criteria)) {
    console.error(chalk.yellow("⚠️  No criteria given, nothing can match."));
  }

  try {
    const snapshot = await resolveEnvironment(options);
    const result = matches(criteria, snapshot);
    logger.debug("Evaluated criteria", { criteria, snapshot, result });

    if (!options.quiet) {
      console.log(String(result));
    }
    return result ? EXIT_MATCH : EXIT_NO_MATCH;
  } catch (error) {
    if (!isOsFamilyError(error)) {
      throw error;
    }
    console.error(chalk.red(`❌ ${error.message}`));
    return EXIT_USAGE_ERROR;
  }
}

/**
 * Is command handler, shorthand for match --family
 */
export async function isCommand(family: string, options: Omit<MatchOptions, "family">): Promise<number> {
  return matchCommand({ ...options, family });
}
