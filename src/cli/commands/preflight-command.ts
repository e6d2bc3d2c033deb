/**
 * Preflight Command - Check that Neo4j answers before a long load
 */

/* eslint-disable no-console */

import chalk from "chalk";
import type { Neo4jGraphClient, PreflightResult } from "../../graph/Neo4jClient.js";
import { formatPreflight } from "../output/formatters.js";
import type { PreflightCommandOptions } from "../utils/validation.js";

/**
 * Execute preflight command
 *
 * @returns The check result; the caller sets a failing exit code when `ok` is false
 */
export async function preflightCommand(
  options: PreflightCommandOptions,
  client: Pick<Neo4jGraphClient, "preflight">
): Promise<PreflightResult> {
  const result = await client.preflight();

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    console.log(chalk.bold("\nPreflight Check\n"));
    console.log(formatPreflight(result));
  }
  return result;
}
