/**
 * Load Command - Run a parameterized write over a batch file in chunks
 */

/* eslint-disable no-console */

import { readFile } from "node:fs/promises";
import path from "node:path";
import chalk from "chalk";
import { readBatchFile } from "../../events/event-reader.js";
import type { BatchWriteTarget, EffectCounters } from "../../loader/types.js";
import { BatchLoader } from "../../loader/batch-loader.js";
import { createSpinner, updateLoadSpinner } from "../output/progress.js";
import { createCountersTable, formatDuration } from "../output/formatters.js";
import type { CliContext } from "../utils/dependency-init.js";
import type { LoadCommandOptions } from "../utils/validation.js";

/**
 * Query text from `--query` or `--query-file`
 */
export async function resolveQuery(options: LoadCommandOptions): Promise<string> {
  if (options.query !== undefined) {
    return options.query;
  }
  if (options.queryFile !== undefined) {
    return (await readFile(options.queryFile, "utf8")).trim();
  }
  throw new Error("Provide exactly one of --query or --query-file");
}

/**
 * Execute load command
 *
 * @param batchPath - JSON array of records bound to `$batch` chunk by chunk
 * @param target - Connected store
 */
export async function loadCommand(
  batchPath: string,
  options: LoadCommandOptions,
  context: CliContext,
  target: BatchWriteTarget
): Promise<EffectCounters> {
  const query = await resolveQuery(options);
  const name = options.name ?? path.basename(batchPath, path.extname(batchPath));
  const spinner = createSpinner(`Reading ${chalk.cyan(batchPath)}...`);
  const startTime = Date.now();

  try {
    const records = await readBatchFile(batchPath);
    const loader = new BatchLoader(target, {
      ...context.config.loader,
      ...(options.chunkSize !== undefined && { chunkSize: options.chunkSize }),
      onChunkCommitted: (progress) => updateLoadSpinner(spinner, progress),
    });

    spinner.text = `Loading ${records.length.toLocaleString()} records...`;
    const counters = await loader.load({ name, query }, records);
    const elapsed = formatDuration(Date.now() - startTime);
    spinner.succeed(`Loaded ${records.length.toLocaleString()} records in ${elapsed}`);

    console.log(createCountersTable(counters));
    return counters;
  } catch (error) {
    spinner.fail(`Load '${name}' failed`);
    throw error;
  }
}
