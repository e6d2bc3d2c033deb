/**
 * Progress Indicators for CLI
 *
 * Spinners for reading, exporting and loading.
 */

import ora, { type Ora } from "ora";
import chalk from "chalk";
import type { ChunkProgress } from "../../loader/types.js";

/**
 * Create and start a spinner
 */
export function createSpinner(text: string): Ora {
  return ora({ text, color: "cyan" }).start();
}

/**
 * Spinner text for a committed chunk
 *
 * @example
 * formatChunkProgress({ operation: "next", chunkIndex: 1, chunkCount: 4,
 *   recordsDone: 20000, recordsTotal: 35000, ... })
 * // "Loading next: chunk 2/4 (20,000/35,000 rows, 57%)"
 */
export function formatChunkProgress(progress: ChunkProgress): string {
  const percent =
    progress.recordsTotal === 0
      ? 100
      : Math.round((progress.recordsDone / progress.recordsTotal) * 100);
  const chunk = `${progress.chunkIndex + 1}/${progress.chunkCount}`;
  const rows = `${progress.recordsDone.toLocaleString()}/${progress.recordsTotal.toLocaleString()}`;
  return `Loading ${chalk.cyan(progress.operation)}: chunk ${chunk} (${rows} rows, ${percent}%)`;
}

/**
 * Update a spinner from the loader's chunk callback
 */
export function updateLoadSpinner(spinner: Ora, progress: ChunkProgress): void {
  spinner.text = formatChunkProgress(progress);
}
