/**
 * Read and Write Commands - Run a single Cypher statement
 */

/* eslint-disable no-console */

import type { EffectCounters } from "../../loader/types.js";
import type { Neo4jGraphClient } from "../../graph/Neo4jClient.js";
import { createCountersTable, createRowsTable } from "../output/formatters.js";
import type { ReadCommandOptions, WriteCommandOptions } from "../utils/validation.js";

/**
 * Execute read command
 */
export async function readCommand(
  cypher: string,
  options: ReadCommandOptions,
  client: Pick<Neo4jGraphClient, "readQuery">
): Promise<Array<Record<string, unknown>>> {
  const rows = await client.readQuery(cypher, options.params);

  if (options.json) {
    console.log(JSON.stringify(rows, null, 2));
  } else {
    console.log(createRowsTable(rows));
  }
  return rows;
}

/**
 * Execute write command
 */
export async function writeCommand(
  cypher: string,
  options: WriteCommandOptions,
  client: Pick<Neo4jGraphClient, "writeQuery">
): Promise<EffectCounters> {
  const counters = await client.writeQuery(cypher, options.params);
  console.log(createCountersTable(counters));
  return counters;
}
