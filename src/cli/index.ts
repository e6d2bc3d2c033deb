#!/usr/bin/env node
/**
 * session-graph - CLI Entry Point
 *
 * Command-line interface for the session graph pipeline:
 * - export: Aggregate events and write bulk import files
 * - load: Run a parameterized write over a batch file in chunks
 * - load-graph: Aggregate events and write the graph to Neo4j directly
 * - read / write: Run a single Cypher statement
 * - preflight: Check that Neo4j answers
 */

import "dotenv/config";
import { Command } from "commander";
import { initializeCli, withGraphClient } from "./utils/dependency-init.js";
import { handleCommandError } from "./utils/error-handler.js";
import { exportCommand } from "./commands/export-command.js";
import { loadCommand } from "./commands/load-command.js";
import { loadGraphCommand } from "./commands/load-graph-command.js";
import { readCommand, writeCommand } from "./commands/query-commands.js";
import { preflightCommand } from "./commands/preflight-command.js";
import {
  ExportCommandOptionsSchema,
  LoadCommandOptionsSchema,
  LoadGraphCommandOptionsSchema,
  ReadCommandOptionsSchema,
  WriteCommandOptionsSchema,
  PreflightCommandOptionsSchema,
} from "./utils/validation.js";

const program = new Command();

program
  .name("session-graph")
  .description("Build a weighted item-transition graph from session events and load it into Neo4j")
  .version("1.0.0");

// Export command
program
  .command("export")
  .description("Aggregate events and write bulk import files")
  .argument("<events>", "JSON file with an array of {session_id, item_id, next_item_id} events")
  .option("-o, --output <dir>", "Output directory (default: EXPORT_DIR or ./import)")
  .option("--warn-format", "Export session identifiers containing separators instead of failing")
  .action(async (events: string, options: Record<string, unknown>) => {
    try {
      const validatedOptions = ExportCommandOptionsSchema.parse(options);
      const context = initializeCli();
      await exportCommand(events, validatedOptions, context);
    } catch (error) {
      handleCommandError(error);
    }
  });

// Load command
program
  .command("load")
  .description("Run a parameterized write over a batch file in chunks")
  .argument("<batch>", "JSON file with an array of records, bound to $batch per chunk")
  .option("-q, --query <cypher>", "Write query, e.g. 'UNWIND $batch AS row MERGE ...'")
  .option("-f, --query-file <path>", "File holding the write query")
  .option("-n, --name <name>", "Operation name for logs (default: batch file name)")
  .option("-c, --chunk-size <number>", "Records per chunk (default: BATCH_CHUNK_SIZE or 10000)")
  .action(async (batch: string, options: Record<string, unknown>) => {
    try {
      const validatedOptions = LoadCommandOptionsSchema.parse(options);
      const context = initializeCli();
      await withGraphClient(context, (client) =>
        loadCommand(batch, validatedOptions, context, client)
      );
    } catch (error) {
      handleCommandError(error);
    }
  });

// Load-graph command
program
  .command("load-graph")
  .description("Aggregate events and write items, sessions, NEXT and CONTAINS to Neo4j")
  .argument("<events>", "JSON file with an array of events")
  .option("-c, --chunk-size <number>", "Records per chunk (default: BATCH_CHUNK_SIZE or 10000)")
  .option("--skip-schema", "Do not create constraints and indexes first")
  .action(async (events: string, options: Record<string, unknown>) => {
    try {
      const validatedOptions = LoadGraphCommandOptionsSchema.parse(options);
      const context = initializeCli();
      await withGraphClient(context, (client) =>
        loadGraphCommand(events, validatedOptions, context, client)
      );
    } catch (error) {
      handleCommandError(error);
    }
  });

// Read command
program
  .command("read")
  .description("Run a read query and print the rows")
  .argument("<cypher>", "Cypher query")
  .option("-p, --params <json>", "Query parameters as a JSON object")
  .option("--json", "Output as JSON")
  .action(async (cypher: string, options: Record<string, unknown>) => {
    try {
      const validatedOptions = ReadCommandOptionsSchema.parse(options);
      const context = initializeCli();
      await withGraphClient(context, (client) => readCommand(cypher, validatedOptions, client));
    } catch (error) {
      handleCommandError(error);
    }
  });

// Write command
program
  .command("write")
  .description("Run a write query and print its counters")
  .argument("<cypher>", "Cypher query")
  .option("-p, --params <json>", "Query parameters as a JSON object")
  .action(async (cypher: string, options: Record<string, unknown>) => {
    try {
      const validatedOptions = WriteCommandOptionsSchema.parse(options);
      const context = initializeCli();
      await withGraphClient(context, (client) => writeCommand(cypher, validatedOptions, client));
    } catch (error) {
      handleCommandError(error);
    }
  });

// Preflight command
program
  .command("preflight")
  .description("Check that Neo4j is reachable and answers queries")
  .option("--json", "Output as JSON")
  .action(async (options: Record<string, unknown>) => {
    try {
      const validatedOptions = PreflightCommandOptionsSchema.parse(options);
      const context = initializeCli();
      const result = await withGraphClient(context, (client) =>
        preflightCommand(validatedOptions, client)
      );
      if (!result.ok) {
        process.exitCode = 1;
      }
    } catch (error) {
      handleCommandError(error);
    }
  });

await program.parseAsync();
