/**
 * Centralized Error Handler for CLI Commands
 *
 * Maps pipeline errors to user-friendly messages with actionable next steps.
 */

/* eslint-disable no-console */

import chalk from "chalk";
import type { Ora } from "ora";
import { ZodError } from "zod";
import {
  BulkFormatError,
  ConfigurationError,
  FormatViolationError,
  LoadFailedError,
  MissingRequiredFieldError,
  PermanentStoreFault,
  StoreConnectionError,
  TransientStoreFault,
} from "../../graph/errors.js";

const CLI = "session-graph";

function isVerbose(): boolean {
  return process.env["LOG_LEVEL"] === "debug" || process.env["LOG_LEVEL"] === "trace";
}

/**
 * Handle command errors and exit with appropriate status code
 *
 * This function stops any active spinner, displays a formatted error message,
 * and exits the process with code 1.
 *
 * @param error - The error to handle
 * @param spinner - Optional spinner to stop before showing error
 */
export function handleCommandError(error: unknown, spinner?: Ora): never {
  if (spinner && spinner.isSpinning) {
    spinner.stop();
  }

  console.error(); // Blank line for spacing

  if (error instanceof ZodError) {
    console.error(chalk.red("✗ Invalid Options"));
    for (const issue of error.issues) {
      const field = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      console.error(`  • ${field}${issue.message}`);
    }
    console.error("\n" + chalk.bold("Next steps:"));
    console.error("  • Show command usage: " + chalk.gray(`${CLI} <command> --help`));
    process.exit(1);
  }

  if (error instanceof ConfigurationError) {
    console.error(chalk.red("✗ Configuration Error"));
    console.error(`\n${error.message}`);
    console.error("\n" + chalk.bold("Next steps:"));
    console.error("  • Check the variables in your .env file (see .env.example)");
    const required = chalk.cyan("NEO4J_URI") + " and " + chalk.cyan("NEO4J_PASSWORD");
    console.error("  • Store commands need " + required);
    process.exit(1);
  }

  if (error instanceof MissingRequiredFieldError) {
    console.error(chalk.red("✗ Invalid Event"));
    console.error(`\n${error.message}`);
    console.error("\nEvery event needs an " + chalk.cyan(error.field) + "; nothing was written.");
    console.error("\n" + chalk.bold("Next steps:"));
    console.error(`  • Fix or drop the event at index ${error.eventIndex} and run again`);
    process.exit(1);
  }

  if (error instanceof FormatViolationError) {
    console.error(chalk.red("✗ Unexportable Session Identifiers"));
    console.error(`\n${error.message}`);
    console.error("\nThe bulk format has no escaping for ';', tabs or line breaks.");
    console.error("\n" + chalk.bold("Next steps:"));
    console.error("  • Clean the session identifiers in the input");
    console.error(
      "  • Or export anyway and accept lossy evidence lists: " +
        chalk.gray(`${CLI} export <events> --warn-format`)
    );
    process.exit(1);
  }

  if (error instanceof BulkFormatError) {
    console.error(chalk.red("✗ Malformed File"));
    console.error(`\n${error.message}`);
    console.error("\n" + chalk.bold("Next steps:"));
    console.error("  • Check that the file exists and holds a JSON array");
    process.exit(1);
  }

  if (error instanceof LoadFailedError) {
    console.error(chalk.red("✗ Load Failed"));
    console.error(`\n${error.message}`);
    console.error("\n" + chalk.bold("Details:"));
    console.error(`  • Operation: ${error.operation}`);
    console.error(`  • Failed chunk: ${error.chunkIndex}`);
    console.error(`  • Attempts: ${error.attempts}`);
    console.error(`  • Last cause: ${error.cause?.message ?? "unknown"}`);
    console.error(
      "\n" + chalk.yellow(`Chunks before ${error.chunkIndex} were committed and stay in the store.`)
    );
    console.error("\n" + chalk.bold("Next steps:"));
    console.error("  • Check the store: " + chalk.gray(`${CLI} preflight`));
    console.error("  • Re-run the load; merge-based writes do not double-count");
    process.exit(1);
  }

  if (error instanceof StoreConnectionError) {
    console.error(chalk.red("✗ Neo4j Connection Failed"));
    console.error(`\n${error.message}`);
    console.error("\n" + chalk.bold("Next steps:"));
    console.error("  • Verify Neo4j is running and reachable at NEO4J_URI");
    console.error("  • Verify NEO4J_USER and NEO4J_PASSWORD");
    console.error("  • Run a preflight check: " + chalk.gray(`${CLI} preflight`));
    process.exit(1);
  }

  if (error instanceof TransientStoreFault || error instanceof PermanentStoreFault) {
    console.error(chalk.red("✗ Query Failed"));
    console.error(`\n${error.message}`);
    if (error.storeCode) {
      console.error(chalk.gray(`  (${error.storeCode})`));
    }
    if (error.retryable) {
      console.error("\n" + chalk.yellow("This error may be transient. You can try again."));
    }
    process.exit(1);
  }

  if (error instanceof Error) {
    console.error(chalk.red("✗ Error"));
    console.error(`\n${error.message}`);

    if (isVerbose()) {
      console.error("\n" + chalk.gray(error.stack || "No stack trace available"));
    }

    console.error("\n" + chalk.bold("Next steps:"));
    console.error(
      "  • Enable verbose logging: " + chalk.gray(`LOG_LEVEL=debug ${CLI} <command>`)
    );
    console.error("  • Check configuration in .env file");
    process.exit(1);
  }

  console.error(chalk.red("✗ Unknown Error"));
  console.error(`\n${String(error)}`);
  console.error("\n" + chalk.bold("Next steps:"));
  console.error("  • Enable verbose logging: " + chalk.gray(`LOG_LEVEL=debug ${CLI} <command>`));
  process.exit(1);
}
