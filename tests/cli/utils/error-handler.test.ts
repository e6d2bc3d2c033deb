/**
 * Tests for CLI Error Handler
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import type { Ora } from "ora";
import { z } from "zod";
import { handleCommandError } from "../../../src/cli/utils/error-handler.js";
import {
  BulkFormatError,
  ConfigurationError,
  FormatViolationError,
  LoadFailedError,
  MissingRequiredFieldError,
  PermanentStoreFault,
  StoreConnectionError,
  TransientStoreFault,
} from "../../../src/graph/errors.js";

describe("Error Handler", () => {
  let consoleErrorSpy: MockInstance<typeof console.error>;
  let processExitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit called");
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const printed = (): string[] => consoleErrorSpy.mock.calls.map((call) => String(call[0] ?? ""));

  it("should list option validation issues", () => {
    const result = z.object({ chunkSize: z.number() }).safeParse({ chunkSize: "x" });
    expect(result.success).toBe(false);

    expect(() => handleCommandError(result.error)).toThrow("process.exit called");
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining("Invalid Options"));
    expect(printed()).toContain("  • chunkSize: Expected number, received string");
    expect(processExitSpy).toHaveBeenCalledWith(1);
  });

  it("should handle ConfigurationError", () => {
    const error = new ConfigurationError("Invalid configuration: neo4j.uri: NEO4J_URI is required");

    expect(() => handleCommandError(error)).toThrow("process.exit called");
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining("Configuration Error"));
    expect(printed()).toContain("\nInvalid configuration: neo4j.uri: NEO4J_URI is required");
    expect(processExitSpy).toHaveBeenCalledWith(1);
  });

  it("should point at the offending event for MissingRequiredFieldError", () => {
    expect(() => handleCommandError(new MissingRequiredFieldError("item_id", 7))).toThrow(
      "process.exit called"
    );
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining("Invalid Event"));
    expect(printed()).toContain("  • Fix or drop the event at index 7 and run again");
  });

  it("should suggest --warn-format for FormatViolationError", () => {
    expect(() => handleCommandError(new FormatViolationError(["a;b"]))).toThrow(
      "process.exit called"
    );
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringContaining("Unexportable Session Identifiers")
    );
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining("--warn-format"));
  });

  it("should handle BulkFormatError", () => {
    expect(() =>
      handleCommandError(new BulkFormatError("events.json", "expected a JSON array"))
    ).toThrow("process.exit called");
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining("Malformed File"));
    expect(printed()).toContain("\nevents.json: expected a JSON array");
  });

  it("should report chunk, attempts and cause for LoadFailedError", () => {
    const error = new LoadFailedError("next", 4, 3, new TransientStoreFault("session expired"));

    expect(() => handleCommandError(error)).toThrow("process.exit called");
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining("Load Failed"));
    expect(printed()).toEqual(
      expect.arrayContaining([
        "  • Operation: next",
        "  • Failed chunk: 4",
        "  • Attempts: 3",
        "  • Last cause: session expired",
      ])
    );
    expect(processExitSpy).toHaveBeenCalledWith(1);
  });

  it("should handle StoreConnectionError", () => {
    expect(() => handleCommandError(new StoreConnectionError("refused"))).toThrow(
      "process.exit called"
    );
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringContaining("Neo4j Connection Failed")
    );
  });

  it("should flag transient query failures as retryable", () => {
    const error = new TransientStoreFault("unavailable", "ServiceUnavailable");

    expect(() => handleCommandError(error)).toThrow("process.exit called");
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining("Query Failed"));
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining("transient"));
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining("ServiceUnavailable"));
  });

  it("should not flag permanent query failures as retryable", () => {
    expect(() => handleCommandError(new PermanentStoreFault("syntax error"))).toThrow(
      "process.exit called"
    );
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining("Query Failed"));
    expect(consoleErrorSpy).not.toHaveBeenCalledWith(expect.stringContaining("transient"));
  });

  it("should handle generic errors", () => {
    expect(() => handleCommandError(new Error("Something broke"))).toThrow("process.exit called");
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining("✗ Error"));
    expect(printed()).toContain("\nSomething broke");
  });

  it("should handle non-Error values", () => {
    expect(() => handleCommandError("string failure")).toThrow("process.exit called");
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining("Unknown Error"));
    expect(printed()).toContain("\nstring failure");
  });

  it("should stop an active spinner first", () => {
    const stop = vi.fn();
    // Only the parts of Ora the handler touches
    const spinner = { isSpinning: true, stop } as unknown as Ora;

    expect(() => handleCommandError(new Error("x"), spinner)).toThrow("process.exit called");
    expect(stop).toHaveBeenCalledTimes(1);
  });
});
