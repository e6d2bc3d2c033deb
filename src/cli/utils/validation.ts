/**
 * Runtime validation schemas for CLI command options
 *
 * Uses Zod for type-safe runtime validation of Commander.js options.
 */

import { z } from "zod";

/**
 * Optional positive integer given as a string option
 */
const optionalPositiveInt = (name: string): z.ZodType<number | undefined, z.ZodTypeDef, unknown> =>
  z
    .string()
    .optional()
    .transform((val) => (val === undefined ? undefined : Number(val)))
    .pipe(
      z
        .number({ invalid_type_error: `${name} must be a positive integer` })
        .int({ message: `${name} must be a positive integer` })
        .positive({ message: `${name} must be a positive integer` })
        .optional()
    );

/**
 * Query parameters given as a JSON object string
 */
const jsonParams = z
  .string()
  .optional()
  .transform((val, ctx): unknown => {
    if (val === undefined) {
      return {};
    }
    try {
      return JSON.parse(val);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "params must be valid JSON" });
      return z.NEVER;
    }
  })
  .pipe(z.record(z.unknown(), { invalid_type_error: "params must be a JSON object" }));

/**
 * Schema for export command options
 */
export const ExportCommandOptionsSchema = z.object({
  output: z.string().min(1).optional(),
  warnFormat: z.boolean().optional(),
});

/**
 * Schema for load command options
 *
 * Exactly one of `query` and `queryFile` must be given.
 */
export const LoadCommandOptionsSchema = z
  .object({
    query: z.string().min(1).optional(),
    queryFile: z.string().min(1).optional(),
    name: z.string().min(1).optional(),
    chunkSize: optionalPositiveInt("chunk-size"),
  })
  .refine((opts) => (opts.query === undefined) !== (opts.queryFile === undefined), {
    message: "Provide exactly one of --query or --query-file",
  });

/**
 * Schema for load-graph command options
 */
export const LoadGraphCommandOptionsSchema = z.object({
  chunkSize: optionalPositiveInt("chunk-size"),
  skipSchema: z.boolean().optional(),
});

/**
 * Schema for read command options
 */
export const ReadCommandOptionsSchema = z.object({
  params: jsonParams,
  json: z.boolean().optional(),
});

/**
 * Schema for write command options
 */
export const WriteCommandOptionsSchema = z.object({
  params: jsonParams,
});

/**
 * Schema for preflight command options
 */
export const PreflightCommandOptionsSchema = z.object({
  json: z.boolean().optional(),
});

export type ExportCommandOptions = z.infer<typeof ExportCommandOptionsSchema>;
export type LoadCommandOptions = z.infer<typeof LoadCommandOptionsSchema>;
export type LoadGraphCommandOptions = z.infer<typeof LoadGraphCommandOptionsSchema>;
export type ReadCommandOptions = z.infer<typeof ReadCommandOptionsSchema>;
export type WriteCommandOptions = z.infer<typeof WriteCommandOptionsSchema>;
export type PreflightCommandOptions = z.infer<typeof PreflightCommandOptionsSchema>;
