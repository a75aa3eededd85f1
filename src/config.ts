import { z } from "zod";

export const DEFAULT_STACK_LIMIT = 1000;
export const DEFAULT_MAX_DESCENT_DEPTH = 8;

export class ConfigurationError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid chunker options: ${issues.join("; ")}`);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

const envSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export const env = envSchema.parse({ LOG_LEVEL: process.env["LOG_LEVEL"] || undefined });

export const chunkerOptionsSchema = z
  .object({
    targetChunkSize: z.number().int().positive(),
    // A chunk at a clean boundary closes once it is this close to the target.
    tolerance: z.number().int().nonnegative().default(0),
    // Main plus alt stack items allowed at a chunk boundary.
    stackLimit: z.number().int().positive().default(DEFAULT_STACK_LIMIT),
    maxDescentDepth: z.number().int().nonnegative().default(DEFAULT_MAX_DESCENT_DEPTH),
    stackInputSize: z.number().int().nonnegative().default(0),
    altstackInputSize: z.number().int().nonnegative().default(0),
  })
  .refine((o) => o.tolerance < o.targetChunkSize, {
    message: "tolerance must be smaller than targetChunkSize",
    path: ["tolerance"],
  });

export type ChunkerOptionsInput = z.input<typeof chunkerOptionsSchema>;

export type ChunkerOptions = z.output<typeof chunkerOptionsSchema>;

export function parseChunkerOptions(input: ChunkerOptionsInput): ChunkerOptions {
  const result = chunkerOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((i) => `${i.path.join(".") || "options"}: ${i.message}`)
    );
  }
  return result.data;
}
