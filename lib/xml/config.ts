/**
 * Chunking configuration
 *
 * Resolution order (later wins):
 * 1. DEFAULT_CHUNK_OPTIONS
 * 2. Environment: XML_CHUNK_TARGET_DEPTH, XML_CHUNK_MIN_CHARS,
 *    XML_CHUNK_MAX_CHARS, XML_CHUNK_PARENT_CONTEXT
 * 3. Options passed by the caller
 */
import { z } from "zod";
import { InvalidOptionsError } from "./errors";
import type { ChunkOptions } from "./types";

// Sized for embedding models: ~1536 tokens at ~4 characters per token
export const CHARS_PER_TOKEN = 4;
export const TARGET_CHUNK_TOKENS = 1536;

export const DEFAULT_CHUNK_OPTIONS: Readonly<ChunkOptions> = {
  targetDepth: 2,
  minChunkChars: 200,
  maxChunkChars: TARGET_CHUNK_TOKENS * CHARS_PER_TOKEN, // 6144
  includeParentContext: true,
};

/** Scores are compared after rounding to this many decimal places */
export const SCORE_PRECISION = 6;

const ChunkOptionsSchema = z
  .object({
    targetDepth: z.number().int().min(0),
    minChunkChars: z.number().int().min(0),
    maxChunkChars: z.number().int().min(1),
    includeParentContext: z.boolean(),
  })
  .refine((o) => o.minChunkChars <= o.maxChunkChars, {
    message: "minChunkChars must not exceed maxChunkChars",
    path: ["minChunkChars"],
  });

// Empty strings count as unset so `XML_CHUNK_MAX_CHARS=` in an env file is harmless
const envInteger = z.preprocess(
  (value) => (value === "" ? undefined : value),
  z
    .string()
    .regex(/^\d+$/, "must be a non-negative integer")
    .transform((value) => Number.parseInt(value, 10))
    .optional()
);

const envBoolean = z.preprocess(
  (value) => (value === "" ? undefined : value),
  z
    .enum(["true", "false", "1", "0"], {
      errorMap: () => ({ message: "must be true, false, 1 or 0" }),
    })
    .transform((value) => value === "true" || value === "1")
    .optional()
);

const ChunkEnvSchema = z.object({
  XML_CHUNK_TARGET_DEPTH: envInteger,
  XML_CHUNK_MIN_CHARS: envInteger,
  XML_CHUNK_MAX_CHARS: envInteger,
  XML_CHUNK_PARENT_CONTEXT: envBoolean,
});

export type Environment = Record<string, string | undefined>;

function withoutUndefined(
  options: Partial<ChunkOptions> | undefined
): Partial<ChunkOptions> {
  const result: Partial<ChunkOptions> = {};
  if (!options) {
    return result;
  }
  if (options.targetDepth !== undefined) {
    result.targetDepth = options.targetDepth;
  }
  if (options.minChunkChars !== undefined) {
    result.minChunkChars = options.minChunkChars;
  }
  if (options.maxChunkChars !== undefined) {
    result.maxChunkChars = options.maxChunkChars;
  }
  if (options.includeParentContext !== undefined) {
    result.includeParentContext = options.includeParentContext;
  }
  return result;
}

/**
 * Read chunk option overrides from the environment.
 */
export function chunkOptionsFromEnv(
  env: Environment = process.env
): Partial<ChunkOptions> {
  const parsed = ChunkEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidOptionsError(parsed.error.issues);
  }
  return withoutUndefined({
    targetDepth: parsed.data.XML_CHUNK_TARGET_DEPTH,
    minChunkChars: parsed.data.XML_CHUNK_MIN_CHARS,
    maxChunkChars: parsed.data.XML_CHUNK_MAX_CHARS,
    includeParentContext: parsed.data.XML_CHUNK_PARENT_CONTEXT,
  });
}

/**
 * Merge defaults, environment and explicit overrides into validated options.
 */
export function resolveChunkOptions(
  overrides?: Partial<ChunkOptions>,
  env: Environment = process.env
): ChunkOptions {
  const merged = {
    ...DEFAULT_CHUNK_OPTIONS,
    ...chunkOptionsFromEnv(env),
    ...withoutUndefined(overrides),
  };
  const parsed = ChunkOptionsSchema.safeParse(merged);
  if (!parsed.success) {
    throw new InvalidOptionsError(parsed.error.issues);
  }
  return parsed.data;
}
