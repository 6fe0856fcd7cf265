import { z } from "zod";

import { GraphAdapterError } from "../graph/errors.js";
import { LOG_LEVELS, StructuredLogger, type LogLevel } from "../logger.js";
import { ERROR_CODES } from "../types.js";
import { readBool, readEnum, readInt, readOptionalString } from "./env.js";

/** Default upper bound on the vertex count accepted when reading a stream. */
export const DEFAULT_MAX_VERTICES = 1_000_000;

/** Default upper bound on the edge count accepted when reading a stream. */
export const DEFAULT_MAX_EDGES = 5_000_000;

const INT32_MAX = 2_147_483_647;

const runtimeConfigSchema = z
  .object({
    codec: z
      .object({
        maxVertices: z.number().int().min(0).max(INT32_MAX),
        maxEdges: z.number().int().min(0).max(INT32_MAX),
      })
      .strict(),
    logging: z
      .object({
        level: z.enum(["debug", "info", "warn", "error"]),
        file: z.string().min(1).nullable(),
        silent: z.boolean(),
      })
      .strict(),
  })
  .strict();

/** Resolved runtime settings shared by the adapters and the wire codec. */
export type AdapterRuntimeConfig = z.infer<typeof runtimeConfigSchema>;

/** Partial overrides accepted by {@link loadAdapterConfig}. */
export interface AdapterConfigOverrides {
  codec?: Partial<AdapterRuntimeConfig["codec"]>;
  logging?: Partial<AdapterRuntimeConfig["logging"]>;
}

/**
 * Resolves the runtime configuration. Explicit overrides win over the
 * environment (`VALUE_GRAPH_MAX_VERTICES`, `VALUE_GRAPH_MAX_EDGES`,
 * `VALUE_GRAPH_LOG_LEVEL`, `VALUE_GRAPH_LOG_FILE`, `VALUE_GRAPH_LOG_SILENT`),
 * which wins over the built-in defaults. Invalid overrides raise a
 * {@link GraphAdapterError} with code `E-CONFIG-INVALID`; invalid environment
 * values fall back to the defaults.
 */
export function loadAdapterConfig(overrides: AdapterConfigOverrides = {}): AdapterRuntimeConfig {
  const candidate = {
    codec: {
      maxVertices: readInt("VALUE_GRAPH_MAX_VERTICES", DEFAULT_MAX_VERTICES, { min: 0, max: INT32_MAX }),
      maxEdges: readInt("VALUE_GRAPH_MAX_EDGES", DEFAULT_MAX_EDGES, { min: 0, max: INT32_MAX }),
      ...overrides.codec,
    },
    logging: {
      level: readEnum<LogLevel>("VALUE_GRAPH_LOG_LEVEL", LOG_LEVELS, "info"),
      file: readOptionalString("VALUE_GRAPH_LOG_FILE") ?? null,
      silent: readBool("VALUE_GRAPH_LOG_SILENT", false),
      ...overrides.logging,
    },
  };

  const parsed = runtimeConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new GraphAdapterError(ERROR_CODES.CONFIG_INVALID, `invalid adapter configuration: ${issue?.message ?? "unknown issue"}`, {
      details: { path: issue?.path.join(".") },
    });
  }
  return parsed.data;
}

/** Builds the structured logger described by the logging section. */
export function createLoggerFromConfig(config: AdapterRuntimeConfig): StructuredLogger {
  return new StructuredLogger({
    level: config.logging.level,
    logFile: config.logging.file,
    silent: config.logging.silent,
  });
}
