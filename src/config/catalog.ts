import { readBool, readEnum, readInt, readList, readOptionalString, type EnvSource } from "./env.js";

/** Default validity window of the cached dependency graph (30 seconds). */
export const DEFAULT_GRAPH_CACHE_TTL_MS = 30_000;
/** Default number of entries returned by popularity rankings. */
export const DEFAULT_TOP_LIMIT = 10;

export const OUTPUT_FORMATS = ["text", "json"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/** Runtime settings shared by the workspace and the CLI. */
export interface CatalogConfig {
  readonly graphCacheTtlMs: number;
  readonly topLimit: number;
  /** Field names hidden from queries on top of the built-in denylist. */
  readonly reservedFields: readonly string[];
  readonly logFile: string | null;
  readonly logRedaction: boolean;
  readonly outputFormat: OutputFormat;
}

/**
 * Resolves the configuration from environment variables:
 *
 * - `CATALOG_GRAPH_CACHE_TTL_MS`: graph cache validity window, `>= 0`.
 * - `CATALOG_TOP_LIMIT`: default size of the top-N rankings, `>= 1`.
 * - `CATALOG_RESERVED_FIELDS`: comma-separated extra reserved field names.
 * - `CATALOG_LOG_FILE`: optional file mirroring the JSON log lines.
 * - `CATALOG_LOG_REDACT`: toggles payload redaction.
 * - `CATALOG_OUTPUT_FORMAT`: default CLI format (`text` or `json`).
 */
export function loadCatalogConfig(env: EnvSource = process.env): CatalogConfig {
  return {
    graphCacheTtlMs: readInt("CATALOG_GRAPH_CACHE_TTL_MS", DEFAULT_GRAPH_CACHE_TTL_MS, { min: 0 }, env),
    topLimit: readInt("CATALOG_TOP_LIMIT", DEFAULT_TOP_LIMIT, { min: 1 }, env),
    reservedFields: readList("CATALOG_RESERVED_FIELDS", env),
    logFile: readOptionalString("CATALOG_LOG_FILE", env) ?? null,
    logRedaction: readBool("CATALOG_LOG_REDACT", false, env),
    outputFormat: readEnum("CATALOG_OUTPUT_FORMAT", OUTPUT_FORMATS, "text", env),
  };
}
