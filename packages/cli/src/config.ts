/**
 * Breadlog configuration file: YAML, validated with zod.
 */

import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { parse } from "yaml";
import { z } from "zod";

import { BreadlogError, BreadlogErrorCode, DEFAULT_CONCURRENCY, describeError, type MacroSpecifier } from "@breadlog/core";

/* =============================================================================
 * SCHEMA
 * ============================================================================= */

const MacroSchema = z.object({
  module: z.string().min(1),
  name: z.string().min(1),
});

const RustSchema = z.object({
  log_macros: z.array(MacroSchema).min(1, "at least one log macro is required"),
  extensions: z.array(z.string().min(1)).min(1).default(["rs"]),
  structured_logging: z.boolean().default(false),
});

export const ConfigFileSchema = z.object({
  source_dir: z.string().min(1),
  cache: z.boolean().default(true),
  concurrency: z.number().int().positive().default(DEFAULT_CONCURRENCY),
  rust: RustSchema,
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/* =============================================================================
 * RESOLVED CONFIG
 * ============================================================================= */

export interface BreadlogConfig {
  /** Absolute path of the configuration file. */
  configPath: string;
  /** Directory holding the configuration file and the lock file. */
  configDir: string;
  sourceDir: string;
  cache: boolean;
  concurrency: number;
  macros: MacroSpecifier[];
  /** File extensions without the leading dot. */
  extensions: string[];
  structured: boolean;
}

/**
 * Read and validate the configuration at `path`.
 *
 * @throws BreadlogError with CONFIG_READ or CONFIG_INVALID
 */
export async function loadConfig(path: string): Promise<BreadlogConfig> {
  const configPath = resolve(path);

  let text: string;
  try {
    text = await readFile(configPath, "utf8");
  } catch (error) {
    throw new BreadlogError(
      `Failed to read configuration ${configPath}: ${describeError(error)}`,
      BreadlogErrorCode.CONFIG_READ,
      configPath,
      { cause: error },
    );
  }

  return parseConfig(text, configPath);
}

/**
 * Validate configuration text. Relative paths resolve against the directory
 * of `configPath`.
 */
export function parseConfig(text: string, configPath: string): BreadlogConfig {
  let document: unknown;
  try {
    document = parse(text);
  } catch (error) {
    throw new BreadlogError(
      `Invalid YAML in ${configPath}: ${describeError(error)}`,
      BreadlogErrorCode.CONFIG_INVALID,
      configPath,
      { cause: error },
    );
  }

  const result = ConfigFileSchema.safeParse(document);
  if (!result.success) {
    throw new BreadlogError(
      `Invalid configuration ${configPath}: ${formatIssues(result.error)}`,
      BreadlogErrorCode.CONFIG_INVALID,
      configPath,
    );
  }

  const file = result.data;
  const configDir = dirname(configPath);
  return {
    configPath,
    configDir,
    sourceDir: resolve(configDir, file.source_dir),
    cache: file.cache,
    concurrency: file.concurrency,
    macros: file.rust.log_macros,
    extensions: file.rust.extensions.map((ext) => ext.replace(/^\./, "")),
    structured: file.rust.structured_logging,
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
