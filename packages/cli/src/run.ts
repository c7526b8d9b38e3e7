/**
 * The `breadlog` command line.
 */

import yargs from "yargs";

import {
  checkReferences,
  describeError,
  generateCode,
  type CommandContext,
  type Logger,
} from "@breadlog/core";
import { LockFileCache } from "./cache.js";
import { loadConfig, type BreadlogConfig } from "./config.js";
import { findSourceFiles } from "./finder.js";
import { createLogger } from "./logger.js";

export const ExitCode = {
  SUCCESS: 0,
  /** Bad arguments, configuration or source directory. */
  SETUP_FAILED: 1,
  /** Missing references found, or references could not be inserted. */
  COMMAND_FAILED: 2,
} as const;

export type ExitCodeType = (typeof ExitCode)[keyof typeof ExitCode];

export interface RunOptions {
  logger?: Logger;
  /** Aborting stops the run between files. */
  signal?: AbortSignal;
  /** Receives help text. */
  output?: (text: string) => void;
}

interface CommandArguments {
  config: string;
  check: boolean;
}

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Run the command line with `argv` (arguments only, no executable or script)
 * and return the process exit code.
 */
export async function run(argv: readonly string[], options: RunOptions = {}): Promise<ExitCodeType> {
  const logger = options.logger ?? createLogger();
  const output = options.output ?? ((text: string) => void process.stdout.write(`${text}\n`));

  const parser = yargs([...argv])
    .scriptName("breadlog")
    .usage("$0 --config <path> [--check]")
    .option("config", {
      alias: "c",
      type: "string",
      describe: "Path to the configuration file",
    })
    .option("check", {
      type: "boolean",
      default: false,
      describe: "Report missing references without changing any file",
    })
    .option("help", {
      alias: "h",
      type: "boolean",
      default: false,
      describe: "Show help",
    })
    .help(false)
    .version(false)
    .strict()
    .exitProcess(false)
    .fail((message, error) => {
      throw error ?? new Error(message);
    });

  let args: CommandArguments;
  try {
    const parsed = await parser.parseAsync();
    if (parsed.help) {
      output(await parser.getHelp());
      return ExitCode.SUCCESS;
    }
    if (!parsed.config) {
      throw new Error("Missing required argument: config");
    }
    args = { config: parsed.config, check: parsed.check };
  } catch (error) {
    logger.error(describeError(error));
    return ExitCode.SETUP_FAILED;
  }

  let config: BreadlogConfig;
  try {
    config = await loadConfig(args.config);
  } catch (error) {
    logger.error(describeError(error));
    return ExitCode.SETUP_FAILED;
  }

  let files: string[];
  try {
    files = await findSourceFiles(config.sourceDir, config.extensions);
  } catch (error) {
    logger.error(`Code discovery error: ${describeError(error)}`);
    return ExitCode.SETUP_FAILED;
  }

  const context: CommandContext = {
    files,
    extract: { macros: config.macros, structured: config.structured },
    logger,
    signal: options.signal,
    concurrency: config.concurrency,
    cache: config.cache ? new LockFileCache(config.configDir, logger) : undefined,
  };

  try {
    const result = args.check ? await checkReferences(context) : await generateCode(context);
    return result.ok ? ExitCode.SUCCESS : ExitCode.COMMAND_FAILED;
  } catch (error) {
    logger.error(describeError(error));
    return ExitCode.COMMAND_FAILED;
  }
}
