/**
 * Source file discovery.
 */

import { lstat, stat } from "node:fs/promises";
import { glob } from "tinyglobby";

import { BreadlogError, BreadlogErrorCode, describeError } from "@breadlog/core";

/**
 * Find files under `sourceDir` with one of `extensions`, as sorted absolute paths.
 * Hidden directories are searched; symbolic links are neither followed nor returned.
 *
 * @throws BreadlogError with SOURCE_DIR_UNREADABLE or SOURCE_DIR_NOT_DIRECTORY
 */
export async function findSourceFiles(sourceDir: string, extensions: readonly string[]): Promise<string[]> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(sourceDir)).isDirectory();
  } catch (error) {
    throw new BreadlogError(
      `Failed to read source directory ${sourceDir}: ${describeError(error)}`,
      BreadlogErrorCode.SOURCE_DIR_UNREADABLE,
      sourceDir,
      { cause: error },
    );
  }
  if (!isDirectory) {
    throw new BreadlogError(
      `Source path ${sourceDir} is not a directory`,
      BreadlogErrorCode.SOURCE_DIR_NOT_DIRECTORY,
      sourceDir,
    );
  }

  const matches = await glob(
    extensions.map((ext) => `**/*.${ext}`),
    { cwd: sourceDir, absolute: true, onlyFiles: true, dot: true, followSymbolicLinks: false },
  );

  // Rewriting a link would replace it with a regular file.
  const files: string[] = [];
  for (const file of matches) {
    if (!(await lstat(file)).isSymbolicLink()) files.push(file);
  }
  return files.sort();
}
