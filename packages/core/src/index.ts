/**
 * @breadlog/core
 *
 * Finds Rust log macro call sites and keeps each one tagged with a unique
 * numeric reference.
 *
 * @example
 * ```typescript
 * import { generateCode } from "@breadlog/core";
 *
 * const result = await generateCode({
 *   files: ["src/main.rs"],
 *   extract: { macros: [{ module: "log", name: "info" }] },
 * });
 *
 * console.log(result.inserted); // References written
 * ```
 */

// Commands
export { checkReferences, generateCode, CommandFailure } from "./commands.js";
export type {
  CheckResult,
  CommandContext,
  CommandFailureCode,
  GenerateResult,
  ReferenceCache,
} from "./commands.js";

// Orchestration and processors
export { processReferences, readSourceFile, DEFAULT_CONCURRENCY } from "./process/orchestrator.js";
export type { ProcessContext } from "./process/orchestrator.js";
export type { MapInput, ReferenceProcessor } from "./process/types.js";
export { ReferenceAllocator, START_REFERENCE_ID } from "./process/allocator.js";
export { createNextReferenceIdProcessor } from "./process/next-reference-id.js";
export type { NextReferenceId, ReferenceScan } from "./process/next-reference-id.js";
export { createCountMissingProcessor } from "./process/count-missing.js";
export { createInsertReferencesProcessor } from "./process/insert-references.js";
export type { InsertResult } from "./process/insert-references.js";
export { ScratchFile } from "./io/scratch-file.js";

// Extraction
export { extractReferences, findReferences } from "./extract/extractor.js";
export type { ExtractOptions, ExtractionResult } from "./extract/extractor.js";
export {
  DEFAULT_COMMENT_PATTERN,
  IGNORE_DIRECTIVE,
  NO_KVP_DIRECTIVE,
  hasIgnoreDirective,
  hasNoKvpDirective,
  isDirectiveActive,
} from "./extract/directives.js";
export { createMacroMatcher } from "./extract/macros.js";
export type { MacroMatcher, MacroSpecifier } from "./extract/macros.js";

// Model
export {
  MAX_REFERENCE_ID,
  REFERENCE_KEY,
  extractReference,
  hasReference,
  hasUsableReferencePosition,
  insertableReferenceString,
  needsReference,
  parseReferenceId,
} from "./model/entry.js";
export type { LogReferenceEntry, LogReferenceKind } from "./model/entry.js";
export { LineIndex, codePosition, computeLineStarts } from "./model/position.js";
export type { CodePosition } from "./model/position.js";

// Grammar
export { scanSource, skipTrivia } from "./grammar/scanner.js";
export type {
  ArgumentTerminator,
  KeyValueArgument,
  MacroArgument,
  MacroCall,
  ScanError,
  ScanResult,
  Span,
  StringLiteral,
} from "./grammar/types.js";

// Errors and logging
export { BreadlogError, BreadlogErrorCode, describeError, isBreadlogError } from "./errors.js";
export type { BreadlogErrorCodeType } from "./errors.js";
export { silentLogger } from "./logger.js";
export type { LogFields, Logger } from "./logger.js";
