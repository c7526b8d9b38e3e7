/**
 * Map/reduce contract shared by the reference processors.
 */

import type { LogReferenceEntry } from "../model/entry.js";

export interface MapInput<Params> {
  path: string;
  /** Decoded file text the entries were extracted from. */
  contents: string;
  params: Params | undefined;
  entries: readonly LogReferenceEntry[];
}

/**
 * A per-file computation (map) combined into one result for the run (reduce).
 *
 * `map` returning undefined drops the file from the reduce input.
 */
export interface ReferenceProcessor<Params, MapResult, ReduceResult> {
  readonly name: string;
  map(input: MapInput<Params>): Promise<MapResult | undefined>;
  reduce(results: readonly MapResult[]): ReduceResult | undefined;
}
