import type { MergeMethod } from "../types";

/**
 * One way of joining ordered clips into a single file. `concat` reports
 * failure by resolving to null; it never throws.
 */
export interface TrackConcatenator {
  readonly method: MergeMethod;
  isAvailable(): Promise<boolean>;
  /** Writes `<outputStem>.<ext>` and resolves to its path. */
  concat(files: readonly string[], outputStem: string): Promise<string | null>;
}
