/**
 * Export configuration.
 */

export interface ExportOptions {
  /** Files named in `include` statements; they also seed the standard gate vocabulary. */
  includes?: readonly string[];
  /** Fold numeric parameters into symbolic multiples of pi where exact. */
  foldConstants?: boolean;
}

export interface ResolvedExportOptions {
  readonly includes: readonly string[];
  readonly foldConstants: boolean;
}

export const DEFAULT_INCLUDES: readonly string[] = ["stdgates.inc"];

export function resolveExportOptions(options: ExportOptions = {}): ResolvedExportOptions {
  return {
    includes: [...(options.includes ?? DEFAULT_INCLUDES)],
    foldConstants: options.foldConstants ?? true,
  };
}
