import { minimatch } from "minimatch";

export const DEFAULT_NAME_PATTERN = "*";

/**
 * Builds a predicate over base names. Brace alternation is supported
 * (`*.{jpg,png}`) and wildcards match dot-files too.
 */
export function createNameMatcher(pattern?: string): (name: string) => boolean {
  const glob = pattern && pattern.trim() ? pattern.trim() : DEFAULT_NAME_PATTERN;
  return (name: string) => minimatch(name, glob, { dot: true, nocomment: true });
}
