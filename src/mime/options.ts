/**
 * Parse option defaults and validation
 *
 * @packageDocumentation
 */

import { iconvCharsets } from '../encoding/charset.js';
import type { ParseOptions, ResolvedParseOptions } from '../types/config.js';

/** Default maximum multipart nesting depth */
export const DEFAULT_MAX_DEPTH = 32;

export const DEFAULT_PARSE_OPTIONS: Readonly<ResolvedParseOptions> = Object.freeze({
  maxDepth: DEFAULT_MAX_DEPTH,
  charsets: iconvCharsets,
  onWarning: () => {},
});

/**
 * Fills in defaults for every option the caller left out
 *
 * @throws RangeError if maxDepth is not a positive integer
 */
export function resolveParseOptions(options: ParseOptions = {}): ResolvedParseOptions {
  const resolved: ResolvedParseOptions = {
    maxDepth: options.maxDepth ?? DEFAULT_PARSE_OPTIONS.maxDepth,
    charsets: options.charsets ?? DEFAULT_PARSE_OPTIONS.charsets,
    onWarning: options.onWarning ?? DEFAULT_PARSE_OPTIONS.onWarning,
  };

  if (!Number.isInteger(resolved.maxDepth) || resolved.maxDepth < 1) {
    throw new RangeError(`maxDepth must be a positive integer, got ${resolved.maxDepth}`);
  }

  return resolved;
}
