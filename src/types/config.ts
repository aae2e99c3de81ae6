/**
 * Configuration types for mimetree
 */

import type { CharsetRegistry } from '../encoding/charset.js';

/**
 * Codes for anomalies the parser recovers from
 */
export type ParseWarningCode = 'DISPOSITION_IGNORED' | 'MISSING_CLOSE_DELIMITER';

/**
 * A recovered anomaly, reported through {@link ParseOptions.onWarning}
 */
export interface ParseWarning {
  /** Warning code */
  code: ParseWarningCode;
  /** Human readable description */
  message: string;
  /** Boundary of the multipart level the anomaly was found in */
  boundary?: string;
}

/**
 * Options accepted by parseMime and readMime
 */
export interface ParseOptions {
  /** Maximum multipart nesting depth (default: 32) */
  maxDepth?: number;
  /** Charset lookup used for content and header decoding (default: iconv-lite backed registry) */
  charsets?: CharsetRegistry;
  /** Receives anomalies that did not abort the parse */
  onWarning?: (warning: ParseWarning) => void;
}

/**
 * Parse options with every default filled in
 */
export type ResolvedParseOptions = Required<ParseOptions>;
