/**
 * Type exports for mimetree
 */

// Configuration types
export type { ParseOptions, ResolvedParseOptions, ParseWarning, ParseWarningCode } from './config.js';

// Part types
export type { MimePart, ReadonlyMimeHeader } from './part.js';

// Error types
export {
  MimeError,
  HeaderParseError,
  MediaTypeParseError,
  MissingContentTypeError,
  EmptyHeaderError,
  BoundaryError,
  UnsupportedCharsetError,
  UnderlyingIOError,
  MaxDepthExceededError
} from './errors.js';

export type { ErrorSource } from './errors.js';
