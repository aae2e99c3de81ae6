/**
 * Error types for mimetree
 */

/**
 * Error source categories
 */
export type ErrorSource = 'parse' | 'boundary' | 'charset' | 'io' | 'limit';

/**
 * Base MIME error class
 */
export class MimeError extends Error {
  /** Error code */
  code: string;
  /** Error source category */
  source: ErrorSource;
  /** Boundary of the multipart level being parsed (if applicable) */
  boundary?: string;

  constructor(message: string, code: string, source: ErrorSource, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MimeError';
    this.code = code;
    this.source = source;
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Header block malformed (line without a colon, bad field name, stray continuation)
 */
export class HeaderParseError extends MimeError {
  override source: 'parse' = 'parse';
  /** Raw line that failed to parse */
  rawData: string;

  constructor(message: string, rawData: string) {
    super(message, 'HEADER_PARSE_ERROR', 'parse');
    this.name = 'HeaderParseError';
    this.rawData = rawData;
  }
}

/**
 * Content-Type or Content-Disposition value does not follow the media type grammar
 */
export class MediaTypeParseError extends MimeError {
  override source: 'parse' = 'parse';
  /** Header value that failed to parse */
  value: string;

  constructor(message: string, value: string) {
    super(message, 'MEDIA_TYPE_PARSE_ERROR', 'parse');
    this.name = 'MediaTypeParseError';
    this.value = value;
  }
}

/**
 * Sub-part without a Content-Type header
 */
export class MissingContentTypeError extends MimeError {
  override source: 'parse' = 'parse';

  constructor(boundary: string) {
    super(`Missing Content-Type at boundary ${boundary}`, 'MISSING_CONTENT_TYPE', 'parse');
    this.name = 'MissingContentTypeError';
    this.boundary = boundary;
  }
}

/**
 * Sub-part with no header fields that is not a dangling final delimiter
 */
export class EmptyHeaderError extends MimeError {
  override source: 'boundary' = 'boundary';

  constructor(boundary: string, cause?: unknown) {
    super(`Empty header at boundary ${boundary}`, 'EMPTY_HEADER', 'boundary', { cause });
    this.name = 'EmptyHeaderError';
    this.boundary = boundary;
  }
}

/**
 * Multipart body could not be split on its boundary
 */
export class BoundaryError extends MimeError {
  override source: 'boundary' = 'boundary';
  /** Input ended inside a part instead of at a close delimiter */
  endOfInput: boolean;

  constructor(message: string, boundary: string, endOfInput = false) {
    super(message, 'BOUNDARY_ERROR', 'boundary');
    this.name = 'BoundaryError';
    this.boundary = boundary;
    this.endOfInput = endOfInput;
  }
}

/**
 * Charset name unknown to the charset registry
 */
export class UnsupportedCharsetError extends MimeError {
  override source: 'charset' = 'charset';
  /** Charset name as it appeared in the message */
  charset: string;

  constructor(charset: string) {
    super(`Unsupported charset: "${charset}"`, 'UNSUPPORTED_CHARSET', 'charset');
    this.name = 'UnsupportedCharsetError';
    this.charset = charset;
  }
}

/**
 * Reading from the input source failed
 */
export class UnderlyingIOError extends MimeError {
  override source: 'io' = 'io';

  constructor(message: string, cause: unknown) {
    super(message, 'IO_ERROR', 'io', { cause });
    this.name = 'UnderlyingIOError';
  }
}

/**
 * Multipart nesting deeper than the configured limit
 */
export class MaxDepthExceededError extends MimeError {
  override source: 'limit' = 'limit';
  /** Configured maximum nesting depth */
  maxDepth: number;

  constructor(maxDepth: number, boundary: string) {
    super(`Multipart nesting exceeds maximum depth of ${maxDepth} at boundary ${boundary}`, 'MAX_DEPTH_EXCEEDED', 'limit');
    this.name = 'MaxDepthExceededError';
    this.maxDepth = maxDepth;
    this.boundary = boundary;
  }
}
