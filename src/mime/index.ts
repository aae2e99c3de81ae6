/**
 * MIME Parser Module
 *
 * Provides MIME document parsing capabilities including:
 * - Header block reading with folded fields
 * - Media type and RFC 2231 parameter parsing
 * - RFC 2047 encoded word decoding
 * - Multipart boundary splitting and recursive tree building
 *
 * @packageDocumentation
 */

// Entry points
export { parseMime, readMime } from './parser.js';
export { DEFAULT_MAX_DEPTH, DEFAULT_PARSE_OPTIONS, resolveParseOptions } from './options.js';

// Header parsing
export { MimeHeader } from './header.js';
export { parseHeaders, parseHeaderLines, readHeaderBlock } from './header-parser.js';
export type { HeaderBlock } from './header-parser.js';
export { parseMediaType } from './media-type.js';
export type { MediaType } from './media-type.js';
export { decodeEncodedWords } from './encoded-words.js';

// Multipart parsing
export { MultipartReader } from './multipart-reader.js';
export type { RawPart } from './multipart-reader.js';
export { buildPartTree } from './tree-builder.js';
export type { BuildContext } from './tree-builder.js';
export { decodeContent, decodeSection } from './decode.js';
export { PartNode } from './part.js';

// Traversal
export { walkParts, findParts, flattenParts, attachments } from './walk.js';
export type { SectionPart } from './walk.js';
