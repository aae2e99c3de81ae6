/**
 * Content decoding utilities for MIME part bodies
 *
 * Transfer decodings (base64, quoted-printable) work on raw bytes; the
 * charset registry turns decoded bytes into text.
 *
 * @packageDocumentation
 */

export { base64Decode, cleanBase64, isBase64Byte } from './base64.js';
export { quotedPrintableDecode } from './quoted-printable.js';
export { iconvCharsets, createCharsetRegistry } from './charset.js';
export type { CharsetDecoder, CharsetRegistry } from './charset.js';
