/**
 * Part body decoding: transfer encoding first, then charset
 *
 * @packageDocumentation
 */

import { base64Decode } from '../encoding/base64.js';
import { quotedPrintableDecode } from '../encoding/quoted-printable.js';
import { iconvCharsets, type CharsetRegistry } from '../encoding/charset.js';
import { UnsupportedCharsetError } from '../types/errors.js';

/**
 * Removes a Content-Transfer-Encoding from a part body
 *
 * @param content - Raw body bytes
 * @param encoding - Content-Transfer-Encoding value (case-insensitive); anything
 *   other than base64 or quoted-printable is copied unchanged
 * @returns Decoded bytes in a buffer of their own, never a view of `content`
 */
export function decodeContent(content: Buffer, encoding: string): Buffer {
  const enc = encoding.trim().toLowerCase();

  switch (enc) {
    case 'base64':
      return base64Decode(content);
    case 'quoted-printable':
      return quotedPrintableDecode(content);
    case '7bit':
    case '8bit':
    case 'binary':
    default:
      return Buffer.from(content);
  }
}

/**
 * Decodes a leaf part body
 *
 * The transfer encoding is removed first; when a charset is named, the
 * result is converted from that charset to UTF-8.
 *
 * @param transferEncoding - Content-Transfer-Encoding value, '' if absent
 * @param charset - Charset name, '' if absent
 * @param raw - Raw body bytes
 * @param charsets - Registry the charset is resolved against
 * @returns Decoded bytes (UTF-8 when a charset was given)
 * @throws UnsupportedCharsetError if the registry does not know the charset
 */
export function decodeSection(
  transferEncoding: string,
  charset: string,
  raw: Buffer,
  charsets: CharsetRegistry = iconvCharsets
): Buffer {
  const bytes = decodeContent(raw, transferEncoding);

  if (!charset) {
    return bytes;
  }

  const decoder = charsets.lookup(charset);
  if (!decoder) {
    throw new UnsupportedCharsetError(charset);
  }

  return Buffer.from(decoder.decode(bytes), 'utf8');
}
