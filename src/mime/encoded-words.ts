/**
 * RFC 2047 encoded-word decoding for header values
 *
 * @packageDocumentation
 */

import { base64Decode } from '../encoding/base64.js';
import { quotedPrintableDecode } from '../encoding/quoted-printable.js';
import { iconvCharsets, type CharsetRegistry } from '../encoding/charset.js';

// RFC 2047 encoded word pattern: =?charset?encoding?encoded_text?=
const WORD = '=\\?[^?\\s]+\\?[BbQq]\\?[^?\\s]*\\?=';
const ENCODED_WORD = new RegExp(`=\\?([^?\\s]+)\\?([BbQq])\\?([^?\\s]*)\\?=`, 'g');
const ADJACENT_WORDS = new RegExp(`(${WORD})\\s+(?=${WORD})`, 'g');

/**
 * Decodes RFC 2047 encoded words in a header value
 *
 * Whitespace between two adjacent encoded words is dropped (RFC 2047
 * section 6.2). Words with an unknown charset or encoding are left as written.
 *
 * @param value - Header value potentially containing encoded words
 * @param charsets - Registry used to decode each word's charset
 * @returns Decoded header value
 */
export function decodeEncodedWords(value: string, charsets: CharsetRegistry = iconvCharsets): string {
  if (!value.includes('=?')) {
    return value;
  }

  return value
    .replace(ADJACENT_WORDS, '$1')
    .replace(ENCODED_WORD, (match: string, charset: string, encoding: string, encodedText: string) => {
      // RFC 2231 section 5 allows a language suffix: =?UTF-8*en?Q?...?=
      const decoder = charsets.lookup(charset.split('*')[0]);
      if (!decoder) {
        return match;
      }

      const bytes = encoding.toUpperCase() === 'B'
        ? base64Decode(encodedText)
        // In Q-encoding, underscores represent spaces
        : quotedPrintableDecode(encodedText.replace(/_/g, ' '));

      return decoder.decode(bytes);
    });
}
