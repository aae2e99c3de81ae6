/**
 * Base64 decoding for MIME part bodies
 *
 * Real-world mail agents emit base64 with line breaks, trailing blanks and
 * the odd stray character. Bodies are passed through {@link cleanBase64}
 * first so a strict decoder never sees anything outside the alphabet.
 */

/**
 * Whether a byte belongs to the base64 alphabet (A-Z, a-z, 0-9, +, /, =)
 *
 * @param byte - Byte value (0-255)
 */
export function isBase64Byte(byte: number): boolean {
  return (byte >= 0x41 && byte <= 0x5A) ||  // A-Z
    (byte >= 0x61 && byte <= 0x7A) ||       // a-z
    (byte >= 0x30 && byte <= 0x39) ||       // 0-9
    byte === 0x2B ||                        // +
    byte === 0x2F ||                        // /
    byte === 0x3D;                          // =
}

/**
 * Drops every byte outside the base64 alphabet
 *
 * @param data - Raw part body
 * @returns Buffer holding only base64 alphabet bytes, in input order
 */
export function cleanBase64(data: Uint8Array): Buffer {
  const out = Buffer.allocUnsafe(data.length);
  let length = 0;

  for (let i = 0; i < data.length; i++) {
    const byte = data[i];
    if (isBase64Byte(byte)) {
      out[length++] = byte;
    }
  }

  return out.subarray(0, length);
}

// One encoded group: data up to and including a run of padding, or trailing data without padding
const PADDED_GROUP = /[^=]*=+|[^=]+$/g;

/**
 * Decodes a base64 part body to a Buffer
 *
 * Padding may appear inside the body when separately encoded chunks were
 * concatenated; each padded group is decoded on its own and the results are
 * joined.
 *
 * @param encoded - The base64 encoded body, as bytes or text
 * @returns Decoded Buffer
 */
export function base64Decode(encoded: Uint8Array | string): Buffer {
  const bytes = typeof encoded === 'string' ? Buffer.from(encoded, 'latin1') : encoded;
  const groups = cleanBase64(bytes).toString('ascii').match(PADDED_GROUP) ?? [];
  return Buffer.concat(groups.map(group => Buffer.from(group, 'base64')));
}
