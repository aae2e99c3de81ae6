/**
 * Quoted-Printable decoding
 *
 * Implements RFC 2045 section 6.7 decoding over raw bytes. Bytes above 0x7F
 * are passed through untouched instead of being rejected, since plenty of
 * senders put 8-bit text into quoted-printable bodies.
 */

const EQUALS = 0x3D;
const CR = 0x0D;
const LF = 0x0A;
const SPACE = 0x20;
const TAB = 0x09;

function hexValue(byte: number): number {
  if (byte >= 0x30 && byte <= 0x39) return byte - 0x30;
  if (byte >= 0x41 && byte <= 0x46) return byte - 0x41 + 10;
  if (byte >= 0x61 && byte <= 0x66) return byte - 0x61 + 10;
  return -1;
}

/**
 * Returns the index just past a soft line break starting at `start`
 * (optional blanks, then CRLF or LF), or -1 if there is none
 */
function softBreakEnd(data: Uint8Array, start: number): number {
  let i = start;
  while (i < data.length && (data[i] === SPACE || data[i] === TAB)) i++;
  if (i === data.length) {
    // "=" at the very end of the body
    return i;
  }
  if (data[i] === CR && data[i + 1] === LF) return i + 2;
  if (data[i] === LF) return i + 1;
  return -1;
}

/**
 * Decodes a quoted-printable body to a Buffer
 *
 * Hard line breaks (CRLF or bare LF) come out as CRLF.
 *
 * @param encoded - The quoted-printable body, as bytes or text
 * @returns Decoded Buffer
 */
export function quotedPrintableDecode(encoded: Uint8Array | string): Buffer {
  const data = typeof encoded === 'string' ? Buffer.from(encoded, 'latin1') : encoded;
  const bytes: number[] = [];
  let i = 0;

  while (i < data.length) {
    const byte = data[i];

    if (byte === EQUALS) {
      const hi = i + 1 < data.length ? hexValue(data[i + 1]) : -1;
      const lo = i + 2 < data.length ? hexValue(data[i + 2]) : -1;
      if (hi !== -1 && lo !== -1) {
        bytes.push(hi * 16 + lo);
        i += 3;
        continue;
      }

      const next = softBreakEnd(data, i + 1);
      if (next !== -1) {
        i = next;
        continue;
      }

      // Invalid sequence, keep the '=' as literal
      bytes.push(byte);
      i++;
    } else if (byte === CR && data[i + 1] === LF) {
      // Hard line break
      bytes.push(CR, LF);
      i += 2;
    } else if (byte === LF) {
      // Bare LF (normalize to CRLF)
      bytes.push(CR, LF);
      i++;
    } else {
      bytes.push(byte);
      i++;
    }
  }

  return Buffer.from(bytes);
}
