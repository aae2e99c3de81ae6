/**
 * MIME Header Parser
 *
 * Reads RFC 822 header blocks, including folded fields, into a
 * {@link MimeHeader}. Values are kept raw; encoded words are decoded only
 * where the tree builder needs display text (file names).
 *
 * @packageDocumentation
 */

import { isUtf8 } from 'node:buffer';
import { MimeHeader } from './header.js';
import { HeaderParseError } from '../types/errors.js';

const LF = 0x0A;
const CR = 0x0D;

// Printable US-ASCII except colon (RFC 5322 section 2.2)
const FIELD_NAME = /^[\x21-\x39\x3B-\x7E]+$/;

/**
 * Result of reading a header block out of a byte buffer
 */
export interface HeaderBlock {
  /** Parsed fields */
  header: MimeHeader;
  /** Offset of the first body byte (just past the blank line) */
  bodyOffset: number;
}

/**
 * Parses unfolded-or-folded header lines into a header map
 *
 * @param lines - Header lines without line terminators
 * @returns Header map in document order
 * @throws HeaderParseError on a line without a colon, an invalid field name,
 *   or a continuation line before the first field
 */
export function parseHeaderLines(lines: readonly string[]): MimeHeader {
  const fields: Array<[string, string]> = [];

  for (const line of lines) {
    if (line.startsWith(' ') || line.startsWith('\t')) {
      // Folded continuation of the previous field
      const previous = fields[fields.length - 1];
      if (!previous) {
        throw new HeaderParseError('Header continuation line without a preceding field', line);
      }
      const continuation = line.trim();
      if (continuation) {
        previous[1] = previous[1] ? `${previous[1]} ${continuation}` : continuation;
      }
      continue;
    }

    const colonIndex = line.indexOf(':');
    if (colonIndex === -1) {
      throw new HeaderParseError('Malformed header line: missing colon', line);
    }

    const name = line.substring(0, colonIndex).trimEnd();
    if (!FIELD_NAME.test(name)) {
      throw new HeaderParseError(`Malformed header field name: "${name}"`, line);
    }

    fields.push([name, line.substring(colonIndex + 1).trim()]);
  }

  return new MimeHeader(fields);
}

/**
 * Parses a header block given as text (headers separated by CRLF or LF)
 *
 * @param headerBlock - Raw header block, without the terminating blank line
 * @returns Header map
 */
export function parseHeaders(headerBlock: string): MimeHeader {
  const lines = headerBlock.split(/\r?\n/);
  // A trailing line break leaves one empty element behind
  if (lines[lines.length - 1] === '') lines.pop();
  return parseHeaderLines(lines);
}

/**
 * Reads the header block starting at `offset`
 *
 * The block ends at the first empty line or at the end of input. Lines may
 * end in CRLF or a bare LF. Each line is read as UTF-8 when it is valid UTF-8
 * and as Latin-1 otherwise, so raw 8-bit header bytes map one-to-one to
 * U+0000-U+00FF instead of turning into U+FFFD.
 *
 * @param input - Message bytes
 * @param offset - Where the header block starts
 * @returns Parsed header and the offset of the body
 */
export function readHeaderBlock(input: Buffer, offset = 0): HeaderBlock {
  const lines: string[] = [];
  let pos = offset;

  while (pos < input.length) {
    const lf = input.indexOf(LF, pos);
    const next = lf === -1 ? input.length : lf + 1;
    let end = lf === -1 ? input.length : lf;
    if (end > pos && input[end - 1] === CR) end--;

    if (end === pos) {
      return { header: parseHeaderLines(lines), bodyOffset: next };
    }

    const line = input.subarray(pos, end);
    lines.push(line.toString(isUtf8(line) ? 'utf8' : 'latin1'));
    pos = next;
  }

  return { header: parseHeaderLines(lines), bodyOffset: input.length };
}
