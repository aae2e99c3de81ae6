/**
 * MIME Multipart Reader
 *
 * Splits a multipart body on its boundary per RFC 2046 section 5.1.1,
 * handing out one raw sub-part (header plus undecoded body) per call.
 *
 * @packageDocumentation
 */

import { readHeaderBlock } from './header-parser.js';
import type { MimeHeader } from './header.js';
import { BoundaryError } from '../types/errors.js';

const LF = 0x0A;
const CR = 0x0D;
const DASH = 0x2D;

/**
 * One sub-part as cut out of a multipart body
 */
export interface RawPart {
  /** Sub-part header */
  header: MimeHeader;
  /** Body bytes, transfer encoding not yet removed */
  body: Buffer;
}

interface DelimiterLine {
  /** Offset of the leading "--" */
  start: number;
  /** Offset just past the line terminator */
  next: number;
  /** Whether this is the close delimiter ("--boundary--") */
  close: boolean;
}

function isLinearWhitespace(byte: number): boolean {
  return byte === 0x20 || byte === 0x09;
}

/**
 * Lazily reads the sub-parts of one multipart level
 *
 * `nextPart()` returns null once the close delimiter has been read (or the
 * body is empty). When the input ends inside the last part, that part is
 * still returned; the following call throws a BoundaryError with
 * `endOfInput` set.
 */
export class MultipartReader {
  readonly boundary: string;
  private readonly body: Buffer;
  private readonly dashBoundary: Buffer;
  private cursor = -1;
  private finished = false;
  private truncated = false;

  constructor(body: Buffer, boundary: string) {
    this.body = body;
    this.boundary = boundary;
    this.dashBoundary = Buffer.from(`--${boundary}`, 'utf8');
  }

  /**
   * Returns the next raw sub-part, or null at a clean end of input
   *
   * @throws BoundaryError when no delimiter can be found or the input ended inside a part
   */
  nextPart(): RawPart | null {
    if (this.finished) {
      return null;
    }
    if (this.truncated) {
      throw new BoundaryError(
        `Unexpected end of input: missing close delimiter for boundary ${this.boundary}`,
        this.boundary,
        true
      );
    }

    if (this.cursor === -1) {
      if (this.body.toString('latin1').trim() === '') {
        this.finished = true;
        return null;
      }

      // Skip the preamble
      const first = this.findDelimiter(0);
      if (!first) {
        throw new BoundaryError(`No delimiter for boundary ${this.boundary} found in multipart body`, this.boundary);
      }
      if (first.close) {
        this.finished = true;
        return null;
      }
      this.cursor = first.next;
    }

    const delimiter = this.findDelimiter(this.cursor);
    const section = this.body.subarray(this.cursor, delimiter ? delimiter.start : this.body.length);
    const { header, bodyOffset } = readHeaderBlock(section);
    let partBody = section.subarray(bodyOffset);

    if (delimiter) {
      partBody = stripTrailingLineBreak(partBody);
      if (delimiter.close) {
        // Anything after the close delimiter is epilogue
        this.finished = true;
      } else {
        this.cursor = delimiter.next;
      }
    } else {
      this.truncated = true;
    }

    return { header, body: partBody };
  }

  /**
   * Finds the next delimiter line at or after `from`, which must be a line start
   */
  private findDelimiter(from: number): DelimiterLine | null {
    let p = this.body.indexOf(this.dashBoundary, from);

    while (p !== -1) {
      if (p === from || this.body[p - 1] === LF) {
        const line = this.classifyLine(p);
        if (line) return line;
      }
      p = this.body.indexOf(this.dashBoundary, p + 1);
    }

    return null;
  }

  /**
   * Checks that what follows "--boundary" at `start` completes a delimiter line
   */
  private classifyLine(start: number): DelimiterLine | null {
    const body = this.body;
    let i = start + this.dashBoundary.length;
    let close = false;

    if (body[i] === DASH && body[i + 1] === DASH) {
      close = true;
      i += 2;
    }

    // Transport padding
    while (i < body.length && isLinearWhitespace(body[i])) i++;

    if (i === body.length) {
      return { start, next: i, close };
    }
    if (body[i] === CR && body[i + 1] === LF) {
      return { start, next: i + 2, close };
    }
    if (body[i] === LF) {
      return { start, next: i + 1, close };
    }

    // Same prefix, longer boundary: body text rather than a delimiter
    return null;
  }
}

/**
 * The line break before a delimiter belongs to the delimiter, not the body
 */
function stripTrailingLineBreak(body: Buffer): Buffer {
  if (body.length > 0 && body[body.length - 1] === LF) {
    const end = body.length >= 2 && body[body.length - 2] === CR ? body.length - 2 : body.length - 1;
    return body.subarray(0, end);
  }
  return body;
}
