/**
 * MIME document parser entry points
 *
 * @packageDocumentation
 */

import { readHeaderBlock } from './header-parser.js';
import { parseMediaType } from './media-type.js';
import { decodeSection } from './decode.js';
import { buildPartTree, resolveDisposition } from './tree-builder.js';
import { PartNode, freezeTree } from './part.js';
import { resolveParseOptions } from './options.js';
import type { MimePart } from '../types/part.js';
import type { ParseOptions } from '../types/config.js';
import { BoundaryError, UnderlyingIOError } from '../types/errors.js';

/**
 * Parses a complete MIME document into a tree of parts
 *
 * @param input - Message bytes; strings are taken as UTF-8
 * @param options - Parse options
 * @returns Root part of a frozen tree
 * @throws MimeError subclasses on malformed input; no partial tree is returned
 *
 * @example
 * ```typescript
 * const root = parseMime(raw);
 * for (const part of root.children()) {
 *   console.log(part.contentType, part.fileName, part.content.length);
 * }
 * ```
 */
export function parseMime(input: Buffer | Uint8Array | string, options?: ParseOptions): MimePart {
  const resolved = resolveParseOptions(options);
  const data = typeof input === 'string'
    ? Buffer.from(input, 'utf8')
    : Buffer.isBuffer(input) ? input : Buffer.from(input.buffer, input.byteOffset, input.byteLength);

  const { header, bodyOffset } = readHeaderBlock(data);
  const { mediaType, params } = parseMediaType(header.get('Content-Type') ?? '', resolved.charsets);
  const root = new PartNode(null, mediaType, header);
  const body = data.subarray(bodyOffset);

  resolveDisposition(root, params, resolved);

  if (mediaType.startsWith('multipart/')) {
    const boundary = params.get('boundary');
    if (!boundary) {
      throw new BoundaryError(`Missing boundary parameter for ${mediaType}`, '');
    }
    buildPartTree(root, body, boundary, { depth: 1, options: resolved });
  } else {
    root.content = decodeSection(
      header.get('Content-Transfer-Encoding') ?? '',
      params.get('charset') ?? '',
      body,
      resolved.charsets
    );
  }

  return freezeTree(root);
}

/**
 * Reads a MIME document from a byte source and parses it
 *
 * Accepts anything async-iterable, Node.js Readable streams included.
 *
 * @param source - Sequential byte source positioned at the start of the document
 * @param options - Parse options
 * @returns Root part of a frozen tree
 * @throws UnderlyingIOError if the source fails; otherwise as parseMime
 */
export async function readMime(
  source: AsyncIterable<Uint8Array | string>,
  options?: ParseOptions
): Promise<MimePart> {
  const chunks: Buffer[] = [];

  try {
    for await (const chunk of source) {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
    }
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new UnderlyingIOError(`Failed to read MIME input: ${reason}`, err);
  }

  return parseMime(Buffer.concat(chunks), options);
}
