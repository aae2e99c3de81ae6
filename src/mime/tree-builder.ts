/**
 * MIME Tree Builder
 *
 * Recursive descent over multipart boundaries. Each call handles one
 * boundary level: it links the sub-parts of `parent` in document order,
 * resolves their metadata, decodes leaves and recurses into nested
 * multiparts.
 *
 * @packageDocumentation
 */

import { MultipartReader, type RawPart } from './multipart-reader.js';
import { parseMediaType } from './media-type.js';
import { decodeEncodedWords } from './encoded-words.js';
import { decodeSection } from './decode.js';
import { PartNode } from './part.js';
import type { MimeHeader } from './header.js';
import type { ResolvedParseOptions } from '../types/config.js';
import {
  BoundaryError,
  EmptyHeaderError,
  MaxDepthExceededError,
  MediaTypeParseError,
  MissingContentTypeError,
} from '../types/errors.js';

/**
 * State carried down the recursion
 */
export interface BuildContext {
  /** Nesting depth of the boundary level being built (top level is 1) */
  depth: number;
  /** Resolved parse options */
  options: ResolvedParseOptions;
}

/**
 * Parses the sub-parts of a multipart body into children of `parent`
 *
 * @param parent - Part the children are attached to
 * @param body - Multipart body (everything after the parent's header)
 * @param boundary - Boundary parameter of the parent's Content-Type
 * @param context - Depth and options
 * @throws MimeError subclasses; nothing is recovered except a bad Content-Disposition
 */
export function buildPartTree(parent: PartNode, body: Buffer, boundary: string, context: BuildContext): void {
  const { options } = context;
  if (context.depth > options.maxDepth) {
    throw new MaxDepthExceededError(options.maxDepth, boundary);
  }

  const reader = new MultipartReader(body, boundary);
  let prevSibling: PartNode | null = null;

  for (let raw = reader.nextPart(); raw !== null; raw = reader.nextPart()) {
    if (raw.header.size === 0) {
      // Empty header probably means the last part was closed with "--boundary"
      // instead of "--boundary--"; tolerated only if nothing follows
      expectEndOfParts(reader);
      options.onWarning({
        code: 'MISSING_CLOSE_DELIMITER',
        message: `Empty part at end of boundary ${boundary} treated as a missing close delimiter`,
        boundary,
      });
      break;
    }

    const part = createPart(parent, raw, boundary, context);
    if (prevSibling) {
      prevSibling.nextSibling = part;
    } else {
      parent.firstChild = part;
    }
    prevSibling = part;
  }
}

/**
 * Builds one child part, recursing if it is itself a multipart
 */
function createPart(parent: PartNode, raw: RawPart, boundary: string, context: BuildContext): PartNode {
  const { options } = context;
  const contentTypeValue = raw.header.get('Content-Type');
  if (!contentTypeValue) {
    throw new MissingContentTypeError(boundary);
  }

  const { mediaType, params } = parseMediaType(contentTypeValue, options.charsets);
  absorbTypeParams(raw.header, params);

  const part = new PartNode(parent, mediaType, raw.header);
  resolveDisposition(part, params, options, boundary);

  const nestedBoundary = params.get('boundary');
  if (nestedBoundary) {
    buildPartTree(part, raw.body, nestedBoundary, { ...context, depth: context.depth + 1 });
  } else {
    part.content = decodeSection(
      raw.header.get('Content-Transfer-Encoding') ?? '',
      params.get('charset') ?? raw.header.get('charset') ?? '',
      raw.body,
      options.charsets
    );
  }

  return part;
}

/**
 * Makes Content-Type parameters reachable as header fields of their own
 * (`charset`, `name`, ...). Existing fields are never overwritten.
 */
function absorbTypeParams(header: MimeHeader, params: Map<string, string>): void {
  for (const [name, value] of params) {
    if (!header.has(name)) {
      header.add(name, value);
    }
  }
}

/**
 * Sets `disposition` and `fileName` of a part
 *
 * The Content-Disposition filename wins over the Content-Type name. A
 * malformed Content-Disposition is reported as a warning and ignored.
 *
 * @param part - Part whose header is already attached
 * @param typeParams - Parsed Content-Type parameters of the part
 * @param options - Resolved parse options
 * @param boundary - Enclosing boundary, for the warning; empty for the root
 */
export function resolveDisposition(
  part: PartNode,
  typeParams: Map<string, string>,
  options: ResolvedParseOptions,
  boundary = ''
): void {
  const dispositionValue = part.header.get('Content-Disposition');

  if (dispositionValue !== undefined) {
    try {
      const { mediaType, params } = parseMediaType(dispositionValue, options.charsets);
      part.disposition = mediaType;
      part.fileName = decodeEncodedWords(params.get('filename') ?? '', options.charsets);
    } catch (err) {
      if (!(err instanceof MediaTypeParseError)) {
        throw err;
      }
      options.onWarning({
        code: 'DISPOSITION_IGNORED',
        message: `Ignoring malformed Content-Disposition: ${err.message}`,
        ...(boundary ? { boundary } : {}),
      });
    }
  }

  const name = typeParams.get('name');
  if (!part.fileName && name) {
    part.fileName = decodeEncodedWords(name, options.charsets);
  }
}

/**
 * After an empty-header part, the reader must be at the end of its input
 *
 * @throws EmptyHeaderError if another part follows or the reader fails otherwise
 */
function expectEndOfParts(reader: MultipartReader): void {
  let next: RawPart | null;
  try {
    next = reader.nextPart();
  } catch (err) {
    if (err instanceof BoundaryError && err.endOfInput) {
      return;
    }
    throw new EmptyHeaderError(reader.boundary, err);
  }

  if (next !== null) {
    throw new EmptyHeaderError(reader.boundary);
  }
}
