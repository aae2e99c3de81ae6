/**
 * Traversal helpers over a parsed MIME tree
 *
 * @packageDocumentation
 */

import type { MimePart } from '../types/part.js';

/**
 * A leaf part with its IMAP-style section number
 */
export interface SectionPart {
  /** Section number, e.g. "1", "2.1"; "TEXT" for a single-part message */
  section: string;
  /** The leaf part */
  part: MimePart;
}

/**
 * Yields every part depth-first, in document order, starting with `root`
 */
export function* walkParts(root: MimePart): IterableIterator<MimePart> {
  yield root;
  for (const child of root.children()) {
    yield* walkParts(child);
  }
}

/**
 * Collects the parts matching `predicate`, in document order
 */
export function findParts(root: MimePart, predicate: (part: MimePart) => boolean): MimePart[] {
  const result: MimePart[] = [];
  for (const part of walkParts(root)) {
    if (predicate(part)) {
      result.push(part);
    }
  }
  return result;
}

/**
 * Flattens a MIME part tree into its leaves with section numbers
 *
 * A container without children contributes nothing.
 *
 * @param root - Root part
 * @param prefix - Section number prefix
 * @returns Leaves in document order
 */
export function flattenParts(root: MimePart, prefix: string = ''): SectionPart[] {
  const result: SectionPart[] = [];

  if (root.firstChild) {
    // Multipart - recurse into children
    let index = 0;
    for (const child of root.children()) {
      index++;
      const section = prefix ? `${prefix}.${index}` : `${index}`;
      result.push(...flattenParts(child, section));
    }
  } else if (!root.contentType.startsWith('multipart/')) {
    result.push({ section: prefix || 'TEXT', part: root });
  }

  return result;
}

/**
 * Leaf parts presented as attachments: disposition "attachment" or a file name
 */
export function attachments(root: MimePart): MimePart[] {
  return findParts(root, part =>
    part.firstChild === null && (part.disposition === 'attachment' || part.fileName !== '')
  );
}
