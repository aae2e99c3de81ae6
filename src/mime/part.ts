/**
 * In-memory MIME part node
 *
 * Nodes are built mutable by the tree builder and frozen as a whole by
 * {@link freezeTree} before the tree is handed out.
 *
 * @packageDocumentation
 */

import type { MimeHeader } from './header.js';
import type { MimePart } from '../types/part.js';

export class PartNode implements MimePart {
  parent: PartNode | null;
  firstChild: PartNode | null = null;
  nextSibling: PartNode | null = null;
  header: MimeHeader;
  contentType: string;
  disposition = '';
  fileName = '';
  content: Buffer = Buffer.alloc(0);

  /**
   * Creates a detached node; the caller links it into its parent's child chain
   */
  constructor(parent: PartNode | null, contentType: string, header: MimeHeader) {
    this.parent = parent;
    this.contentType = contentType;
    this.header = header;
  }

  *children(): IterableIterator<PartNode> {
    for (let child = this.firstChild; child; child = child.nextSibling) {
      yield child;
    }
  }
}

/**
 * Freezes every node and header of a finished tree
 *
 * @param root - Root of a completely built tree
 * @returns The same root, typed read-only
 */
export function freezeTree(root: PartNode): MimePart {
  const pending: PartNode[] = [root];

  while (pending.length > 0) {
    const node = pending.pop();
    if (!node) break;
    pending.push(...node.children());
    node.header.freeze();
    Object.freeze(node);
  }

  return root;
}
