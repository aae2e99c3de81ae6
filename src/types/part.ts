/**
 * Part types for mimetree
 */

/**
 * Read access to an ordered, case-insensitive, multi-valued header map
 */
export interface ReadonlyMimeHeader extends Iterable<[string, string]> {
  /** Number of fields, counting repeats */
  readonly size: number;
  /** First value of a field, or undefined */
  get(name: string): string | undefined;
  /** All values of a field in document order */
  values(name: string): string[];
  /** Whether at least one field with this name exists */
  has(name: string): boolean;
  /** Distinct field names in order of first appearance, original casing */
  names(): string[];
  /** All fields in document order */
  entries(): IterableIterator<[string, string]>;
}

/**
 * One node of a parsed MIME tree
 */
export interface MimePart {
  /** Enclosing part, null for the root */
  readonly parent: MimePart | null;
  /** First child part (multipart containers only) */
  readonly firstChild: MimePart | null;
  /** Next part under the same parent */
  readonly nextSibling: MimePart | null;
  /** Header fields as they appeared in the message */
  readonly header: ReadonlyMimeHeader;
  /** Media type without parameters, e.g. "text/plain" */
  readonly contentType: string;
  /** Disposition without parameters, e.g. "attachment"; empty if absent */
  readonly disposition: string;
  /** File name from the disposition or type parameters; empty if none */
  readonly fileName: string;
  /** Decoded content; empty for multipart containers */
  readonly content: Buffer;
  /** Direct children in document order */
  children(): IterableIterator<MimePart>;
}
