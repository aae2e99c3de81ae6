/**
 * Charset registry
 *
 * Maps charset names found in MIME headers to decoders producing JavaScript
 * strings. The default registry is backed by iconv-lite; callers may pass
 * their own through ParseOptions.charsets.
 */

import iconv from 'iconv-lite';

/**
 * Decoder for one charset
 */
export interface CharsetDecoder {
  /** Charset name as it was looked up */
  readonly name: string;
  /** Decodes bytes in this charset to text */
  decode(bytes: Uint8Array): string;
}

/**
 * Read-only lookup from charset name to decoder
 */
export interface CharsetRegistry {
  /**
   * Resolves a charset name (case-insensitive)
   *
   * @returns Decoder, or undefined if the name is unknown
   */
  lookup(name: string): CharsetDecoder | undefined;
}

/**
 * Registry covering every charset iconv-lite knows, aliases included
 * (utf-8, iso-8859-*, windows-125*, koi8-r, shift_jis, gb2312, ...)
 */
export const iconvCharsets: CharsetRegistry = {
  lookup(name: string): CharsetDecoder | undefined {
    const normalized = name.trim().toLowerCase();
    if (!normalized || !iconv.encodingExists(normalized)) {
      return undefined;
    }
    return {
      name,
      decode: (bytes) => iconv.decode(Buffer.from(bytes), normalized),
    };
  },
};

/**
 * Builds a registry from a fixed table of decoders, keyed by lower-case name
 *
 * @param decoders - Map of charset name to decode function
 */
export function createCharsetRegistry(decoders: Record<string, (bytes: Uint8Array) => string>): CharsetRegistry {
  const table = new Map<string, (bytes: Uint8Array) => string>();
  for (const [name, decode] of Object.entries(decoders)) {
    table.set(name.toLowerCase(), decode);
  }

  return {
    lookup(name: string): CharsetDecoder | undefined {
      const decode = table.get(name.trim().toLowerCase());
      return decode ? { name, decode } : undefined;
    },
  };
}
