/**
 * Media type parsing for Content-Type and Content-Disposition values
 *
 * Grammar per RFC 2045 section 5.1 (type/subtype; attribute=value) with
 * RFC 2231 extended and continued parameters.
 *
 * @packageDocumentation
 */

import { iconvCharsets, type CharsetRegistry } from '../encoding/charset.js';
import { MediaTypeParseError } from '../types/errors.js';

/**
 * A parsed media type or disposition
 */
export interface MediaType {
  /** Lower-case media type without parameters, e.g. "multipart/mixed" */
  mediaType: string;
  /** Parameters keyed by lower-case name */
  params: Map<string, string>;
}

const TSPECIALS = '()<>@,;:\\"/[]?=';

function isTokenChar(char: string): boolean {
  const code = char.charCodeAt(0);
  return code > 0x20 && code < 0x7F && !TSPECIALS.includes(char);
}

function isToken(value: string): boolean {
  return value.length > 0 && [...value].every(isTokenChar);
}

/**
 * Splits a leading token off `input`
 */
function consumeToken(input: string): [token: string, rest: string] {
  let i = 0;
  while (i < input.length && isTokenChar(input[i])) i++;
  return [input.substring(0, i), input.substring(i)];
}

/**
 * Splits a leading token or quoted-string off `input`.
 * Returns an empty value and the untouched input on failure.
 */
function consumeValue(input: string): [value: string, rest: string] {
  if (!input.startsWith('"')) {
    return consumeToken(input);
  }

  let value = '';
  for (let i = 1; i < input.length; i++) {
    const char = input[i];
    if (char === '"') {
      return [value, input.substring(i + 1)];
    }
    // Backslash escapes the next character; a lone trailing backslash is an error
    if (char === '\\' && i + 1 < input.length) {
      value += input[++i];
    } else if (char === '\r' || char === '\n') {
      break;
    } else {
      value += char;
    }
  }

  // Unterminated quoted-string
  return ['', input];
}

/**
 * Consumes one `; name=value` parameter.
 * Returns null when `input` does not start with a well-formed parameter.
 */
function consumeParam(input: string): [name: string, value: string, rest: string] | null {
  let rest = input.trimStart();
  if (!rest.startsWith(';')) return null;

  rest = rest.substring(1).trimStart();
  const [name, afterName] = consumeToken(rest);
  if (!name) return null;

  rest = afterName.trimStart();
  if (!rest.startsWith('=')) return null;

  rest = rest.substring(1).trimStart();
  const [value, afterValue] = consumeValue(rest);
  if (!value && afterValue === rest) return null;

  return [name.toLowerCase(), value, afterValue];
}

/**
 * Percent-decodes an RFC 2231 extended value into bytes
 */
function percentDecode(value: string): number[] {
  const bytes: number[] = [];
  for (let i = 0; i < value.length; i++) {
    const hex = value.substring(i + 1, i + 3);
    if (value[i] === '%' && /^[0-9A-Fa-f]{2}$/.test(hex)) {
      bytes.push(parseInt(hex, 16));
      i += 2;
    } else {
      bytes.push(value.charCodeAt(i) & 0xFF);
    }
  }
  return bytes;
}

/**
 * Assembles RFC 2231 pieces of one parameter.
 *
 * `pieces` holds raw values keyed by the full parameter name
 * (`name*`, `name*0`, `name*1*`, ...).
 *
 * @returns Decoded value, or undefined if the pieces cannot be decoded
 */
function assembleExtended(
  baseName: string,
  pieces: Map<string, string>,
  charsets: CharsetRegistry
): string | undefined {
  const single = pieces.get(`${baseName}*`);
  if (single !== undefined) {
    return decodeExtendedValue([single], [true], charsets);
  }

  const values: string[] = [];
  const encoded: boolean[] = [];
  for (let n = 0; ; n++) {
    const plain = pieces.get(`${baseName}*${n}`);
    const extended = pieces.get(`${baseName}*${n}*`);
    if (plain !== undefined) {
      values.push(plain);
      encoded.push(false);
    } else if (extended !== undefined) {
      values.push(extended);
      encoded.push(true);
    } else {
      break;
    }
  }

  return values.length > 0 ? decodeExtendedValue(values, encoded, charsets) : undefined;
}

function decodeExtendedValue(
  values: string[],
  encoded: boolean[],
  charsets: CharsetRegistry
): string | undefined {
  if (!encoded[0]) {
    // Plain continuation: later extended segments are still percent-encoded US-ASCII
    return values
      .map((value, i) => (encoded[i] ? Buffer.from(percentDecode(value)).toString('latin1') : value))
      .join('');
  }

  // First extended segment carries charset'language'
  const parts = values[0].split("'");
  if (parts.length < 3) return undefined;
  const charsetName = parts[0];
  const bytes = percentDecode(parts.slice(2).join("'"));
  for (let i = 1; i < values.length; i++) {
    bytes.push(...(encoded[i] ? percentDecode(values[i]) : Buffer.from(values[i], 'latin1')));
  }

  if (!charsetName) {
    return Buffer.from(bytes).toString('latin1');
  }
  const decoder = charsets.lookup(charsetName);
  return decoder ? decoder.decode(Uint8Array.from(bytes)) : undefined;
}

/**
 * Parses a media type value such as `text/plain; charset="utf-8"`
 *
 * @param value - Content-Type or Content-Disposition header value
 * @param charsets - Registry for RFC 2231 charset-tagged parameters
 * @returns Lower-case media type and its parameters
 * @throws MediaTypeParseError on an empty or malformed value or a duplicate parameter
 */
export function parseMediaType(value: string, charsets: CharsetRegistry = iconvCharsets): MediaType {
  const semicolon = value.indexOf(';');
  const base = semicolon === -1 ? value : value.substring(0, semicolon);
  const mediaType = base.trim().toLowerCase();

  if (!mediaType) {
    throw new MediaTypeParseError('No media type', value);
  }
  const slash = mediaType.indexOf('/');
  const valid = slash === -1
    ? isToken(mediaType)
    : isToken(mediaType.substring(0, slash)) && isToken(mediaType.substring(slash + 1));
  if (!valid) {
    throw new MediaTypeParseError(`Invalid media type "${mediaType}"`, value);
  }

  const params = new Map<string, string>();
  const extended = new Map<string, Map<string, string>>();
  let rest = value.substring(base.length);

  while (rest.trim()) {
    const param = consumeParam(rest);
    if (!param) {
      // Trailing semicolons are tolerated
      if (rest.trim() === ';') break;
      throw new MediaTypeParseError(`Invalid media parameter in "${value}"`, value);
    }

    const [name, paramValue, remaining] = param;
    rest = remaining;

    let target = params;
    const star = name.indexOf('*');
    if (star !== -1) {
      const baseName = name.substring(0, star);
      target = extended.get(baseName) ?? new Map<string, string>();
      extended.set(baseName, target);
    }

    if (target.has(name)) {
      throw new MediaTypeParseError(`Duplicate parameter "${name}"`, value);
    }
    target.set(name, paramValue);
  }

  for (const [baseName, pieces] of extended) {
    const decoded = assembleExtended(baseName, pieces, charsets);
    if (decoded !== undefined) {
      params.set(baseName, decoded);
    }
  }

  return { mediaType, params };
}
