import { describe, it, expect } from 'vitest';
import { parseHeaders, readHeaderBlock } from '../../src/mime/header-parser.js';
import { MimeHeader } from '../../src/mime/header.js';
import { HeaderParseError } from '../../src/types/errors.js';

describe('MIME Header Parser', () => {

  describe('Field parsing', () => {
    it('should look up fields case-insensitively', () => {
      const parsed = parseHeaders('Subject: Hello\r\nFrom: user@example.com');
      expect(parsed.get('subject')).toBe('Hello');
      expect(parsed.get('FROM')).toBe('user@example.com');
      expect(parsed.size).toBe(2);
    });

    it('should preserve original casing of field names', () => {
      const parsed = parseHeaders('content-TYPE: text/plain');
      expect(parsed.names()).toEqual(['content-TYPE']);
    });

    it('should keep repeated fields in document order', () => {
      const parsed = parseHeaders('Received: from a\r\nSubject: x\r\nReceived: from b');
      expect(parsed.get('received')).toBe('from a');
      expect(parsed.values('Received')).toEqual(['from a', 'from b']);
      expect(parsed.names()).toEqual(['Received', 'Subject']);
      expect([...parsed.entries()]).toEqual([
        ['Received', 'from a'],
        ['Subject', 'x'],
        ['Received', 'from b'],
      ]);
    });

    it('should trim field values', () => {
      const parsed = parseHeaders('X-Note:    spaced out   ');
      expect(parsed.get('x-note')).toBe('spaced out');
    });

    it('should tolerate whitespace before the colon', () => {
      const parsed = parseHeaders('Subject : old style');
      expect(parsed.get('subject')).toBe('old style');
    });

    it('should keep encoded words raw', () => {
      const parsed = parseHeaders('Subject: =?UTF-8?B?SGVsbG8=?=');
      expect(parsed.get('subject')).toBe('=?UTF-8?B?SGVsbG8=?=');
    });
  });

  describe('Folding', () => {
    it('should unfold continuation lines with a single space', () => {
      const parsed = parseHeaders('Subject: Hello\r\n World\r\n\tAgain');
      expect(parsed.get('subject')).toBe('Hello World Again');
    });

    it('should unfold LF-only continuation lines', () => {
      const parsed = parseHeaders('Content-Type: multipart/mixed;\n boundary="abc"');
      expect(parsed.get('content-type')).toBe('multipart/mixed; boundary="abc"');
    });
  });

  describe('Malformed input', () => {
    it('should reject a line without a colon', () => {
      expect(() => parseHeaders('Subject: ok\r\nNoColonHere')).toThrow(HeaderParseError);
      try {
        parseHeaders('NoColonHere');
      } catch (err) {
        expect(err).toBeInstanceOf(HeaderParseError);
        expect(err instanceof HeaderParseError && err.rawData).toBe('NoColonHere');
      }
    });

    it('should reject a continuation before the first field', () => {
      expect(() => parseHeaders(' leading: continuation')).toThrow(HeaderParseError);
    });

    it('should reject field names containing spaces', () => {
      expect(() => parseHeaders('Bad Name: value')).toThrow('Malformed header field name: "Bad Name"');
    });
  });

  describe('readHeaderBlock', () => {
    it('should stop at the blank line and report the body offset', () => {
      const input = Buffer.from('A: 1\r\nB: 2\r\n\r\nbody');
      const { header, bodyOffset } = readHeaderBlock(input);

      expect(header.get('a')).toBe('1');
      expect(header.get('b')).toBe('2');
      expect(bodyOffset).toBe(14);
      expect(input.subarray(bodyOffset).toString()).toBe('body');
    });

    it('should accept bare LF line endings', () => {
      const input = Buffer.from('A: 1\nB: 2\n\nbody');
      const { bodyOffset } = readHeaderBlock(input);
      expect(bodyOffset).toBe(11);
    });

    it('should end the block at end of input', () => {
      const { header, bodyOffset } = readHeaderBlock(Buffer.from('A: 1'));
      expect(header.get('a')).toBe('1');
      expect(bodyOffset).toBe(4);
    });

    it('should start reading at the given offset', () => {
      const { header, bodyOffset } = readHeaderBlock(Buffer.from('xxA: 1\r\n\r\n'), 2);
      expect(header.get('a')).toBe('1');
      expect(bodyOffset).toBe(10);
    });

    it('should return an empty header for a leading blank line', () => {
      const { header, bodyOffset } = readHeaderBlock(Buffer.from('\r\nbody'));
      expect(header.size).toBe(0);
      expect(bodyOffset).toBe(2);
    });

    it('should read header bytes as UTF-8', () => {
      const { header } = readHeaderBlock(Buffer.from('Subject: Grüße\r\n\r\n'));
      expect(header.get('subject')).toBe('Grüße');
    });

    it('should read a line that is not valid UTF-8 as Latin-1', () => {
      const input = Buffer.concat([
        Buffer.from('Subject: Gr'),
        Buffer.from([0xFC]),
        Buffer.from('n\r\nX: Grüße\r\n\r\n'),
      ]);
      const { header } = readHeaderBlock(input);
      expect(header.get('subject')).toBe('Grün');
      expect(header.get('x')).toBe('Grüße');
    });
  });

  describe('MimeHeader', () => {
    it('should append without replacing earlier fields of the same name', () => {
      const header = new MimeHeader();
      header.add('A', '1');
      header.add('B', '2');
      header.add('a', '3');

      expect([...header]).toEqual([['A', '1'], ['B', '2'], ['a', '3']]);
      expect(header.values('a')).toEqual(['1', '3']);
      expect(header.names()).toEqual(['A', 'B']);
    });

    it('should report absent fields', () => {
      const header = new MimeHeader();
      expect(header.get('missing')).toBeUndefined();
      expect(header.values('missing')).toEqual([]);
      expect(header.has('missing')).toBe(false);
    });

    it('should reject writes once frozen', () => {
      const header = new MimeHeader([['A', '1']]).freeze();
      expect(header.isFrozen).toBe(true);
      expect(() => header.add('B', '2')).toThrow(TypeError);
      expect(header.get('a')).toBe('1');
    });
  });
});
