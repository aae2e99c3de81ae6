import { describe, it, expect } from 'vitest';
import {
  MimeError,
  HeaderParseError,
  MediaTypeParseError,
  MissingContentTypeError,
  EmptyHeaderError,
  BoundaryError,
  UnsupportedCharsetError,
  UnderlyingIOError,
  MaxDepthExceededError
} from '../../src/types/errors.js';

describe('Type definitions', () => {
  describe('Error classes', () => {
    it('should create MimeError with correct properties', () => {
      const error = new MimeError('Test error', 'TEST_CODE', 'parse');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(MimeError);
      expect(error.message).toBe('Test error');
      expect(error.code).toBe('TEST_CODE');
      expect(error.source).toBe('parse');
      expect(error.name).toBe('MimeError');
    });

    it('should create HeaderParseError with raw data', () => {
      const error = new HeaderParseError('Malformed header line: missing colon', 'garbage');

      expect(error).toBeInstanceOf(MimeError);
      expect(error.source).toBe('parse');
      expect(error.code).toBe('HEADER_PARSE_ERROR');
      expect(error.rawData).toBe('garbage');
      expect(error.name).toBe('HeaderParseError');
    });

    it('should create MediaTypeParseError with the offending value', () => {
      const error = new MediaTypeParseError('No media type', '');

      expect(error.code).toBe('MEDIA_TYPE_PARSE_ERROR');
      expect(error.value).toBe('');
      expect(error.name).toBe('MediaTypeParseError');
    });

    it('should name the boundary in MissingContentTypeError', () => {
      const error = new MissingContentTypeError('frontier');

      expect(error.message).toBe('Missing Content-Type at boundary frontier');
      expect(error.boundary).toBe('frontier');
      expect(error.code).toBe('MISSING_CONTENT_TYPE');
    });

    it('should keep the splitter failure as cause of EmptyHeaderError', () => {
      const cause = new BoundaryError('No delimiter', 'frontier');
      const error = new EmptyHeaderError('frontier', cause);

      expect(error.message).toBe('Empty header at boundary frontier');
      expect(error.source).toBe('boundary');
      expect(error.cause).toBe(cause);
    });

    it('should default BoundaryError to not end-of-input', () => {
      expect(new BoundaryError('x', 'b').endOfInput).toBe(false);
      expect(new BoundaryError('x', 'b', true).endOfInput).toBe(true);
    });

    it('should name the charset in UnsupportedCharsetError', () => {
      const error = new UnsupportedCharsetError('unknown-x');

      expect(error.charset).toBe('unknown-x');
      expect(error.message).toBe('Unsupported charset: "unknown-x"');
      expect(error.source).toBe('charset');
    });

    it('should wrap the source failure in UnderlyingIOError', () => {
      const cause = new Error('EIO');
      const error = new UnderlyingIOError('Failed to read MIME input: EIO', cause);

      expect(error.source).toBe('io');
      expect(error.code).toBe('IO_ERROR');
      expect(error.cause).toBe(cause);
    });

    it('should report the limit in MaxDepthExceededError', () => {
      const error = new MaxDepthExceededError(32, 'deep');

      expect(error.maxDepth).toBe(32);
      expect(error.boundary).toBe('deep');
      expect(error.source).toBe('limit');
      expect(error.message).toBe('Multipart nesting exceeds maximum depth of 32 at boundary deep');
    });
  });
});
