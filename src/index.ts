/**
 * mimetree - parse MIME documents into a tree of decoded parts
 *
 * @packageDocumentation
 */

// Export all types
export * from './types/index.js';

// Export encoding utilities
export * from './encoding/index.js';

// Export MIME parser
export * from './mime/index.js';
