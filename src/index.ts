/**
 * note2gdocs - Markdown note to Google Docs publisher
 */

// High-level conversion API
export { convertNote, convertNoteFile, extractTitle, DEFAULT_NOTE_TITLE } from './converter.js';

// Types
export type { ConvertOptions, ConvertResult, ConvertMetadata } from './types.js';

// Core module re-exports
export {
  translate,
  LineTranslator,
  TranslatorClosedError,
  toRequest,
  toRequests,
  splitLines,
  readLines,
} from './core/index.js';

export type {
  Operation,
  DocsRequest,
  Range,
  ParseState,
  TranslatorOptions,
  TranslationResult,
} from './core/index.js';

// Docs API
export { DocsClient } from './gdocs-api/client.js';
export type { DocsClientConfig } from './gdocs-api/client.js';
export { publishNote, updateFooter } from './gdocs-api/document-service.js';
export type { DocsApi, PublishOptions, PublishResult } from './gdocs-api/document-service.js';
export { DocsApiError, DocsAuthError, DocumentNotFoundError } from './gdocs-api/types.js';

// Configuration and logging
export { loadConfig, ConfigError } from './config.js';
export type { NoteConfig } from './config.js';
export { createLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
