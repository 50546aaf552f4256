/**
 * Core module barrel exports.
 *
 * @module core
 */

// Operations
export {
  insertText,
  setParagraphStyle,
  setTextStyle,
  applyListBullets,
  toRequest,
  toRequests,
} from './operations.js';
export type {
  Operation,
  InsertText,
  SetParagraphStyle,
  SetTextStyle,
  ApplyListBullets,
  Range,
  Location,
  TextStyle,
  DocsRequest,
  WireRange,
} from './operations.js';

// Translator
export {
  translate,
  LineTranslator,
  TranslatorClosedError,
  createTranslatorState,
  closeList,
  visibleLength,
  isFooterDelimiter,
} from './translator.js';

// Line sources
export { splitLines, readLines } from './line-reader.js';

// Types
export type {
  ListStyle,
  ParseState,
  TranslatorState,
  TranslatorOptions,
  TranslationResult,
} from './types.js';
