/**
 * Core type definitions for the note translator.
 */
import type { Operation } from './operations.js';

/**
 * Bullet preset suffix of a list run, fixed by the run's first line.
 *
 * `CHECKBOX` for `- [ ] item`, `DISC_CIRCLE_SQUARE` for a plain bullet.
 */
export type ListStyle = 'CHECKBOX' | 'DISC_CIRCLE_SQUARE';

/**
 * Structural context of the translator.
 *
 * Only the `list` variant carries list bookkeeping, so list fields cannot be
 * read outside a list run.
 */
export type ParseState =
  | { kind: 'none' }
  | {
      kind: 'list';
      /** Cursor value when the run began. */
      startOffset: number;
      /** Sum of the indent levels (tab characters) inserted so far. */
      indentTotal: number;
      style: ListStyle;
    }
  | { kind: 'footer' };

/**
 * Mutable record owned by a single translation pass.
 */
export interface TranslatorState {
  /** Next insertion index. Starts at 1. */
  cursor: number;
  mode: ParseState;
  footer: string;
  operations: Operation[];
}

/**
 * Options that control translation.
 */
export interface TranslatorOptions {
  /**
   * Also insert lines that are neither list items nor headings, with
   * backslash escapes removed.
   * @default false
   */
  emitBodyText?: boolean;
}

/**
 * The result of translating a note.
 */
export interface TranslationResult {
  /** Operations in emission order. */
  operations: Operation[];

  /** Raw lines that followed the footer delimiter. */
  footer: string;

  /** Cursor value after the last line. */
  cursor: number;
}
