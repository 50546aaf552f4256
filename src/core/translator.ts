/**
 * Markdown note to Docs operation translator.
 *
 * A single pass over the note's lines that tracks the document insertion
 * cursor and emits {@link Operation}s whose indices stay valid when applied
 * in order to an empty document body. Every line is handled in a fixed
 * order: footer delimiter, footer capture, list item, heading, `@tag:`
 * emphasis, then cursor advance.
 *
 * @module core/translator
 */
import {
  applyListBullets,
  insertText,
  setParagraphStyle,
  setTextStyle,
} from './operations.js';
import type {
  ListStyle,
  TranslationResult,
  TranslatorOptions,
  TranslatorState,
} from './types.js';

// Patterns tolerate the line's own trailing newline.
const LIST_PATTERN = /^(\s*)[-*] (?:(\[ \]) ?)?([^\n]*)\n?$/;
const HEADING_PATTERN = /^(#+)\s([^\n]*)\n?$/;
const TAG_PATTERN = /(@[\p{L}\p{N}_]*):/u;
const FOOTER_PATTERN = /^-{3,}\n?$/;

/** Whether `line` starts the footer block. */
export function isFooterDelimiter(line: string): boolean {
  return FOOTER_PATTERN.test(line);
}

/** Error thrown when a finished translator is used again. */
export class TranslatorClosedError extends Error {
  constructor() {
    super('Translator has already finished');
    this.name = 'TranslatorClosedError';
  }
}

/** Create the state record for a new pass. */
export function createTranslatorState(): TranslatorState {
  return { cursor: 1, mode: { kind: 'none' }, footer: '', operations: [] };
}

/** Document length a line occupies once backslash escapes are dropped. */
export function visibleLength(line: string): number {
  return stripEscapes(line).length;
}

function stripEscapes(line: string): string {
  return line.replace(/\\/g, '');
}

// ---------------------------------------------------------------------------
// Per-line steps
// ---------------------------------------------------------------------------

/**
 * Emit the bullets for the open list run and drop its indentation tabs from
 * the cursor. The Docs API turns leading tabs into nesting levels and removes
 * them, so later content sits `indentTotal` positions earlier.
 */
export function closeList(state: TranslatorState): void {
  if (state.mode.kind !== 'list') return;
  const { startOffset, indentTotal, style } = state.mode;

  state.operations.push(
    applyListBullets({ start: startOffset, end: state.cursor }, `BULLET_${style}`),
  );
  state.cursor -= indentTotal;
  state.mode = { kind: 'none' };
}

/** Enter footer mode on a delimiter line. Returns `true` when consumed. */
function checkFooter(state: TranslatorState, line: string): boolean {
  if (state.mode.kind === 'footer' || !isFooterDelimiter(line)) return false;
  closeList(state);
  state.mode = { kind: 'footer' };
  return true;
}

/**
 * Rewrite a list item as tab-indented text and insert it.
 * Returns the working line for the remaining steps.
 */
function parseListItem(state: TranslatorState, line: string): string {
  const match = LIST_PATTERN.exec(line);
  if (!match) {
    closeList(state);
    return line;
  }

  const [, indentSpaces, checkbox, text] = match;

  if (state.mode.kind !== 'list') {
    const style: ListStyle = checkbox ? 'CHECKBOX' : 'DISC_CIRCLE_SQUARE';
    state.mode = { kind: 'list', startOffset: state.cursor, indentTotal: 0, style };
  }

  const indentLevel = Math.floor(indentSpaces.length / 2);
  state.mode.indentTotal += indentLevel;

  const rewritten = '\t'.repeat(indentLevel) + text + '\n';
  state.operations.push(insertText(state.cursor, rewritten));
  return rewritten;
}

/**
 * Insert a heading and style its paragraph.
 * Returns the heading text as the working line, or `null` when the line is
 * not a heading.
 */
function parseHeading(state: TranslatorState, line: string): string | null {
  const match = HEADING_PATTERN.exec(line);
  if (!match) return null;

  const [, hashes, text] = match;
  state.operations.push(
    insertText(state.cursor, text + '\n'),
    setParagraphStyle(
      { start: state.cursor, end: state.cursor + text.length },
      `HEADING_${hashes.length}`,
    ),
  );
  // The heading's newline.
  state.cursor += 1;
  return text;
}

/** Bold the first `@tag` (without its colon) found in the working line. */
function parseTag(state: TranslatorState, line: string): void {
  const match = TAG_PATTERN.exec(line);
  if (!match) return;

  const start = state.cursor + match.index;
  const end = start + match[0].length - 1;
  state.operations.push(setTextStyle({ start, end }, { bold: true }));
}

// ---------------------------------------------------------------------------
// LineTranslator
// ---------------------------------------------------------------------------

/**
 * Incremental translator over one input stream.
 *
 * ```ts
 * const translator = new LineTranslator();
 * for (const line of lines) translator.push(line);
 * const { operations, footer } = translator.finish();
 * ```
 *
 * Not reusable: create one instance per stream.
 */
export class LineTranslator {
  private readonly state: TranslatorState = createTranslatorState();
  private readonly emitBodyText: boolean;
  private finished = false;

  constructor(options?: TranslatorOptions) {
    this.emitBodyText = options?.emitBodyText ?? false;
  }

  /** Current insertion index. */
  get cursor(): number {
    return this.state.cursor;
  }

  /** Current parse state kind. */
  get mode(): TranslatorState['mode']['kind'] {
    return this.state.mode.kind;
  }

  /** Process one raw line, with or without its trailing newline. */
  push(line: string): void {
    if (this.finished) throw new TranslatorClosedError();
    if (line.trim().length === 0) return;

    const { state } = this;
    if (checkFooter(state, line)) return;

    if (state.mode.kind === 'footer') {
      state.footer += line;
      return;
    }

    let working = parseListItem(state, line);
    const wasListItem = state.mode.kind === 'list';

    const heading = parseHeading(state, working);
    if (heading !== null) {
      working = heading;
    } else if (this.emitBodyText && !wasListItem) {
      // Tag offsets must address the text as inserted.
      working = stripEscapes(working);
      state.operations.push(insertText(state.cursor, working));
    }

    parseTag(state, working);
    state.cursor += visibleLength(working);
  }

  /** Close any open list and return the accumulated output. */
  finish(): TranslationResult {
    if (this.finished) throw new TranslatorClosedError();
    this.finished = true;

    closeList(this.state);
    return {
      operations: this.state.operations,
      footer: this.state.footer,
      cursor: this.state.cursor,
    };
  }
}

/**
 * Translate a sequence of note lines in one call.
 *
 * @param lines - Lines in order; each may keep its trailing `\n`.
 * @param options - Translator options.
 *
 * @example
 * ```ts
 * const { operations } = translate(['# Title\n']);
 * // [insertText(1, 'Title\n'), setParagraphStyle({ start: 1, end: 6 }, 'HEADING_1')]
 * ```
 */
export function translate(
  lines: Iterable<string>,
  options?: TranslatorOptions,
): TranslationResult {
  const translator = new LineTranslator(options);
  for (const line of lines) {
    translator.push(line);
  }
  return translator.finish();
}
