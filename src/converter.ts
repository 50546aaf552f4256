import type { ConvertMetadata, ConvertOptions, ConvertResult } from './types.js';
import type { Operation } from './core/operations.js';
import { toRequests } from './core/operations.js';
import { readLines, splitLines } from './core/line-reader.js';
import { isFooterDelimiter, translate } from './core/translator.js';
import type { TranslationResult } from './core/types.js';

/** Title used when neither the options nor the note provide one. */
export const DEFAULT_NOTE_TITLE = 'New Note';

const TITLE_PATTERN = /^#{1,2}[ \t]+([^\n]+)/;

/** Heading text of a level-1 or level-2 heading line, if it is one. */
function titleOf(line: string): string | undefined {
  const match = TITLE_PATTERN.exec(line);
  const title = match?.[1].trim();
  return title ? title : undefined;
}

/**
 * Extract the first heading text from a note.
 *
 * Looks for a level-1 or level-2 ATX heading (`# ...` or `## ...`) above the
 * footer delimiter.
 *
 * @returns The heading text, or `undefined` if none was found.
 */
export function extractTitle(markdown: string): string | undefined {
  for (const line of splitLines(markdown)) {
    if (isFooterDelimiter(line)) return undefined;
    const title = titleOf(line);
    if (title !== undefined) return title;
  }
  return undefined;
}

/**
 * Collect metadata by walking the emitted operations once.
 */
function collectMetadata(
  operations: Operation[],
  footer: string,
  title: string,
): ConvertMetadata {
  let headingCount = 0;
  let listCount = 0;
  let tagCount = 0;

  for (const op of operations) {
    switch (op.type) {
      case 'setParagraphStyle':
        headingCount++;
        break;
      case 'applyListBullets':
        listCount++;
        break;
      case 'setTextStyle':
        tagCount++;
        break;
      default:
        break;
    }
  }

  return { title, headingCount, listCount, tagCount, hasFooter: footer.length > 0 };
}

function toConvertResult(
  result: TranslationResult,
  title: string,
): ConvertResult {
  return {
    requests: toRequests(result.operations),
    footer: result.footer,
    operations: result.operations,
    metadata: collectMetadata(result.operations, result.footer, title),
  };
}

/**
 * Convert a markdown note to Docs `batchUpdate` requests.
 *
 * 1. Split the note into lines
 * 2. Translate lines to operations (single pass)
 * 3. Serialize operations to request objects
 * 4. Collect metadata
 *
 * @example
 * ```ts
 * const result = convertNote({ markdown: '# Hello\n---\nbye\n' });
 * result.requests[0]; // { insertText: { location: { index: 1 }, text: 'Hello\n' } }
 * result.footer;      // 'bye\n'
 * ```
 */
export function convertNote(options: ConvertOptions): ConvertResult {
  const { markdown, title, emitBodyText } = options;
  const result = translate(splitLines(markdown), { emitBodyText });
  const resolvedTitle = title ?? extractTitle(markdown) ?? DEFAULT_NOTE_TITLE;
  return toConvertResult(result, resolvedTitle);
}

/**
 * Convert a note file, reading it line by line.
 *
 * Read errors propagate; no partial result is returned.
 *
 * @param path - Path to the markdown note.
 * @param options - Title and translator options.
 */
export function convertNoteFile(
  path: string,
  options: Omit<ConvertOptions, 'markdown'> = {},
): ConvertResult {
  let firstHeading: string | undefined;
  let scanning = true;
  const lines = readLines(path);

  // Title detection rides along with the single read and stops at the footer.
  function* tap(): Generator<string, void, undefined> {
    for (const line of lines) {
      if (scanning) {
        if (isFooterDelimiter(line)) {
          scanning = false;
        } else {
          firstHeading = titleOf(line);
          scanning = firstHeading === undefined;
        }
      }
      yield line;
    }
  }

  const result = translate(tap(), { emitBodyText: options.emitBodyText });
  const resolvedTitle = options.title ?? firstHeading ?? DEFAULT_NOTE_TITLE;
  return toConvertResult(result, resolvedTitle);
}
