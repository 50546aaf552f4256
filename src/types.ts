import type { DocsRequest, Operation } from './core/operations.js';

/**
 * Options for note conversion.
 */
export interface ConvertOptions {
  /** Source markdown string */
  markdown: string;
  /** Target document title */
  title?: string;
  /** Insert plain body lines as well as headings and list items */
  emitBodyText?: boolean;
}

/**
 * Metadata about the converted note.
 */
export interface ConvertMetadata {
  /** Document title (from options, else the first heading) */
  title: string;
  /** Number of headings inserted */
  headingCount: number;
  /** Number of list runs */
  listCount: number;
  /** Number of bolded `@tag`s */
  tagCount: number;
  /** Whether the note has a footer block */
  hasFooter: boolean;
}

/**
 * Result of the conversion pipeline.
 *
 * Contains the `batchUpdate` requests, the footer text, the operations the
 * requests were serialized from, and note-level metadata.
 */
export interface ConvertResult {
  /** Requests ready for `documents.batchUpdate` */
  requests: DocsRequest[];
  /** Footer text, empty when the note has none */
  footer: string;
  /** Operations in emission order */
  operations: Operation[];
  /** Note metadata */
  metadata: ConvertMetadata;
}
