/**
 * Note publishing service for the Docs API.
 *
 * Orchestrates document creation, application of the translated requests
 * and the footer update, which needs a footer segment to exist first.
 *
 * @module document-service
 */

import { ENDPOINTS } from './types.js';
import type {
  BatchUpdateRequest,
  BatchUpdateResponse,
  DocsDocument,
} from './types.js';

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

/** Phases of the publishing pipeline. */
export type PublishPhase =
  | 'creating-document'
  | 'applying-requests'
  | 'creating-footer'
  | 'updating-footer'
  | 'done';

/** Progress information emitted while publishing. */
export interface PublishProgress {
  phase: PublishPhase;
  current: number;
  total: number;
  message: string;
}

/** Callback type for progress reporting. */
export type ProgressCallback = (progress: PublishProgress) => void;

/** A translated note ready to publish. */
export interface PublishableNote {
  requests: BatchUpdateRequest[];
  footer: string;
}

export interface PublishOptions {
  /** Existing document to write into. A new one is created when absent. */
  documentId?: string;
  /** Title of a newly created document. Default: "New Note". */
  title?: string;
  onProgress?: ProgressCallback;
}

/** Result of a successful publish. */
export interface PublishResult {
  documentId: string;
  documentUrl: string;
  footerUpdated: boolean;
}

/**
 * Minimal client interface expected by the document service.
 *
 * This decouples the service from a concrete HTTP client implementation,
 * making it easy to mock in tests.
 */
export interface DocsApi {
  getDocument(documentId: string): Promise<DocsDocument>;
  createDocument(title?: string): Promise<DocsDocument>;
  batchUpdate(documentId: string, requests: BatchUpdateRequest[]): Promise<BatchUpdateResponse>;
  /** Base URL for constructing document URLs. */
  baseUrl?: string;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Publish a translated note.
 *
 * 1. Create the document unless `options.documentId` is given
 * 2. Apply all requests in one batch (skipped when there are none)
 * 3. Write the footer when the note has one
 *
 * @returns The document's ID and URL.
 */
export async function publishNote(
  client: DocsApi,
  note: PublishableNote,
  options: PublishOptions = {},
): Promise<PublishResult> {
  const { onProgress } = options;
  const total = note.footer ? 3 : 2;
  let documentId = options.documentId;

  if (!documentId) {
    const title = options.title ?? 'New Note';
    onProgress?.({
      phase: 'creating-document',
      current: 1,
      total,
      message: `Creating document "${title}"`,
    });
    const created = await client.createDocument(title);
    documentId = created.documentId;
  }

  if (note.requests.length > 0) {
    onProgress?.({
      phase: 'applying-requests',
      current: 2,
      total,
      message: `Applying ${note.requests.length} requests`,
    });
    await client.batchUpdate(documentId, note.requests);
  }

  let footerUpdated = false;
  if (note.footer) {
    await updateFooter(client, documentId, note.footer, onProgress);
    footerUpdated = true;
  }

  const baseUrl = client.baseUrl ?? ENDPOINTS.web;
  const documentUrl = `${baseUrl}/${documentId}/edit`;

  onProgress?.({
    phase: 'done',
    current: total,
    total,
    message: 'Note published',
  });

  return { documentId, documentUrl, footerUpdated };
}

/**
 * Append `text` to the document's default footer, creating the footer
 * first when the document has none.
 */
export async function updateFooter(
  client: DocsApi,
  documentId: string,
  text: string,
  onProgress?: ProgressCallback,
): Promise<void> {
  let document = await client.getDocument(documentId);

  if (!hasFooter(document)) {
    onProgress?.({
      phase: 'creating-footer',
      current: 3,
      total: 3,
      message: 'Creating footer',
    });
    await client.batchUpdate(documentId, [{ createFooter: { type: 'DEFAULT' } }]);
    document = await client.getDocument(documentId);
  }

  const footerId = firstFooterId(document);
  if (!footerId) {
    throw new Error(`Document ${documentId} has no footer after creating one`);
  }

  onProgress?.({
    phase: 'updating-footer',
    current: 3,
    total: 3,
    message: 'Writing footer text',
  });
  await client.batchUpdate(documentId, [
    { insertText: { endOfSegmentLocation: { segmentId: footerId }, text } },
  ]);
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function hasFooter(document: DocsDocument): boolean {
  return firstFooterId(document) !== undefined;
}

function firstFooterId(document: DocsDocument): string | undefined {
  return Object.keys(document.footers ?? {})[0];
}
