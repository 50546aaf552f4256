/**
 * Google Docs API type definitions.
 *
 * Provides interfaces for OAuth tokens, the subset of the Docs
 * `Document` resource the publisher reads, footer requests and errors.
 */
import type { DocsRequest } from '../core/operations.js';

// --- Endpoint Configuration ---

/** Base URLs used by the client. */
export interface DocsEndpoints {
  auth: string;
  token: string;
  api: string;
  web: string;
}

export const ENDPOINTS: DocsEndpoints = {
  auth: 'https://accounts.google.com/o/oauth2/v2/auth',
  token: 'https://oauth2.googleapis.com/token',
  api: 'https://docs.googleapis.com/v1',
  web: 'https://docs.google.com/document/d',
};

/** OAuth scope granting read/write access to Docs. */
export const DOCS_SCOPE = 'https://www.googleapis.com/auth/documents';

// --- OAuth / Auth ---

/** Installed-app client credentials. */
export interface DocsAuthConfig {
  clientId: string;
  clientSecret: string;
  /** Loopback redirect, e.g. `http://127.0.0.1:53682`. Set per login. */
  redirectUri: string;
}

/** Raw response from the OAuth token endpoint. */
export interface DocsTokenResponse {
  access_token: string;
  expires_in: number;
  /** Absent on refresh responses. */
  refresh_token?: string;
  scope?: string;
  token_type: string;
}

/** Locally persisted token information with a pre-computed expiry timestamp. */
export interface DocsTokenStore {
  accessToken: string;
  refreshToken: string;
  /** Absolute timestamp (ms) when access token expires: Date.now() + expires_in * 1000 */
  expiresAt: number;
}

// --- Document resource (subset) ---

export interface DocsFooter {
  footerId: string;
}

/** Response of `documents.get` / `documents.create`. */
export interface DocsDocument {
  documentId: string;
  title: string;
  revisionId?: string;
  footers?: Record<string, DocsFooter>;
}

// --- Footer requests ---

export interface CreateFooterRequest {
  createFooter: {
    type: 'DEFAULT';
  };
}

export interface InsertFooterTextRequest {
  insertText: {
    endOfSegmentLocation: { segmentId: string };
    text: string;
  };
}

/** Any request the client sends in a `batchUpdate`. */
export type BatchUpdateRequest = DocsRequest | CreateFooterRequest | InsertFooterTextRequest;

/** Response of `documents.batchUpdate`. */
export interface BatchUpdateResponse {
  documentId: string;
  replies?: Array<Record<string, unknown>>;
  writeControl?: { requiredRevisionId?: string };
}

/** Error envelope returned by Google APIs. */
export interface DocsErrorBody {
  error?: {
    code?: number;
    message?: string;
    status?: string;
  };
}

// --- Error Types ---

/** Base error class for Docs API errors. */
export class DocsApiError extends Error {
  constructor(
    public readonly httpStatus: number,
    /** Canonical status name, e.g. `INVALID_ARGUMENT`. */
    public readonly status: string,
    message: string,
    /** Delay requested by a `Retry-After` header, if any. */
    public readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'DocsApiError';
  }
}

/** Error thrown when authentication / authorization fails. */
export class DocsAuthError extends DocsApiError {
  constructor(httpStatus: number, status: string, message: string) {
    super(httpStatus, status, message);
    this.name = 'DocsAuthError';
  }
}

/** Error thrown when the addressed document does not exist. */
export class DocumentNotFoundError extends DocsApiError {
  constructor(message: string) {
    super(404, 'NOT_FOUND', message);
    this.name = 'DocumentNotFoundError';
  }
}
