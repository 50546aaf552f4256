/**
 * Tests for Docs API constants and error classes.
 */

import {
  DOCS_SCOPE,
  DocsApiError,
  DocsAuthError,
  DocumentNotFoundError,
  ENDPOINTS,
} from '../../src/gdocs-api/types.js';

// ---------------------------------------------------------------------------
// ENDPOINTS constant
// ---------------------------------------------------------------------------

describe('ENDPOINTS', () => {
  it('should have HTTPS URLs', () => {
    for (const url of Object.values(ENDPOINTS)) {
      expect(url).toMatch(/^https:\/\//);
    }
  });

  it('should target Docs API v1', () => {
    expect(ENDPOINTS.api).toBe('https://docs.googleapis.com/v1');
  });

  it('should request the documents scope', () => {
    expect(DOCS_SCOPE).toBe('https://www.googleapis.com/auth/documents');
  });
});

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

describe('DocsApiError', () => {
  it('should carry status details', () => {
    const err = new DocsApiError(429, 'RESOURCE_EXHAUSTED', 'Quota exceeded', 2000);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('DocsApiError');
    expect(err.httpStatus).toBe(429);
    expect(err.status).toBe('RESOURCE_EXHAUSTED');
    expect(err.message).toBe('Quota exceeded');
    expect(err.retryAfterMs).toBe(2000);
  });
});

describe('DocsAuthError', () => {
  it('should be a DocsApiError without a retry delay', () => {
    const err = new DocsAuthError(401, 'UNAUTHENTICATED', 'Not authenticated');
    expect(err).toBeInstanceOf(DocsApiError);
    expect(err.name).toBe('DocsAuthError');
    expect(err.retryAfterMs).toBeUndefined();
  });
});

describe('DocumentNotFoundError', () => {
  it('should use 404 and NOT_FOUND', () => {
    const err = new DocumentNotFoundError('No such document');
    expect(err).toBeInstanceOf(DocsApiError);
    expect(err.name).toBe('DocumentNotFoundError');
    expect(err.httpStatus).toBe(404);
    expect(err.status).toBe('NOT_FOUND');
  });
});
