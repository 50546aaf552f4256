/**
 * Tests for the DocsClient HTTP client.
 *
 * fetch is mocked and tokens live in a temporary directory, so tests run
 * without network access.
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { DocsClient } from '../../src/gdocs-api/client.js';
import { loadTokens, saveTokens } from '../../src/gdocs-api/auth.js';
import {
  DocsApiError,
  DocsAuthError,
  DocumentNotFoundError,
} from '../../src/gdocs-api/types.js';
import type { BatchUpdateRequest } from '../../src/gdocs-api/types.js';
import type { Logger } from '../../src/logger.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const API = 'https://docs.googleapis.com/v1';

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
}

function errorResponse(status: number, code: string, message: string, headers?: Record<string, string>): Response {
  return jsonResponse({ error: { code: status, message, status: code } }, { status, headers });
}

function mockLogger() {
  return {
    level: 'debug',
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  } satisfies Logger;
}

let dir: string;
let tokenFile: string;
let fetchSpy: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'note2gdocs-client-'));
  tokenFile = join(dir, 'token.json');
  fetchSpy = jest.spyOn(globalThis, 'fetch');
});

afterEach(() => {
  jest.restoreAllMocks();
  rmSync(dir, { recursive: true, force: true });
});

async function storeTokens(expiresAt = Date.now() + 3_600_000): Promise<void> {
  await saveTokens(tokenFile, { accessToken: 'access-1', refreshToken: 'refresh-1', expiresAt });
}

function createClient(logger: Logger = mockLogger()): DocsClient {
  return new DocsClient({
    clientId: 'test-client',
    clientSecret: 'test-secret',
    tokenFile,
    retry: { baseDelay429Ms: 1, baseDelay5xxMs: 1 },
    logger,
  });
}

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

describe('DocsClient requests', () => {
  beforeEach(async () => {
    await storeTokens();
  });

  it('should get a document with the bearer token', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ documentId: 'doc-1', title: 'Plan' }));

    const document = await createClient().getDocument('doc-1');

    expect(document).toEqual({ documentId: 'doc-1', title: 'Plan' });
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe(`${API}/documents/doc-1`);
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({
      Authorization: 'Bearer access-1',
      'Content-Type': 'application/json',
    });
    expect(init?.body).toBeUndefined();
  });

  it('should create a document with its title', async () => {
    const logger = mockLogger();
    fetchSpy.mockResolvedValueOnce(jsonResponse({ documentId: 'doc-9', title: 'My Note' }));

    const document = await createClient(logger).createDocument('My Note');

    expect(document.documentId).toBe('doc-9');
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe(`${API}/documents`);
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"title":"My Note"}');
    expect(logger.info).toHaveBeenCalledWith('Created document "My Note" (doc-9)');
  });

  it('should post requests to the batchUpdate endpoint', async () => {
    const requests: BatchUpdateRequest[] = [
      { insertText: { location: { index: 1 }, text: 'Hi\n' } },
      { createFooter: { type: 'DEFAULT' } },
    ];
    fetchSpy.mockResolvedValueOnce(jsonResponse({ documentId: 'doc-1', replies: [{}, {}] }));

    const response = await createClient().batchUpdate('doc-1', requests);

    expect(response).toEqual({ documentId: 'doc-1', replies: [{}, {}] });
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe(`${API}/documents/doc-1:batchUpdate`);
    expect(JSON.parse(String(init?.body))).toEqual({ requests });
  });
});

// ---------------------------------------------------------------------------
// Errors and retries
// ---------------------------------------------------------------------------

describe('DocsClient errors', () => {
  beforeEach(async () => {
    await storeTokens();
  });

  it('should map 404 to DocumentNotFoundError', async () => {
    fetchSpy.mockResolvedValueOnce(
      errorResponse(404, 'NOT_FOUND', 'Requested entity was not found.'),
    );

    const promise = createClient().getDocument('missing');
    await expect(promise).rejects.toBeInstanceOf(DocumentNotFoundError);
    await expect(promise).rejects.toMatchObject({
      httpStatus: 404,
      message: 'Requested entity was not found.',
    });
  });

  it('should map 403 to DocsAuthError without retrying', async () => {
    fetchSpy.mockResolvedValueOnce(
      errorResponse(403, 'PERMISSION_DENIED', 'The caller does not have permission'),
    );

    const promise = createClient().getDocument('doc-1');
    await expect(promise).rejects.toBeInstanceOf(DocsAuthError);
    await expect(promise).rejects.toMatchObject({ httpStatus: 403, status: 'PERMISSION_DENIED' });
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('should fall back to the status text for a body without an error', async () => {
    fetchSpy.mockResolvedValueOnce(new Response('oops', { status: 400, statusText: 'Bad Request' }));

    await expect(createClient().getDocument('doc-1')).rejects.toMatchObject({
      httpStatus: 400,
      status: 'UNKNOWN',
      message: 'Bad Request',
    });
  });

  it('should retry 429 after the Retry-After delay', async () => {
    const logger = mockLogger();
    fetchSpy
      .mockResolvedValueOnce(
        errorResponse(429, 'RESOURCE_EXHAUSTED', 'Quota exceeded', { 'Retry-After': '0' }),
      )
      .mockResolvedValueOnce(jsonResponse({ documentId: 'doc-1', title: 'Plan' }));

    const document = await createClient(logger).getDocument('doc-1');

    expect(document.documentId).toBe('doc-1');
    expect(fetchSpy).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith('Request failed with HTTP 429; retry 1 in 0ms');
  });

  it('should give up on 5xx after the configured retries', async () => {
    fetchSpy.mockImplementation(() =>
      Promise.resolve(errorResponse(500, 'INTERNAL', 'Internal error')),
    );
    const client = new DocsClient({
      clientId: 'test-client',
      clientSecret: 'test-secret',
      tokenFile,
      retry: { maxRetries5xx: 1, baseDelay5xxMs: 1 },
    });

    const promise = client.getDocument('doc-1');
    await expect(promise).rejects.toBeInstanceOf(DocsApiError);
    await expect(promise).rejects.toMatchObject({ httpStatus: 500, status: 'INTERNAL' });
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });
});

// ---------------------------------------------------------------------------
// Token handling
// ---------------------------------------------------------------------------

describe('DocsClient tokens', () => {
  it('should refresh an expired token before the request', async () => {
    await storeTokens(0);
    fetchSpy
      .mockResolvedValueOnce(
        jsonResponse({ access_token: 'access-2', expires_in: 3600, token_type: 'Bearer' }),
      )
      .mockResolvedValueOnce(jsonResponse({ documentId: 'doc-1', title: 'Plan' }));

    await createClient().getDocument('doc-1');

    expect(fetchSpy.mock.calls[0][0]).toBe('https://oauth2.googleapis.com/token');
    expect(fetchSpy.mock.calls[1][1]?.headers).toMatchObject({ Authorization: 'Bearer access-2' });
    await expect(loadTokens(tokenFile)).resolves.toMatchObject({
      accessToken: 'access-2',
      refreshToken: 'refresh-1',
    });
  });

  it('should refresh and replay once on 401', async () => {
    await storeTokens();
    fetchSpy
      .mockResolvedValueOnce(new Response('', { status: 401 }))
      .mockResolvedValueOnce(
        jsonResponse({ access_token: 'access-2', expires_in: 3600, token_type: 'Bearer' }),
      )
      .mockResolvedValueOnce(jsonResponse({ documentId: 'doc-1', title: 'Plan' }));

    const document = await createClient().getDocument('doc-1');

    expect(document.title).toBe('Plan');
    expect(fetchSpy.mock.calls.map((call) => call[0])).toEqual([
      `${API}/documents/doc-1`,
      'https://oauth2.googleapis.com/token',
      `${API}/documents/doc-1`,
    ]);
    expect(fetchSpy.mock.calls[2][1]?.headers).toMatchObject({ Authorization: 'Bearer access-2' });
  });

  it('should fail without stored tokens', async () => {
    const promise = createClient().getDocument('doc-1');
    await expect(promise).rejects.toBeInstanceOf(DocsAuthError);
    await expect(promise).rejects.toMatchObject({ status: 'UNAUTHENTICATED' });
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('should report authentication and log out', async () => {
    const client = createClient();
    await expect(client.isAuthenticated()).resolves.toBe(false);

    await storeTokens();
    await expect(client.isAuthenticated()).resolves.toBe(true);

    await client.logout();
    await expect(client.isAuthenticated()).resolves.toBe(false);
  });
});
