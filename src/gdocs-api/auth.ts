/**
 * Google OAuth 2.0 + PKCE authentication utilities.
 *
 * Pure functions (PKCE helpers, URL builders, state validation) are
 * exported separately so they can be unit-tested without network access.
 * The loopback redirect listener and the file token store are isolated
 * into dedicated functions.
 */

import { createHash, randomBytes, timingSafeEqual } from 'node:crypto';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { createServer } from 'node:http';
import type { Server } from 'node:http';
import { dirname } from 'node:path';

import {
  DOCS_SCOPE,
  DocsAuthConfig,
  DocsAuthError,
  DocsTokenResponse,
  DocsTokenStore,
  ENDPOINTS,
} from './types.js';

// ---------------------------------------------------------------------------
// PKCE helpers (pure functions)
// ---------------------------------------------------------------------------

/**
 * Generate a random code verifier (Base64URL of 64 bytes, 86 characters).
 */
export function generateCodeVerifier(): string {
  return randomBytes(64).toString('base64url');
}

/**
 * Derive the PKCE code challenge from a code verifier using SHA-256.
 */
export function generateCodeChallenge(verifier: string): string {
  return createHash('sha256').update(verifier).digest('base64url');
}

/**
 * Generate a random state parameter for CSRF protection.
 */
export function generateState(): string {
  return randomBytes(32).toString('base64url');
}

// ---------------------------------------------------------------------------
// Authorization URL & state validation (pure)
// ---------------------------------------------------------------------------

/**
 * Build the Google authorization URL with PKCE parameters.
 *
 * Requests offline access with a forced consent prompt so a refresh token
 * is always returned.
 */
export function buildAuthorizationUrl(
  config: DocsAuthConfig,
  codeChallenge: string,
  state: string,
): string {
  const params = new URLSearchParams({
    client_id: config.clientId,
    redirect_uri: config.redirectUri,
    response_type: 'code',
    scope: DOCS_SCOPE,
    access_type: 'offline',
    prompt: 'consent',
    state,
    code_challenge: codeChallenge,
    code_challenge_method: 'S256',
  });
  return `${ENDPOINTS.auth}?${params.toString()}`;
}

/**
 * Validate that the received state matches the expected value.
 * @returns `true` when the values match.
 */
export function validateState(expected: string, received: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(received);
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}

// ---------------------------------------------------------------------------
// Token expiry check (pure)
// ---------------------------------------------------------------------------

/**
 * Check whether the access token in a {@link DocsTokenStore} has expired.
 *
 * A 60-second safety margin is applied so tokens are refreshed before the
 * absolute deadline.
 */
export function isTokenExpired(store: DocsTokenStore): boolean {
  return Date.now() >= store.expiresAt - 60_000;
}

// ---------------------------------------------------------------------------
// Token exchange (network)
// ---------------------------------------------------------------------------

/**
 * Exchange an authorization code for tokens.
 */
export async function exchangeCodeForTokens(
  config: DocsAuthConfig,
  code: string,
  codeVerifier: string,
): Promise<DocsTokenStore> {
  const data = await postTokenForm(
    {
      grant_type: 'authorization_code',
      code,
      code_verifier: codeVerifier,
      client_id: config.clientId,
      client_secret: config.clientSecret,
      redirect_uri: config.redirectUri,
    },
    'Token exchange',
  );

  if (!data.refresh_token) {
    throw new DocsAuthError(0, 'NO_REFRESH_TOKEN', 'Token exchange returned no refresh token');
  }
  return tokenResponseToStore(data, data.refresh_token);
}

/**
 * Refresh an access token using a refresh token.
 *
 * Google usually omits the refresh token on refresh; the previous one is
 * kept in that case.
 */
export async function refreshAccessToken(
  config: DocsAuthConfig,
  refreshToken: string,
): Promise<DocsTokenStore> {
  const data = await postTokenForm(
    {
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
      client_id: config.clientId,
      client_secret: config.clientSecret,
    },
    'Token refresh',
  );

  return tokenResponseToStore(data, data.refresh_token ?? refreshToken);
}

async function postTokenForm(
  form: Record<string, string>,
  label: string,
): Promise<DocsTokenResponse> {
  const response = await fetch(ENDPOINTS.token, {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    body: new URLSearchParams(form).toString(),
  });

  if (!response.ok) {
    throw new DocsAuthError(
      response.status,
      'TOKEN_ENDPOINT',
      `${label} failed: ${response.statusText}`,
    );
  }

  const json: unknown = await response.json();
  if (!isTokenResponse(json)) {
    throw new DocsAuthError(response.status, 'TOKEN_ENDPOINT', `${label} returned no access token`);
  }
  return json;
}

// ---------------------------------------------------------------------------
// Loopback redirect listener
// ---------------------------------------------------------------------------

/** A local HTTP listener that receives the OAuth redirect. */
export interface RedirectListener {
  /** `http://127.0.0.1:<port>` to register as the redirect URI. */
  redirectUri: string;
  /** Resolves with the full redirect URL of the first request. */
  waitForRedirect(): Promise<URL>;
  close(): Promise<void>;
}

/**
 * Listen on an ephemeral loopback port for the authorization redirect.
 */
export async function startRedirectListener(): Promise<RedirectListener> {
  let resolveRedirect: (url: URL) => void = () => undefined;
  const redirected = new Promise<URL>((resolve) => {
    resolveRedirect = resolve;
  });

  const server = createServer((req, res) => {
    const url = new URL(req.url ?? '/', `http://127.0.0.1:${listeningPort(server)}`);
    res.writeHead(200, { 'Content-Type': 'text/plain; charset=utf-8' });
    res.end('Authentication complete. You can close this window.');
    resolveRedirect(url);
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => resolve());
  });

  return {
    redirectUri: `http://127.0.0.1:${listeningPort(server)}`,
    waitForRedirect: () => redirected,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

function listeningPort(server: Server): number {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Redirect listener is not bound to a TCP port');
  }
  return address.port;
}

// ---------------------------------------------------------------------------
// Token persistence (JSON file)
// ---------------------------------------------------------------------------

/**
 * Persist tokens to `path`, readable by the current user only.
 */
export async function saveTokens(path: string, store: DocsTokenStore): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(store, null, 2), { encoding: 'utf8', mode: 0o600 });
}

/**
 * Load tokens from `path`. Returns `null` when the file is missing or does
 * not hold a token store.
 */
export async function loadTokens(path: string): Promise<DocsTokenStore | null> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  return isTokenStore(parsed) ? parsed : null;
}

/**
 * Remove persisted tokens.
 */
export async function clearTokens(path: string): Promise<void> {
  await rm(path, { force: true });
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function tokenResponseToStore(data: DocsTokenResponse, refreshToken: string): DocsTokenStore {
  return {
    accessToken: data.access_token,
    refreshToken,
    expiresAt: Date.now() + data.expires_in * 1000,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isTokenResponse(value: unknown): value is DocsTokenResponse {
  return (
    isRecord(value) &&
    typeof value.access_token === 'string' &&
    typeof value.expires_in === 'number' &&
    (value.refresh_token === undefined || typeof value.refresh_token === 'string')
  );
}

function isTokenStore(value: unknown): value is DocsTokenStore {
  return (
    isRecord(value) &&
    typeof value.accessToken === 'string' &&
    typeof value.refreshToken === 'string' &&
    typeof value.expiresAt === 'number'
  );
}

function isMissingFile(err: unknown): boolean {
  return isRecord(err) && err.code === 'ENOENT';
}
