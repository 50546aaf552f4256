/**
 * High-level HTTP client for the Google Docs API.
 *
 * Integrates OAuth token management, automatic token refresh with
 * mutex-style concurrency control, rate limiting, and exponential
 * backoff retry.
 */

import {
  BatchUpdateRequest,
  BatchUpdateResponse,
  DocsApiError,
  DocsAuthConfig,
  DocsAuthError,
  DocsDocument,
  DocsErrorBody,
  DocumentNotFoundError,
  ENDPOINTS,
} from './types.js';
import {
  buildAuthorizationUrl,
  clearTokens,
  exchangeCodeForTokens,
  generateCodeChallenge,
  generateCodeVerifier,
  generateState,
  isTokenExpired,
  loadTokens,
  refreshAccessToken,
  saveTokens,
  startRedirectListener,
  validateState,
} from './auth.js';
import { RateLimiter, RetryInfo, RetryOptions, parseRetryAfter, withRetry } from './rate-limiter.js';
import { silentLogger } from '../logger.js';
import type { Logger } from '../logger.js';

// ---------------------------------------------------------------------------
// Client configuration
// ---------------------------------------------------------------------------

/** Configuration used to construct a {@link DocsClient}. */
export interface DocsClientConfig {
  clientId: string;
  clientSecret: string;
  /** JSON file holding the persisted tokens. */
  tokenFile: string;
  /** Default: 5. */
  requestsPerSecond?: number;
  retry?: RetryOptions;
  logger?: Logger;
}

/** Opens the authorization URL for the user (browser, terminal, ...). */
export type OpenUrl = (url: string) => void | Promise<void>;

// ---------------------------------------------------------------------------
// DocsClient
// ---------------------------------------------------------------------------

/**
 * Authenticated HTTP client for the Docs API.
 *
 * Usage:
 * ```ts
 * const client = new DocsClient({ clientId: '...', clientSecret: '...', tokenFile: '...' });
 * await client.authenticate((url) => console.log(url));
 * const doc = await client.createDocument('My Note');
 * ```
 */
export class DocsClient {
  readonly baseUrl = ENDPOINTS.web;
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly tokenFile: string;
  private readonly apiBase: string;
  private readonly rateLimiter: RateLimiter;
  private readonly retryOptions: RetryOptions;
  private readonly logger: Logger;

  /**
   * Shared promise used to serialize concurrent token refresh attempts.
   * Only one refresh network call is in-flight at any time.
   */
  private refreshPromise: Promise<void> | null = null;

  constructor(clientConfig: DocsClientConfig) {
    this.clientId = clientConfig.clientId;
    this.clientSecret = clientConfig.clientSecret;
    this.tokenFile = clientConfig.tokenFile;
    this.apiBase = ENDPOINTS.api;
    this.rateLimiter = new RateLimiter(clientConfig.requestsPerSecond ?? 5, 1000);
    this.logger = clientConfig.logger ?? silentLogger;
    this.retryOptions = {
      onRetry: (info, attempt, delayMs) => {
        this.logger.warn(
          `Request failed with HTTP ${info.status}; retry ${attempt} in ${Math.round(delayMs)}ms`,
        );
      },
      ...clientConfig.retry,
    };
  }

  // -----------------------------------------------------------------------
  // Authentication
  // -----------------------------------------------------------------------

  /**
   * Run the OAuth 2.0 + PKCE flow with a loopback redirect and store the
   * resulting tokens.
   *
   * @param openUrl - Presents the authorization URL to the user.
   */
  async authenticate(openUrl: OpenUrl): Promise<void> {
    const listener = await startRedirectListener();
    try {
      const config = this.authConfig(listener.redirectUri);
      const codeVerifier = generateCodeVerifier();
      const state = generateState();
      const authUrl = buildAuthorizationUrl(config, generateCodeChallenge(codeVerifier), state);

      await openUrl(authUrl);
      const url = await listener.waitForRedirect();

      const denied = url.searchParams.get('error');
      if (denied) {
        throw new DocsAuthError(0, 'ACCESS_DENIED', `Authorization failed: ${denied}`);
      }

      const receivedState = url.searchParams.get('state') ?? '';
      if (!validateState(state, receivedState)) {
        throw new DocsAuthError(0, 'STATE_MISMATCH', 'State mismatch: possible CSRF attack');
      }

      const code = url.searchParams.get('code');
      if (!code) {
        throw new DocsAuthError(0, 'NO_CODE', 'No authorization code in redirect URL');
      }

      const tokens = await exchangeCodeForTokens(config, code, codeVerifier);
      await saveTokens(this.tokenFile, tokens);
      this.logger.info(`Stored tokens in ${this.tokenFile}`);
    } finally {
      await listener.close();
    }
  }

  /**
   * Check whether a token store with a refresh token is available.
   */
  async isAuthenticated(): Promise<boolean> {
    const tokens = await loadTokens(this.tokenFile);
    return tokens !== null;
  }

  /**
   * Remove all stored tokens.
   */
  async logout(): Promise<void> {
    await clearTokens(this.tokenFile);
  }

  // -----------------------------------------------------------------------
  // Generic request
  // -----------------------------------------------------------------------

  /**
   * Make an authenticated API request.
   *
   * - Automatically attaches the `Authorization` header.
   * - Refreshes the access token on 401 (with mutex to avoid races).
   * - Applies rate limiting and retry with exponential backoff.
   *
   * @param method HTTP method.
   * @param path   API path relative to the API base (e.g. `/documents`).
   * @param body   Optional JSON body.
   */
  async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const execute = async (): Promise<T> => {
      await this.rateLimiter.acquire();
      const token = await this.ensureValidToken();
      const url = `${this.apiBase}${path}`;
      this.logger.debug(`${method} ${url}`);

      const headers: Record<string, string> = {
        Authorization: `Bearer ${token}`,
        'Content-Type': 'application/json',
      };
      const payload = body !== undefined ? JSON.stringify(body) : undefined;

      const response = await fetch(url, { method, headers, body: payload });

      if (response.status === 401) {
        // Token may have been revoked server-side; force a refresh.
        await this.forceRefresh();
        const freshToken = await this.ensureValidToken();
        const retryResponse = await fetch(url, {
          method,
          headers: { ...headers, Authorization: `Bearer ${freshToken}` },
          body: payload,
        });
        return this.parseResponse<T>(retryResponse);
      }

      return this.parseResponse<T>(response);
    };

    return withRetry(execute, classifyError, this.retryOptions);
  }

  // -----------------------------------------------------------------------
  // Convenience methods
  // -----------------------------------------------------------------------

  /**
   * Retrieve a document.
   */
  async getDocument(documentId: string): Promise<DocsDocument> {
    return this.request<DocsDocument>('GET', `/documents/${encodeURIComponent(documentId)}`);
  }

  /**
   * Create a new, empty document.
   */
  async createDocument(title = 'New Document'): Promise<DocsDocument> {
    const document = await this.request<DocsDocument>('POST', '/documents', { title });
    this.logger.info(`Created document "${title}" (${document.documentId})`);
    return document;
  }

  /**
   * Apply requests to a document in one transactional batch.
   */
  async batchUpdate(
    documentId: string,
    requests: BatchUpdateRequest[],
  ): Promise<BatchUpdateResponse> {
    return this.request<BatchUpdateResponse>(
      'POST',
      `/documents/${encodeURIComponent(documentId)}:batchUpdate`,
      { requests },
    );
  }

  // -----------------------------------------------------------------------
  // Token management (private)
  // -----------------------------------------------------------------------

  private authConfig(redirectUri = ''): DocsAuthConfig {
    return { clientId: this.clientId, clientSecret: this.clientSecret, redirectUri };
  }

  /**
   * Return a valid access token, refreshing if necessary.
   * Concurrent callers share the same refresh promise (mutex pattern).
   */
  private async ensureValidToken(): Promise<string> {
    const tokens = await loadTokens(this.tokenFile);
    if (!tokens) {
      throw new DocsAuthError(401, 'UNAUTHENTICATED', 'Not authenticated: run "note2gdocs login"');
    }

    if (!isTokenExpired(tokens)) {
      return tokens.accessToken;
    }

    await this.forceRefresh();

    const refreshed = await loadTokens(this.tokenFile);
    if (!refreshed) {
      throw new DocsAuthError(401, 'UNAUTHENTICATED', 'Token refresh failed');
    }
    return refreshed.accessToken;
  }

  /**
   * Refresh the token, joining a refresh already in flight.
   */
  private async forceRefresh(): Promise<void> {
    if (!this.refreshPromise) {
      this.refreshPromise = this.doRefresh().finally(() => {
        this.refreshPromise = null;
      });
    }
    await this.refreshPromise;
  }

  /**
   * Perform the actual token refresh network call.
   */
  private async doRefresh(): Promise<void> {
    const tokens = await loadTokens(this.tokenFile);
    if (!tokens) {
      throw new DocsAuthError(401, 'UNAUTHENTICATED', 'No tokens available for refresh');
    }
    this.logger.debug('Refreshing access token');
    const newTokens = await refreshAccessToken(this.authConfig(), tokens.refreshToken);
    await saveTokens(this.tokenFile, newTokens);
  }

  /**
   * Parse a fetch `Response`, throwing the matching error subclass for
   * non-success status codes.
   */
  private async parseResponse<T>(response: Response): Promise<T> {
    if (response.ok) {
      return (await response.json()) as T;
    }

    const errorBody = await readErrorBody(response);
    const message = errorBody.error?.message ?? response.statusText;
    const status = errorBody.error?.status ?? 'UNKNOWN';

    if (response.status === 404) {
      throw new DocumentNotFoundError(message);
    }
    if (response.status === 401 || response.status === 403) {
      throw new DocsAuthError(response.status, status, message);
    }
    throw new DocsApiError(
      response.status,
      status,
      message,
      parseRetryAfter(response.headers.get('Retry-After')),
    );
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function classifyError(error: unknown): RetryInfo {
  if (error instanceof DocsApiError) {
    return { status: error.httpStatus, retryAfterMs: error.retryAfterMs };
  }
  return { status: undefined };
}

async function readErrorBody(response: Response): Promise<DocsErrorBody> {
  let json: unknown;
  try {
    json = await response.json();
  } catch {
    return {};
  }
  if (typeof json !== 'object' || json === null || !('error' in json)) return {};

  const { error } = json;
  if (typeof error !== 'object' || error === null) return {};
  return {
    error: {
      message: 'message' in error && typeof error.message === 'string' ? error.message : undefined,
      status: 'status' in error && typeof error.status === 'string' ? error.status : undefined,
    },
  };
}
