/**
 * Authenticated session against the portal
 *
 * Holds the bearer token, the header bag and the transaction id of the
 * attempt in flight. One Session serves one worker; pipeline runs must not
 * interleave on the same instance.
 */

import { randomUUID } from 'node:crypto';
import type { Credential } from '../types/index.js';
import { AuthenticationError, TransportError } from '../types/index.js';
import { HeaderBag } from './headers.js';
import type { HttpMethod, PortalHttp, RequestOptions } from './http.js';
import { isAuthorizationError } from './errors.js';
import { parseLoginResponse } from '../utils/validation.js';
import { info, warn } from '../utils/logger.js';

export const LOGIN_ENDPOINT = '/login/users/login';

export interface SessionOptions {
  /** Base URL of the authentication service */
  authBaseUrl: string;
  /** Portal web origin, sent as origin and referer */
  portalUrl: string;
  userAgent: string;
}

/**
 * Capitalizes a token kind the way the portal expects ("bearer" -> "Bearer")
 */
export function formatTokenType(tokenType: string): string {
  if (!tokenType) return 'Bearer';
  return tokenType.charAt(0).toUpperCase() + tokenType.slice(1).toLowerCase();
}

export class Session {
  readonly headers = new HeaderBag();
  private token: string | null = null;
  private tokenType: string = 'Bearer';
  private currentTransactionId: string | null = null;

  constructor(
    private readonly credential: Credential,
    private readonly http: PortalHttp,
    private readonly options: SessionOptions
  ) {}

  get isAuthenticated(): boolean {
    return this.token !== null;
  }

  /**
   * Transaction id of the attempt in flight
   *
   * @throws Error if no attempt has begun
   */
  get transactionId(): string {
    if (!this.currentTransactionId) {
      throw new Error('No transaction in progress; call beginTransaction() first');
    }
    return this.currentTransactionId;
  }

  /**
   * Fresh base headers, identical on every login
   */
  baseHeaders(): Record<string, string> {
    return {
      'accept': 'application/json, text/plain, */*',
      'accept-language': 'en-US,en;q=0.9',
      'cache-control': 'no-cache',
      'content-type': 'application/json',
      'origin': this.options.portalUrl,
      'pragma': 'no-cache',
      'referer': this.options.portalUrl,
      'user-agent': this.options.userAgent,
    };
  }

  /**
   * Authenticates and resets the header bag to base headers plus Authorization
   *
   * @throws AuthenticationError if the portal rejects the credentials or returns no token
   */
  async login(): Promise<void> {
    const loginHeaders = this.baseHeaders();
    this.token = null;

    let body: unknown;
    try {
      body = await this.http.request('POST', `${this.options.authBaseUrl}${LOGIN_ENDPOINT}`, {
        json: { username: this.credential.username, password: this.credential.password },
        headers: loginHeaders,
      });
    } catch (err) {
      if (err instanceof TransportError && (err.status === 401 || err.status === 403)) {
        throw new AuthenticationError(`Login rejected with status ${err.status}`);
      }
      throw err;
    }

    const { accessToken, tokenType } = parseLoginResponse(body);
    if (!accessToken) {
      throw new AuthenticationError("Login failed: 'access_token' not found in response");
    }

    this.token = accessToken;
    this.tokenType = formatTokenType(tokenType);
    this.headers.reset(loginHeaders);
    this.headers.set('Authorization', `${this.tokenType} ${accessToken}`);

    info('Portal session authenticated', { module: 'session', phase: 'login' });
  }

  /**
   * Runs a portal call with authentication
   *
   * Logs in first when no token is held. On a 401 the token is dropped,
   * login runs once more and the call is replayed once; any further
   * failure propagates unchanged.
   *
   * @param call - The portal call to run
   * @returns The call's result
   */
  async withAuth<T>(call: () => Promise<T>): Promise<T> {
    if (!this.isAuthenticated) {
      info('No token found, performing initial login', { module: 'session', phase: 'auth' });
      await this.login();
    }

    try {
      return await call();
    } catch (err) {
      if (!isAuthorizationError(err)) {
        throw err;
      }
      warn('Token expired or invalid (401), re-authenticating', { module: 'session', phase: 'auth' });
      this.token = null;
      await this.login();
      return await call();
    }
  }

  /**
   * Sends a request with the current session headers
   * Per-request headers override session headers for that call only
   */
  async send(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<unknown> {
    const headers = new HeaderBag(this.headers.toRecord());
    headers.merge(options.headers ?? {});
    return this.http.request(method, url, { ...options, headers: headers.toRecord() });
  }

  /**
   * Starts an upload attempt with a fresh transaction id
   */
  beginTransaction(transactionId: string = randomUUID()): string {
    this.currentTransactionId = transactionId;
    return transactionId;
  }

  endTransaction(): void {
    this.currentTransactionId = null;
  }
}
