/**
 * Shared test fixtures
 */

import type { Config } from '../config.js';
import type { Credential } from '../types/index.js';

export function testConfig(overrides: Partial<Config> = {}): Config {
  return {
    nodeEnv: 'test',
    logLevel: 'INFO',
    portalUsername: 'test-user',
    portalPassword: 'test-password',
    portalAuthUrl: 'https://auth.portal.test',
    portalApiUrl: 'https://api.portal.test',
    portalUrl: 'https://portal.test',
    userAgent: 'test-agent',
    organizationId: '900000001',
    organizationName: 'TEST ORG S.A.S.',
    userId: 'test-user-id',
    roles: 'test-role',
    applicationCode: 'REG-FACT',
    fileTypeCode: 'ZIP_REG-FACT',
    uploadEnabled: true,
    pollMaxAttempts: 10,
    pollIntervalSeconds: 6,
    uploadConcurrency: 1,
    uploadTimeoutMs: 0,
    maxItemsPerRun: 100,
    reportUtcOffsetHours: -5,
    ...overrides,
  };
}

export const testCredential: Credential = Object.freeze({
  username: 'test-user',
  password: 'test-password',
  organizationId: '900000001',
  organizationName: 'TEST ORG S.A.S.',
  userId: 'test-user-id',
});

/**
 * Builds a fetch Response with a JSON (or raw text) body
 */
export function jsonResponse(body: unknown, status: number = 200): Response {
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return new Response(status === 204 ? null : text, { status });
}

/**
 * A request captured by the fake fetch
 */
export interface RecordedRequest {
  method: string;
  url: string;
  path: string;
  query: Record<string, string>;
  /** Header names lower-cased */
  headers: Record<string, string>;
  /** Parsed JSON body, raw Buffer for binary bodies, undefined when empty */
  body: unknown;
}

export type FakeHandler = (request: RecordedRequest) => Response | Promise<Response>;

function decodeBody(body: unknown): unknown {
  if (typeof body === 'string') {
    try {
      return JSON.parse(body);
    } catch {
      return body;
    }
  }
  return body ?? undefined;
}

/**
 * fetch stand-in that records every request and answers through a handler
 */
export function createFakeFetch(handler: FakeHandler): {
  fetchFn: (input: string, init?: RequestInit) => Promise<Response>;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];

  const fetchFn = async (input: string, init?: RequestInit): Promise<Response> => {
    const url = new URL(input);
    const request: RecordedRequest = {
      method: init?.method ?? 'GET',
      url: input,
      path: url.pathname,
      query: Object.fromEntries(url.searchParams.entries()),
      headers: Object.fromEntries(new Headers(init?.headers).entries()),
      body: decodeBody(init?.body),
    };
    requests.push(request);
    return handler(request);
  };

  return { fetchFn, requests };
}

export const SIGNED_URL_BASE = 'https://storage.portal.test/bucket';

export interface FakePortalOptions {
  /** findLoad bodies, served in order; the last one repeats */
  snapshots: unknown[];
  /** Access tokens handed out by successive logins */
  tokens?: string[];
  /** Paths answered with 401 the first N times they are hit */
  unauthorizedOnce?: Record<string, number>;
  /** Overrides the application configuration body */
  applicationBody?: unknown;
}

/**
 * In-process stand-in for the portal API, auth service and signed-URL storage
 */
export function createFakePortal(options: FakePortalOptions) {
  const tokens = options.tokens ?? ['token-1', 'token-2', 'token-3'];
  const unauthorized = { ...options.unauthorizedOnce };
  let logins = 0;
  let polls = 0;

  const fake = createFakeFetch(request => {
    const remaining = unauthorized[request.path] ?? 0;
    if (remaining > 0) {
      unauthorized[request.path] = remaining - 1;
      return jsonResponse({ message: 'Unauthorized' }, 401);
    }

    if (request.path === '/login/users/login') {
      const token = tokens[Math.min(logins, tokens.length - 1)];
      logins++;
      return jsonResponse({ access_token: token, token_type: 'bearer' });
    }
    if (request.path.endsWith('/application')) {
      return jsonResponse(
        options.applicationBody ?? {
          tipos: [
            { codigo: 'PDF_REG-FACT', id: 'type-pdf' },
            { codigo: 'ZIP_REG-FACT', id: 'type-zip' },
          ],
        }
      );
    }
    if (request.path.endsWith('/upload')) {
      return new Response(null, { status: 204 });
    }
    if (request.path.endsWith('/signedUrl/getUrlUploadFile')) {
      const fileName = request.query.fileNames;
      return jsonResponse({ [fileName]: `${SIGNED_URL_BASE}/${fileName}?sig=abc` });
    }
    if (request.url.startsWith(SIGNED_URL_BASE)) {
      return new Response('', { status: 200 });
    }
    if (request.path.endsWith('/upload-files')) {
      return jsonResponse({});
    }
    if (request.path.endsWith('/findLoad')) {
      const body = options.snapshots[Math.min(polls, options.snapshots.length - 1)];
      polls++;
      return jsonResponse(body);
    }
    return jsonResponse({ message: 'Not found' }, 404);
  });

  return {
    ...fake,
    get logins(): number {
      return logins;
    },
    get polls(): number {
      return polls;
    },
  };
}
