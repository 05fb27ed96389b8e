/**
 * Validation utilities for portal API responses
 * Narrows untyped JSON bodies into the engine's domain types
 */

import type { FileResult, PortalMessage, StatusSnapshot } from '../types/index.js';

/**
 * Checks that a value is a plain JSON object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a field as a string
 * Numbers are stringified; anything else yields the fallback
 */
export function readString(record: Record<string, unknown>, key: string, fallback: string = ''): string {
  const value = record[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return fallback;
}

/**
 * Reads a field as an array, empty when absent or not an array
 */
export function readArray(record: Record<string, unknown>, key: string): unknown[] {
  const value = record[key];
  return Array.isArray(value) ? value : [];
}

/**
 * Login response fields
 */
export interface LoginPayload {
  accessToken: string | null;
  tokenType: string;
}

/**
 * Parses the login response
 *
 * @param body - Parsed response body
 * @returns Token (null when absent or empty) and token type (default "Bearer")
 */
export function parseLoginResponse(body: unknown): LoginPayload {
  if (!isRecord(body)) {
    return { accessToken: null, tokenType: 'Bearer' };
  }
  const accessToken = readString(body, 'access_token');
  return {
    accessToken: accessToken || null,
    tokenType: readString(body, 'token_type') || 'Bearer',
  };
}

/**
 * File type entry from the application configuration endpoint
 */
export interface FileTypeEntry {
  code: string;
  id: string;
}

/**
 * Parses the `tipos` list of the application configuration response
 */
export function parseFileTypes(body: unknown): FileTypeEntry[] {
  if (!isRecord(body)) return [];
  return readArray(body, 'tipos')
    .filter(isRecord)
    .map(tipo => ({ code: readString(tipo, 'codigo'), id: readString(tipo, 'id') }));
}

/**
 * Parses the signed URL response: a map of file name to URL
 */
export function parseSignedUrls(body: unknown): Map<string, string> {
  const urls = new Map<string, string>();
  if (!isRecord(body)) return urls;
  for (const [fileName, url] of Object.entries(body)) {
    if (typeof url === 'string' && url) {
      urls.set(fileName, url);
    }
  }
  return urls;
}

function parseMessage(raw: Record<string, unknown>): PortalMessage {
  return {
    code: readString(raw, 'codigo'),
    type: readString(raw, 'tipo'),
    description: readString(raw, 'descripcion'),
  };
}

function parseFileResult(raw: Record<string, unknown>): FileResult {
  return {
    state: readString(raw, 'estado'),
    messages: readArray(raw, 'mensajes').filter(isRecord).map(parseMessage),
  };
}

/**
 * Parses a status (findLoad) response into a snapshot
 *
 * Missing fields default to empty values; a non-object body yields an
 * empty snapshot, which the poller treats as non-terminal.
 */
export function parseStatusSnapshot(body: unknown): StatusSnapshot {
  if (!isRecord(body)) {
    return { state: '', files: [] };
  }
  const id = readString(body, 'id');
  return {
    ...(id ? { id } : {}),
    state: readString(body, 'estado'),
    files: readArray(body, 'archivos').filter(isRecord).map(parseFileResult),
  };
}
