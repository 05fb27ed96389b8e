/**
 * Configuration management for the portal invoice uploader
 * All configuration is loaded from environment variables
 */

import type { LogLevel } from './types/index.js';

/**
 * Portal application code used to query upload configuration
 */
export const DEFAULT_APPLICATION_CODE = 'REG-FACT';

/**
 * File type code of invoice ZIP archives
 */
export const DEFAULT_FILE_TYPE_CODE = 'ZIP_REG-FACT';

/**
 * Role header the portal expects on API calls
 */
export const DEFAULT_PORTAL_ROLES = '15574sad';

/**
 * User-Agent sent when none is configured
 */
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/108.0.0.0 Safari/537.36';

/**
 * Fetch timeout in milliseconds for a single portal request
 */
export const FETCH_TIMEOUT_MS = 60000;

/**
 * Application configuration loaded from environment
 */
export interface Config {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevel;

  // Portal credentials
  portalUsername: string;
  portalPassword: string;

  // Portal endpoints
  portalAuthUrl: string;
  portalApiUrl: string;
  /** Web origin sent as origin/referer */
  portalUrl: string;
  userAgent: string;

  // Organization
  organizationId: string;
  organizationName: string;
  userId: string;
  roles: string;

  // Upload protocol
  applicationCode: string;
  fileTypeCode: string;
  uploadEnabled: boolean;

  // Polling
  pollMaxAttempts: number;
  pollIntervalSeconds: number;

  // Batch
  uploadConcurrency: number;
  /** 0 disables the per-upload timeout */
  uploadTimeoutMs: number;
  maxItemsPerRun: number;

  // Reporting
  reportUtcOffsetHours: number;
}

/**
 * Reads a required environment variable
 * Throws if missing or empty
 */
function required(name: string): string {
  const value = process.env[name] || '';
  if (!value) {
    throw new Error(`${name} is required`);
  }
  return value;
}

/**
 * Parses a boolean flag ("true"/"1"/"yes")
 */
function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
}

/**
 * Parses an integer, falling back when not a finite number
 */
function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

const NODE_ENVS: ReadonlyArray<Config['nodeEnv']> = ['development', 'production', 'test'];
const LOG_LEVELS: ReadonlyArray<LogLevel> = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

function parseNodeEnv(value: string | undefined): Config['nodeEnv'] {
  return NODE_ENVS.find(env => env === value) ?? 'development';
}

function parseLogLevel(value: string | undefined): LogLevel {
  const upper = value?.toUpperCase();
  return LOG_LEVELS.find(level => level === upper) ?? 'INFO';
}

/**
 * Loads configuration from environment variables
 * Throws if required variables are missing
 */
export function loadConfig(): Config {
  const nodeEnv = parseNodeEnv(process.env.NODE_ENV);
  const logLevel = parseLogLevel(process.env.LOG_LEVEL);

  const portalUsername = required('PORTAL_USERNAME');
  const portalPassword = required('PORTAL_PASSWORD');
  const portalAuthUrl = required('PORTAL_AUTH_URL').replace(/\/$/, '');
  const portalApiUrl = required('PORTAL_API_URL').replace(/\/$/, '');
  const organizationId = required('ORGANIZATION_ID');
  const userId = required('USER_ID');

  // Off outside production unless PORTAL_UPLOAD_ENABLED is set
  const uploadEnabled = parseFlag(process.env.PORTAL_UPLOAD_ENABLED, nodeEnv === 'production');

  return {
    nodeEnv,
    logLevel,
    portalUsername,
    portalPassword,
    portalAuthUrl,
    portalApiUrl,
    portalUrl: process.env.PORTAL_URL || '',
    userAgent: process.env.PORTAL_USER_AGENT || DEFAULT_USER_AGENT,
    organizationId,
    organizationName: process.env.ORGANIZATION_NAME || '',
    userId,
    roles: process.env.PORTAL_ROLES || DEFAULT_PORTAL_ROLES,
    applicationCode: process.env.PORTAL_APPLICATION_CODE || DEFAULT_APPLICATION_CODE,
    fileTypeCode: process.env.PORTAL_FILE_TYPE_CODE || DEFAULT_FILE_TYPE_CODE,
    uploadEnabled,
    pollMaxAttempts: Math.max(1, parseNumber(process.env.POLL_MAX_ATTEMPTS, 10)),
    pollIntervalSeconds: Math.max(0, parseNumber(process.env.POLL_INTERVAL_SECONDS, 6)),
    uploadConcurrency: Math.max(1, parseNumber(process.env.UPLOAD_CONCURRENCY, 1)),
    uploadTimeoutMs: Math.max(0, parseNumber(process.env.UPLOAD_TIMEOUT_MS, 0)),
    maxItemsPerRun: Math.max(1, parseNumber(process.env.MAX_ITEMS_PER_RUN, 100)),
    reportUtcOffsetHours: parseNumber(process.env.REPORT_UTC_OFFSET_HOURS, -5),
  };
}

/**
 * Singleton config instance
 */
let configInstance: Config | null = null;

/**
 * Gets the application configuration
 * Loads from environment on first call
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Resets the config instance (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
