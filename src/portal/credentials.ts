/**
 * Credential store for the portal
 */

import type { Config } from '../config.js';
import type { Credential } from '../types/index.js';

/**
 * Builds the immutable credential set from configuration
 *
 * @param config - Application configuration
 * @returns Frozen credential
 * @throws Error if username or password is empty
 */
export function createCredential(
  config: Pick<Config, 'portalUsername' | 'portalPassword' | 'organizationId' | 'organizationName' | 'userId'>
): Credential {
  if (!config.portalUsername || !config.portalPassword) {
    throw new Error('PORTAL_USERNAME and PORTAL_PASSWORD must be set');
  }

  return Object.freeze({
    username: config.portalUsername,
    password: config.portalPassword,
    organizationId: config.organizationId,
    organizationName: config.organizationName,
    userId: config.userId,
  });
}
