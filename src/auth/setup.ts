/**
 * Wires the credential manager from configuration
 */

import type { Config } from '../config.js';
import { loadAppIdentity } from './client-secrets.js';
import { FileCredentialStore } from './credential-store.js';
import { CredentialManager } from './credential-manager.js';
import type { AuthorizationPrompter } from './credential-manager.js';
import type { AppIdentity } from './client-secrets.js';
import { GoogleTokenRefresher, createGoogleDriveClientFactory } from './google-token-refresher.js';

export interface CredentialSetup {
  identity: AppIdentity;
  manager: CredentialManager;
}

/**
 * Loads the app identity and builds a CredentialManager over the token file
 *
 * @param createPrompter - Builds the interactive prompter, for the authorize command
 */
export async function createCredentialManager(
  config: Config,
  createPrompter?: (identity: AppIdentity) => AuthorizationPrompter
): Promise<CredentialSetup> {
  const identity = await loadAppIdentity(config.clientSecretsPath);
  const manager = new CredentialManager({
    store: new FileCredentialStore(config.credentialPath),
    refresher: new GoogleTokenRefresher(identity),
    createDriveClient: createGoogleDriveClientFactory(identity),
    prompter: createPrompter?.(identity),
    expirySkewMs: config.tokenExpirySkewMs,
  });
  return { identity, manager };
}
