#!/usr/bin/env node

/**
 * Grants the server read-only Drive access and stores the credential
 */

import 'dotenv/config';
import { getConfig } from './config.js';
import { createCredentialManager } from './auth/setup.js';
import { LoopbackAuthorizationPrompter } from './auth/loopback-prompter.js';
import { info, error as logError, resetLogger } from './utils/logger.js';

async function main(): Promise<void> {
  const config = getConfig();
  const { manager } = await createCredentialManager(
    config,
    (identity) => new LoopbackAuthorizationPrompter(identity)
  );

  const credential = await manager.authorize();
  if (!credential.refreshToken) {
    logError('No refresh token was granted; access will stop when the token expires', { module: 'authorize' });
  }
  info('Credential saved', { module: 'authorize', path: config.credentialPath });
}

main()
  .then(() => {
    resetLogger();
  })
  .catch((err: unknown) => {
    logError('Authorization failed', {
      module: 'authorize',
      error: err instanceof Error ? err.message : String(err),
    });
    resetLogger();
    process.exitCode = 1;
  });
