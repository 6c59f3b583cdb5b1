/**
 * Interactive OAuth consent over a loopback redirect
 *
 * Starts a one-shot HTTP listener on 127.0.0.1, prints the consent URL and
 * exchanges the returned authorization code for a credential.
 */

import { createServer } from 'node:http';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { randomBytes } from 'node:crypto';
import { google } from 'googleapis';
import type { Auth } from 'googleapis';
import type { Credential, Result } from '../types/index.js';
import type { AppIdentity } from './client-secrets.js';
import type { AuthorizationPrompter } from './credential-manager.js';
import { AUTHORIZATION_TIMEOUT_MS, DRIVE_READONLY_SCOPE } from '../config.js';
import { info, debug } from '../utils/logger.js';

export const CALLBACK_PATH = '/oauth/callback';

const LOOPBACK_HOST = '127.0.0.1';

export interface LoopbackPrompterOptions {
  /** Time to wait for the browser redirect (default: AUTHORIZATION_TIMEOUT_MS) */
  timeoutMs?: number;
  /** Shows the consent URL to the user (default: stderr) */
  announce?: (authUrl: string) => void;
}

/**
 * Reads the authorization code from a redirect request
 *
 * @returns null when the request is not for the callback path,
 *   otherwise the code or a message describing why it was refused
 */
export function parseCallback(requestUrl: string, expectedState: string): Result<string, string> | null {
  const parsed = new URL(requestUrl, `http://${LOOPBACK_HOST}`);
  if (parsed.pathname !== CALLBACK_PATH) {
    return null;
  }

  const error = parsed.searchParams.get('error');
  if (error) {
    return { ok: false, error: `Authorization was denied: ${error}` };
  }

  if (parsed.searchParams.get('state') !== expectedState) {
    return { ok: false, error: 'Authorization response has an unexpected state parameter' };
  }

  const code = parsed.searchParams.get('code');
  if (!code) {
    return { ok: false, error: 'Authorization response has no code' };
  }

  return { ok: true, value: code };
}

/**
 * Converts the token endpoint response into a Credential
 */
export function credentialFromTokens(tokens: Auth.Credentials): Credential {
  if (!tokens.access_token) {
    throw new Error('Token endpoint returned no access token');
  }
  if (typeof tokens.expiry_date !== 'number') {
    throw new Error('Token endpoint returned no expiry');
  }

  return {
    accessToken: tokens.access_token,
    refreshToken: tokens.refresh_token ?? null,
    expiresAt: tokens.expiry_date,
    scopes: tokens.scope ? tokens.scope.split(' ').filter(Boolean) : [DRIVE_READONLY_SCOPE],
  };
}

function listen(server: Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, LOOPBACK_HOST, () => {
      server.off('error', reject);
      const address: AddressInfo | string | null = server.address();
      if (address && typeof address === 'object') {
        resolve(address.port);
      } else {
        reject(new Error('Could not determine the callback port'));
      }
    });
  });
}

function page(message: string): string {
  return `<!DOCTYPE html>
<html>
<head><title>Drive authorization</title></head>
<body style="font-family:system-ui,sans-serif;text-align:center;padding-top:4rem;">
  <h2>${message}</h2>
</body>
</html>`;
}

export class LoopbackAuthorizationPrompter implements AuthorizationPrompter {
  private readonly timeoutMs: number;
  private readonly announce: (authUrl: string) => void;

  constructor(
    private readonly identity: AppIdentity,
    options: LoopbackPrompterOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? AUTHORIZATION_TIMEOUT_MS;
    this.announce =
      options.announce ??
      ((authUrl) => {
        process.stderr.write(`\nOpen this URL in a browser to grant read-only Drive access:\n\n${authUrl}\n\n`);
      });
  }

  async obtainCredential(): Promise<Credential> {
    const state = randomBytes(16).toString('hex');
    let settle: ((outcome: Result<string, string>) => void) | null = null;
    const outcome = new Promise<Result<string, string>>((resolve) => {
      settle = resolve;
    });

    const server = createServer((req, res) => {
      const parsed = parseCallback(req.url ?? '/', state);
      if (!parsed) {
        res.writeHead(404);
        res.end('Not found');
        return;
      }

      res.writeHead(parsed.ok ? 200 : 400, { 'Content-Type': 'text/html' });
      res.end(page(parsed.ok ? 'Authorization complete. You can close this window.' : 'Authorization failed.'));
      settle?.(parsed);
      settle = null;
    });

    const port = await listen(server);
    const redirectUri = `http://${LOOPBACK_HOST}:${port}${CALLBACK_PATH}`;
    const client = new google.auth.OAuth2(this.identity.clientId, this.identity.clientSecret, redirectUri);

    const authUrl = client.generateAuthUrl({
      access_type: 'offline',
      prompt: 'consent',
      scope: [DRIVE_READONLY_SCOPE],
      state,
    });

    debug('Waiting for authorization redirect', { module: 'loopback-prompter', port });
    this.announce(authUrl);

    const timer = setTimeout(() => {
      settle?.({ ok: false, error: `Authorization timed out after ${Math.round(this.timeoutMs / 1000)} seconds` });
      settle = null;
    }, this.timeoutMs);

    try {
      const result = await outcome;
      if (!result.ok) {
        throw new Error(result.error);
      }

      const { tokens } = await client.getToken(result.value);
      const credential = credentialFromTokens(tokens);
      info('Authorization code exchanged', { module: 'loopback-prompter' });
      return credential;
    } finally {
      clearTimeout(timer);
      server.close();
    }
  }
}
