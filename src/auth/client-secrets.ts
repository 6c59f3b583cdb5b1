/**
 * Application identity (OAuth client) loading
 * Reads the client_secrets.json downloaded from the Google Cloud console
 */

import { readFile } from 'fs/promises';

/**
 * OAuth client registration for this deployment
 */
export interface AppIdentity {
  clientId: string;
  clientSecret: string;
  redirectUris: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Parses a client secrets document
 * Accepts both the "installed" (desktop) and "web" client layouts
 *
 * @throws Error when required fields are missing
 */
export function parseClientSecrets(raw: string): AppIdentity {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error('Client secrets file is not valid JSON');
  }

  if (!isRecord(parsed)) {
    throw new Error('Client secrets file must contain a JSON object');
  }

  const section = isRecord(parsed.installed) ? parsed.installed : isRecord(parsed.web) ? parsed.web : null;
  if (!section) {
    throw new Error('Client secrets file must have an "installed" or "web" section');
  }

  const { client_id: clientId, client_secret: clientSecret, redirect_uris: redirectUris } = section;
  if (typeof clientId !== 'string' || !clientId) {
    throw new Error('Client secrets file is missing client_id');
  }
  if (typeof clientSecret !== 'string' || !clientSecret) {
    throw new Error('Client secrets file is missing client_secret');
  }

  return {
    clientId,
    clientSecret,
    redirectUris: Array.isArray(redirectUris)
      ? redirectUris.filter((uri): uri is string => typeof uri === 'string')
      : [],
  };
}

/**
 * Loads the application identity from disk
 *
 * @param filePath - Path to client_secrets.json
 */
export async function loadAppIdentity(filePath: string): Promise<AppIdentity> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Could not read client secrets at ${filePath}: ${reason}`, { cause: err });
  }
  return parseClientSecrets(raw);
}
