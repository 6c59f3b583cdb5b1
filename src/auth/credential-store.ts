/**
 * Persistence for the single delegated-access credential
 *
 * The file format is the one google-auth-library writes for OAuth2 tokens
 * (access_token, refresh_token, expiry_date, scope, token_type), so a token
 * file produced by other Google tooling loads as-is.
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { Credential } from '../types/index.js';
import { warn } from '../utils/logger.js';

/**
 * Storage backend for the process credential
 */
export interface CredentialStore {
  /**
   * Loads the stored credential.
   * @returns The credential, or null when none is stored.
   */
  load(): Promise<Credential | null>;

  /**
   * Stores the credential, replacing any previous one.
   */
  save(credential: Credential): Promise<void>;
}

/**
 * On-disk token shape
 */
interface StoredToken {
  access_token: string;
  refresh_token?: string;
  expiry_date: number;
  scope?: string;
  token_type?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isStoredToken(value: unknown): value is StoredToken {
  if (!isRecord(value)) return false;
  return (
    typeof value.access_token === 'string' &&
    typeof value.expiry_date === 'number' &&
    (value.refresh_token === undefined || typeof value.refresh_token === 'string') &&
    (value.scope === undefined || typeof value.scope === 'string')
  );
}

export function toStoredToken(credential: Credential): StoredToken {
  return {
    access_token: credential.accessToken,
    ...(credential.refreshToken ? { refresh_token: credential.refreshToken } : {}),
    expiry_date: credential.expiresAt,
    scope: credential.scopes.join(' '),
    token_type: 'Bearer',
  };
}

export function fromStoredToken(token: StoredToken): Credential {
  return {
    accessToken: token.access_token,
    refreshToken: token.refresh_token || null,
    expiresAt: token.expiry_date,
    scopes: token.scope ? token.scope.split(' ').filter(Boolean) : [],
  };
}

function isNotFound(err: unknown): boolean {
  return isRecord(err) && err.code === 'ENOENT';
}

/**
 * Credential store backed by a JSON file
 */
export class FileCredentialStore implements CredentialStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<Credential | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) {
        return null;
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      warn('Credential file is not valid JSON, ignoring it', { module: 'credential-store', path: this.filePath });
      return null;
    }

    if (!isStoredToken(parsed)) {
      warn('Credential file has invalid shape, ignoring it', { module: 'credential-store', path: this.filePath });
      return null;
    }

    return fromStoredToken(parsed);
  }

  async save(credential: Credential): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });

    // Write then rename so a crash never leaves a half-written token file
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tempPath, JSON.stringify(toStoredToken(credential), null, 2), {
      encoding: 'utf-8',
      mode: 0o600,
    });
    await rename(tempPath, this.filePath);
  }
}

/**
 * In-memory credential store for testing.
 * Data is lost on process restart.
 */
export class MemoryCredentialStore implements CredentialStore {
  private credential: Credential | null;

  constructor(initial: Credential | null = null) {
    this.credential = initial ? { ...initial } : null;
  }

  async load(): Promise<Credential | null> {
    return this.credential ? { ...this.credential } : null;
  }

  async save(credential: Credential): Promise<void> {
    this.credential = { ...credential };
  }

  /** Current stored value, for assertions */
  peek(): Credential | null {
    return this.credential;
  }
}
