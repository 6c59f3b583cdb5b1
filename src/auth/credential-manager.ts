/**
 * Credential lifecycle for the single delegated-access credential
 *
 * Owns the in-memory copy, refreshes it when expired, writes refreshed tokens
 * through the store, and hands out Drive clients bound to the current access
 * token. Interactive authorization is delegated to an injected prompter.
 */

import type { Credential, CredentialStatus } from '../types/index.js';
import type { DriveClient } from '../drive/client.js';
import type { CredentialStore } from './credential-store.js';
import { AuthError } from '../errors.js';
import { debug, info, warn, error as logError } from '../utils/logger.js';

/**
 * Token data returned by a refresh exchange
 */
export interface RefreshedToken {
  accessToken: string;
  expiresAt: number;
  /** Set when the provider rotated the refresh token */
  refreshToken?: string | null;
  scopes?: string[];
}

/**
 * Performs the refresh-token exchange against the authorization server
 */
export interface TokenRefresher {
  refresh(refreshToken: string): Promise<RefreshedToken>;
}

/**
 * Runs the interactive consent flow and returns a brand-new credential
 */
export interface AuthorizationPrompter {
  obtainCredential(): Promise<Credential>;
}

/**
 * Drive access bound to one access token
 */
export interface AuthorizedClient {
  accessToken: string;
  drive: DriveClient;
}

/**
 * Builds a Drive client for a credential; must not be given refresh rights
 */
export type DriveClientFactory = (credential: Credential) => DriveClient;

export interface CredentialManagerOptions {
  store: CredentialStore;
  refresher: TokenRefresher;
  createDriveClient: DriveClientFactory;
  prompter?: AuthorizationPrompter;
  /** Treat tokens as expired this many ms before their expiry (default: 0) */
  expirySkewMs?: number;
  /** Clock, for testing */
  now?: () => number;
}

/**
 * Keeps one credential valid for the lifetime of the process
 */
export class CredentialManager {
  private credential: Credential | null = null;
  private loaded = false;
  private loadPromise: Promise<Credential | null> | null = null;
  private refreshPromise: Promise<Credential> | null = null;
  private client: AuthorizedClient | null = null;

  private readonly store: CredentialStore;
  private readonly refresher: TokenRefresher;
  private readonly createDriveClient: DriveClientFactory;
  private readonly prompter: AuthorizationPrompter | undefined;
  private readonly expirySkewMs: number;
  private readonly now: () => number;

  constructor(options: CredentialManagerOptions) {
    this.store = options.store;
    this.refresher = options.refresher;
    this.createDriveClient = options.createDriveClient;
    this.prompter = options.prompter;
    this.expirySkewMs = options.expirySkewMs ?? 0;
    this.now = options.now ?? Date.now;
  }

  /**
   * Returns a Drive client bound to a valid access token
   *
   * @throws AuthError NoCredential when nothing usable is stored,
   *   RefreshFailed when the refresh exchange is rejected
   */
  async ensureAuthorizedClient(): Promise<AuthorizedClient> {
    const credential = await this.loadOnce();

    if (!credential) {
      throw new AuthError('NoCredential', 'No stored credential. Run the authorize command to grant Drive access.');
    }

    if (this.isValid(credential)) {
      return this.clientFor(credential);
    }

    if (!credential.refreshToken) {
      throw new AuthError(
        'NoCredential',
        'Stored credential has expired and has no refresh token. Run the authorize command again.'
      );
    }

    const refreshed = await this.refreshOnce(credential.refreshToken);
    return this.clientFor(refreshed);
  }

  /**
   * Runs the interactive authorization flow and persists the new credential
   */
  async authorize(): Promise<Credential> {
    if (!this.prompter) {
      throw new Error('No authorization prompter configured');
    }

    const credential = await this.prompter.obtainCredential();
    await this.store.save(credential);
    this.adopt(credential);

    info('Authorization completed', {
      module: 'credential-manager',
      hasRefreshToken: credential.refreshToken !== null,
      scopes: credential.scopes,
    });
    return credential;
  }

  /**
   * Marks the given access token as expired after the API rejected it
   * No-op if the credential has already moved on to another token
   */
  invalidateAccessToken(accessToken: string): void {
    if (this.credential?.accessToken !== accessToken) {
      return;
    }
    warn('Access token rejected by Drive, will refresh on next call', { module: 'credential-manager' });
    this.credential = { ...this.credential, expiresAt: 0 };
    this.client = null;
  }

  /**
   * Describes the stored credential without refreshing it
   */
  async getStatus(): Promise<CredentialStatus> {
    const credential = await this.loadOnce();
    if (!credential) return 'missing';
    if (this.isValid(credential)) return 'valid';
    return credential.refreshToken ? 'refreshable' : 'dead';
  }

  /**
   * Drops in-memory state (process exit)
   */
  close(): void {
    this.credential = null;
    this.client = null;
    this.loaded = false;
    this.loadPromise = null;
    this.refreshPromise = null;
  }

  private isValid(credential: Credential): boolean {
    return credential.expiresAt - this.expirySkewMs > this.now();
  }

  /**
   * Loads the persisted credential once per process
   * Concurrent first calls share the same read; a failed read is not cached
   */
  private async loadOnce(): Promise<Credential | null> {
    if (this.loaded) {
      return this.credential;
    }

    if (!this.loadPromise) {
      this.loadPromise = this.store.load().then(
        (credential) => {
          this.credential = credential;
          this.loaded = true;
          debug('Credential loaded', { module: 'credential-manager', found: credential !== null });
          return credential;
        },
        (err: unknown) => {
          this.loadPromise = null;
          throw err;
        }
      );
    }

    return this.loadPromise;
  }

  /**
   * Single-flight refresh: concurrent callers share one exchange and its outcome
   */
  private refreshOnce(refreshToken: string): Promise<Credential> {
    if (!this.refreshPromise) {
      this.refreshPromise = this.refresh(refreshToken).finally(() => {
        this.refreshPromise = null;
      });
    }
    return this.refreshPromise;
  }

  private async refresh(refreshToken: string): Promise<Credential> {
    const previous = this.credential;
    info('Refreshing access token', { module: 'credential-manager' });

    let token: RefreshedToken;
    try {
      token = await this.refresher.refresh(refreshToken);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logError('Token refresh failed', { module: 'credential-manager', error: message });
      throw new AuthError('RefreshFailed', `Token expired and could not be refreshed, re-authorize: ${message}`, {
        cause: err,
      });
    }

    const refreshed: Credential = {
      accessToken: token.accessToken,
      refreshToken: token.refreshToken || refreshToken,
      expiresAt: token.expiresAt,
      scopes: token.scopes && token.scopes.length > 0 ? token.scopes : previous?.scopes ?? [],
    };

    try {
      await this.store.save(refreshed);
    } catch (err) {
      logError('Failed to persist refreshed credential, continuing without persistence', {
        module: 'credential-manager',
        error: err instanceof Error ? err.message : String(err),
      });
    }

    this.adopt(refreshed);
    info('Access token refreshed', { module: 'credential-manager', expiresAt: new Date(refreshed.expiresAt).toISOString() });
    return refreshed;
  }

  private adopt(credential: Credential): void {
    this.credential = credential;
    this.loaded = true;
    this.client = null;
  }

  private clientFor(credential: Credential): AuthorizedClient {
    if (!this.client || this.client.accessToken !== credential.accessToken) {
      this.client = {
        accessToken: credential.accessToken,
        drive: this.createDriveClient(credential),
      };
    }
    return this.client;
  }
}
