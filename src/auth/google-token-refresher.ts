/**
 * Google OAuth2 refresh exchange and Drive client factory
 * Uses googleapis' bundled google-auth-library OAuth2 client
 */

import { google } from 'googleapis';
import type { Credential } from '../types/index.js';
import type { AppIdentity } from './client-secrets.js';
import type { DriveClientFactory, RefreshedToken, TokenRefresher } from './credential-manager.js';
import { GoogleDriveClient } from '../drive/client.js';

/**
 * Exchanges a refresh token for a new access token at Google's token endpoint
 */
export class GoogleTokenRefresher implements TokenRefresher {
  constructor(private readonly identity: AppIdentity) {}

  async refresh(refreshToken: string): Promise<RefreshedToken> {
    const client = new google.auth.OAuth2(this.identity.clientId, this.identity.clientSecret);
    client.setCredentials({ refresh_token: refreshToken });

    // No access token is set, so this always performs the exchange
    const { token } = await client.getAccessToken();
    const { expiry_date: expiryDate, refresh_token: rotated, scope } = client.credentials;

    if (!token) {
      throw new Error('Token endpoint returned no access token');
    }
    if (typeof expiryDate !== 'number') {
      throw new Error('Token endpoint returned no expiry');
    }

    return {
      accessToken: token,
      expiresAt: expiryDate,
      refreshToken: rotated && rotated !== refreshToken ? rotated : null,
      scopes: scope ? scope.split(' ').filter(Boolean) : undefined,
    };
  }
}

/**
 * Creates Drive clients bound to an access token only
 *
 * The OAuth2 client holds neither the refresh token nor the expiry, so it never
 * tries to refresh on its own: CredentialManager alone decides when a token is stale.
 */
export function createGoogleDriveClientFactory(identity: AppIdentity): DriveClientFactory {
  return (credential: Credential) => {
    const auth = new google.auth.OAuth2(identity.clientId, identity.clientSecret);
    auth.setCredentials({
      access_token: credential.accessToken,
      scope: credential.scopes.join(' '),
      token_type: 'Bearer',
    });
    return new GoogleDriveClient(google.drive({ version: 'v3', auth }));
  };
}
