/**
 * Upstream Credential Providers
 *
 * - API key: static `api-key` header
 * - Managed identity: short-lived bearer token from a user-assigned identity
 */

import { ManagedIdentityCredential, type TokenCredential } from '@azure/identity';
import type { CredentialProvider } from './types.js';

export const COGNITIVE_SERVICES_SCOPE = 'https://cognitiveservices.azure.com/.default';

export class ApiKeyCredentials implements CredentialProvider {
  readonly name = 'api-key';

  constructor(private readonly apiKey: string) {
    if (!apiKey) {
      throw new Error('API key required for api-key credentials');
    }
  }

  async getAuthHeaders(): Promise<Record<string, string>> {
    return { 'api-key': this.apiKey };
  }
}

export class ManagedIdentityCredentials implements CredentialProvider {
  readonly name = 'managed-identity';
  private readonly credential: TokenCredential;

  /**
   * @param credential - override for the token source (defaults to a user-assigned managed identity)
   */
  constructor(clientId: string, credential?: TokenCredential) {
    this.credential = credential ?? new ManagedIdentityCredential({ clientId });
  }

  async getAuthHeaders(): Promise<Record<string, string>> {
    const token = await this.credential.getToken(COGNITIVE_SERVICES_SCOPE);
    if (!token) {
      throw new Error('Managed identity returned no access token');
    }
    console.log('[Auth] Acquired managed identity token for Voice Live');
    return { Authorization: `Bearer ${token.token}` };
  }
}
