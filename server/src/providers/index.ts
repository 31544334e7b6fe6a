/**
 * Provider Factory
 *
 * Creates providers from relay configuration.
 */

import type { RelayConfig } from '../config.js';
import type { CredentialProvider, EmailProvider } from './types.js';
import { ApiKeyCredentials, ManagedIdentityCredentials } from './credentials.js';
import { ConsoleEmailProvider } from './email-console.js';

export * from './types.js';
export { ApiKeyCredentials, ManagedIdentityCredentials, COGNITIVE_SERVICES_SCOPE } from './credentials.js';
export { ConsoleEmailProvider } from './email-console.js';

/**
 * Managed identity takes precedence over a static key when both are configured
 */
export function createCredentialProvider(config: RelayConfig): CredentialProvider {
  if (config.managedIdentityClientId) {
    console.log('[Auth] Using managed identity credentials');
    return new ManagedIdentityCredentials(config.managedIdentityClientId);
  }
  console.log('[Auth] Using API key credentials');
  return new ApiKeyCredentials(config.apiKey);
}

export function createEmailProvider(): EmailProvider {
  return new ConsoleEmailProvider();
}
