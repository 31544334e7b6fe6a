/**
 * Relay Configuration
 *
 * Read from environment variables. Use validateRelayConfig() to collect
 * problems before starting the server.
 */

export const DEFAULT_MAX_CONNECTIONS = 100;

export interface RelayConfig {
  /** Voice Live endpoint, e.g. https://my-resource.cognitiveservices.azure.com */
  endpoint: string;
  model: string;
  apiVersion: string;
  /** Static API key; ignored when a managed identity client ID is set */
  apiKey: string;
  managedIdentityClientId?: string;
  voiceName: string;
  port: number;
  maxConnections: number;
}

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  return Number(value);
}

export function loadRelayConfig(): RelayConfig {
  const managedIdentityClientId = process.env.AZURE_USER_ASSIGNED_IDENTITY_CLIENT_ID?.trim();

  return {
    endpoint: process.env.AZURE_VOICE_LIVE_ENDPOINT?.trim() || '',
    model: process.env.VOICE_LIVE_MODEL?.trim() || 'gpt-4o-mini',
    apiVersion: process.env.VOICE_LIVE_API_VERSION?.trim() || '2025-05-01-preview',
    apiKey: process.env.AZURE_VOICE_LIVE_API_KEY || '',
    managedIdentityClientId: managedIdentityClientId || undefined,
    voiceName: process.env.VOICE_LIVE_VOICE?.trim() || 'en-US-Aria:DragonHDLatestNeural',
    port: parseInteger(process.env.RELAY_PORT, 8000),
    maxConnections: parseInteger(process.env.RELAY_MAX_CONNECTIONS, DEFAULT_MAX_CONNECTIONS),
  };
}

const ENDPOINT_PROTOCOLS = new Set(['http:', 'https:', 'ws:', 'wss:']);

/**
 * Validate configuration and return any errors
 */
export function validateRelayConfig(config: RelayConfig): string[] {
  const errors: string[] = [];

  if (!config.endpoint) {
    errors.push('Missing AZURE_VOICE_LIVE_ENDPOINT');
  } else {
    let protocol: string | null = null;
    try {
      protocol = new URL(config.endpoint).protocol;
    } catch {
      protocol = null;
    }
    if (!protocol || !ENDPOINT_PROTOCOLS.has(protocol)) {
      errors.push(`Invalid AZURE_VOICE_LIVE_ENDPOINT: ${config.endpoint} (expected an https:// URL)`);
    }
  }

  if (!config.model) {
    errors.push('Missing VOICE_LIVE_MODEL');
  }

  if (!config.apiKey && !config.managedIdentityClientId) {
    errors.push(
      'Missing credentials: set AZURE_VOICE_LIVE_API_KEY or AZURE_USER_ASSIGNED_IDENTITY_CLIENT_ID'
    );
  }

  if (!Number.isInteger(config.port) || config.port <= 0 || config.port > 65535) {
    errors.push('RELAY_PORT must be an integer between 1 and 65535');
  }

  if (!Number.isInteger(config.maxConnections) || config.maxConnections <= 0) {
    errors.push('RELAY_MAX_CONNECTIONS must be a positive integer');
  }

  return errors;
}
