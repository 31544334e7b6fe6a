#!/usr/bin/env node

/**
 * Voice Relay Server
 *
 * Accepts web and telephony clients and relays each one to a Voice Live
 * realtime session. Configuration comes from environment variables (see config.ts).
 */

import { loadRelayConfig, validateRelayConfig } from './config.js';
import { ConnectionRegistry } from './connection-registry.js';
import { createCredentialProvider, createEmailProvider } from './providers/index.js';
import { RelayServer } from './relay-server.js';

async function main() {
  const config = loadRelayConfig();
  const errors = validateRelayConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration:\n  - ${errors.join('\n  - ')}`);
  }

  const registry = new ConnectionRegistry(config.maxConnections);
  const server = new RelayServer({
    config,
    registry,
    credentials: createCredentialProvider(config),
    emailProvider: createEmailProvider(),
  });

  const port = await server.start();

  const shutdown = () => {
    console.log('\nShutting down...');
    server
      .shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  console.log('');
  console.log('Voice relay ready');
  console.log(`Port: ${port}`);
  console.log(`Model: ${config.model}`);
  console.log(`Max connections: ${registry.getMaxConnections()}`);
  console.log('');
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
