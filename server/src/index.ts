export * from './async-queue.js';
export * from './audio-utils.js';
export * from './config.js';
export * from './connection-registry.js';
export * from './downstream.js';
export * from './protocol.js';
export * from './providers/index.js';
export * from './relay-server.js';
export * from './session-relay.js';
export * from './tools/index.js';
export * from './upstream.js';
