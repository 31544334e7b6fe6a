/**
 * Tests for HTTP routing and WebSocket admission, served on an ephemeral local port
 */

import { describe, test, expect, afterEach, vi } from 'vitest';
import WebSocket from 'ws';
import { AsyncQueue } from './async-queue.js';
import type { RelayConfig } from './config.js';
import { ConnectionRegistry } from './connection-registry.js';
import { ConsoleEmailProvider } from './providers/email-console.js';
import { CLOSE_NORMAL, CLOSE_TRY_AGAIN_LATER, CLOSE_UPSTREAM_FAILED, RelayServer } from './relay-server.js';
import type { UpstreamConnector, UpstreamTransport } from './upstream.js';

const config: RelayConfig = {
  endpoint: 'https://example.cognitiveservices.azure.com',
  model: 'gpt-4o-mini',
  apiVersion: '2025-05-01-preview',
  apiKey: 'test-key',
  voiceName: 'en-US-Test',
  port: 0,
  maxConnections: 10,
};

class FakeUpstream implements UpstreamTransport {
  readonly sent: string[] = [];
  failSends = false;
  private inbound = new AsyncQueue<string>();

  async send(data: string): Promise<void> {
    if (this.failSends) {
      throw new Error('upstream write failed');
    }
    this.sent.push(data);
  }

  async close(): Promise<void> {
    this.inbound.end();
  }

  [Symbol.asyncIterator](): AsyncIterator<string> {
    return this.inbound[Symbol.asyncIterator]();
  }
}

let server: RelayServer | null = null;

afterEach(async () => {
  await server?.shutdown();
  server = null;
});

async function startServer(registry: ConnectionRegistry, connectUpstream: UpstreamConnector): Promise<number> {
  server = new RelayServer({
    config,
    registry,
    credentials: { name: 'test', getAuthHeaders: async () => ({ 'api-key': 'test-key' }) },
    emailProvider: new ConsoleEmailProvider(),
    connectUpstream,
  });
  return server.start(0);
}

function waitForClose(ws: WebSocket): Promise<number> {
  return new Promise((resolve) => {
    ws.once('close', (code: number) => resolve(code));
  });
}

function waitForOpen(ws: WebSocket): Promise<void> {
  return new Promise((resolve, reject) => {
    ws.once('open', () => resolve());
    ws.once('error', reject);
  });
}

describe('RelayServer', () => {
  test('reports health with connection counts', async () => {
    const port = await startServer(new ConnectionRegistry(7), async () => new FakeUpstream());

    const response = await fetch(`http://127.0.0.1:${port}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok', activeConnections: 0, maxConnections: 7 });
  });

  test('returns 404 for unknown paths', async () => {
    const port = await startServer(new ConnectionRegistry(), async () => new FakeUpstream());

    const response = await fetch(`http://127.0.0.1:${port}/missing`);

    expect(response.status).toBe(404);
  });

  test('relays binary audio from a web client', async () => {
    const upstream = new FakeUpstream();
    const registry = new ConnectionRegistry();
    const port = await startServer(registry, async () => upstream);

    const client = new WebSocket(`ws://127.0.0.1:${port}/web/ws?callerId=web-user`);
    await waitForOpen(client);
    await vi.waitFor(() => expect(upstream.sent).toHaveLength(2));
    expect(server?.activeSessions).toBe(1);

    client.send(Buffer.from([0x00, 0x01, 0x02, 0x03]));

    await vi.waitFor(() => expect(upstream.sent).toHaveLength(3));
    expect(upstream.sent[2]).toBe('{"type":"input_audio_buffer.append","audio":"AAECAw=="}');
    const entries = Array.from(registry.all().values());
    expect(entries.map((entry) => [entry.callerId, entry.connectionType])).toEqual([['web-user', 'web']]);

    const closed = waitForClose(client);
    client.close();
    await closed;
    await vi.waitFor(() => expect(registry.activeCount()).toBe(0));
    await vi.waitFor(() => expect(server?.activeSessions).toBe(0));
  });

  test('ends the session when an upstream write fails', async () => {
    const upstream = new FakeUpstream();
    const registry = new ConnectionRegistry();
    const port = await startServer(registry, async () => upstream);

    const client = new WebSocket(`ws://127.0.0.1:${port}/web/ws`);
    await waitForOpen(client);
    await vi.waitFor(() => expect(upstream.sent).toHaveLength(2));
    const closed = waitForClose(client);

    upstream.failSends = true;
    client.send(Buffer.from([0x01, 0x02]));

    expect(await closed).toBe(CLOSE_NORMAL);
    await vi.waitFor(() => expect(registry.activeCount()).toBe(0));
  });

  test('refuses clients beyond the connection limit', async () => {
    const registry = new ConnectionRegistry(1);
    const port = await startServer(registry, async () => new FakeUpstream());

    const first = new WebSocket(`ws://127.0.0.1:${port}/acs/ws`);
    await waitForOpen(first);
    await vi.waitFor(() => expect(registry.activeCount()).toBe(1));

    const second = new WebSocket(`ws://127.0.0.1:${port}/acs/ws`);
    expect(await waitForClose(second)).toBe(CLOSE_TRY_AGAIN_LATER);
    expect(registry.activeCount()).toBe(1);
  });

  test('closes the client when the upstream connection fails', async () => {
    const registry = new ConnectionRegistry();
    const port = await startServer(registry, async () => {
      throw new Error('upstream unavailable');
    });

    const client = new WebSocket(`ws://127.0.0.1:${port}/web/ws`);

    expect(await waitForClose(client)).toBe(CLOSE_UPSTREAM_FAILED);
    expect(registry.activeCount()).toBe(0);
  });
});
