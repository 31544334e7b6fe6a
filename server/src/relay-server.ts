/**
 * Relay Server
 *
 * HTTP server with WebSocket upgrade routing. Each accepted client socket gets
 * its own SessionRelay; the ConnectionRegistry decides admission.
 *
 * Routes:
 * - GET /health  -> JSON status with connection counts
 * - WS  /web/ws  -> browser clients sending raw PCM frames
 * - WS  /acs/ws  -> telephony media streams sending JSON frames
 */

import WebSocket, { WebSocketServer, type RawData } from 'ws';
import { createServer, type IncomingMessage, type Server } from 'http';
import type { Duplex } from 'stream';
import type { RelayConfig } from './config.js';
import type { ConnectionRegistry } from './connection-registry.js';
import { WebSocketDownstream } from './downstream.js';
import type { ConnectionType } from './protocol.js';
import type { CredentialProvider, EmailProvider } from './providers/types.js';
import { ConnectionLimitExceededError, SessionRelay } from './session-relay.js';
import type { UpstreamConnector } from './upstream.js';

/** Close codes sent to clients */
export const CLOSE_NORMAL = 1000;
export const CLOSE_UPSTREAM_FAILED = 1011;
export const CLOSE_TRY_AGAIN_LATER = 1013;

const ROUTES: Record<string, ConnectionType> = {
  '/web/ws': 'web',
  '/acs/ws': 'telephony',
};

export interface RelayServerOptions {
  config: RelayConfig;
  registry: ConnectionRegistry;
  credentials: CredentialProvider;
  emailProvider: EmailProvider;
  connectUpstream?: UpstreamConnector;
}

function rawDataToBuffer(data: RawData): Buffer {
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  return data;
}

export class RelayServer {
  private httpServer: Server | null = null;
  private wss: WebSocketServer | null = null;
  private relays = new Set<SessionRelay>();

  constructor(private readonly options: RelayServerOptions) {}

  get activeSessions(): number {
    return this.relays.size;
  }

  /**
   * Start listening. Resolves with the bound port (useful when configured as 0).
   */
  start(port: number = this.options.config.port): Promise<number> {
    const httpServer = createServer((req, res) => {
      const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

      if (url.pathname === '/health') {
        res.writeHead(200, { 'Content-Type': 'application/json' });
        res.end(
          JSON.stringify({
            status: 'ok',
            activeConnections: this.options.registry.activeCount(),
            maxConnections: this.options.registry.getMaxConnections(),
          })
        );
        return;
      }

      res.writeHead(404);
      res.end('Not Found');
    });

    const wss = new WebSocketServer({ noServer: true });

    httpServer.on('upgrade', (request: IncomingMessage, socket: Duplex, head: Buffer) => {
      const url = new URL(request.url ?? '/', `http://${request.headers.host ?? 'localhost'}`);
      const connectionType = ROUTES[url.pathname];
      if (!connectionType) {
        console.warn(`[Server] Rejecting upgrade for unknown path: ${url.pathname}`);
        socket.destroy();
        return;
      }

      const callerId = url.searchParams.get('callerId') ?? undefined;
      wss.handleUpgrade(request, socket, head, (ws) => {
        this.handleConnection(ws, connectionType, callerId);
      });
    });

    this.httpServer = httpServer;
    this.wss = wss;

    return new Promise((resolve, reject) => {
      httpServer.once('error', reject);
      httpServer.listen(port, () => {
        httpServer.off('error', reject);
        const address = httpServer.address();
        const boundPort = address && typeof address === 'object' ? address.port : port;
        console.log(`[Server] Listening on port ${boundPort}`);
        resolve(boundPort);
      });
    });
  }

  /**
   * Relay one client socket for its lifetime
   */
  handleConnection(ws: WebSocket, connectionType: ConnectionType, callerId: string | undefined): void {
    const relay = new SessionRelay({
      config: this.options.config,
      registry: this.options.registry,
      credentials: this.options.credentials,
      emailProvider: this.options.emailProvider,
      connectUpstream: this.options.connectUpstream,
    });

    try {
      relay.attachDownstream(new WebSocketDownstream(ws), { connectionType, callerId });
    } catch (error) {
      if (error instanceof ConnectionLimitExceededError) {
        ws.close(CLOSE_TRY_AGAIN_LATER, 'Connection limit reached');
        return;
      }
      throw error;
    }

    this.relays.add(relay);
    console.log(`[Server] ${connectionType} client connected: ${relay.connectionId}`);

    ws.on('message', (data: RawData, isBinary: boolean) => {
      if (connectionType === 'web') {
        if (isBinary) {
          relay.handleWebAudio(rawDataToBuffer(data));
        } else {
          console.debug(`[${relay.connectionId}] Ignoring text frame from web client`);
        }
      } else {
        relay.handleTelephonyFrame(rawDataToBuffer(data).toString('utf8'));
      }
    });

    ws.on('close', () => {
      console.log(`[Server] ${connectionType} client disconnected: ${relay.connectionId}`);
      this.release(relay);
    });

    ws.on('error', (error: Error) => {
      console.error(`[${relay.connectionId}] Client socket error:`, error);
    });

    relay
      .connect()
      .then(async () => {
        await relay.waitForUpstreamClose();
        if (ws.readyState === WebSocket.OPEN) {
          ws.close(CLOSE_NORMAL, 'Session ended');
        }
        this.release(relay);
      })
      .catch((error: unknown) => {
        console.error(`[${relay.connectionId}] Session could not start:`, error);
        this.relays.delete(relay);
        if (ws.readyState === WebSocket.OPEN) {
          ws.close(CLOSE_UPSTREAM_FAILED, 'Upstream connection failed');
        }
      });
  }

  /**
   * Close every session and stop accepting connections
   */
  async shutdown(): Promise<void> {
    const pending = Array.from(this.relays, (relay) => relay.cleanup());
    for (const client of this.wss?.clients ?? []) {
      client.close(CLOSE_NORMAL, 'Server shutting down');
    }
    await Promise.all(pending);
    this.relays.clear();

    const wss = this.wss;
    const httpServer = this.httpServer;
    this.wss = null;
    this.httpServer = null;

    wss?.close();
    if (httpServer) {
      await new Promise<void>((resolve) => {
        httpServer.close(() => resolve());
        httpServer.closeAllConnections();
      });
    }
  }

  private release(relay: SessionRelay): void {
    relay
      .cleanup()
      .then(() => {
        this.relays.delete(relay);
      })
      .catch((error: unknown) => {
        console.error(`[${relay.connectionId}] Cleanup failed:`, error);
      });
  }
}
