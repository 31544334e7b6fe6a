/**
 * Upstream Transport
 *
 * Message-oriented connection to the Voice Live realtime API. Inbound text
 * messages are consumed by async iteration, which ends when the socket closes.
 */

import WebSocket, { type RawData } from 'ws';
import { AsyncQueue } from './async-queue.js';

export interface UpstreamTransport extends AsyncIterable<string> {
  send(data: string): Promise<void>;
  close(): Promise<void>;
}

export type UpstreamConnector = (url: string, headers: Record<string, string>) => Promise<UpstreamTransport>;

/**
 * Realtime endpoint URL for an Azure resource endpoint and model
 */
export function buildRealtimeUrl(endpoint: string, model: string, apiVersion: string): string {
  const base = endpoint.trim().replace(/\/+$/, '');
  const query = new URLSearchParams({ 'api-version': apiVersion, model: model.trim() });
  const url = `${base}/voice-live/realtime?${query.toString()}`;
  return url.replace(/^https:\/\//, 'wss://').replace(/^http:\/\//, 'ws://');
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

export class WebSocketUpstream implements UpstreamTransport {
  private inbound = new AsyncQueue<string>();

  constructor(private readonly ws: WebSocket) {
    ws.on('message', (data: RawData) => {
      this.inbound.push(rawDataToString(data));
    });

    ws.on('close', (code: number) => {
      console.log(`[Upstream] Connection closed (code ${code})`);
      this.inbound.end();
    });

    ws.on('error', (error: Error) => {
      console.error('[Upstream] WebSocket error:', error);
    });
  }

  send(data: string): Promise<void> {
    if (this.ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error('Upstream connection is not open'));
    }
    return new Promise((resolve, reject) => {
      this.ws.send(data, (error?: Error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  close(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.ws.once('close', () => resolve());
      if (this.ws.readyState !== WebSocket.CLOSING) {
        this.ws.close(1000, 'Session ended');
      }
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<string> {
    return this.inbound[Symbol.asyncIterator]();
  }
}

/**
 * Open a WebSocket to the upstream service; resolves once the socket is open
 */
export function connectWebSocketUpstream(url: string, headers: Record<string, string>): Promise<UpstreamTransport> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(url, { headers });
    let settled = false;

    // Stays attached after settling so a late 'error' never goes unhandled
    ws.on('error', (error: Error) => {
      if (settled) return;
      settled = true;
      ws.off('close', onClose);
      reject(error);
    });

    const onClose = (code: number) => {
      if (settled) return;
      settled = true;
      reject(new Error(`Upstream connection closed before opening (code ${code})`));
    };

    ws.once('open', () => {
      if (settled) return;
      settled = true;
      ws.off('close', onClose);
      resolve(new WebSocketUpstream(ws));
    });
    ws.once('close', onClose);
  });
}
