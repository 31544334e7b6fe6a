/**
 * Downstream Transport
 *
 * Connection back to the web or telephony client. Text frames carry JSON
 * envelopes; binary frames carry raw PCM audio for web clients.
 */

import WebSocket from 'ws';

export interface DownstreamTransport {
  send(data: string | Buffer): Promise<void>;
}

export class WebSocketDownstream implements DownstreamTransport {
  constructor(private readonly ws: WebSocket) {}

  send(data: string | Buffer): Promise<void> {
    if (this.ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error('Downstream connection is not open'));
    }
    return new Promise((resolve, reject) => {
      this.ws.send(data, { binary: typeof data !== 'string' }, (error?: Error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}
