import type { RawData, WebSocket } from 'ws';
import type { PeerChannel } from '../contracts/channel';

/** PeerChannel over a `ws` socket as handed out by @fastify/websocket. */
export class WebSocketChannel implements PeerChannel {
  constructor(private readonly socket: WebSocket) {}

  send(payload: string): Promise<void> {
    const { socket } = this;
    if (socket.readyState !== socket.OPEN) {
      return Promise.reject(new Error(`socket not open (readyState ${socket.readyState})`));
    }
    return new Promise((resolve, reject) => {
      socket.send(payload, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  close(code?: number, reason?: string): void {
    if (isClosing(this.socket)) return;
    this.socket.close(code, reason);
  }
}

function isClosing(socket: WebSocket): boolean {
  return socket.readyState === socket.CLOSING || socket.readyState === socket.CLOSED;
}

export function frameToText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}
