import WebSocket from 'ws';
import type { ClientMessage, ServerMessage } from './schemas.js';

export type WireMessage = ServerMessage | ClientMessage;

export const CLOSE_AUTH_FAILED = 4001;
export const CLOSE_ADMISSION_FAILED = 4002;
export const CLOSE_GOING_AWAY = 1001;

/** Close codes after which the viewer must not reconnect on its own. */
export const TERMINAL_CLOSE_CODES: ReadonlySet<number> = new Set([CLOSE_AUTH_FAILED, CLOSE_ADMISSION_FAILED]);

export function isOpen(socket: WebSocket): boolean {
  return socket.readyState === WebSocket.OPEN;
}

/** Fire-and-forget send; frames for a socket that is not open are dropped. */
export function send(socket: WebSocket, message: WireMessage): void {
  if (!isOpen(socket)) return;
  socket.send(JSON.stringify(message));
}

/** Resolves once the frame has been handed to the transport, rejects on failure. */
export function sendAsync(socket: WebSocket, payload: WireMessage | string): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!isOpen(socket)) {
      reject(new Error('socket is not open'));
      return;
    }
    const frame = typeof payload === 'string' ? payload : JSON.stringify(payload);
    socket.send(frame, (error) => {
      if (error) reject(error);
      else resolve();
    });
  });
}

export function rawToString(raw: WebSocket.RawData): string {
  if (Array.isArray(raw)) return Buffer.concat(raw).toString('utf8');
  if (raw instanceof ArrayBuffer) return Buffer.from(raw).toString('utf8');
  return raw.toString('utf8');
}
