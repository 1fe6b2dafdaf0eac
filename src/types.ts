import type WebSocket from 'ws';
import type { Member } from './ws/schemas.js';

export type { Member } from './ws/schemas.js';

export type ConnectionState = 'connected' | 'authenticating' | 'authenticated' | 'disconnected';

export interface ClientRecord {
  id: string;
  socket: WebSocket;
  state: ConnectionState;
  authenticated: boolean;
  nickname?: string;
  srtPort?: number;
  connectedAt: number;
  remoteAddress?: string;
  isAlive: boolean;
}

export type ClientState =
  | 'idle'
  | 'connecting'
  | 'connected'
  | 'authenticating'
  | 'authenticated'
  | 'reconnecting'
  | 'disconnected';

export interface StreamEndpoint {
  host: string;
  port: number;
}

export interface AuthenticatedInfo {
  nickname: string;
  srtPort: number;
  serverIp: string;
}

/**
 * Host-side callbacks. They run on the coordinator's event loop; moving the
 * work onto a UI thread is up to the implementer.
 */
export interface CoordinatorObserver {
  onMessage?(nickname: string, message: string): void;
  onMembersChanged?(members: Member[]): void;
}

/** Viewer-side callbacks, same threading contract as CoordinatorObserver. */
export interface ClientObserver {
  onConnected?(): void;
  onAuthenticated?(info: AuthenticatedInfo): void;
  onMessage?(nickname: string, message: string): void;
  onMembersChanged?(members: Member[]): void;
  onError?(message: string): void;
  onDisconnected?(): void;
}

/** Starts and stops the per-viewer relay feeding a viewer's stream port. */
export interface ViewerRelayLauncher {
  startViewerRelay(srtPort: number, bindAddress: string): Promise<void>;
  stopViewerRelay(srtPort: number): Promise<void>;
  stopAllViewerRelays(): Promise<void>;
}
