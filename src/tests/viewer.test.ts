import type http from 'node:http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { AuthenticatedInfo } from '../types.js';
import { ViewerSession, type ViewerConfig } from '../viewer.js';
import { SessionCoordinator } from '../ws/coordinator.js';
import { FakeRelays, closeHttpServer, sequentialPorts, startHttpServer } from './helpers.js';

describe('ViewerSession', () => {
  let server: http.Server;
  let port: number;
  let coordinator: SessionCoordinator;

  const viewerConfig = (serverHost: string): ViewerConfig => ({
    serverHost,
    serverPort: 1,
    nickname: 'Caster',
    verificationCode: '114514',
    connectionTimeoutMs: 2000,
    reconnectIntervalMs: 20,
    maxReconnectAttempts: 1,
    heartbeatIntervalMs: 30_000,
    playerStartDelayMs: 10,
    stopTimeoutMs: 1000,
    programs: { ffmpeg: 'ffmpeg', mpv: '/nonexistent/player', nginx: 'nginx' },
  });

  beforeEach(async () => {
    ({ server, port } = await startHttpServer());
    coordinator = new SessionCoordinator({
      verificationCode: '114514',
      hostNickname: 'Host',
      relays: new FakeRelays(),
      srtBasePort: 12000,
      findPort: sequentialPorts,
    });
    coordinator.attach(server);
  });

  afterEach(async () => {
    await coordinator.stop();
    await closeHttpServer(server);
  });

  it('joins through a host:port address and survives a player that cannot start', async () => {
    const onAuthenticated = vi.fn<(info: AuthenticatedInfo) => void>();
    const viewer = new ViewerSession(viewerConfig(`127.0.0.1:${port}`), { onAuthenticated });

    await viewer.start();

    await vi.waitFor(() =>
      expect(onAuthenticated).toHaveBeenCalledWith({ nickname: 'Caster', srtPort: 12000, serverIp: '0.0.0.0' }),
    );
    expect(viewer.client.streamEndpoint()).toEqual({ host: '127.0.0.1', port: 12000 });
    expect(viewer.sendChat('hello from the couch')).toBe(true);

    await viewer.stop();
    await viewer.stop();

    expect(viewer.client.state).toBe('disconnected');
    expect(viewer.supervisor.list()).toEqual([]);
    await vi.waitFor(() => expect(coordinator.stats().viewers).toBe(0));
  });
});
