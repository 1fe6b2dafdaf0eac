import http from 'node:http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { createApp } from '../app.js';
import { ProcessSupervisor } from '../lib/processSupervisor.js';
import { SessionCoordinator } from '../ws/coordinator.js';
import { FakeRelays, TestSocket, closeHttpServer, sequentialPorts } from './helpers.js';

const healthBody = z.object({ processes: z.object({ memoryBytes: z.number() }) });
const processBody = z.object({ usage: z.object({ pid: z.number(), memoryBytes: z.number() }) });

describe('HTTP status routes', () => {
  let server: http.Server;
  let baseUrl: string;
  let port: number;
  let coordinator: SessionCoordinator;
  let supervisor: ProcessSupervisor;

  beforeEach(async () => {
    supervisor = new ProcessSupervisor();
    coordinator = new SessionCoordinator({
      verificationCode: '114514',
      hostNickname: 'Host',
      relays: new FakeRelays(),
      findPort: sequentialPorts,
    });
    server = http.createServer(createApp({ coordinator, supervisor, corsOrigins: ['http://localhost:5173'] }));
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    coordinator.attach(server);
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('not listening');
    port = address.port;
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    await coordinator.stop();
    await supervisor.stopAll(1000);
    await closeHttpServer(server);
  });

  it('reports health', async () => {
    await supervisor.start('idle', [process.execPath, '-e', 'setInterval(() => {}, 1000)']);

    const response = await fetch(`${baseUrl}/health`);
    expect(response.status).toBe(200);
    const body = await response.json();
    expect(body).toMatchObject({ status: 'ok', viewers: 0, processes: { total: 1, running: 1 } });
    expect(healthBody.parse(body).processes.memoryBytes).toBeGreaterThan(0);
  });

  it('lists the room members next to the WebSocket endpoint', async () => {
    const viewer = await TestSocket.open(port);
    await viewer.join('Saber');

    const response = await fetch(`${baseUrl}/api/session/members`);
    expect(await response.json()).toEqual({
      members: [
        { nickname: 'Host', role: 'sender' },
        { nickname: 'Saber', role: 'receiver' },
      ],
    });
    await viewer.close();
  });

  it('describes supervised programs and 404s unknown ones', async () => {
    await supervisor.start('idle', [process.execPath, '-e', 'setInterval(() => {}, 1000)']);

    const known = await fetch(`${baseUrl}/api/session/processes/idle`);
    const described = await known.json();
    expect(described).toMatchObject({ name: 'idle', running: true, restarts: 0 });
    const { usage } = processBody.parse(described);
    expect(usage.pid).toBe(supervisor.info('idle')?.pid);
    expect(usage.memoryBytes).toBeGreaterThan(0);

    const unknown = await fetch(`${baseUrl}/api/session/processes/nope`);
    expect(unknown.status).toBe(404);
    expect(await unknown.json()).toEqual({ error: 'NOT_FOUND' });
  });
});
