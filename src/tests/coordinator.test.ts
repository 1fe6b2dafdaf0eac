import type http from 'node:http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { userMessage } from '../errors.js';
import type { CoordinatorObserver } from '../types.js';
import { SessionCoordinator, type CoordinatorOptions } from '../ws/coordinator.js';
import {
  FakeRelays,
  TestSocket,
  closeHttpServer,
  deferred,
  sequentialPorts,
  startHttpServer,
} from './helpers.js';

describe('SessionCoordinator', () => {
  let server: http.Server;
  let port: number;
  let relays: FakeRelays;
  let coordinator: SessionCoordinator;
  let sockets: TestSocket[];

  const observer = {
    onMessage: vi.fn<NonNullable<CoordinatorObserver['onMessage']>>(),
    onMembersChanged: vi.fn<NonNullable<CoordinatorObserver['onMembersChanged']>>(),
  };

  function createCoordinator(overrides: Partial<CoordinatorOptions> = {}): SessionCoordinator {
    coordinator = new SessionCoordinator({
      verificationCode: '114514',
      hostNickname: 'Host',
      relays,
      srtBasePort: 10000,
      findPort: sequentialPorts,
      observer,
      ...overrides,
    });
    coordinator.attach(server);
    return coordinator;
  }

  async function connect(): Promise<TestSocket> {
    const socket = await TestSocket.open(port);
    sockets.push(socket);
    return socket;
  }

  beforeEach(async () => {
    ({ server, port } = await startHttpServer());
    relays = new FakeRelays();
    sockets = [];
    observer.onMessage.mockReset();
    observer.onMembersChanged.mockReset();
  });

  afterEach(async () => {
    await Promise.all(sockets.map((socket) => socket.close()));
    await coordinator.stop();
    await closeHttpServer(server);
  });

  it('admits two viewers with the same nickname on distinct ports', async () => {
    createCoordinator();
    const first = await connect();
    const second = await connect();

    const firstAuth = await first.join('Saber');
    expect(firstAuth).toEqual({ type: 'auth_success', nickname: 'Saber', srt_port: 10000, server_ip: '0.0.0.0' });

    const secondAuth = await second.join('Saber');
    expect(secondAuth.nickname).toBe('Saber_2');
    expect(secondAuth.srt_port).toBe(10001);

    const joined = await first.next('join');
    expect(joined).toEqual({ type: 'join', nickname: 'Saber_2', message: 'Saber_2 joined the room' });

    const members = await second.next('members');
    expect(members.members).toEqual([
      { nickname: 'Host', role: 'sender' },
      { nickname: 'Saber', role: 'receiver' },
      { nickname: 'Saber_2', role: 'receiver' },
    ]);
    expect(coordinator.members()).toEqual(members.members);
    expect(observer.onMembersChanged).toHaveBeenLastCalledWith(members.members);
    expect(relays.started).toEqual([10000, 10001]);
  });

  it('gives viewers joining at the same time distinct nicknames and ports', async () => {
    createCoordinator();
    const viewers = await Promise.all(Array.from({ length: 6 }, () => connect()));

    const auths = await Promise.all(viewers.map((viewer, index) => viewer.join(index % 2 === 0 ? 'Archer' : 'Saber')));

    expect(auths.map((auth) => auth.srt_port).sort((a, b) => a - b)).toEqual([
      10000, 10001, 10002, 10003, 10004, 10005,
    ]);
    expect(auths.map((auth) => auth.nickname).sort()).toEqual([
      'Archer',
      'Archer_2',
      'Archer_3',
      'Saber',
      'Saber_2',
      'Saber_3',
    ]);
    expect([...relays.started].sort((a, b) => a - b)).toEqual([10000, 10001, 10002, 10003, 10004, 10005]);
    expect(coordinator.stats().viewers).toBe(6);
  });

  it('does not announce a viewer to itself', async () => {
    createCoordinator();
    const viewer = await connect();
    await viewer.join('Rider');
    await viewer.next('members');

    expect(viewer.count('join')).toBe(0);
  });

  it('rejects a wrong verification code and closes the connection', async () => {
    createCoordinator();
    const viewer = await connect();
    viewer.send({ type: 'auth', code: '000000', nickname: 'Lancer' });

    const failed = await viewer.next('auth_failed');
    expect(failed.message).toBe(userMessage('AUTHENTICATION_FAILED'));
    expect((await viewer.closed).code).toBe(4001);

    expect(coordinator.members()).toEqual([{ nickname: 'Host', role: 'sender' }]);
    expect(relays.started).toEqual([]);
  });

  it('refuses chat before authentication', async () => {
    createCoordinator();
    const viewer = await connect();
    viewer.send({ type: 'chat', message: 'hello?' });

    const error = await viewer.next('error');
    expect(error.message).toBe('Please authenticate first');
    expect(observer.onMessage).not.toHaveBeenCalled();
  });

  it('answers malformed frames with a protocol error', async () => {
    createCoordinator();
    const viewer = await connect();
    viewer.send('not json');
    viewer.send({ type: 'teleport' });

    expect((await viewer.next('error')).message).toBe(userMessage('PROTOCOL_VIOLATION'));
    expect((await viewer.next('error')).message).toBe(userMessage('PROTOCOL_VIOLATION'));
  });

  it('delivers each chat message to every viewer exactly once', async () => {
    createCoordinator();
    const first = await connect();
    const second = await connect();
    await first.join('Archer');
    await second.join('Caster');

    first.send({ type: 'chat', message: 'popcorn ready' });

    const toFirst = await first.next('chat');
    const toSecond = await second.next('chat');
    expect(toFirst.nickname).toBe('Archer');
    expect(toFirst.message).toBe('popcorn ready');
    expect(toSecond.message).toBe('popcorn ready');
    expect(Number.isNaN(Date.parse(toSecond.timestamp))).toBe(false);

    // a heartbeat round trip on each socket flushes anything still in flight
    first.send({ type: 'heartbeat' });
    second.send({ type: 'heartbeat' });
    await first.next('heartbeat');
    await second.next('heartbeat');

    expect(first.count('chat')).toBe(1);
    expect(second.count('chat')).toBe(1);
    expect(observer.onMessage).toHaveBeenCalledTimes(1);
    expect(observer.onMessage).toHaveBeenCalledWith('Archer', 'popcorn ready');
  });

  it('broadcasts host chat under the host nickname', async () => {
    createCoordinator();
    const viewer = await connect();
    await viewer.join('Assassin');

    await coordinator.sendChat('starting in five');

    const chat = await viewer.next('chat');
    expect(chat.nickname).toBe('Host');
    expect(chat.message).toBe('starting in five');
    expect(observer.onMessage).toHaveBeenCalledWith('Host', 'starting in five');
  });

  it('echoes heartbeats', async () => {
    createCoordinator();
    const viewer = await connect();
    await viewer.join('Berserker');

    viewer.send({ type: 'heartbeat' });
    await expect(viewer.next('heartbeat')).resolves.toEqual({ type: 'heartbeat' });
  });

  it('releases the port and announces the leave on disconnect', async () => {
    createCoordinator();
    const staying = await connect();
    const leaving = await connect();
    await staying.join('Saber');
    const { srt_port: leavingPort } = await leaving.join('Ruler');

    await leaving.close();

    const left = await staying.next('leave');
    expect(left).toEqual({ type: 'leave', nickname: 'Ruler', message: 'Ruler left the room' });
    const members = await staying.nextMatching('members', (message) => message.members.length === 2);
    expect(members.members).toEqual([
      { nickname: 'Host', role: 'sender' },
      { nickname: 'Saber', role: 'receiver' },
    ]);
    expect(relays.stopped).toEqual([leavingPort]);
    expect(relays.running.has(leavingPort)).toBe(false);
  });

  it('makes a released nickname available again', async () => {
    createCoordinator();
    const first = await connect();
    await first.join('Avenger');
    await first.close();
    await vi.waitFor(() => expect(coordinator.members()).toHaveLength(1));

    const second = await connect();
    expect((await second.join('Avenger')).nickname).toBe('Avenger');
  });

  it('rolls the admission back when the relay fails to start', async () => {
    createCoordinator();
    relays.failStarts = true;
    const viewer = await connect();
    viewer.send({ type: 'auth', code: '114514', nickname: 'Saber' });

    const error = await viewer.next('error');
    expect(error.message).toBe(userMessage('PROCESS_LAUNCH_FAILED'));
    expect((await viewer.closed).code).toBe(4002);
    expect(coordinator.members()).toEqual([{ nickname: 'Host', role: 'sender' }]);

    relays.failStarts = false;
    const retry = await connect();
    const auth = await retry.join('Saber');
    expect(auth.nickname).toBe('Saber');
    expect(auth.srt_port).toBe(10001);
  });

  it('reports port exhaustion without admitting the viewer', async () => {
    createCoordinator({ findPort: async () => null });
    const viewer = await connect();
    viewer.send({ type: 'auth', code: '114514', nickname: 'Caster' });

    expect((await viewer.next('error')).message).toBe(userMessage('PORT_EXHAUSTED'));
    expect((await viewer.closed).code).toBe(4002);
    expect(coordinator.stats().viewers).toBe(0);
  });

  it('wraps the port cursor back to the base port', async () => {
    createCoordinator({
      portProbeAttempts: 2,
      findPort: (start, attempts, isExcluded) =>
        sequentialPorts(start, Math.min(attempts ?? 2, 10002 - start), isExcluded),
    });
    const first = await connect();
    const second = await connect();
    expect((await first.join('Archer')).srt_port).toBe(10000);
    expect((await second.join('Lancer')).srt_port).toBe(10001);

    await first.close();
    await vi.waitFor(() => expect(relays.stopped).toEqual([10000]));

    const third = await connect();
    expect((await third.join('Rider')).srt_port).toBe(10000);
  });

  it('stops the relay of a viewer that leaves during admission', async () => {
    createCoordinator();
    const gate = deferred();
    relays.gate = gate.promise;
    const viewer = await connect();
    viewer.send({ type: 'auth', code: '114514', nickname: 'Saber' });
    await vi.waitFor(() => expect(relays.started).toEqual([10000]));

    await viewer.close();
    gate.resolve();

    await vi.waitFor(() => expect(relays.stopped).toEqual([10000]));
    expect(coordinator.members()).toEqual([{ nickname: 'Host', role: 'sender' }]);
  });

  it('ignores upgrades on other paths', async () => {
    createCoordinator();
    await expect(TestSocket.open(port, '/elsewhere')).rejects.toThrow();
  });

  it('closes viewers and stops their relays on stop', async () => {
    createCoordinator();
    const viewer = await connect();
    await viewer.join('Saber');

    await coordinator.stop();

    expect((await viewer.closed).code).toBe(1001);
    expect(relays.running.size).toBe(0);
    expect(coordinator.stats()).toEqual({ connections: 0, viewers: 0, nextPort: 10001 });
  });
});
