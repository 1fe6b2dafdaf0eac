import http from 'node:http';
import { createApp } from './app.js';
import { ChatConsole } from './chatConsole.js';
import { config } from './config.js';
import { HostSession } from './host.js';
import { logger, processLogs } from './lib/logger.js';
import { hostForBind } from './lib/network.js';
import { ViewerSession } from './viewer.js';

type Shutdown = () => Promise<void>;

async function runHost(): Promise<Shutdown> {
  const chat = new ChatConsole((message) => {
    host.coordinator.sendChat(message).catch((error: unknown) => {
      logger.error({ err: error }, 'host_chat_failed');
    });
  });
  const host = new HostSession(config, {
    onMessage: (nickname, message) => chat.printMessage(nickname, message),
    onMembersChanged: (members) => chat.printMembers(members),
  });

  const app = createApp({
    coordinator: host.coordinator,
    supervisor: host.supervisor,
    corsOrigins: config.corsOrigins,
  });
  const server = http.createServer(app);

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.wsPort, hostForBind(config.bindAddress), () => {
      server.off('error', reject);
      resolve();
    });
  });
  logger.info({ port: config.wsPort, bind: config.bindAddress }, 'server_started');

  await host.start(server);
  chat.start();

  return async () => {
    chat.close();
    await host.stop();
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  };
}

async function runViewer(): Promise<Shutdown> {
  const chat = new ChatConsole((message) => {
    if (!viewer.sendChat(message)) chat.printError('Not connected yet');
  });
  const viewer = new ViewerSession(config, {
    onAuthenticated: (info) => chat.printMessage('System', `Joined as ${info.nickname}`),
    onMessage: (nickname, message) => chat.printMessage(nickname, message),
    onMembersChanged: (members) => chat.printMembers(members),
    onError: (message) => chat.printError(message),
    onDisconnected: () => chat.printMessage('System', 'Lost the connection to the server, reconnecting'),
  });

  await viewer.start();
  chat.start();

  return async () => {
    chat.close();
    await viewer.stop();
  };
}

async function main(): Promise<void> {
  logger.info({ role: config.role, nickname: config.nickname }, 'starting');
  const shutdown = config.role === 'host' ? await runHost() : await runViewer();

  let exiting = false;
  const onSignal = (signal: NodeJS.Signals) => {
    if (exiting) return;
    exiting = true;
    logger.info({ signal }, 'shutting_down');
    shutdown()
      .then(() => processLogs.close())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, 'shutdown_failed');
        process.exit(1);
      });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'startup_failed');
  process.exit(1);
});
