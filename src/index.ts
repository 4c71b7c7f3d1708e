#!/usr/bin/env node

import { EchoAgentExecutor } from './agents/echo.js';
import { loadConfig, type HubConfig } from './config.js';
import { closeDb, initDb, SqliteMessageStorage, SqlitePushNotificationConfigStorage, SqliteTaskStorage } from './db.js';
import { HttpPushNotificationSender } from './notifications.js';
import { ProtocolServer } from './server.js';
import {
  InMemoryMessageStorage,
  InMemoryPushNotificationConfigStorage,
  InMemoryTaskStorage,
  type MessageStorage,
  type PushNotificationConfigStorage,
  type TaskStorage,
} from './storage.js';
import { AGENT_CARD_PATH, createHttpApp } from './transport/http.js';
import type { AgentCard } from './types.js';

interface Storages {
  taskStorage: TaskStorage;
  messageStorage: MessageStorage;
  pushConfigStorage: PushNotificationConfigStorage;
}

function createStorages(config: HubConfig): Storages {
  if (config.storage === 'memory') {
    return {
      taskStorage: new InMemoryTaskStorage(),
      messageStorage: new InMemoryMessageStorage(),
      pushConfigStorage: new InMemoryPushNotificationConfigStorage(),
    };
  }
  const d = initDb(config.dbPath);
  return {
    taskStorage: new SqliteTaskStorage(d),
    messageStorage: new SqliteMessageStorage(d),
    pushConfigStorage: new SqlitePushNotificationConfigStorage(d),
  };
}

function buildAgentCard(config: HubConfig): AgentCard {
  return {
    name: 'Echo Agent',
    description: 'Echoes messages back; text mentioning "task" runs as a tracked task',
    url: config.publicUrl,
    version: '0.1.0',
    protocolVersion: '0.3.0',
    capabilities: { streaming: true, pushNotifications: true },
    defaultInputModes: ['text/plain'],
    defaultOutputModes: ['text/plain'],
    skills: [
      {
        id: 'echo',
        name: 'Echo',
        description: 'Repeats the input text',
        tags: ['demo'],
        examples: ['hello world', 'do task', 'do long-running task'],
      },
    ],
  };
}

const config = loadConfig();
const storages = createStorages(config);
const server = new ProtocolServer({
  agentExecutor: new EchoAgentExecutor(),
  agentCard: buildAgentCard(config),
  ...storages,
  pushSender: new HttpPushNotificationSender({ timeoutMs: config.pushTimeoutMs }),
});
const app = createHttpApp(server, { rpcPath: config.rpcPath, sseHeartbeatMs: config.sseHeartbeatMs });

const listener = app.listen(config.port, config.host, () => {
  console.log(
    `Agent task hub running at http://${config.host}:${config.port}${config.rpcPath} (storage=${config.storage}, agent_card=${AGENT_CARD_PATH})`
  );
});

let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`[shutdown] ${signal} received, closing sessions`);
  try {
    await server.shutdown();
  } catch (error) {
    console.error('[shutdown] error closing sessions', error);
  }
  listener.close(() => {
    closeDb();
    process.exit(0);
  });
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    void shutdown(signal);
  });
}
