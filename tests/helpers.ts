import type { PushNotificationSender } from '../src/notifications.js';
import type {
  AgentCard,
  Logger,
  Message,
  PushNotificationConfig,
  Task,
  TaskState,
  TaskStatusUpdateEvent,
} from '../src/types.js';

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

/** Lets every pending promise callback and I/O callback run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

export function waitForAbort(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

export function userMessage(text: string, extra: Partial<Message> = {}): Message {
  return {
    kind: 'message',
    messageId: `msg-${text.replace(/\W+/g, '-')}`,
    role: 'user',
    parts: [{ kind: 'text', text }],
    ...extra,
  };
}

export function makeTask(id: string, contextId: string, state: TaskState = 'submitted', extra: Partial<Task> = {}): Task {
  return { kind: 'task', id, contextId, status: { state }, ...extra };
}

export function statusUpdate(
  taskId: string,
  contextId: string,
  state: TaskState,
  final = false,
  extra: Partial<TaskStatusUpdateEvent> = {},
): TaskStatusUpdateEvent {
  return { kind: 'status-update', taskId, contextId, status: { state }, final, ...extra };
}

export function expectTask(result: Message | Task): Task {
  if (result.kind !== 'task') throw new Error(`expected a task, got ${result.kind}`);
  return result;
}

export function expectMessage(result: Message | Task): Message {
  if (result.kind !== 'message') throw new Error(`expected a message, got ${result.kind}`);
  return result;
}

export const quietLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export interface SentNotification {
  config: PushNotificationConfig;
  task: Task;
}

export class RecordingPushSender implements PushNotificationSender {
  readonly sent: SentNotification[] = [];
  failFor = new Set<string>();

  async send(config: PushNotificationConfig, task: Task): Promise<void> {
    if (this.failFor.has(config.url)) {
      throw new Error(`webhook ${config.url} unreachable`);
    }
    this.sent.push({ config, task });
  }
}

export function testAgentCard(overrides: Partial<AgentCard> = {}): AgentCard {
  return {
    name: 'Test Agent',
    description: 'Agent used in tests',
    url: 'http://localhost:3000/a2a',
    version: '1.0.0',
    protocolVersion: '0.3.0',
    capabilities: { streaming: true, pushNotifications: true },
    defaultInputModes: ['text/plain'],
    defaultOutputModes: ['text/plain'],
    skills: [],
    ...overrides,
  };
}
