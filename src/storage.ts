import { InvalidAgentResponseError, TaskOperationError } from './errors.js';
import { taskIdOf, type Artifact, type Message, type PushNotificationConfig, type Task, type TaskEvent } from './types.js';

export interface TaskQueryOptions {
  /** Keep only the last N history entries. 0 drops history; undefined keeps all of it. */
  historyLength?: number;
  includeArtifacts?: boolean;
}

export interface TaskStorage {
  get(taskId: string, options?: TaskQueryOptions): Promise<Task | null>;
  getAll(taskIds: readonly string[], options?: TaskQueryOptions): Promise<Task[]>;
  getByContext(contextId: string, options?: TaskQueryOptions): Promise<Task[]>;
  /** Merges an event into the stored snapshot. Fails with TaskOperationError for unknown tasks. */
  update(event: TaskEvent): Promise<void>;
  delete(taskId: string): Promise<void>;
}

export interface MessageStorage {
  save(message: Message): Promise<void>;
  getByContext(contextId: string): Promise<Message[]>;
  deleteByContext(contextId: string): Promise<void>;
  replaceByContext(contextId: string, messages: readonly Message[]): Promise<void>;
}

export interface PushNotificationConfigStorage {
  /** Stores the config under its id (the task id when it has none) and returns what was stored. */
  save(taskId: string, config: PushNotificationConfig): Promise<PushNotificationConfig>;
  getAll(taskId: string): Promise<PushNotificationConfig[]>;
  /** Without a config id every config of the task is removed. */
  delete(taskId: string, configId?: string): Promise<void>;
}

function mergeMetadata(
  current: Record<string, unknown> | undefined,
  incoming: Record<string, unknown> | undefined,
): Record<string, unknown> | undefined {
  if (!incoming) return current;
  return { ...(current ?? {}), ...incoming };
}

function mergeArtifact(artifacts: readonly Artifact[], incoming: Artifact, append: boolean): Artifact[] {
  const next = [...artifacts];
  const index = next.findIndex((artifact) => artifact.artifactId === incoming.artifactId);
  if (index === -1) {
    next.push(incoming);
  } else if (append) {
    const current = next[index];
    next[index] = {
      ...current,
      parts: [...current.parts, ...incoming.parts],
      metadata: mergeMetadata(current.metadata, incoming.metadata),
    };
  } else {
    next[index] = incoming;
  }
  return next;
}

/** Applies one event to a task snapshot and returns the new snapshot. */
export function applyTaskEvent(existing: Task | null, event: TaskEvent): Task {
  switch (event.kind) {
    case 'task':
      return structuredClone(event);
    case 'status-update': {
      if (!existing) {
        throw new TaskOperationError(event.taskId, `Cannot update status of unknown task '${event.taskId}'`);
      }
      const statusMessage = event.status.message;
      return {
        ...existing,
        status: structuredClone(event.status),
        ...(statusMessage ? { history: [...(existing.history ?? []), structuredClone(statusMessage)] } : {}),
        metadata: mergeMetadata(existing.metadata, event.metadata),
      };
    }
    case 'artifact-update': {
      if (!existing) {
        throw new TaskOperationError(event.taskId, `Cannot add artifact to unknown task '${event.taskId}'`);
      }
      return {
        ...existing,
        artifacts: mergeArtifact(existing.artifacts ?? [], structuredClone(event.artifact), event.append === true),
      };
    }
  }
}

/** Returns a copy of the task shaped by the query options. */
export function viewTask(task: Task, options: TaskQueryOptions = {}): Task {
  const { history, artifacts, ...rest } = structuredClone(task);
  const view: Task = rest;
  if (history !== undefined) {
    const { historyLength } = options;
    view.history = historyLength === undefined
      ? history
      : historyLength <= 0 ? [] : history.slice(-Math.floor(historyLength));
  }
  if (options.includeArtifacts && artifacts !== undefined) {
    view.artifacts = artifacts;
  }
  return view;
}

export class InMemoryTaskStorage implements TaskStorage {
  private readonly tasks = new Map<string, Task>();

  async get(taskId: string, options?: TaskQueryOptions): Promise<Task | null> {
    const task = this.tasks.get(taskId);
    return task ? viewTask(task, options) : null;
  }

  async getAll(taskIds: readonly string[], options?: TaskQueryOptions): Promise<Task[]> {
    const found: Task[] = [];
    for (const id of taskIds) {
      const task = this.tasks.get(id);
      if (task) found.push(viewTask(task, options));
    }
    return found;
  }

  async getByContext(contextId: string, options?: TaskQueryOptions): Promise<Task[]> {
    return [...this.tasks.values()]
      .filter((task) => task.contextId === contextId)
      .map((task) => viewTask(task, options));
  }

  async update(event: TaskEvent): Promise<void> {
    const taskId = taskIdOf(event);
    this.tasks.set(taskId, applyTaskEvent(this.tasks.get(taskId) ?? null, event));
  }

  async delete(taskId: string): Promise<void> {
    this.tasks.delete(taskId);
  }
}

export class InMemoryMessageStorage implements MessageStorage {
  private readonly messages = new Map<string, Message[]>();

  async save(message: Message): Promise<void> {
    if (!message.contextId) {
      throw new InvalidAgentResponseError('Message must carry a contextId to be stored');
    }
    const list = this.messages.get(message.contextId) ?? [];
    list.push(structuredClone(message));
    this.messages.set(message.contextId, list);
  }

  async getByContext(contextId: string): Promise<Message[]> {
    return structuredClone(this.messages.get(contextId) ?? []);
  }

  async deleteByContext(contextId: string): Promise<void> {
    this.messages.delete(contextId);
  }

  async replaceByContext(contextId: string, messages: readonly Message[]): Promise<void> {
    this.messages.set(contextId, structuredClone([...messages]));
  }
}

export class InMemoryPushNotificationConfigStorage implements PushNotificationConfigStorage {
  private readonly configs = new Map<string, PushNotificationConfig[]>();

  async save(taskId: string, config: PushNotificationConfig): Promise<PushNotificationConfig> {
    const stored: PushNotificationConfig = { ...structuredClone(config), id: config.id ?? taskId };
    const list = (this.configs.get(taskId) ?? []).filter((existing) => existing.id !== stored.id);
    list.push(stored);
    this.configs.set(taskId, list);
    return structuredClone(stored);
  }

  async getAll(taskId: string): Promise<PushNotificationConfig[]> {
    return structuredClone(this.configs.get(taskId) ?? []);
  }

  async delete(taskId: string, configId?: string): Promise<void> {
    if (configId === undefined) {
      this.configs.delete(taskId);
      return;
    }
    const remaining = (this.configs.get(taskId) ?? []).filter((config) => config.id !== configId);
    if (remaining.length > 0) {
      this.configs.set(taskId, remaining);
    } else {
      this.configs.delete(taskId);
    }
  }
}

/** Read view of task storage restricted to one conversation. */
export class ContextTaskStorage {
  constructor(
    readonly contextId: string,
    private readonly storage: TaskStorage,
  ) {}

  async get(taskId: string, options?: TaskQueryOptions): Promise<Task | null> {
    const task = await this.storage.get(taskId, options);
    return task && task.contextId === this.contextId ? task : null;
  }

  getAll(options?: TaskQueryOptions): Promise<Task[]> {
    return this.storage.getByContext(this.contextId, options);
  }
}

/** Message storage restricted to one conversation. */
export class ContextMessageStorage {
  constructor(
    readonly contextId: string,
    private readonly storage: MessageStorage,
  ) {}

  async save(message: Message): Promise<void> {
    await this.storage.save(this.scoped(message));
  }

  getAll(): Promise<Message[]> {
    return this.storage.getByContext(this.contextId);
  }

  deleteAll(): Promise<void> {
    return this.storage.deleteByContext(this.contextId);
  }

  async replaceAll(messages: readonly Message[]): Promise<void> {
    await this.storage.replaceByContext(this.contextId, messages.map((message) => this.scoped(message)));
  }

  private scoped(message: Message): Message {
    if (message.contextId !== undefined && message.contextId !== this.contextId) {
      throw new InvalidAgentResponseError(
        `Message contextId '${message.contextId}' does not match conversation '${this.contextId}'`,
      );
    }
    return { ...message, contextId: this.contextId };
  }
}
