import type { AgentExecutor } from './agent.js';
import {
  AuthenticatedExtendedCardNotConfiguredError,
  ContentTypeNotSupportedError,
  DuplicateSessionError,
  InternalError,
  InvalidParamsError,
  PushNotificationNotSupportedError,
  TaskNotFoundError,
  UnsupportedOperationError,
} from './errors.js';
import type { PushNotificationSender } from './notifications.js';
import { createRequestContext } from './session/context.js';
import { SessionEventProcessor, type EventSubscription } from './session/eventProcessor.js';
import { SessionManager } from './session/manager.js';
import { Session } from './session/session.js';
import type { MessageStorage, PushNotificationConfigStorage, TaskStorage } from './storage.js';
import {
  EMPTY_CALL_CONTEXT,
  isTaskEvent,
  isTerminalState,
  taskIdOf,
  type AgentCard,
  type DeleteTaskPushNotificationConfigParams,
  type Event,
  type GetTaskPushNotificationConfigParams,
  type Logger,
  type Message,
  type MessageSendParams,
  type PushNotificationConfig,
  type ServerCallContext,
  type Task,
  type TaskIdParams,
  type TaskPushNotificationConfig,
  type TaskQueryParams,
} from './types.js';
import { newId, systemClock, type Clock } from './utils.js';

/**
 * Live events of one task. Consume it to the end or call `return()`: a subscriber that
 * stops reading holds the agent back.
 */
export type EventStream = AsyncIterableIterator<Event>;

export interface ProtocolServerOptions {
  agentExecutor: AgentExecutor;
  agentCard: AgentCard;
  extendedAgentCard?: AgentCard;
  taskStorage: TaskStorage;
  messageStorage: MessageStorage;
  /** Without it push notifications are reported as unsupported. */
  pushConfigStorage?: PushNotificationConfigStorage;
  pushSender?: PushNotificationSender;
  sessionManager?: SessionManager;
  clock?: Clock;
  logger?: Logger;
}

export class ProtocolServer {
  readonly agentCard: AgentCard;
  readonly sessionManager: SessionManager;

  private readonly agentExecutor: AgentExecutor;
  private readonly extendedAgentCard?: AgentCard;
  private readonly taskStorage: TaskStorage;
  private readonly messageStorage: MessageStorage;
  private readonly pushConfigStorage?: PushNotificationConfigStorage;
  private readonly clock: Clock;

  constructor(options: ProtocolServerOptions) {
    this.agentExecutor = options.agentExecutor;
    this.agentCard = options.agentCard;
    this.extendedAgentCard = options.extendedAgentCard;
    this.taskStorage = options.taskStorage;
    this.messageStorage = options.messageStorage;
    this.pushConfigStorage = options.pushConfigStorage;
    this.clock = options.clock ?? systemClock;
    this.sessionManager = options.sessionManager ?? new SessionManager({
      taskStorage: options.taskStorage,
      pushConfigStorage: options.pushConfigStorage,
      pushSender: options.pushSender,
      logger: options.logger,
    });
  }

  /**
   * Blocking calls wait for the agent and return its last result, resolved to the stored
   * task when it is task-related. Otherwise the first Message or Task is returned and the
   * agent keeps running in the background.
   */
  async sendMessage(params: MessageSendParams, callContext: ServerCallContext = EMPTY_CALL_CONTEXT): Promise<Message | Task> {
    const events = await this.sendMessageStreaming(params, callContext);

    if (params.configuration?.blocking === true) {
      let last: Event | undefined;
      for await (const event of events) {
        last = event;
      }
      if (!last) {
        throw new InternalError('Agent finished without publishing any event');
      }
      if (!isTaskEvent(last)) return last;

      const taskId = taskIdOf(last);
      const task = await this.taskStorage.get(taskId, {
        historyLength: params.configuration.historyLength,
        includeArtifacts: true,
      });
      if (!task) throw new TaskNotFoundError(taskId);
      return task;
    }

    try {
      const first = await events.next();
      if (first.done) {
        throw new InternalError('Agent finished without publishing any event');
      }
      const event = first.value;
      switch (event.kind) {
        case 'message':
        case 'task':
          return event;
        case 'status-update':
        case 'artifact-update':
          throw new InternalError(`Agent published '${event.kind}' before the task itself`);
      }
    } finally {
      await events.return?.();
    }
  }

  /**
   * Registers and starts a session for the message and returns its live events. Rejects
   * before anything is registered when the request is invalid.
   */
  async sendMessageStreaming(
    params: MessageSendParams,
    callContext: ServerCallContext = EMPTY_CALL_CONTEXT,
  ): Promise<EventStream> {
    const { message, configuration } = params;
    this.checkOutputModes(configuration?.acceptedOutputModes);
    const pushConfig = configuration?.pushNotificationConfig;
    const pushConfigStorage = pushConfig ? this.requirePushConfigStorage() : undefined;

    const processor = await this.createProcessor(message);
    const context = createRequestContext({
      contextId: processor.contextId,
      taskId: processor.taskId,
      callContext,
      params,
      taskStorage: this.taskStorage,
      messageStorage: this.messageStorage,
    });
    const session = new Session(processor, async (signal) => {
      try {
        await this.agentExecutor.execute(context, processor, signal);
      } finally {
        await processor.close();
      }
    });

    try {
      await this.sessionManager.addSession(session);
    } catch (error) {
      if (error instanceof DuplicateSessionError) {
        throw new UnsupportedOperationError(`Task ${error.taskId} is already running`);
      }
      throw error;
    }

    const events = processor.subscribe();
    if (pushConfig && pushConfigStorage) {
      try {
        await pushConfigStorage.save(processor.taskId, pushConfig);
      } catch (error) {
        await events.return();
        await session.close();
        throw error;
      }
    }
    session.start();
    return this.forward(events, session);
  }

  async getTask(params: TaskQueryParams): Promise<Task> {
    const task = await this.taskStorage.get(params.id, {
      historyLength: params.historyLength,
      includeArtifacts: true,
    });
    if (!task) throw new TaskNotFoundError(params.id);
    return task;
  }

  /**
   * Cancels through the agent when the task is running, otherwise marks the stored task as
   * canceled. Canceling a canceled task is a no-op.
   */
  async cancelTask(params: TaskIdParams, callContext: ServerCallContext = EMPTY_CALL_CONTEXT): Promise<Task> {
    const session = await this.sessionManager.sessionForTask(params.id);

    if (session) {
      const context = createRequestContext({
        contextId: session.contextId,
        taskId: session.taskId,
        callContext,
        params,
        taskStorage: this.taskStorage,
        messageStorage: this.messageStorage,
      });
      await this.agentExecutor.cancel?.(context, session);
      await this.sessionManager.withTaskLock(params.id, async () => {
        await session.close();
        await this.sessionManager.removeSession(session);
      });
    } else {
      await this.sessionManager.withTaskLock(params.id, async () => {
        const task = await this.taskStorage.get(params.id, { historyLength: 0 });
        if (!task) throw new TaskNotFoundError(params.id);
        const { state } = task.status;
        if (state === 'canceled') return;
        if (isTerminalState(state)) {
          throw new UnsupportedOperationError(`Task ${params.id} is already ${state} and cannot be canceled`);
        }
        await this.taskStorage.update({
          kind: 'status-update',
          taskId: task.id,
          contextId: task.contextId,
          status: { state: 'canceled', timestamp: this.clock().toISOString() },
          final: true,
        });
      });
    }

    const task = await this.taskStorage.get(params.id, { historyLength: 0, includeArtifacts: true });
    if (!task) throw new TaskNotFoundError(params.id);
    return task;
  }

  /** Attaches to a running task. Only events published from now on are seen. */
  async resubscribeTask(params: TaskIdParams): Promise<EventStream> {
    const session = await this.sessionManager.sessionForTask(params.id);
    if (!session) {
      throw new UnsupportedOperationError(`Task ${params.id} is not running`);
    }
    return session.eventProcessor.subscribe();
  }

  async setTaskPushNotificationConfig(params: TaskPushNotificationConfig): Promise<TaskPushNotificationConfig> {
    const storage = this.requirePushConfigStorage();
    const task = await this.taskStorage.get(params.taskId, { historyLength: 0 });
    if (!task) throw new TaskNotFoundError(params.taskId);
    const stored = await storage.save(params.taskId, params.pushNotificationConfig);
    return { taskId: params.taskId, pushNotificationConfig: stored };
  }

  async getTaskPushNotificationConfig(params: GetTaskPushNotificationConfigParams): Promise<TaskPushNotificationConfig> {
    const storage = this.requirePushConfigStorage();
    const configs = await storage.getAll(params.id);
    const config: PushNotificationConfig | undefined = params.pushNotificationConfigId === undefined
      ? configs[0]
      : configs.find((candidate) => candidate.id === params.pushNotificationConfigId);
    if (!config) {
      throw new InvalidParamsError(`Push notification config not found for task ${params.id}`);
    }
    return { taskId: params.id, pushNotificationConfig: config };
  }

  async listTaskPushNotificationConfig(params: TaskIdParams): Promise<TaskPushNotificationConfig[]> {
    const storage = this.requirePushConfigStorage();
    const configs = await storage.getAll(params.id);
    return configs.map((config) => ({ taskId: params.id, pushNotificationConfig: config }));
  }

  async deleteTaskPushNotificationConfig(params: DeleteTaskPushNotificationConfigParams): Promise<void> {
    const storage = this.requirePushConfigStorage();
    await storage.delete(params.id, params.pushNotificationConfigId);
  }

  async getAuthenticatedExtendedAgentCard(): Promise<AgentCard> {
    if (!this.agentCard.supportsAuthenticatedExtendedCard) {
      throw new UnsupportedOperationError('Agent does not support an authenticated extended card');
    }
    if (!this.extendedAgentCard) {
      throw new AuthenticatedExtendedCardNotConfiguredError();
    }
    return this.extendedAgentCard;
  }

  /** Closes every running session. */
  shutdown(): Promise<void> {
    return this.sessionManager.closeAll();
  }

  private async createProcessor(message: Message): Promise<SessionEventProcessor> {
    if (!message.taskId) {
      return new SessionEventProcessor({
        contextId: message.contextId ?? newId(),
        taskId: newId(),
        taskStorage: this.taskStorage,
      });
    }

    if (await this.sessionManager.sessionForTask(message.taskId)) {
      throw new UnsupportedOperationError(`Task ${message.taskId} is already running`);
    }
    const task = await this.taskStorage.get(message.taskId, { includeArtifacts: true });
    if (!task) throw new TaskNotFoundError(message.taskId);
    if (message.contextId !== task.contextId) {
      throw new InvalidParamsError(
        `Message contextId '${message.contextId ?? ''}' does not match task contextId '${task.contextId}'`,
      );
    }
    return new SessionEventProcessor({
      contextId: task.contextId,
      taskId: task.id,
      taskStorage: this.taskStorage,
      task,
    });
  }

  private checkOutputModes(accepted: string[] | undefined): void {
    if (!accepted || accepted.length === 0) return;
    const offered = this.agentCard.defaultOutputModes;
    if (!accepted.some((mode) => offered.includes(mode))) {
      throw new ContentTypeNotSupportedError(
        `None of the accepted output modes (${accepted.join(', ')}) is produced by this agent`,
      );
    }
  }

  private requirePushConfigStorage(): PushNotificationConfigStorage {
    if (!this.agentCard.capabilities.pushNotifications || !this.pushConfigStorage) {
      throw new PushNotificationNotSupportedError();
    }
    return this.pushConfigStorage;
  }

  private async *forward(events: EventSubscription, session: Session): AsyncGenerator<Event, void, undefined> {
    try {
      for await (const event of events) {
        yield event;
      }
    } finally {
      await events.return();
    }
    const outcome = await session.completion();
    if (outcome.status === 'failed') {
      throw outcome.error;
    }
  }
}
