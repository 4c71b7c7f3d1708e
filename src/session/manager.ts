import { DuplicateSessionError } from '../errors.js';
import type { PushNotificationSender } from '../notifications.js';
import type { PushNotificationConfigStorage, TaskStorage } from '../storage.js';
import { isTaskEvent, type Logger } from '../types.js';
import type { EventSubscription } from './eventProcessor.js';
import { KeyedMutex, RWLock } from './locks.js';
import type { Session, SessionOutcome } from './session.js';

export interface SessionManagerOptions {
  taskStorage: TaskStorage;
  pushConfigStorage?: PushNotificationConfigStorage;
  pushSender?: PushNotificationSender;
  logger?: Logger;
}

/**
 * Registry of running sessions, one per task id.
 *
 * The registry sits behind a reader-writer lock. A second, per-task lock table orders the
 * finalization of a task between its completion monitor and an explicit cancel. Lock order
 * is always task lock first, registry lock second.
 */
export class SessionManager {
  private readonly sessions = new Map<string, Session>();
  private readonly registryLock = new RWLock();
  private readonly taskLocks = new KeyedMutex();
  private readonly monitors = new Set<Promise<void>>();
  private readonly taskStorage: TaskStorage;
  private readonly pushConfigStorage?: PushNotificationConfigStorage;
  private readonly pushSender?: PushNotificationSender;
  private readonly logger: Logger;

  constructor(options: SessionManagerOptions) {
    this.taskStorage = options.taskStorage;
    this.pushConfigStorage = options.pushConfigStorage;
    this.pushSender = options.pushSender;
    this.logger = options.logger ?? console;
  }

  /**
   * Registers the session and starts watching it. When its job ends the session is
   * removed, closed, and push notifications are sent for task sessions.
   * Fails with DuplicateSessionError if the task already has a session.
   */
  async addSession(session: Session): Promise<void> {
    // taken before registration so the session's first event cannot be missed
    const firstEvent = session.eventProcessor.subscribe();
    try {
      await this.registryLock.withWriteLock(() => {
        if (this.sessions.has(session.taskId)) {
          throw new DuplicateSessionError(session.taskId);
        }
        this.sessions.set(session.taskId, session);
      });
    } catch (error) {
      await firstEvent.return();
      throw error;
    }

    const monitor: Promise<void> = this.monitor(session, firstEvent)
      .catch((error: unknown) => {
        this.logger.error(`[session-manager] monitor failed for task ${session.taskId}`, error);
      })
      .finally(() => {
        this.monitors.delete(monitor);
      });
    this.monitors.add(monitor);
    session.trackCompletion(monitor);
  }

  sessionForTask(taskId: string): Promise<Session | undefined> {
    return this.registryLock.withReadLock(() => this.sessions.get(taskId));
  }

  activeSessions(): Promise<number> {
    return this.registryLock.withReadLock(() => this.sessions.size);
  }

  /** Removes the registry entry only if it still belongs to `session`. */
  removeSession(session: Session): Promise<boolean> {
    return this.registryLock.withWriteLock(() => {
      if (this.sessions.get(session.taskId) !== session) return false;
      this.sessions.delete(session.taskId);
      return true;
    });
  }

  taskLock(taskId: string): Promise<void> {
    return this.taskLocks.lock(taskId);
  }

  /** Throws LockStateError if the task is not locked. */
  taskUnlock(taskId: string): void {
    this.taskLocks.unlock(taskId);
  }

  isTaskLocked(taskId: string): boolean {
    return this.taskLocks.isLocked(taskId);
  }

  withTaskLock<T>(taskId: string, action: () => Promise<T> | T): Promise<T> {
    return this.taskLocks.withLock(taskId, action);
  }

  /** Closes every registered session and waits for their cleanup. */
  async closeAll(): Promise<void> {
    const sessions = await this.registryLock.withReadLock(() => [...this.sessions.values()]);
    await Promise.all(sessions.map((session) => session.close()));
    await Promise.allSettled([...this.monitors]);
  }

  private async monitor(session: Session, firstEvent: EventSubscription): Promise<void> {
    const startedTask = this.readFirstEvent(firstEvent);
    const outcome = await session.completion();
    this.logOutcome(session, outcome);

    await this.withTaskLock(session.taskId, async () => {
      await this.removeSession(session);
      await session.close();
    });

    if (await startedTask) {
      await this.notify(session.taskId);
    }
  }

  private async readFirstEvent(events: EventSubscription): Promise<boolean> {
    try {
      const first = await events.next();
      if (first.done) return false;
      return isTaskEvent(first.value);
    } finally {
      await events.return();
    }
  }

  private logOutcome(session: Session, outcome: SessionOutcome): void {
    switch (outcome.status) {
      case 'completed':
        break;
      case 'canceled':
        this.logger.info(`[session-manager] task ${session.taskId} canceled`);
        break;
      case 'failed':
        this.logger.warn(`[session-manager] task ${session.taskId} failed`, outcome.error);
        break;
    }
  }

  private async notify(taskId: string): Promise<void> {
    if (!this.pushConfigStorage || !this.pushSender) return;
    const configs = await this.pushConfigStorage.getAll(taskId);
    if (configs.length === 0) return;

    const task = await this.taskStorage.get(taskId, { historyLength: 0, includeArtifacts: false });
    if (!task) {
      this.logger.warn(`[push] task ${taskId} not found, skipping ${configs.length} notification(s)`);
      return;
    }
    for (const config of configs) {
      try {
        await this.pushSender.send(config, task);
      } catch (error) {
        this.logger.warn(`[push] notification to ${config.url} for task ${taskId} failed`, error);
      }
    }
  }
}
