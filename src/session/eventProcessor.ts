import { InvalidEventError, SessionClosedError } from '../errors.js';
import type { TaskStorage } from '../storage.js';
import { isTerminalState, taskIdOf, type Event, type Message, type Task, type TaskEvent, type TaskState } from '../types.js';
import { Mutex } from './locks.js';

interface Delivery {
  event: Event;
  delivered: () => void;
}

/**
 * One subscriber's view of a session's events. Registered as soon as it is created, so
 * events published before the first `next()` call are still seen. A publisher waits until
 * every subscriber has taken the event; `return()` detaches and releases it.
 */
export class EventSubscription implements AsyncIterableIterator<Event> {
  private readonly buffer: Delivery[] = [];
  private pending: ((result: IteratorResult<Event>) => void) | null = null;
  private ended = false;

  constructor(private readonly detach: (subscription: EventSubscription) => void) {}

  deliver(event: Event): Promise<void> {
    if (this.ended) return Promise.resolve();
    return new Promise((resolve) => {
      const waiter = this.pending;
      if (waiter) {
        this.pending = null;
        waiter({ value: event, done: false });
        resolve();
      } else {
        this.buffer.push({ event, delivered: () => resolve() });
      }
    });
  }

  /** Ends the stream once buffered events have been taken. */
  end(): void {
    this.ended = true;
    if (this.buffer.length === 0) this.settlePending();
  }

  next(): Promise<IteratorResult<Event>> {
    const queued = this.buffer.shift();
    if (queued) {
      queued.delivered();
      return Promise.resolve({ value: queued.event, done: false });
    }
    if (this.ended) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => {
      this.pending = resolve;
    });
  }

  return(): Promise<IteratorResult<Event>> {
    this.ended = true;
    for (const queued of this.buffer.splice(0)) queued.delivered();
    this.settlePending();
    this.detach(this);
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): EventSubscription {
    return this;
  }

  private settlePending(): void {
    const waiter = this.pending;
    if (waiter) {
      this.pending = null;
      waiter({ value: undefined, done: true });
    }
  }
}

export interface SessionEventProcessorOptions {
  contextId: string;
  taskId: string;
  taskStorage: TaskStorage;
  /** Existing task when the session continues one. */
  task?: Task | null;
}

/**
 * Event bus of one session. Events are validated, mirrored into task storage and then
 * fanned out to every subscriber in publish order.
 */
export class SessionEventProcessor {
  readonly contextId: string;
  readonly taskId: string;

  private readonly taskStorage: TaskStorage;
  private readonly mutex = new Mutex();
  private readonly subscribers = new Set<EventSubscription>();
  private closing: Promise<void> | null = null;
  private taskState: TaskState | null;
  private sentMessage = false;
  private sentTaskEvent = false;
  private sentFinal = false;

  constructor(options: SessionEventProcessorOptions) {
    this.contextId = options.contextId;
    this.taskId = options.taskId;
    this.taskStorage = options.taskStorage;
    this.taskState = options.task?.status.state ?? null;
  }

  get isClosed(): boolean {
    return this.closing !== null;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  get currentState(): TaskState | null {
    return this.taskState;
  }

  subscribe(): EventSubscription {
    const subscription = new EventSubscription((detached) => this.subscribers.delete(detached));
    if (this.isClosed) {
      subscription.end();
    } else {
      this.subscribers.add(subscription);
    }
    return subscription;
  }

  async sendMessage(message: Message): Promise<void> {
    await this.publish(message, () => this.acceptMessage(message));
  }

  async sendTaskEvent(event: TaskEvent): Promise<void> {
    await this.publish(event, async () => {
      this.acceptTaskEvent(event);
      await this.taskStorage.update(event);
      switch (event.kind) {
        case 'task':
          this.taskState = event.status.state;
          break;
        case 'status-update':
          this.taskState = event.status.state;
          if (event.final) this.sentFinal = true;
          break;
        case 'artifact-update':
          break;
      }
      this.sentTaskEvent = true;
    });
  }

  /** Ends the stream for current and future subscribers. Waits for an in-flight send. */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.mutex.withLock(() => {
        for (const subscription of this.subscribers) subscription.end();
        this.subscribers.clear();
      });
    }
    return this.closing;
  }

  /** Resolves once no send is in flight. */
  async idle(): Promise<void> {
    await this.mutex.withLock(() => undefined);
  }

  private async publish(event: Event, accept: () => Promise<void> | void): Promise<void> {
    if (this.isClosed) throw new SessionClosedError(this.taskId);
    await this.mutex.withLock(async () => {
      if (this.isClosed) throw new SessionClosedError(this.taskId);
      await accept();
      await Promise.all([...this.subscribers].map((subscription) => subscription.deliver(event)));
    });
  }

  private acceptMessage(message: Message): void {
    if (message.contextId !== this.contextId) {
      throw new InvalidEventError(
        'CONTEXT_ID_MISMATCH',
        `Message contextId '${message.contextId}' does not match session contextId '${this.contextId}'`,
      );
    }
    if (this.sentTaskEvent || this.taskState !== null) {
      throw new InvalidEventError('MESSAGE_AFTER_TASK_EVENT', 'A task session cannot publish messages');
    }
    if (this.sentMessage) {
      throw new InvalidEventError('MULTIPLE_MESSAGES', 'A message session publishes exactly one message');
    }
    this.sentMessage = true;
  }

  private acceptTaskEvent(event: TaskEvent): void {
    if (event.contextId !== this.contextId) {
      throw new InvalidEventError(
        'CONTEXT_ID_MISMATCH',
        `Event contextId '${event.contextId}' does not match session contextId '${this.contextId}'`,
      );
    }
    const eventTaskId = taskIdOf(event);
    if (eventTaskId !== this.taskId) {
      throw new InvalidEventError(
        'TASK_ID_MISMATCH',
        `Event taskId '${eventTaskId}' does not match session taskId '${this.taskId}'`,
      );
    }
    if (this.sentMessage) {
      throw new InvalidEventError('TASK_EVENT_AFTER_MESSAGE', 'A message session cannot publish task events');
    }
    if (this.sentFinal) {
      throw new InvalidEventError('EVENT_AFTER_FINAL', 'No events may follow a final status update');
    }
    if (this.taskState === null && event.kind !== 'task') {
      throw new InvalidEventError('TASK_NOT_STARTED', 'A new task must be published before its updates');
    }
    if (this.taskState !== null && isTerminalState(this.taskState)) {
      throw new InvalidEventError('TASK_IN_TERMINAL_STATE', `Task is already in terminal state '${this.taskState}'`);
    }
    if (event.kind === 'status-update' && isTerminalState(event.status.state) && !event.final) {
      throw new InvalidEventError(
        'TERMINAL_UPDATE_NOT_FINAL',
        `Status update to '${event.status.state}' must be marked final`,
      );
    }
  }
}
