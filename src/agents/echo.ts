import type { AgentExecutor } from '../agent.js';
import { InvalidEventError, SessionClosedError } from '../errors.js';
import type { RequestContext } from '../session/context.js';
import type { SessionEventProcessor } from '../session/eventProcessor.js';
import type { Session } from '../session/session.js';
import { isTerminalState, type Message, type MessageSendParams, type TaskIdParams, type TaskState } from '../types.js';
import { newId, systemClock, type Clock } from '../utils.js';

export interface EchoAgentOptions {
  clock?: Clock;
}

function textOf(message: Message): string {
  return message.parts
    .map((part) => (part.kind === 'text' ? part.text : ''))
    .filter((text) => text.length > 0)
    .join('\n');
}

function waitForAbort(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

function isAlreadyFinished(error: unknown): boolean {
  if (error instanceof SessionClosedError) return true;
  return error instanceof InvalidEventError
    && (error.reason === 'EVENT_AFTER_FINAL' || error.reason === 'TASK_IN_TERMINAL_STATE');
}

/**
 * Demo agent. Plain text is answered with a single message. Text mentioning "task", and any
 * message continuing a task, runs as a task that echoes the input as an artifact;
 * "long-running" tasks stay working until they are canceled.
 */
export class EchoAgentExecutor implements AgentExecutor {
  private readonly clock: Clock;

  constructor(options: EchoAgentOptions = {}) {
    this.clock = options.clock ?? systemClock;
  }

  async execute(
    context: RequestContext<MessageSendParams>,
    eventProcessor: SessionEventProcessor,
    signal: AbortSignal,
  ): Promise<void> {
    const { message } = context.params;
    const text = textOf(message);

    if (eventProcessor.currentState === null && !/\btask\b/i.test(text)) {
      const reply = this.reply(context.contextId, `Echo: ${text}`);
      await context.messageStorage.save(message);
      await context.messageStorage.save(reply);
      await eventProcessor.sendMessage(reply);
      return;
    }

    if (eventProcessor.currentState === null) {
      await eventProcessor.sendTaskEvent({
        kind: 'task',
        id: context.taskId,
        contextId: context.contextId,
        status: { state: 'submitted', timestamp: this.now() },
        history: [{ ...message, contextId: context.contextId, taskId: context.taskId }],
      });
    }
    await this.updateStatus(eventProcessor, 'working');

    if (/long-running/i.test(text)) {
      await waitForAbort(signal);
      return;
    }

    await eventProcessor.sendTaskEvent({
      kind: 'artifact-update',
      taskId: context.taskId,
      contextId: context.contextId,
      artifact: { artifactId: `${context.taskId}-echo`, name: 'echo', parts: [{ kind: 'text', text }] },
      lastChunk: true,
    });
    await this.updateStatus(eventProcessor, 'completed', this.reply(context.contextId, 'Done', context.taskId));
  }

  async cancel(_context: RequestContext<TaskIdParams>, session: Session): Promise<void> {
    const processor = session.eventProcessor;
    const state = processor.currentState;
    if (!processor.isClosed && state !== null && !isTerminalState(state)) {
      try {
        await this.updateStatus(processor, 'canceled');
      } catch (error) {
        // a concurrent cancel got there first
        if (!isAlreadyFinished(error)) throw error;
      }
    }
    await session.close();
  }

  private async updateStatus(eventProcessor: SessionEventProcessor, state: TaskState, message?: Message): Promise<void> {
    await eventProcessor.sendTaskEvent({
      kind: 'status-update',
      taskId: eventProcessor.taskId,
      contextId: eventProcessor.contextId,
      status: message ? { state, message, timestamp: this.now() } : { state, timestamp: this.now() },
      final: isTerminalState(state),
    });
  }

  private reply(contextId: string, text: string, taskId?: string): Message {
    return {
      kind: 'message',
      messageId: newId(),
      role: 'agent',
      parts: [{ kind: 'text', text }],
      contextId,
      ...(taskId ? { taskId } : {}),
    };
  }

  private now(): string {
    return this.clock().toISOString();
  }
}
