import type { RequestContext } from './session/context.js';
import type { SessionEventProcessor } from './session/eventProcessor.js';
import type { Session } from './session/session.js';
import type { MessageSendParams, TaskIdParams } from './types.js';

/**
 * The agent behind the server. `execute` publishes its results through the event processor
 * and returns when the work is done; it should stop early once `signal` is aborted.
 */
export interface AgentExecutor {
  execute(
    context: RequestContext<MessageSendParams>,
    eventProcessor: SessionEventProcessor,
    signal: AbortSignal,
  ): Promise<void>;

  /**
   * Called when a client cancels a running task. May publish a final status update and
   * close the session itself. Absent means nothing to do.
   */
  cancel?(context: RequestContext<TaskIdParams>, session: Session): Promise<void>;
}
