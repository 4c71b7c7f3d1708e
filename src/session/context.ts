import { ContextMessageStorage, ContextTaskStorage, type MessageStorage, type TaskStorage } from '../storage.js';
import type { ServerCallContext } from '../types.js';

/** Everything the agent sees for one request. Frozen on creation. */
export interface RequestContext<TParams> {
  readonly contextId: string;
  readonly taskId: string;
  readonly callContext: ServerCallContext;
  readonly params: TParams;
  readonly taskStorage: ContextTaskStorage;
  readonly messageStorage: ContextMessageStorage;
}

export interface RequestContextInit<TParams> {
  contextId: string;
  taskId: string;
  callContext: ServerCallContext;
  params: TParams;
  taskStorage: TaskStorage;
  messageStorage: MessageStorage;
}

export function createRequestContext<TParams>(init: RequestContextInit<TParams>): RequestContext<TParams> {
  return Object.freeze({
    contextId: init.contextId,
    taskId: init.taskId,
    callContext: init.callContext,
    params: init.params,
    taskStorage: new ContextTaskStorage(init.contextId, init.taskStorage),
    messageStorage: new ContextMessageStorage(init.contextId, init.messageStorage),
  });
}
