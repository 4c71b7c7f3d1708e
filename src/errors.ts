export const ErrorCodes = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  TASK_NOT_FOUND: -32001,
  TASK_NOT_CANCELABLE: -32002,
  PUSH_NOTIFICATION_NOT_SUPPORTED: -32003,
  UNSUPPORTED_OPERATION: -32004,
  CONTENT_TYPE_NOT_SUPPORTED: -32005,
  INVALID_AGENT_RESPONSE: -32006,
  AUTHENTICATED_EXTENDED_CARD_NOT_CONFIGURED: -32007,
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/** Errors that cross the protocol boundary with a JSON-RPC error code. */
export class A2AError extends Error {
  readonly code: ErrorCode;
  readonly data?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.data = data;
  }
}

export class ParseError extends A2AError {
  constructor(message = 'Parse error') {
    super(ErrorCodes.PARSE_ERROR, message);
  }
}

export class InvalidRequestError extends A2AError {
  constructor(message = 'Request payload validation error') {
    super(ErrorCodes.INVALID_REQUEST, message);
  }
}

export class MethodNotFoundError extends A2AError {
  constructor(method: string) {
    super(ErrorCodes.METHOD_NOT_FOUND, `Method not found: ${method}`);
  }
}

export class InvalidParamsError extends A2AError {
  constructor(message = 'Invalid parameters', data?: Record<string, unknown>) {
    super(ErrorCodes.INVALID_PARAMS, message, data);
  }
}

export class InternalError extends A2AError {
  constructor(message = 'Internal error') {
    super(ErrorCodes.INTERNAL_ERROR, message);
  }
}

export class TaskNotFoundError extends A2AError {
  constructor(taskId: string) {
    super(ErrorCodes.TASK_NOT_FOUND, 'Task not found', { taskId });
  }
}

export class TaskNotCancelableError extends A2AError {
  constructor(taskId: string) {
    super(ErrorCodes.TASK_NOT_CANCELABLE, 'Task cannot be canceled', { taskId });
  }
}

export class PushNotificationNotSupportedError extends A2AError {
  constructor() {
    super(ErrorCodes.PUSH_NOTIFICATION_NOT_SUPPORTED, 'Push Notification is not supported');
  }
}

export class UnsupportedOperationError extends A2AError {
  constructor(message = 'This operation is not supported') {
    super(ErrorCodes.UNSUPPORTED_OPERATION, message);
  }
}

export class ContentTypeNotSupportedError extends A2AError {
  constructor(message = 'Incompatible content types') {
    super(ErrorCodes.CONTENT_TYPE_NOT_SUPPORTED, message);
  }
}

export class InvalidAgentResponseError extends A2AError {
  constructor(message = 'Invalid agent response') {
    super(ErrorCodes.INVALID_AGENT_RESPONSE, message);
  }
}

export class AuthenticatedExtendedCardNotConfiguredError extends A2AError {
  constructor() {
    super(ErrorCodes.AUTHENTICATED_EXTENDED_CARD_NOT_CONFIGURED, 'Authenticated Extended Card is not configured');
  }
}

// Internal failures. These never reach a client as-is; the transport maps them to InternalError.

/** Registering a second session for a task that already has one. */
export class DuplicateSessionError extends Error {
  readonly taskId: string;

  constructor(taskId: string) {
    super(`A session for task '${taskId}' is already registered`);
    this.name = 'DuplicateSessionError';
    this.taskId = taskId;
  }
}

/** Releasing a lock that is not held. Always a programming error. */
export class LockStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LockStateError';
  }
}

export type InvalidEventReason =
  | 'CONTEXT_ID_MISMATCH'
  | 'TASK_ID_MISMATCH'
  | 'MESSAGE_AFTER_TASK_EVENT'
  | 'TASK_EVENT_AFTER_MESSAGE'
  | 'MULTIPLE_MESSAGES'
  | 'TASK_NOT_STARTED'
  | 'EVENT_AFTER_FINAL'
  | 'TASK_IN_TERMINAL_STATE'
  | 'TERMINAL_UPDATE_NOT_FINAL';

/** An agent published an event that breaks the session's event ordering rules. */
export class InvalidEventError extends Error {
  readonly reason: InvalidEventReason;

  constructor(reason: InvalidEventReason, message: string) {
    super(message);
    this.name = 'InvalidEventError';
    this.reason = reason;
  }
}

export class SessionClosedError extends Error {
  constructor(taskId: string) {
    super(`Session for task '${taskId}' is closed`);
    this.name = 'SessionClosedError';
  }
}

/** Storage refused an update, usually because the task does not exist. */
export class TaskOperationError extends Error {
  readonly taskId: string;

  constructor(taskId: string, message: string) {
    super(message);
    this.name = 'TaskOperationError';
    this.taskId = taskId;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
