import { z } from 'zod';
import {
  A2AError,
  InternalError,
  InvalidParamsError,
  InvalidRequestError,
  MethodNotFoundError,
  UnsupportedOperationError,
  errorMessage,
} from '../errors.js';
import type { EventStream, ProtocolServer } from '../server.js';
import type { Logger, ServerCallContext } from '../types.js';

export type JsonRpcId = string | number | null;

export interface JsonRpcErrorBody {
  code: number;
  message: string;
  data?: Record<string, unknown>;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: JsonRpcErrorBody;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

export interface JsonRpcRequest {
  id: JsonRpcId;
  method: string;
  params: unknown;
}

export type ParsedRequest =
  | { ok: true; request: JsonRpcRequest }
  | { ok: false; response: JsonRpcErrorResponse };

export const STREAMING_METHODS: ReadonlySet<string> = new Set(['message/stream', 'tasks/resubscribe']);

function jsonRpcErrorResponse(
  id: JsonRpcId,
  code: number,
  message: string,
  data?: Record<string, unknown>,
): JsonRpcErrorResponse {
  return {
    jsonrpc: '2.0',
    error: data ? { code, message, data } : { code, message },
    id,
  };
}

export function errorResponse(id: JsonRpcId, error: A2AError): JsonRpcErrorResponse {
  return jsonRpcErrorResponse(id, error.code, error.message, error.data);
}

function success(id: JsonRpcId, result: unknown): JsonRpcSuccessResponse {
  return { jsonrpc: '2.0', id, result };
}

const metadataSchema = z.record(z.unknown());

const partSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('text'), text: z.string(), metadata: metadataSchema.optional() }),
  z.object({
    kind: z.literal('file'),
    file: z
      .object({
        name: z.string().optional(),
        mimeType: z.string().optional(),
        bytes: z.string().optional(),
        uri: z.string().optional(),
      })
      .refine((file) => file.bytes !== undefined || file.uri !== undefined, 'file part needs bytes or uri'),
    metadata: metadataSchema.optional(),
  }),
  z.object({ kind: z.literal('data'), data: metadataSchema, metadata: metadataSchema.optional() }),
]);

const messageSchema = z.object({
  kind: z.literal('message'),
  messageId: z.string().min(1),
  role: z.enum(['user', 'agent']),
  parts: z.array(partSchema).min(1),
  contextId: z.string().min(1).optional(),
  taskId: z.string().min(1).optional(),
  referenceTaskIds: z.array(z.string()).optional(),
  metadata: metadataSchema.optional(),
});

const pushNotificationConfigSchema = z.object({
  id: z.string().min(1).optional(),
  url: z.string().url(),
  token: z.string().optional(),
  authentication: z
    .object({
      schemes: z.array(z.string()),
      credentials: z.string().optional(),
    })
    .optional(),
});

const messageSendParamsSchema = z.object({
  message: messageSchema,
  configuration: z
    .object({
      blocking: z.boolean().optional(),
      historyLength: z.number().int().min(0).optional(),
      acceptedOutputModes: z.array(z.string()).optional(),
      pushNotificationConfig: pushNotificationConfigSchema.optional(),
    })
    .optional(),
  metadata: metadataSchema.optional(),
});

const taskIdParamsSchema = z.object({
  id: z.string().min(1),
  metadata: metadataSchema.optional(),
});

const taskQueryParamsSchema = taskIdParamsSchema.extend({
  historyLength: z.number().int().min(0).optional(),
});

const taskPushNotificationConfigSchema = z.object({
  taskId: z.string().min(1),
  pushNotificationConfig: pushNotificationConfigSchema,
});

const getTaskPushNotificationConfigParamsSchema = taskIdParamsSchema.extend({
  pushNotificationConfigId: z.string().min(1).optional(),
});

const deleteTaskPushNotificationConfigParamsSchema = taskIdParamsSchema.extend({
  pushNotificationConfigId: z.string().min(1),
});

const requestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string().min(1),
  params: z.unknown().optional(),
});

function parseParams<T extends z.ZodTypeAny>(schema: T, params: unknown): z.infer<T> {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    throw new InvalidParamsError('Cannot parse request params', {
      issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }
  return parsed.data;
}

function requestIdOf(body: unknown): JsonRpcId {
  if (!body || typeof body !== 'object' || !('id' in body)) return null;
  const { id } = body;
  return typeof id === 'string' || typeof id === 'number' ? id : null;
}

export function parseRequest(body: unknown): ParsedRequest {
  const parsed = requestSchema.safeParse(body);
  if (!parsed.success) {
    return {
      ok: false,
      response: errorResponse(requestIdOf(body), new InvalidRequestError()),
    };
  }
  const { id, method, params } = parsed.data;
  return { ok: true, request: { id: id ?? null, method, params } };
}

/** Maps JSON-RPC 2.0 requests onto a ProtocolServer. */
export class JsonRpcHandler {
  constructor(
    private readonly server: ProtocolServer,
    private readonly logger: Logger = console,
  ) {}

  isStreaming(method: string): boolean {
    return STREAMING_METHODS.has(method);
  }

  async handle(request: JsonRpcRequest, callContext: ServerCallContext): Promise<JsonRpcResponse> {
    try {
      return success(request.id, await this.invoke(request, callContext));
    } catch (error) {
      return this.toErrorResponse(request.id, error);
    }
  }

  /** Yields one response per event. An error ends the stream after its error response. */
  async *stream(request: JsonRpcRequest, callContext: ServerCallContext): AsyncGenerator<JsonRpcResponse, void, undefined> {
    let events: EventStream;
    try {
      events = await this.openStream(request, callContext);
    } catch (error) {
      yield this.toErrorResponse(request.id, error);
      return;
    }
    try {
      for await (const event of events) {
        yield success(request.id, event);
      }
    } catch (error) {
      yield this.toErrorResponse(request.id, error);
    }
  }

  toErrorResponse(id: JsonRpcId, error: unknown): JsonRpcErrorResponse {
    if (error instanceof A2AError) {
      return errorResponse(id, error);
    }
    this.logger.error('[jsonrpc] internal error', error);
    return errorResponse(id, new InternalError(`Internal error: ${errorMessage(error)}`));
  }

  private openStream(request: JsonRpcRequest, callContext: ServerCallContext): Promise<EventStream> {
    if (!this.server.agentCard.capabilities.streaming) {
      throw new UnsupportedOperationError('Streaming is not supported by this agent');
    }
    switch (request.method) {
      case 'message/stream':
        return this.server.sendMessageStreaming(parseParams(messageSendParamsSchema, request.params), callContext);
      case 'tasks/resubscribe':
        return this.server.resubscribeTask(parseParams(taskIdParamsSchema, request.params));
      default:
        throw new MethodNotFoundError(request.method);
    }
  }

  private async invoke(request: JsonRpcRequest, callContext: ServerCallContext): Promise<unknown> {
    const { method, params } = request;
    switch (method) {
      case 'message/send':
        return this.server.sendMessage(parseParams(messageSendParamsSchema, params), callContext);
      case 'tasks/get':
        return this.server.getTask(parseParams(taskQueryParamsSchema, params));
      case 'tasks/cancel':
        return this.server.cancelTask(parseParams(taskIdParamsSchema, params), callContext);
      case 'tasks/pushNotificationConfig/set':
        return this.server.setTaskPushNotificationConfig(parseParams(taskPushNotificationConfigSchema, params));
      case 'tasks/pushNotificationConfig/get':
        return this.server.getTaskPushNotificationConfig(parseParams(getTaskPushNotificationConfigParamsSchema, params));
      case 'tasks/pushNotificationConfig/list':
        return this.server.listTaskPushNotificationConfig(parseParams(taskIdParamsSchema, params));
      case 'tasks/pushNotificationConfig/delete':
        await this.server.deleteTaskPushNotificationConfig(
          parseParams(deleteTaskPushNotificationConfigParamsSchema, params),
        );
        return null;
      case 'agent/getAuthenticatedExtendedCard':
        return this.server.getAuthenticatedExtendedAgentCard();
      default:
        throw new MethodNotFoundError(method);
    }
  }
}
