import express from 'express';
import type { ErrorRequestHandler, Request, Response } from 'express';
import { ParseError } from '../errors.js';
import type { ProtocolServer } from '../server.js';
import type { Logger, ServerCallContext } from '../types.js';
import { JsonRpcHandler, errorResponse, parseRequest, type JsonRpcRequest } from './jsonrpc.js';

export const AGENT_CARD_PATH = '/.well-known/agent-card.json';

export interface HttpAppOptions {
  rpcPath?: string;
  sseHeartbeatMs?: number;
  bodyLimit?: string;
  logger?: Logger;
}

function callContextFrom(req: Request): ServerCallContext {
  const headers: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    headers[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  return { headers };
}

async function writeEventStream(
  handler: JsonRpcHandler,
  request: JsonRpcRequest,
  req: Request,
  res: Response,
  heartbeatMs: number,
): Promise<void> {
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache, no-transform');
  res.setHeader('Connection', 'keep-alive');
  res.setHeader('X-Accel-Buffering', 'no');
  res.flushHeaders();

  let clientGone = false;
  const heartbeat = setInterval(() => {
    if (!clientGone) res.write(': heartbeat\n\n');
  }, heartbeatMs);
  heartbeat.unref();
  res.on('close', () => {
    clientGone = true;
    clearInterval(heartbeat);
  });

  try {
    for await (const response of handler.stream(request, callContextFrom(req))) {
      if (clientGone) break;
      res.write(`data: ${JSON.stringify(response)}\n\n`);
    }
  } finally {
    clearInterval(heartbeat);
    if (!res.writableEnded) res.end();
  }
}

/** JSON-RPC endpoint (plain JSON and SSE), agent card discovery and health. */
export function createHttpApp(server: ProtocolServer, options: HttpAppOptions = {}): express.Express {
  const rpcPath = options.rpcPath ?? '/';
  const heartbeatMs = options.sseHeartbeatMs ?? 15_000;
  const logger = options.logger ?? console;
  const handler = new JsonRpcHandler(server, logger);
  const app = express();

  app.get(AGENT_CARD_PATH, (_req, res) => {
    res.json(server.agentCard);
  });

  app.get('/health', async (_req, res) => {
    res.json({
      status: 'ok',
      agent: server.agentCard.name,
      active_sessions: await server.sessionManager.activeSessions(),
    });
  });

  app.post(rpcPath, express.json({ limit: options.bodyLimit ?? '1mb' }), async (req, res) => {
    const parsed = parseRequest(req.body);
    if (!parsed.ok) {
      res.status(400).json(parsed.response);
      return;
    }
    const { request } = parsed;

    try {
      if (handler.isStreaming(request.method)) {
        await writeEventStream(handler, request, req, res, heartbeatMs);
        return;
      }
      res.json(await handler.handle(request, callContextFrom(req)));
    } catch (error) {
      logger.error(`[http] ${request.method} failed`, error);
      if (!res.headersSent) {
        res.status(500).json(handler.toErrorResponse(request.id, error));
      } else if (!res.writableEnded) {
        res.end();
      }
    }
  });

  const parseErrorHandler: ErrorRequestHandler = (error: unknown, _req, res, next) => {
    if (error instanceof SyntaxError) {
      res.status(400).json(errorResponse(null, new ParseError()));
      return;
    }
    next(error);
  };
  app.use(parseErrorHandler);

  return app;
}
