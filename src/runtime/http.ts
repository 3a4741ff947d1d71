import http from 'node:http';
import { extractBearerToken } from '../auth/gate.js';
import type { RelayContext } from '../relay.js';
import { describeError } from '../shared/errors.js';
import { AGENT_CARD_PATH, JSON_RPC_ERRORS } from '../shared/protocol.js';
import { createLogger } from '../utils/logger.js';
import { JsonRpcHandler, STREAM_METHOD, errorResponse, parseJsonRpcRequest } from './jsonrpc.js';

const MAX_BODY_BYTES = 1_000_000;

const setSecurityHeaders = (res: http.ServerResponse) => {
  res.setHeader('content-type', 'application/json');
  res.setHeader('cache-control', 'no-store, no-cache, must-revalidate');
  res.setHeader('pragma', 'no-cache');
  res.setHeader('x-content-type-options', 'nosniff');
};

const writeJson = (res: http.ServerResponse, statusCode: number, body: unknown, headers: Record<string, string> = {}) => {
  setSecurityHeaders(res);
  for (const [name, value] of Object.entries(headers)) {
    res.setHeader(name, value);
  }
  res.statusCode = statusCode;
  res.end(JSON.stringify(body));
};

class BodyError extends Error {
  constructor(readonly statusCode: number, message: string) {
    super(message);
    this.name = 'BodyError';
  }
}

const readJsonBody = (req: http.IncomingMessage): Promise<unknown> => {
  return new Promise((resolve, reject) => {
    const contentType = req.headers['content-type'];
    if (!contentType || !contentType.includes('application/json')) {
      reject(new BodyError(415, 'Content-Type must be application/json'));
      req.resume();
      return;
    }

    // Decoded once at the end: a multi-byte character may straddle two chunks.
    const chunks: Buffer[] = [];
    let received = 0;
    let tooLarge = false;
    req.on('data', (chunk: Buffer) => {
      if (tooLarge) return;
      received += chunk.length;
      if (received > MAX_BODY_BYTES) {
        tooLarge = true;
        reject(new BodyError(413, 'Payload Too Large'));
        return;
      }
      chunks.push(chunk);
    });

    req.on('error', reject);

    req.on('end', () => {
      if (tooLarge) return;
      const body = Buffer.concat(chunks).toString('utf8');
      if (!body) {
        resolve({});
        return;
      }
      try {
        resolve(JSON.parse(body));
      } catch (error) {
        reject(error);
      }
    });
  });
};

const openEventStream = (res: http.ServerResponse) => {
  res.statusCode = 200;
  res.setHeader('content-type', 'text/event-stream');
  res.setHeader('cache-control', 'no-cache');
  res.setHeader('connection', 'keep-alive');
  res.setHeader('x-content-type-options', 'nosniff');
  res.flushHeaders();
};

export const createHttpServer = (
  relay: RelayContext,
  port: number,
  logger = createLogger('runtime.http', 'info'),
) => {
  const rpc = new JsonRpcHandler(relay);

  const serveRpc = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    let raw: unknown;
    try {
      raw = await readJsonBody(req);
    } catch (error) {
      if (error instanceof BodyError) {
        writeJson(res, error.statusCode, { error: error.message });
        return;
      }
      writeJson(res, 200, errorResponse(null, JSON_RPC_ERRORS.parseError, 'Parse error'));
      return;
    }

    const parsed = parseJsonRpcRequest(raw);
    if (!parsed.ok) {
      writeJson(res, 200, parsed.response);
      return;
    }

    const { request } = parsed;
    const credential = extractBearerToken(req.headers);
    logger.debug(`rpc ${request.method}`, { id: request.id });

    if (request.method !== STREAM_METHOD) {
      writeJson(res, 200, await rpc.handle(request, credential));
      return;
    }

    openEventStream(res);
    await rpc.stream(
      request,
      (payload) => {
        if (res.writableEnded || res.destroyed) return;
        res.write(`data: ${JSON.stringify(payload)}\n\n`);
      },
      credential,
    );
    res.end();
  };

  const server = http.createServer(async (req, res) => {
    try {
      const url = new URL(req.url || '/', `http://127.0.0.1:${port || 80}`);
      const pathname = url.pathname;
      const method = req.method ?? 'GET';

      if (method === 'GET' && pathname === AGENT_CARD_PATH) {
        writeJson(res, 200, relay.card);
        return;
      }

      const decision = await relay.gate.authorize({ method, path: pathname, headers: req.headers });
      if (!decision.allowed) {
        writeJson(res, decision.status, decision.body, decision.headers);
        return;
      }

      if (pathname === '/health') {
        if (method !== 'GET') {
          writeJson(res, 405, { error: 'Method Not Allowed' });
          return;
        }
        const tasks = relay.tasks.list();
        writeJson(res, 200, {
          status: 'ok',
          startedAt: new Date(relay.startedAt).toISOString(),
          uptime: Math.floor((Date.now() - relay.startedAt) / 1000),
          authMode: relay.authMode,
          backend: relay.backend.name,
          sessions: relay.sessions.size,
          tasks: {
            total: tasks.length,
            running: relay.executor.runningCount,
            completed: tasks.filter((task) => task.status.state === 'completed').length,
            failed: tasks.filter((task) => task.status.state === 'failed').length,
          },
        });
        return;
      }

      if (pathname === '/') {
        if (method !== 'POST') {
          writeJson(res, 405, { error: 'Method Not Allowed' });
          return;
        }
        await serveRpc(req, res);
        return;
      }

      writeJson(res, 404, { error: 'Not Found' });
    } catch (error) {
      logger.error(`request failed: ${describeError(error)}`);
      if (res.headersSent) {
        res.end();
        return;
      }
      writeJson(res, 500, { error: 'Internal Server Error' });
    }
  });

  return new Promise<http.Server>((resolve) => {
    server.listen(port, () => {
      const address = server.address();
      const boundPort = typeof address === 'object' && address ? address.port : port;
      logger.info(`agent endpoint listening on ${boundPort}`);
      resolve(server);
    });
  });
};
