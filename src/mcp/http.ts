import express, { type NextFunction, type Request, type Response } from 'express';

import debug from '../../util/debug.js';
import { RequestMetrics } from '../metrics.js';
import { SearchCompatibilityError, type TextSearch } from '../search/types.js';
import type { Dispatcher, ServerInfo } from './dispatcher.js';
import { InternalError, type JsonRpcError } from './errors.js';
import { toBodyErrorResponse } from './http-errors.js';
import { collectMetrics, requestTracking, stampProcessTime } from './middleware.js';
import { toResponsePayload } from './protocol.js';
import { DONE_FRAME, formatSseFrame, messageFrame, SSE_HEADERS, type SseFrame } from './sse.js';
import { DEFAULT_REGION, DEFAULT_SAFESEARCH } from './web-search-tool.js';

export interface CreateHttpAppOptions {
  dispatcher: Dispatcher;
  search: TextSearch;
  serverInfo: ServerInfo;
  metrics?: RequestMetrics;
}

const READINESS_QUERY = 'test';

const sendJson = (res: Response, status: number, body: unknown) => {
  stampProcessTime(res);
  res.status(status).json(body);
};

const openEventStream = (res: Response, status = 200) => {
  stampProcessTime(res);
  res.status(status).set(SSE_HEADERS);
  res.flushHeaders();
};

const writeFrame = (res: Response, frame: SseFrame) => {
  res.write(formatSseFrame(frame));
};

const writeErrorFrames = (res: Response, error: JsonRpcError) => {
  writeFrame(res, messageFrame(toResponsePayload(undefined, { error: error.toErrorObject() })));
  writeFrame(res, DONE_FRAME);
};

/**
 * Run a one-result query against the search provider. A page the client
 * library cannot read still proves DuckDuckGo answered.
 */
const checkSearchProvider = async (search: TextSearch) => {
  try {
    await search(READINESS_QUERY, {
      maxResults: 1,
      region: DEFAULT_REGION,
      safesearch: DEFAULT_SAFESEARCH,
    });
  } catch (error) {
    if (error instanceof SearchCompatibilityError) return;
    throw error;
  }
};

export const createHttpApp = ({
  dispatcher,
  search,
  serverInfo,
  metrics = new RequestMetrics(),
}: CreateHttpAppOptions) => {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestTracking());
  app.use(collectMetrics(metrics));
  app.use(express.json());

  app.get('/health', (_req, res) => {
    sendJson(res, 200, { status: 'healthy', service: serverInfo.name, version: serverInfo.version });
  });

  app.get('/ready', async (req, res) => {
    try {
      await checkSearchProvider(search);
      sendJson(res, 200, { status: 'ready', checks: { duckduckgo: 'ok' } });
    } catch (error) {
      debug.error('Readiness check failed', { req, error });
      sendJson(res, 503, { status: 'not_ready', checks: { duckduckgo: 'unreachable' } });
    }
  });

  app.get('/metrics', (_req, res) => {
    sendJson(res, 200, {
      service: serverInfo.name,
      version: serverInfo.version,
      ...metrics.snapshot(),
    });
  });

  app.post('/', async (req, res) => {
    const controller = new AbortController();
    res.on('close', () => {
      if (res.writableEnded) return;
      controller.abort();
      debug.http('Client disconnected before the stream finished');
    });

    openEventStream(res);

    try {
      for await (const frame of dispatcher.dispatch(req.body, { signal: controller.signal })) {
        if (controller.signal.aborted) break;
        writeFrame(res, frame);
      }
    } catch (error) {
      debug.error('SSE stream failed', { req, error });
      if (!controller.signal.aborted) {
        writeErrorFrames(res, new InternalError());
      }
    }

    res.end();
  });

  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const { status, error: rpcError } = toBodyErrorResponse(error);
    if (status >= 500) {
      debug.error('Request failed before dispatch', { req, error });
    } else {
      debug.http(`Rejected request body (${status}): ${rpcError.message}`);
    }

    openEventStream(res, status);
    writeErrorFrames(res, rpcError);
    res.end();
  });

  return app;
};
