import {
  type CallToolResult,
  type InitializeResult,
  LATEST_PROTOCOL_VERSION,
  type ListResourcesResult,
  type ListToolsResult,
  SUPPORTED_PROTOCOL_VERSIONS,
} from '@modelcontextprotocol/sdk/types.js';

import debug from '../../util/debug.js';
import { formatSearchResults } from '../search/format.js';
import { type RawSearchHit, SearchCompatibilityError, type TextSearch } from '../search/types.js';
import {
  InvalidParamsError,
  InvalidRequestError,
  type McpToolError,
  MethodNotFoundError,
  SearchUnavailableError,
  toJsonRpcError,
} from './errors.js';
import { type RequestEnvelope, readRequestEnvelope, toResponsePayload } from './protocol.js';
import { DONE_FRAME, messageFrame, type SseFrame } from './sse.js';
import {
  parseWebSearchArguments,
  WEB_SEARCH_TOOL_NAME,
  type WebSearchRequest,
  webSearchTool,
} from './web-search-tool.js';

export type ServerInfo = {
  name: string;
  version: string;
};

export interface CreateDispatcherOptions {
  search: TextSearch;
  serverInfo: ServerInfo;
}

export interface DispatchOptions {
  signal?: AbortSignal;
}

export interface Dispatcher {
  dispatch(body: unknown, options?: DispatchOptions): AsyncGenerator<SseFrame, void, undefined>;
}

/** Handlers resolve to `null` when the method is a notification with nothing to return. */
type MethodHandler = (params: Record<string, unknown>) => Promise<object | null>;

export const SEARCH_UNAVAILABLE_PREFIX = 'Search unavailable';

export const formatToolResult = (text: string): CallToolResult => ({
  content: [{ type: 'text' as const, text }],
});

export const formatToolErrorResult = (error: McpToolError): CallToolResult => {
  const payload = error.toPayload();
  return {
    content: [{ type: 'text' as const, text: `${SEARCH_UNAVAILABLE_PREFIX}: ${payload.error.message}` }],
    structuredContent: payload,
    isError: true,
  };
};

const pickProtocolVersion = (requested: unknown) =>
  typeof requested === 'string' && SUPPORTED_PROTOCOL_VERSIONS.includes(requested)
    ? requested
    : LATEST_PROTOCOL_VERSION;

export const createDispatcher = ({ search, serverInfo }: CreateDispatcherOptions): Dispatcher => {
  const runWebSearch = async (request: WebSearchRequest): Promise<CallToolResult> => {
    debug.search(
      `web_search "${request.query}" (max=${request.maxResults}, all_results=${request.allResults}, region=${request.region}, safesearch=${request.safesearch}, timelimit=${request.timelimit ?? 'none'})`
    );

    let hits: ReadonlyArray<RawSearchHit>;
    try {
      hits = await search(request.query, {
        maxResults: request.maxResults,
        region: request.region,
        safesearch: request.safesearch,
        timelimit: request.timelimit,
      });
    } catch (error) {
      if (error instanceof SearchCompatibilityError) {
        // duck-duck-scrape throws while parsing some DuckDuckGo result pages
        // instead of reporting them as empty; those pages carry no usable hits.
        debug.search(`Search response unreadable, returning no results: ${error.message}`);
        hits = [];
      } else if (error instanceof SearchUnavailableError) {
        debug.search(`Search unavailable: ${error.message}`);
        return formatToolErrorResult(error);
      } else {
        throw error;
      }
    }

    return formatToolResult(formatSearchResults(hits, request.maxResults));
  };

  const handlers: Record<string, MethodHandler> = {
    initialize: async params =>
      ({
        protocolVersion: pickProtocolVersion(params.protocolVersion),
        capabilities: { tools: {}, resources: {} },
        serverInfo: { name: serverInfo.name, version: serverInfo.version },
      }) satisfies InitializeResult,

    'resources/list': async () => ({ resources: [] }) satisfies ListResourcesResult,

    'tools/list': async () => ({ tools: [webSearchTool] }) satisfies ListToolsResult,

    'notifications/initialized': async () => {
      debug.rpc('Client initialized notification received');
      return null;
    },

    'notifications/cancelled': async params => {
      const reason = typeof params.reason === 'string' ? params.reason : 'unknown';
      debug.rpc(`Request ${String(params.requestId)} was cancelled: ${reason}`);
      return null;
    },

    'tools/call': async params => {
      const name = params.name;
      if (typeof name !== 'string' || !name) {
        throw new InvalidParamsError('Tool name is required', [
          { field: 'name', message: 'name is required.', code: 'required' },
        ]);
      }
      if (name !== WEB_SEARCH_TOOL_NAME) {
        throw new MethodNotFoundError(`Unknown tool: ${name}`);
      }
      return runWebSearch(parseWebSearchArguments(params.arguments));
    },
  };

  const handle = async (request: RequestEnvelope) => {
    if (request.method === undefined) {
      throw new InvalidRequestError('No method specified in request');
    }
    const handler = Object.hasOwn(handlers, request.method) ? handlers[request.method] : undefined;
    if (!handler) {
      throw new MethodNotFoundError(`Unknown method: ${request.method}`);
    }
    return handler(request.params);
  };

  return {
    async *dispatch(body, options = {}) {
      const { signal } = options;
      let request: RequestEnvelope | undefined;
      let reply: SseFrame | null = null;

      try {
        request = readRequestEnvelope(body);
        debug.rpc(`${request.method ?? '<none>'} (id: ${request.id ?? 'none'})`);
        const result = await handle(request);
        if (result !== null) {
          reply = messageFrame(toResponsePayload(request, { result }));
        } else if (request.id !== undefined) {
          reply = messageFrame(toResponsePayload(request, { result: {} }));
        }
      } catch (error) {
        const rpcError = toJsonRpcError(error);
        if (rpcError !== error) {
          debug.error('Unhandled error while dispatching request', { req: { body }, error });
        } else {
          debug.rpc(`${rpcError.name}: ${rpcError.message}`);
        }
        reply = messageFrame(toResponsePayload(request, { error: rpcError.toErrorObject() }));
      }

      if (signal?.aborted) return;
      if (reply) yield reply;
      if (signal?.aborted) return;
      yield DONE_FRAME;
    },
  };
};
