import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { RESULT_CEILING } from '../search/format.js';
import {
  SAFESEARCH_LEVELS,
  type SafeSearchLevel,
  TIME_LIMITS,
  type TimeLimit,
} from '../search/types.js';
import { InvalidParamsError, toInvalidParamsFromZod } from './errors.js';

export const WEB_SEARCH_TOOL_NAME = 'web_search';
export const DEFAULT_MAX_RESULTS = 5;
export const DEFAULT_REGION = 'wt-wt';
export const DEFAULT_SAFESEARCH: SafeSearchLevel = 'moderate';

export const webSearchTool = {
  name: WEB_SEARCH_TOOL_NAME,
  description: 'Search the web using DuckDuckGo',
  inputSchema: {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        description: 'The search query',
      },
      max_results: {
        type: 'integer',
        description: `Maximum number of results (capped at ${RESULT_CEILING})`,
        default: DEFAULT_MAX_RESULTS,
        minimum: 1,
        maximum: RESULT_CEILING,
      },
      region: {
        type: 'string',
        description: 'Search region, e.g., wt-wt (global), us-en, uk-en',
        default: DEFAULT_REGION,
      },
      safesearch: {
        type: 'string',
        description: 'SafeSearch level: off | moderate | strict',
        enum: [...SAFESEARCH_LEVELS],
        default: DEFAULT_SAFESEARCH,
      },
      timelimit: {
        type: 'string',
        description: 'Time limit for results: d (day), w (week), m (month), y (year)',
        enum: [...TIME_LIMITS],
      },
      all_results: {
        type: 'boolean',
        description: `Fetch the maximum number of results (capped at ${RESULT_CEILING})`,
        default: false,
      },
    },
    required: ['query'],
  },
} satisfies Tool;

export type WebSearchRequest = {
  query: string;
  maxResults: number;
  region: string;
  safesearch: SafeSearchLevel;
  timelimit?: TimeLimit;
  allResults: boolean;
};

const normalizeKeyword = (value: unknown) =>
  typeof value === 'string' ? value.trim().toLowerCase() : value;

const webSearchArgumentsSchema = z.object({
  query: z.string(),
  max_results: z.number().refine(Number.isInteger, 'Expected an integer').nullish(),
  region: z.string().optional(),
  safesearch: z.preprocess(normalizeKeyword, z.enum(SAFESEARCH_LEVELS).optional()),
  timelimit: z.preprocess(normalizeKeyword, z.enum(TIME_LIMITS).nullish()),
  all_results: z.boolean().optional(),
});

const clamp = (value: number, min: number, max: number) => Math.min(Math.max(value, min), max);

const hasQuery = (args: Record<string, unknown>) =>
  typeof args.query === 'string' && args.query.trim().length > 0;

/**
 * Validate `tools/call` arguments for `web_search` and fill in defaults.
 * Out-of-range result counts are clamped; wrong types are rejected.
 */
export const parseWebSearchArguments = (input: unknown): WebSearchRequest => {
  const args = input ?? {};
  if (typeof args !== 'object' || Array.isArray(args)) {
    throw new InvalidParamsError('arguments must be an object', [
      { field: 'arguments', message: 'arguments must be an object.', code: 'type' },
    ]);
  }

  const record: Record<string, unknown> = { ...args };
  if (!hasQuery(record)) {
    throw new InvalidParamsError('query parameter is required', [
      { field: 'query', message: 'query is required.', code: 'required' },
    ]);
  }

  const parsed = webSearchArgumentsSchema.safeParse(record);
  if (!parsed.success) {
    throw toInvalidParamsFromZod(
      `Invalid arguments for tool ${WEB_SEARCH_TOOL_NAME}.`,
      parsed.error.issues
    );
  }

  const data = parsed.data;
  const allResults = data.all_results ?? false;
  const requested = data.max_results ?? DEFAULT_MAX_RESULTS;

  return {
    query: data.query.trim(),
    maxResults: allResults ? RESULT_CEILING : clamp(requested, 1, RESULT_CEILING),
    region: data.region?.trim() || DEFAULT_REGION,
    safesearch: data.safesearch ?? DEFAULT_SAFESEARCH,
    timelimit: data.timelimit ?? undefined,
    allResults,
  };
};
