import * as DDG from 'duck-duck-scrape';

import debug from '../../util/debug.js';
import { SearchUnavailableError } from '../lib/errors.js';
import {
  type RawSearchHit,
  type SafeSearchLevel,
  SearchCompatibilityError,
  type TextSearch,
  type TextSearchOptions,
  type TimeLimit,
} from './types.js';

type DuckDuckGoResult = {
  title: string;
  url: string;
  description: string;
};

type DuckDuckGoResponse = {
  noResults: boolean;
  results: ReadonlyArray<DuckDuckGoResult>;
};

export type DuckDuckGoSearchFn = (
  query: string,
  options: DDG.SearchOptions
) => Promise<DuckDuckGoResponse>;

export interface DuckDuckGoSearchOptions {
  search?: DuckDuckGoSearchFn;
}

const SAFE_SEARCH_TYPES: Record<SafeSearchLevel, DDG.SafeSearchType> = {
  off: DDG.SafeSearchType.OFF,
  moderate: DDG.SafeSearchType.MODERATE,
  strict: DDG.SafeSearchType.STRICT,
};

const SEARCH_TIME_TYPES: Record<TimeLimit, DDG.SearchTimeType> = {
  d: DDG.SearchTimeType.DAY,
  w: DDG.SearchTimeType.WEEK,
  m: DDG.SearchTimeType.MONTH,
  y: DDG.SearchTimeType.YEAR,
};

const NETWORK_ERROR_CODES = new Set([
  'EAI_AGAIN',
  'ECONNABORTED',
  'ECONNREFUSED',
  'ECONNRESET',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'ESOCKETTIMEDOUT',
  'ETIMEDOUT',
]);

const NETWORK_MESSAGE_HINTS = ['dns', 'connection', 'timeout', 'timed out', 'refused', 'unreachable'];

// Messages duck-duck-scrape throws when DuckDuckGo refuses to serve results.
const PROVIDER_REFUSAL_HINTS = ['anomaly', 'server error occurred', 'failed to get the vqd'];

const getErrorCode = (error: unknown) => {
  if (!error || typeof error !== 'object' || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
};

export const isNetworkError = (error: unknown) => {
  const code = getErrorCode(error);
  if (code && NETWORK_ERROR_CODES.has(code)) return true;
  const message = error instanceof Error ? error.message.toLowerCase() : '';
  return NETWORK_MESSAGE_HINTS.some(hint => message.includes(hint));
};

const isProviderRefusal = (error: unknown) => {
  const message = error instanceof Error ? error.message.toLowerCase() : '';
  return PROVIDER_REFUSAL_HINTS.some(hint => message.includes(hint));
};

/**
 * duck-duck-scrape pulls results out of an inline script with a regular
 * expression and JSON.parse. When DuckDuckGo changes that script the library
 * dereferences a null match (TypeError) or parses a truncated payload
 * (SyntaxError) instead of reporting an empty page.
 */
const isLayoutMismatch = (error: unknown) =>
  error instanceof SyntaxError || error instanceof TypeError;

export const classifySearchError = (error: unknown): unknown => {
  if (isNetworkError(error)) {
    const message = error instanceof Error ? error.message : String(error);
    return new SearchUnavailableError(`DuckDuckGo could not be reached (${message})`, {
      cause: error,
    });
  }
  if (isProviderRefusal(error)) {
    const message = error instanceof Error ? error.message : String(error);
    return new SearchUnavailableError(`DuckDuckGo refused the request (${message})`, {
      cause: error,
    });
  }
  if (isLayoutMismatch(error)) {
    return new SearchCompatibilityError('DuckDuckGo response could not be parsed', {
      cause: error,
    });
  }
  return error;
};

const stripHighlight = (value: string) => value.replace(/<\/?b>/gi, '');

const toRawHit = (result: DuckDuckGoResult): RawSearchHit => ({
  title: stripHighlight(result.title),
  url: result.url,
  snippet: stripHighlight(result.description),
});

export const createDuckDuckGoSearch = (options: DuckDuckGoSearchOptions = {}): TextSearch => {
  const search = options.search ?? DDG.search;

  return async (query: string, { maxResults, region, safesearch, timelimit }: TextSearchOptions) => {
    const searchOptions: DDG.SearchOptions = {
      safeSearch: SAFE_SEARCH_TYPES[safesearch],
      region,
      ...(timelimit ? { time: SEARCH_TIME_TYPES[timelimit] } : {}),
    };

    debug.search(`DuckDuckGo query "${query}" (region=${region}, safesearch=${safesearch})`);

    let response: DuckDuckGoResponse;
    try {
      response = await search(query, searchOptions);
    } catch (error) {
      throw classifySearchError(error);
    }

    if (response.noResults) return [];
    return response.results.slice(0, maxResults).map(toRawHit);
  };
};
