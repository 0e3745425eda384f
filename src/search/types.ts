export const SAFESEARCH_LEVELS = ['off', 'moderate', 'strict'] as const;
export const TIME_LIMITS = ['d', 'w', 'm', 'y'] as const;

export type SafeSearchLevel = (typeof SAFESEARCH_LEVELS)[number];
export type TimeLimit = (typeof TIME_LIMITS)[number];

/** A hit as it comes back from the search provider. Any field may be missing. */
export type RawSearchHit = {
  readonly title?: string;
  readonly url?: string;
  readonly snippet?: string;
};

export type TextSearchOptions = {
  readonly maxResults: number;
  readonly region: string;
  readonly safesearch: SafeSearchLevel;
  readonly timelimit?: TimeLimit;
};

export type TextSearch = (
  query: string,
  options: TextSearchOptions
) => Promise<ReadonlyArray<RawSearchHit>>;

/**
 * The provider answered, but in a shape the client library could not read.
 * Callers treat this as "no results" instead of a failure.
 */
export class SearchCompatibilityError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SearchCompatibilityError';
  }
}
