import type { RawSearchHit } from './types.js';

export const RESULT_CEILING = 10;
export const SNIPPET_MAX_LENGTH = 200;
export const NO_RESULTS_TEXT = 'No results found';

const ELLIPSIS = '…';
const LOCATION_MARKER = '📍';
const FALLBACK_DOMAIN = 'link';

type Survivor = {
  title: string;
  url: string;
  snippet: string;
};

export const collapseWhitespace = (value: string) => value.replace(/\s+/g, ' ').trim();

const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;

/** Cuts at `maxLength` UTF-16 units, never between the halves of a surrogate pair. */
export const truncateSnippet = (snippet: string, maxLength: number = SNIPPET_MAX_LENGTH) => {
  if (snippet.length <= maxLength) return snippet;
  const end = isHighSurrogate(snippet.charCodeAt(maxLength - 1)) ? maxLength - 1 : maxLength;
  return `${snippet.slice(0, end)}${ELLIPSIS}`;
};

/** Comparison key for duplicate detection: case and trailing slashes are ignored. */
export const normalizeUrlKey = (url: string) => url.trim().toLowerCase().replace(/\/+$/, '');

export const extractDomain = (url: string): string => {
  const candidates = /^[a-z][a-z\d+.-]*:\/\//i.test(url) ? [url] : [url, `https://${url}`];
  for (const candidate of candidates) {
    try {
      const { hostname } = new URL(candidate);
      if (hostname) return hostname.replace(/^www\./i, '');
    } catch {
      // try the next form
    }
  }
  return FALLBACK_DOMAIN;
};

const escapeLinkText = (text: string) => text.replace(/[[\]]/g, match => `\\${match}`);

const escapeLinkTarget = (url: string) =>
  url.replace(/ /g, '%20').replace(/\(/g, '%28').replace(/\)/g, '%29');

const selectSurvivors = (hits: ReadonlyArray<RawSearchHit>): Survivor[] => {
  const seen = new Set<string>();
  const survivors: Survivor[] = [];

  for (const hit of hits) {
    const title = collapseWhitespace(hit.title ?? '');
    const snippet = collapseWhitespace(hit.snippet ?? '');
    if (!title || !snippet) continue;

    const url = (hit.url ?? '').trim();
    if (url) {
      const key = normalizeUrlKey(url);
      if (seen.has(key)) continue;
      seen.add(key);
    }

    survivors.push({ title, url, snippet });
  }

  return survivors;
};

const renderEntry = (entry: Survivor, position: number) => {
  const title = escapeLinkText(entry.title);
  const snippet = truncateSnippet(entry.snippet);
  const heading = entry.url
    ? `${position}. [${title}](${escapeLinkTarget(entry.url)}) — ${LOCATION_MARKER} ${extractDomain(entry.url)}`
    : `${position}. ${title}`;
  return `${heading}\n   ${snippet}`;
};

/**
 * Render raw hits as a numbered Markdown list.
 *
 * Hits without a title or snippet are dropped, duplicate URLs keep their
 * first occurrence, and at most `min(bound, RESULT_CEILING)` entries are
 * rendered. Returns {@link NO_RESULTS_TEXT} when nothing survives.
 */
export const formatSearchResults = (hits: ReadonlyArray<RawSearchHit>, bound: number): string => {
  const limit = Math.max(0, Math.min(Math.floor(bound), RESULT_CEILING));
  const entries = selectSurvivors(hits).slice(0, limit);
  if (entries.length === 0) return NO_RESULTS_TEXT;
  return entries.map((entry, index) => renderEntry(entry, index + 1)).join('\n');
};
