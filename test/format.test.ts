import assert from 'node:assert/strict';
import test from 'node:test';

import {
  extractDomain,
  formatSearchResults,
  NO_RESULTS_TEXT,
  normalizeUrlKey,
  RESULT_CEILING,
  truncateSnippet,
} from '../src/search/format.js';
import type { RawSearchHit } from '../src/search/types.js';

const makeHits = (count: number): RawSearchHit[] =>
  Array.from({ length: count }, (_, index) => ({
    title: `Result ${index + 1}`,
    url: `https://site${index + 1}.test/page`,
    snippet: `Snippet ${index + 1}`,
  }));

const countEntries = (markdown: string) => markdown.split('\n').filter(line => /^\d+\. /.test(line)).length;

test('formatSearchResults renders a numbered list with domain and snippet', () => {
  const output = formatSearchResults(
    [
      { title: 'Alpha', url: 'https://www.example.com/a', snippet: 'First  result\n snippet' },
      { title: 'Beta', url: 'https://docs.example.org/b', snippet: 'Second result' },
    ],
    5
  );

  assert.equal(
    output,
    [
      '1. [Alpha](https://www.example.com/a) — 📍 example.com',
      '   First result snippet',
      '2. [Beta](https://docs.example.org/b) — 📍 docs.example.org',
      '   Second result',
    ].join('\n')
  );
});

test('formatSearchResults returns the no-results text for empty input', () => {
  assert.equal(formatSearchResults([], 5), NO_RESULTS_TEXT);
  assert.equal(NO_RESULTS_TEXT, 'No results found');
});

test('formatSearchResults drops hits missing a title or snippet', () => {
  const output = formatSearchResults(
    [
      { url: 'https://a.test', snippet: 'no title' },
      { title: 'No snippet', url: 'https://b.test' },
      { title: '   ', url: 'https://c.test', snippet: 'blank title' },
      { title: 'Kept', url: 'https://d.test', snippet: 'kept snippet' },
    ],
    5
  );

  assert.equal(output, '1. [Kept](https://d.test) — 📍 d.test\n   kept snippet');
});

test('formatSearchResults returns the no-results text when every hit is filtered', () => {
  const output = formatSearchResults([{ title: 'Only title' }, { snippet: 'Only snippet' }], 5);
  assert.equal(output, 'No results found');
});

test('formatSearchResults keeps the first of URLs differing by case or trailing slash', () => {
  const output = formatSearchResults(
    [
      { title: 'First', url: 'https://Example.com/Page/', snippet: 'first seen' },
      { title: 'Other', url: 'https://other.test', snippet: 'other' },
      { title: 'Second', url: 'https://example.com/page', snippet: 'duplicate' },
    ],
    5
  );

  assert.equal(
    output,
    [
      '1. [First](https://Example.com/Page/) — 📍 example.com',
      '   first seen',
      '2. [Other](https://other.test) — 📍 other.test',
      '   other',
    ].join('\n')
  );
});

test('formatSearchResults caps entries at the requested bound', () => {
  assert.equal(countEntries(formatSearchResults(makeHits(8), 3)), 3);
});

test('formatSearchResults never exceeds the safety ceiling', () => {
  assert.equal(countEntries(formatSearchResults(makeHits(25), 100)), RESULT_CEILING);
  assert.equal(RESULT_CEILING, 10);
});

test('formatSearchResults truncates long snippets to 200 characters plus an ellipsis', () => {
  const long = 'word '.repeat(80);
  const output = formatSearchResults([{ title: 'Long', url: 'https://long.test', snippet: long }], 5);
  const snippetLine = output.split('\n')[1] ?? '';
  const snippet = snippetLine.slice(3);

  assert.equal(snippet.length, 201);
  assert.ok(snippet.endsWith('…'));
  assert.ok(long.trim().startsWith(snippet.slice(0, 200)));
});

test('formatSearchResults renders hits without a URL as plain titles', () => {
  const output = formatSearchResults(
    [
      { title: 'Loose', snippet: 'no link' },
      { title: 'Loose', snippet: 'no link either' },
    ],
    5
  );

  assert.equal(output, '1. Loose\n   no link\n2. Loose\n   no link either');
});

test('formatSearchResults escapes brackets in titles and parentheses in URLs', () => {
  const output = formatSearchResults(
    [{ title: 'C [lang]', url: 'https://en.wiki.test/C_(language)', snippet: 'A language' }],
    5
  );

  assert.equal(
    output,
    '1. [C \\[lang\\]](https://en.wiki.test/C_%28language%29) — 📍 en.wiki.test\n   A language'
  );
});

test('truncateSnippet leaves short text alone', () => {
  assert.equal(truncateSnippet('short'), 'short');
  assert.equal(truncateSnippet('a'.repeat(200)), 'a'.repeat(200));
  assert.equal(truncateSnippet('a'.repeat(201)), `${'a'.repeat(200)}…`);
});

test('truncateSnippet does not split a surrogate pair at the cut', () => {
  const snippet = `${'a'.repeat(199)}😀 and more text`;
  assert.equal(truncateSnippet(snippet), `${'a'.repeat(199)}…`);
  assert.equal(truncateSnippet(`${'a'.repeat(198)}😀 tail`), `${'a'.repeat(198)}😀…`);
});

test('extractDomain strips www and falls back for unparseable URLs', () => {
  assert.equal(extractDomain('https://www.Example.com/path?q=1'), 'example.com');
  assert.equal(extractDomain('news.example.net/story'), 'news.example.net');
  assert.equal(extractDomain('http://'), 'link');
});

test('normalizeUrlKey ignores case and trailing slashes', () => {
  assert.equal(normalizeUrlKey('https://Example.com/A//'), 'https://example.com/a');
});
