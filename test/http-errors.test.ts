import assert from 'node:assert/strict';
import test from 'node:test';

import { InternalError, InvalidRequestError, ParseError } from '../src/mcp/errors.js';
import { isJsonParseError, toBodyErrorResponse } from '../src/mcp/http-errors.js';

const bodyParserError = () =>
  Object.assign(new SyntaxError('Unexpected token } in JSON at position 9'), {
    type: 'entity.parse.failed',
    status: 400,
  });

test('isJsonParseError identifies body-parser parse errors', () => {
  assert.equal(isJsonParseError(bodyParserError()), true);
});

test('isJsonParseError ignores non-parse errors', () => {
  assert.equal(isJsonParseError(new Error('nope')), false);
  assert.equal(isJsonParseError(new SyntaxError('Unexpected identifier')), false);
});

test('toBodyErrorResponse maps malformed JSON to a ParseError frame with status 200', () => {
  const { status, error } = toBodyErrorResponse(bodyParserError());

  assert.equal(status, 200);
  assert.ok(error instanceof ParseError);
  assert.deepEqual(error.toErrorObject(), { code: -32700, message: 'Invalid JSON body' });
});

test('toBodyErrorResponse keeps the status of other client-side body errors', () => {
  const tooLarge = Object.assign(new Error('request entity too large'), {
    type: 'entity.too.large',
    status: 413,
  });
  const { status, error } = toBodyErrorResponse(tooLarge);

  assert.equal(status, 413);
  assert.ok(error instanceof InvalidRequestError);
  assert.deepEqual(error.toErrorObject(), { code: -32600, message: 'request entity too large' });
});

test('toBodyErrorResponse maps other failures to a generic InternalError', () => {
  const { status, error } = toBodyErrorResponse(new Error('stream exploded'));

  assert.equal(status, 500);
  assert.ok(error instanceof InternalError);
  assert.deepEqual(error.toErrorObject(), { code: -32603, message: 'Internal error' });
});
