export {
  type FieldError,
  InternalError,
  InvalidParamsError,
  InvalidRequestError,
  JsonRpcError,
  type JsonRpcErrorObject,
  McpToolError,
  MethodNotFoundError,
  ParseError,
  SearchUnavailableError,
  type ToolErrorCode,
  type ToolErrorPayload,
} from '../lib/errors.js';

import {
  type FieldError,
  InternalError,
  InvalidParamsError,
  JsonRpcError,
} from '../lib/errors.js';

type ZodIssueLike = {
  code: string;
  path?: ReadonlyArray<PropertyKey>;
  message: string;
};

const mapZodIssueToFieldError = (issue: ZodIssueLike): FieldError => {
  const field = issue.path?.length ? issue.path.map(String).join('.') : 'value';
  let code: string | undefined;

  if (issue.code === 'invalid_type') {
    code = 'type';
  } else if (issue.code === 'invalid_value' || issue.code === 'invalid_enum_value') {
    code = 'enum';
  } else if (issue.code === 'too_small' || issue.code === 'too_big') {
    code = 'range';
  } else if (issue.code === 'custom') {
    code = 'invalid';
  }

  return {
    field,
    message: issue.message,
    code,
  };
};

export const toInvalidParamsFromZod = (
  message: string,
  issues: ReadonlyArray<ZodIssueLike>
): InvalidParamsError => new InvalidParamsError(message, issues.map(mapZodIssueToFieldError));

/** Protocol errors pass through; anything else becomes a generic internal error. */
export const toJsonRpcError = (error: unknown): JsonRpcError =>
  error instanceof JsonRpcError ? error : new InternalError();
