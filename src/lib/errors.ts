import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';

export type FieldError = {
  field: string;
  message: string;
  code?: string;
};

export type JsonRpcErrorObject = {
  code: number;
  message: string;
  data?: unknown;
};

/**
 * Base for failures reported as a JSON-RPC `error` object. The message is
 * sent to the client verbatim.
 */
export class JsonRpcError extends Error {
  readonly code: ErrorCode;
  readonly data?: unknown;

  constructor(code: ErrorCode, message: string, data?: unknown) {
    super(message);
    this.name = 'JsonRpcError';
    this.code = code;
    this.data = data;
  }

  toErrorObject(): JsonRpcErrorObject {
    return this.data === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, data: this.data };
  }
}

export class ParseError extends JsonRpcError {
  constructor(message = 'Invalid JSON body') {
    super(ErrorCode.ParseError, message);
    this.name = 'ParseError';
  }
}

export class InvalidRequestError extends JsonRpcError {
  constructor(message: string) {
    super(ErrorCode.InvalidRequest, message);
    this.name = 'InvalidRequestError';
  }
}

export class MethodNotFoundError extends JsonRpcError {
  constructor(message: string) {
    super(ErrorCode.MethodNotFound, message);
    this.name = 'MethodNotFoundError';
  }
}

export class InvalidParamsError extends JsonRpcError {
  readonly fieldErrors?: FieldError[];

  constructor(message: string, fieldErrors?: FieldError[]) {
    super(ErrorCode.InvalidParams, message, fieldErrors?.length ? { fieldErrors } : undefined);
    this.name = 'InvalidParamsError';
    this.fieldErrors = fieldErrors;
  }
}

export class InternalError extends JsonRpcError {
  constructor(message = 'Internal error') {
    super(ErrorCode.InternalError, message);
    this.name = 'InternalError';
  }
}

export type ToolErrorCode = 'search_unavailable';

export type ToolErrorPayload = {
  error: {
    code: ToolErrorCode;
    message: string;
    retryable: boolean;
  };
};

type McpToolErrorOptions = {
  retryable?: boolean;
  cause?: unknown;
};

/**
 * A failure the tool reports inside a successful `tools/call` result
 * (`isError: true`) rather than as a protocol error.
 */
export class McpToolError extends Error {
  readonly code: ToolErrorCode;
  readonly retryable: boolean;

  constructor(code: ToolErrorCode, message: string, options: McpToolErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'McpToolError';
    this.code = code;
    this.retryable = options.retryable ?? false;
  }

  toPayload(): ToolErrorPayload {
    return {
      error: {
        code: this.code,
        message: this.message,
        retryable: this.retryable,
      },
    };
  }
}

export class SearchUnavailableError extends McpToolError {
  constructor(message: string, options: Omit<McpToolErrorOptions, 'retryable'> = {}) {
    super('search_unavailable', message, { ...options, retryable: true });
    this.name = 'SearchUnavailableError';
  }
}
