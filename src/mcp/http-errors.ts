import { InternalError, InvalidRequestError, type JsonRpcError, ParseError } from './errors.js';

export const isJsonParseError = (error: unknown): boolean => {
  if (!(error instanceof SyntaxError)) return false;
  const maybeError = error as { type?: string; status?: number; message?: string };
  if (maybeError.type === 'entity.parse.failed') return true;
  if (typeof maybeError.status === 'number' && maybeError.status === 400) return true;
  if (typeof maybeError.message === 'string' && maybeError.message.toLowerCase().includes('json')) {
    return true;
  }
  return false;
};

export type BodyErrorResponse = {
  status: number;
  error: JsonRpcError;
};

const getClientErrorStatus = (error: unknown) => {
  if (!error || typeof error !== 'object' || !('status' in error)) return undefined;
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
};

/**
 * Map a failure raised before the request reached the dispatcher (body
 * parsing, size limits) to the status and error frame streamed back.
 */
export const toBodyErrorResponse = (error: unknown): BodyErrorResponse => {
  if (isJsonParseError(error)) {
    return { status: 200, error: new ParseError() };
  }
  const clientStatus = getClientErrorStatus(error);
  if (clientStatus !== undefined) {
    const message = error instanceof Error && error.message ? error.message : 'Invalid request body';
    return { status: clientStatus, error: new InvalidRequestError(message) };
  }
  return { status: 500, error: new InternalError() };
};
