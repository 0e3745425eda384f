import { z } from 'zod';

import { InvalidRequestError, type JsonRpcErrorObject } from './errors.js';

export const JSONRPC_VERSION = '2.0' as const;

export type JsonRpcId = string | number;

export type RequestEnvelope = {
  id?: JsonRpcId;
  method?: string;
  params: Record<string, unknown>;
};

export type ResponseOutcome = { result: unknown } | { error: JsonRpcErrorObject };

export type ResponsePayload =
  | ResponseOutcome
  | ({ jsonrpc: typeof JSONRPC_VERSION; id: JsonRpcId } & ResponseOutcome);

// Fields of the wrong type are treated as absent instead of rejecting the request.
const requestEnvelopeSchema = z.object({
  jsonrpc: z.string().optional().catch(undefined),
  id: z.union([z.string(), z.number()]).optional().catch(undefined),
  method: z.string().optional().catch(undefined),
  params: z.record(z.string(), z.unknown()).optional().catch(undefined),
});

export const readRequestEnvelope = (body: unknown): RequestEnvelope => {
  const parsed = requestEnvelopeSchema.safeParse(body);
  if (!parsed.success) {
    throw new InvalidRequestError('Request body must be a JSON object');
  }
  const { id, method, params } = parsed.data;
  return { id, method, params: params ?? {} };
};

/**
 * Requests that carry an id get a JSON-RPC envelope; everything else gets the
 * bare `result` or `error` object.
 */
export const toResponsePayload = (
  request: Pick<RequestEnvelope, 'id'> | undefined,
  outcome: ResponseOutcome
): ResponsePayload => {
  if (request?.id === undefined) return outcome;
  return { jsonrpc: JSONRPC_VERSION, id: request.id, ...outcome };
};
