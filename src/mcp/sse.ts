export type SseEventName = 'message' | 'done';

export type SseFrame = {
  event: SseEventName;
  data: unknown;
};

export const SSE_HEADERS = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no',
} as const;

export const DONE_FRAME: SseFrame = { event: 'done', data: {} };

export const messageFrame = (data: unknown): SseFrame => ({ event: 'message', data });

export const formatSseFrame = ({ event, data }: SseFrame) =>
  `event: ${event}\ndata: ${JSON.stringify(data ?? {})}\n\n`;
