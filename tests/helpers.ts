import { vi } from 'vitest';
import type { Logger } from '../src/config.js';

// Mock logger
export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * One SSE record the way the backend frames it
 */
export function sseEvent(type: string, payload: Record<string, unknown> = {}): string {
  return `event: ${type}\ndata: ${JSON.stringify({ type, ...payload })}\n\n`;
}

/**
 * Backend response whose body is delivered in the given pieces
 */
export function streamResponse(pieces: string[], contentType = 'text/event-stream'): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const piece of pieces) controller.enqueue(encoder.encode(piece));
      controller.close();
    },
  });
  return new Response(body, { status: 200, headers: { 'content-type': contentType } });
}

export function jsonResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

/**
 * Split an SSE body produced by the bridge into its data payloads
 */
export function dataPayloads(body: string): string[] {
  return body
    .split('\n\n')
    .filter((record) => record.length > 0)
    .map((record) => record.replace(/^data: /, ''));
}
