import { describe, it, expect } from 'vitest';
import {
  collectEventStream,
  eventErrorMessage,
  extractOutputText,
  fromBackend,
  mapFinishReason,
  parseBackendBody,
} from '../src/lib/response-converter.js';
import { SseParser } from '../src/lib/sse-parser.js';
import { ApiError } from '../src/lib/errors.js';
import type { BackendOutputItem, BackendResponse } from '../src/types/backend.js';
import { sseEvent } from './helpers.js';

const hi: BackendOutputItem[] = [{ type: 'message', role: 'assistant', content: [{ type: 'output_text', text: 'Hi' }] }];

function records(body: string) {
  const parser = new SseParser();
  return [...parser.push(body), ...parser.flush()];
}

describe('fromBackend', () => {
  const response: BackendResponse = {
    id: 'resp_1',
    status: 'completed',
    output: [
      { type: 'reasoning', id: 'rs_1' },
      {
        type: 'message',
        role: 'assistant',
        content: [{ type: 'output_text', text: 'Hello' }, { type: 'refusal' }],
      },
      { type: 'message', role: 'assistant', content: [{ type: 'output_text', text: ', world' }] },
    ],
    usage: { input_tokens: 12, output_tokens: 5, total_tokens: 17 },
  };

  it('concatenates the text of every message item', () => {
    const result = fromBackend(response, 'gpt-5');

    expect(result.object).toBe('chat.completion');
    expect(result.id).toMatch(/^chatcmpl-/);
    expect(result.model).toBe('gpt-5');
    expect(result.choices).toEqual([
      { index: 0, message: { role: 'assistant', content: 'Hello, world' }, finish_reason: 'stop' },
    ]);
  });

  it('maps usage to OpenAI token counts', () => {
    expect(fromBackend(response).usage).toEqual({ prompt_tokens: 12, completion_tokens: 5, total_tokens: 17 });
  });

  it('omits usage the backend did not report', () => {
    expect('usage' in fromBackend({ status: 'completed', output: hi })).toBe(false);
  });

  it('prefers the model the backend reports', () => {
    expect(fromBackend({ model: 'gpt-5-2025-08-07', output: hi }, 'gpt-5').model).toBe('gpt-5-2025-08-07');
  });

  it('rejects a successful response without assistant text', () => {
    expect(() => fromBackend({ status: 'completed' })).toThrow(
      'Backend returned success but no assistant content could be extracted'
    );
    expect(() =>
      fromBackend({ status: 'completed', output: [{ type: 'function_call', id: 'fc_1' }] })
    ).toThrow(ApiError);
  });

  it('maps incomplete responses to finish_reason length', () => {
    expect(fromBackend({ status: 'incomplete', output: hi }).choices[0]?.finish_reason).toBe('length');
  });
});

describe('mapFinishReason', () => {
  it('falls back to stop for unknown or missing statuses', () => {
    expect(mapFinishReason('completed')).toBe('stop');
    expect(mapFinishReason('cancelled')).toBe('stop');
    expect(mapFinishReason(undefined)).toBe('stop');
    expect(mapFinishReason('incomplete')).toBe('length');
  });
});

describe('extractOutputText', () => {
  it('skips content parts and items that are not objects', () => {
    const output: unknown = JSON.parse(
      '[null, {"type":"message","content":[null, 7, {"type":"output_text","text":"ok"}]}]'
    );

    expect(extractOutputText(output)).toBe('ok');
  });

  it('returns nothing when output is not a list', () => {
    const output: unknown = JSON.parse('{"type":"message"}');

    expect(extractOutputText(output)).toBe('');
  });

  it('ignores non-message items', () => {
    expect(
      extractOutputText([
        { type: 'function_call', id: 'fc_1' },
        { type: 'message', content: [{ type: 'output_text', text: 'ok' }] },
      ])
    ).toBe('ok');
  });
});

describe('eventErrorMessage', () => {
  it('reads the message from the most specific place available', () => {
    expect(eventErrorMessage({ type: 'error', error: { message: 'quota exceeded' } })).toBe('quota exceeded');
    expect(
      eventErrorMessage({ type: 'response.failed', response: { error: { message: 'model overloaded' } } })
    ).toBe('model overloaded');
    expect(eventErrorMessage({ type: 'error', message: 'bad request' })).toBe('bad request');
    expect(eventErrorMessage({ type: 'response.failed' })).toBe('Backend reported response.failed');
  });
});

describe('collectEventStream', () => {
  it('collects streamed deltas into one message', () => {
    const result = collectEventStream(
      records(
        sseEvent('response.created', { response: { id: 'resp_1', status: 'in_progress' } }) +
          sseEvent('response.output_text.delta', { delta: 'Hel' }) +
          sseEvent('response.output_text.delta', { delta: 'lo' }) +
          sseEvent('response.completed', {
            response: { id: 'resp_1', status: 'completed', usage: { input_tokens: 3, output_tokens: 2, total_tokens: 5 } },
          })
      )
    );

    expect(result).toEqual({
      id: 'resp_1',
      status: 'completed',
      usage: { input_tokens: 3, output_tokens: 2, total_tokens: 5 },
      output: [{ type: 'message', role: 'assistant', content: [{ type: 'output_text', text: 'Hello' }] }],
    });
  });

  it('falls back to finished output items when nothing was streamed', () => {
    const result = collectEventStream(
      records(
        sseEvent('response.output_item.done', {
          item: { type: 'message', content: [{ type: 'output_text', text: 'from item' }] },
        }) + sseEvent('response.completed', { response: { status: 'completed' } })
      )
    );

    expect(extractOutputText(result.output)).toBe('from item');
  });

  it('falls back to the terminal response output last', () => {
    const result = collectEventStream(
      records(
        sseEvent('response.completed', {
          response: { output: [{ type: 'message', content: [{ type: 'output_text', text: 'final' }] }] },
        })
      )
    );

    expect(extractOutputText(result.output)).toBe('final');
    expect(result.status).toBe('completed');
  });

  it('marks response.incomplete as incomplete', () => {
    const result = collectEventStream(
      records(
        sseEvent('response.output_text.delta', { delta: 'cut' }) + sseEvent('response.incomplete', { response: {} })
      )
    );

    expect(result.status).toBe('incomplete');
  });

  it('rejects a completed stream that carried no assistant text', () => {
    let caught: unknown;
    try {
      collectEventStream(
        records(
          sseEvent('response.output_item.done', { item: { type: 'function_call', id: 'fc_1' } }) +
            sseEvent('response.completed', { response: { status: 'completed' } })
        )
      );
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ApiError);
    expect(caught).toMatchObject({
      statusCode: 502,
      code: 'upstream_error',
      message: 'Backend returned success but no assistant content could be extracted',
    });
  });

  it('raises upstream errors reported in the stream', () => {
    expect(() =>
      collectEventStream(records(sseEvent('error', { error: { message: 'quota exceeded' } })))
    ).toThrow('quota exceeded');
  });

  it('rejects streams that end before completion', () => {
    expect(() => collectEventStream(records(sseEvent('response.output_text.delta', { delta: 'x' })))).toThrow(
      'Backend stream ended before completion'
    );
  });

  it('rejects bodies that are not event streams', () => {
    expect(() => collectEventStream(records('<html>\n<body>Just a moment...</body>\n'))).toThrow(
      'Backend returned a payload that is not an event stream'
    );
  });

  it('rejects events that are not JSON', () => {
    expect(() => collectEventStream(records('data: {not json\n\n'))).toThrow(
      'Backend sent an event that is not valid JSON'
    );
  });
});

describe('parseBackendBody', () => {
  it('parses JSON bodies', () => {
    const body = JSON.stringify({ status: 'completed', output: [] });

    expect(parseBackendBody('application/json; charset=utf-8', body)).toEqual({ status: 'completed', output: [] });
  });

  it('collects event-stream bodies', () => {
    const body =
      sseEvent('response.output_text.delta', { delta: 'Hi' }) +
      sseEvent('response.completed', { response: { status: 'completed' } });

    expect(extractOutputText(parseBackendBody('text/event-stream', body).output)).toBe('Hi');
  });

  it('rejects invalid JSON', () => {
    expect(() => parseBackendBody('application/json', '{"status":')).toThrow('Backend returned invalid JSON');
  });

  it('rejects JSON that is not a response object', () => {
    expect(() => parseBackendBody('application/json', '[1,2]')).toThrow(
      'Backend JSON does not look like a response object'
    );
  });

  it('rejects JSON whose output entries are not objects', () => {
    const body = JSON.stringify({ status: 'completed', output: [{ type: 'message', content: [null] }] });

    let caught: unknown;
    try {
      parseBackendBody('application/json', body);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ApiError);
    expect(caught).toMatchObject({
      statusCode: 502,
      code: 'malformed_upstream',
      message: 'Backend JSON does not look like a response object',
    });
    expect(() => parseBackendBody('application/json', '{"output":"text"}')).toThrow(
      'Backend JSON does not look like a response object'
    );
  });

  it('rejects other content types', () => {
    expect(() => parseBackendBody('text/html', '<html></html>')).toThrow(
      'Backend returned unexpected content type: text/html'
    );
    expect(() => parseBackendBody(null, '')).toThrow('Backend returned unexpected content type: none');
  });
});
