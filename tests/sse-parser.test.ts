import { describe, it, expect } from 'vitest';
import { SseParser, type SseRecord } from '../src/lib/sse-parser.js';

describe('SseParser', () => {
  it('returns records terminated by a blank line', () => {
    const parser = new SseParser();

    expect(parser.push('event: ping\ndata: {"a":1}\n\n')).toEqual([
      { kind: 'event', event: 'ping', data: '{"a":1}' },
    ]);
  });

  it('keeps partial input until the record completes', () => {
    const parser = new SseParser();

    expect(parser.push('data: {"a"')).toEqual([]);
    expect(parser.push(':1}\n')).toEqual([]);
    expect(parser.push('\n')).toEqual([{ kind: 'event', data: '{"a":1}' }]);
  });

  it('yields the same records however the input is split', () => {
    const input = 'event: one\ndata: first\n\nevent: two\ndata: second\n\n';
    const whole = new SseParser().push(input);

    const parser = new SseParser();
    const pieces: SseRecord[] = [];
    for (const char of input) pieces.push(...parser.push(char));

    expect(pieces).toEqual(whole);
    expect(whole).toHaveLength(2);
  });

  it('handles CRLF line endings', () => {
    const parser = new SseParser();

    expect(parser.push('data: hello\r\n\r\n')).toEqual([{ kind: 'event', data: 'hello' }]);
  });

  it('joins multi-line data with newlines', () => {
    const parser = new SseParser();

    expect(parser.push('data: line one\ndata: line two\n\n')).toEqual([
      { kind: 'event', data: 'line one\nline two' },
    ]);
  });

  it('ignores comments, ids and retry hints', () => {
    const parser = new SseParser();

    expect(parser.push(': keep-alive\nid: 7\nretry: 1000\ndata: x\n\n')).toEqual([{ kind: 'event', data: 'x' }]);
  });

  it('skips blank-line separated records without data', () => {
    const parser = new SseParser();

    expect(parser.push('event: empty\n\n\n')).toEqual([]);
    expect(parser.push('data: y\n\n')).toEqual([{ kind: 'event', data: 'y' }]);
  });

  it('reports lines that are not event-stream fields', () => {
    const parser = new SseParser();

    expect(parser.push('<html>\n')).toEqual([{ kind: 'invalid', line: '<html>' }]);
  });

  it('flushes a trailing record without a blank line', () => {
    const parser = new SseParser();

    expect(parser.push('data: tail')).toEqual([]);
    expect(parser.flush()).toEqual([{ kind: 'event', data: 'tail' }]);
    expect(parser.flush()).toEqual([]);
  });
});
