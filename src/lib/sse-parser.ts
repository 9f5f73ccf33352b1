/**
 * A complete record from the backend byte stream
 */
export type SseRecord =
  | { kind: 'event'; event?: string; data: string }
  | { kind: 'invalid'; line: string };

/**
 * Incremental server-sent-events framer.
 *
 * Text is pushed in whatever pieces the transport delivers. Only records
 * terminated by a blank line are returned; partial trailing input is kept
 * for the next push.
 */
export class SseParser {
  private buffer = '';
  private eventName: string | undefined;
  private dataLines: string[] = [];

  /**
   * Feed decoded text and collect the records it completes
   */
  push(text: string): SseRecord[] {
    this.buffer += text;
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() || ''; // Keep incomplete line in buffer

    const records: SseRecord[] = [];
    for (const rawLine of lines) {
      const record = this.consumeLine(rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine);
      if (record) records.push(record);
    }
    return records;
  }

  /**
   * End of input: emit whatever complete data is still pending
   */
  flush(): SseRecord[] {
    const records: SseRecord[] = [];

    if (this.buffer.length > 0) {
      const line = this.buffer.endsWith('\r') ? this.buffer.slice(0, -1) : this.buffer;
      this.buffer = '';
      const record = this.consumeLine(line);
      if (record) records.push(record);
    }

    const pending = this.dispatch();
    if (pending) records.push(pending);
    return records;
  }

  private consumeLine(line: string): SseRecord | null {
    if (line === '') {
      return this.dispatch();
    }

    // Comments double as keep-alives
    if (line.startsWith(':')) {
      return null;
    }

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) value = value.slice(1);

    switch (field) {
      case 'data':
        this.dataLines.push(value);
        return null;
      case 'event':
        this.eventName = value;
        return null;
      case 'id':
      case 'retry':
        return null;
      default:
        // Not an event-stream line at all (e.g. an HTML page from an intermediary)
        return { kind: 'invalid', line };
    }
  }

  private dispatch(): SseRecord | null {
    if (this.dataLines.length === 0) {
      this.eventName = undefined;
      return null;
    }

    const record: SseRecord = {
      kind: 'event',
      ...(this.eventName !== undefined && { event: this.eventName }),
      data: this.dataLines.join('\n'),
    };
    this.eventName = undefined;
    this.dataLines = [];
    return record;
  }
}
