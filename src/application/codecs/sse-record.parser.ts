/**
 * One `text/event-stream` record, before its payload is interpreted.
 */
export interface SseRecord {
  id?: string;
  /** Defaults to `message` when the record carries no `event:` line. */
  event: string;
  data: string;
}

const DEFAULT_EVENT = 'message';

/**
 * Incremental parser for the event-stream wire format. Feed it raw chunks in
 * arrival order; it returns the records completed by each chunk. Lines may
 * end in LF, CRLF or CR, and a line may be split across chunks.
 */
export class SseRecordParser {
  private readonly decoder = new TextDecoder('utf-8');
  private buffer = '';
  private pendingCarriageReturn = false;

  private id?: string;
  private event?: string;
  private dataLines: string[] = [];
  private hasFields = false;

  push(chunk: Buffer | string): SseRecord[] {
    let text = typeof chunk === 'string' ? chunk : this.decoder.decode(chunk, { stream: true });

    // A CR ending the previous chunk may be the first half of a CRLF.
    if (this.pendingCarriageReturn && text.startsWith('\n')) {
      text = text.slice(1);
    }
    this.pendingCarriageReturn = false;

    this.buffer += text;
    const records: SseRecord[] = [];
    const lineBreak = /\r\n|\r|\n/g;
    let consumed = 0;
    let match: RegExpExecArray | null;

    while ((match = lineBreak.exec(this.buffer)) !== null) {
      // A trailing CR cannot be classified until the next chunk arrives.
      if (match[0] === '\r' && match.index === this.buffer.length - 1) {
        this.pendingCarriageReturn = true;
      }
      const record = this.processLine(this.buffer.slice(consumed, match.index));
      if (record) {
        records.push(record);
      }
      consumed = match.index + match[0].length;
    }

    this.buffer = this.buffer.slice(consumed);
    return records;
  }

  private processLine(line: string): SseRecord | undefined {
    if (line.length === 0) {
      return this.dispatch();
    }
    if (line.startsWith(':')) {
      return undefined;
    }

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) {
      value = value.slice(1);
    }

    switch (field) {
      case 'id':
        if (!value.includes('\0')) {
          this.id = value;
          this.hasFields = true;
        }
        break;
      case 'event':
        this.event = value;
        this.hasFields = true;
        break;
      case 'data':
        this.dataLines.push(value);
        this.hasFields = true;
        break;
      default:
        // `retry` and unknown fields carry nothing this client uses.
        break;
    }
    return undefined;
  }

  private dispatch(): SseRecord | undefined {
    if (!this.hasFields) {
      return undefined;
    }

    const record: SseRecord = {
      event: this.event || DEFAULT_EVENT,
      data: this.dataLines.join('\n'),
      ...(this.id !== undefined && { id: this.id }),
    };
    this.resetRecord();
    return record;
  }

  private resetRecord(): void {
    this.id = undefined;
    this.event = undefined;
    this.dataLines = [];
    this.hasFields = false;
  }
}
