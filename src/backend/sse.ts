export interface SseEvent {
  event: string;
  data: string;
}

/** The slice of a web `ReadableStream` the decoder needs; fetch bodies satisfy it. */
export interface ByteStream {
  getReader(): {
    read(): Promise<{ done: boolean; value?: Uint8Array }>;
    releaseLock(): void;
  };
}

/** Decodes a `text/event-stream` body into events; comment lines and unknown fields are skipped. */
export async function* readSseEvents(stream: ByteStream): AsyncGenerator<SseEvent> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();

  let buffer = '';
  let eventName = '';
  let dataLines: string[] = [];

  const take = (): SseEvent | null => {
    if (eventName.length === 0 && dataLines.length === 0) {
      return null;
    }
    const event: SseEvent = { event: eventName || 'message', data: dataLines.join('\n') };
    eventName = '';
    dataLines = [];
    return event;
  };

  const consumeLine = (line: string) => {
    if (line.startsWith(':')) return;
    if (line.startsWith('event:')) {
      eventName = line.slice('event:'.length).trim();
      return;
    }
    if (line.startsWith('data:')) {
      const data = line.slice('data:'.length);
      dataLines.push(data.startsWith(' ') ? data.slice(1) : data);
    }
  };

  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) break;
      buffer += decoder.decode(value, { stream: true });

      let lineBreakIndex = buffer.indexOf('\n');
      while (lineBreakIndex >= 0) {
        const rawLine = buffer.slice(0, lineBreakIndex);
        buffer = buffer.slice(lineBreakIndex + 1);
        const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;

        if (line.length === 0) {
          const event = take();
          if (event) yield event;
        } else {
          consumeLine(line);
        }
        lineBreakIndex = buffer.indexOf('\n');
      }
    }

    buffer += decoder.decode();
    if (buffer.trim().length > 0) {
      consumeLine(buffer.endsWith('\r') ? buffer.slice(0, -1) : buffer);
    }
    const last = take();
    if (last) yield last;
  } finally {
    reader.releaseLock();
  }
}
