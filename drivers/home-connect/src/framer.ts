const DELIMITER = "\n\n";
const DATA_FIELD = "data:";

/**
 * Turns arbitrarily chunked stream text into complete SSE messages.
 *
 * Messages are separated by a blank line. Text after the last delimiter stays
 * buffered until the rest of the message arrives; `reset()` is the only way
 * buffered text is dropped. A lone `data:` line with a complete JSON object is
 * held until the next chunk shows whether the message continues.
 */
export class SseFramer {
  private buffer = "";
  private framed = 0;
  /** The buffer holds one complete `data:` line that may still be a message of its own. */
  private holding = false;

  get pendingLength(): number {
    return this.buffer.length;
  }

  get messagesFramed(): number {
    return this.framed;
  }

  feed(chunk: string): string[] {
    if (!chunk) return [];
    this.buffer = (this.buffer + chunk).replace(/\r\n/g, "\n");

    const messages: string[] = [];
    if (this.holding) {
      const released = this.releaseHeldLine();
      if (released !== null) messages.push(released);
    }
    messages.push(...this.drain());

    // a bare `data:` line from a sender that never emits the blank-line delimiter
    this.holding = this.mayHoldStandaloneLine();
    this.framed += messages.length;
    return messages;
  }

  /** Hands out a held standalone line once no more text will follow it. */
  flush(): string[] {
    if (!this.holding) return [];
    const lineEnd = this.buffer.indexOf("\n");
    const line = asStandaloneDataLine(lineEnd === -1 ? this.buffer : this.buffer.slice(0, lineEnd));
    this.reset();
    if (line === null) return [];
    this.framed += 1;
    return [line];
  }

  reset(): void {
    this.buffer = "";
    this.holding = false;
  }

  /**
   * A held line stands alone only when the next line starts another `data:`
   * line. Anything else (`event:`, `id:`, the blank line) belongs to the same
   * message and is framed normally.
   */
  private releaseHeldLine(): string | null {
    const lineEnd = this.buffer.indexOf("\n");
    if (lineEnd === -1) return null;
    const rest = this.buffer.slice(lineEnd + 1);
    if (!rest.startsWith(DATA_FIELD)) return null;
    const line = this.buffer.slice(0, lineEnd);
    this.buffer = rest;
    return line;
  }

  /** True while the buffer is one standalone line, possibly followed by the start of a `data:` field. */
  private mayHoldStandaloneLine(): boolean {
    const lineEnd = this.buffer.indexOf("\n");
    if (lineEnd === -1 || lineEnd === this.buffer.length - 1) {
      return asStandaloneDataLine(this.buffer) !== null;
    }
    const rest = this.buffer.slice(lineEnd + 1);
    return DATA_FIELD.startsWith(rest) && asStandaloneDataLine(this.buffer.slice(0, lineEnd)) !== null;
  }

  private drain(): string[] {
    const messages: string[] = [];
    let idx = this.buffer.indexOf(DELIMITER);
    while (idx !== -1) {
      const message = this.buffer.slice(0, idx).replace(/^\n+/, "");
      this.buffer = this.buffer.slice(idx + DELIMITER.length);
      if (message.trim().length > 0) {
        messages.push(message);
      }
      idx = this.buffer.indexOf(DELIMITER);
    }
    return messages;
  }
}

function asStandaloneDataLine(text: string): string | null {
  const line = text.replace(/\r?\n$/, "").replace(/\r$/, "");
  if (line.includes("\n") || !line.startsWith(DATA_FIELD)) return null;
  const payload = line.slice(DATA_FIELD.length).trim();
  if (!payload.startsWith("{")) return null;
  try {
    JSON.parse(payload);
  } catch {
    return null;
  }
  return line;
}
