import type { StreamHandlers, StreamRequest, StreamSignal, StreamTransport } from "@hc-bridge/driver-core";

export interface FakeStreamScript {
  /** Chunks emitted after START, one per interval. */
  chunks: string[];
  startDelayMs?: number;
  intervalMs?: number;
  /** Emit STOP after the last chunk. Otherwise the stream idles open. */
  stopAfter?: boolean;
}

/**
 * In-process stand-in for the SSE subscription. Tests drive it by hand with
 * `start`, `push`, `stop` and `fail`; with a script it plays itself back on
 * every `open`, which is how the bridge runs without the vendor cloud.
 */
export class FakeStreamTransport implements StreamTransport {
  readonly requests: StreamRequest[] = [];
  private handlers: StreamHandlers | null = null;
  private opened = false;
  private timers: Array<ReturnType<typeof setTimeout>> = [];

  constructor(private readonly script?: FakeStreamScript) {}

  get openCount(): number {
    return this.requests.length;
  }

  get isOpen(): boolean {
    return this.opened;
  }

  get lastRequest(): StreamRequest | undefined {
    return this.requests[this.requests.length - 1];
  }

  open(request: StreamRequest, handlers: StreamHandlers): void {
    this.close();
    this.requests.push(request);
    this.handlers = handlers;
    this.opened = true;
    if (this.script) this.play(this.script);
  }

  close(): void {
    this.clearTimers();
    this.handlers = null;
    this.opened = false;
  }

  start(): void {
    this.emit({ type: "START" });
  }

  push(chunk: string): void {
    this.requireHandlers().onData(chunk);
  }

  /** Leaves the handlers attached so a second STOP can be delivered. */
  stop(reason?: string): void {
    this.opened = false;
    this.emit(reason === undefined ? { type: "STOP" } : { type: "STOP", reason });
  }

  fail(error: { message?: string; status?: number; body?: string } = {}): void {
    this.opened = false;
    this.emit({
      type: "ERROR",
      message: error.message ?? (error.status !== undefined ? `stream responded ${error.status}` : "stream failed"),
      status: error.status,
      body: error.body
    });
  }

  private play(script: FakeStreamScript): void {
    const interval = script.intervalMs ?? 1000;
    let at = script.startDelayMs ?? 0;
    this.schedule(at, () => this.start());
    for (const chunk of script.chunks) {
      at += interval;
      this.schedule(at, () => this.push(chunk));
    }
    if (script.stopAfter) {
      this.schedule(at + interval, () => this.stop("script finished"));
    }
  }

  private schedule(delayMs: number, fn: () => void): void {
    const timer = setTimeout(() => {
      this.timers = this.timers.filter((t) => t !== timer);
      if (this.handlers) fn();
    }, delayMs);
    this.timers.push(timer);
  }

  private clearTimers(): void {
    for (const timer of this.timers) clearTimeout(timer);
    this.timers = [];
  }

  private emit(signal: StreamSignal): void {
    this.requireHandlers().onStatus(signal);
  }

  private requireHandlers(): StreamHandlers {
    if (!this.handlers) {
      throw new Error("Fake stream is not open");
    }
    return this.handlers;
  }
}
