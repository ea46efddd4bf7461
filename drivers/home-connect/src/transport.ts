import type { DriverLogger, StreamHandlers, StreamRequest, StreamTransport } from "@hc-bridge/driver-core";

interface FetchStreamTransportDeps {
  fetch?: typeof fetch;
  logger?: DriverLogger;
}

/**
 * SSE subscription over `fetch` and a body reader. Signals stop once the
 * subscription is closed: an aborted request emits nothing.
 */
export class FetchStreamTransport implements StreamTransport {
  private controller: AbortController | null = null;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly deps: FetchStreamTransportDeps = {}) {
    this.fetchImpl = deps.fetch ?? ((input, init) => fetch(input, init));
  }

  open(request: StreamRequest, handlers: StreamHandlers): void {
    this.close();
    const controller = new AbortController();
    this.controller = controller;

    void this.run(request, handlers, controller.signal).catch((err: unknown) => {
      if (controller.signal.aborted) return;
      this.deps.logger?.error({ err }, "transport: stream reader failed");
      handlers.onStatus({ type: "ERROR", message: errorMessage(err) });
    });
  }

  close(): void {
    if (!this.controller) return;
    this.controller.abort();
    this.controller = null;
  }

  private async run(request: StreamRequest, handlers: StreamHandlers, signal: AbortSignal): Promise<void> {
    let response: Response;
    try {
      response = await this.fetchImpl(request.url, { headers: request.headers, signal });
    } catch (err) {
      if (signal.aborted) return;
      this.deps.logger?.warn({ err, url: request.url }, "transport: stream request failed");
      handlers.onStatus({ type: "ERROR", message: errorMessage(err) });
      return;
    }
    if (signal.aborted) return;

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      if (signal.aborted) return;
      handlers.onStatus({
        type: "ERROR",
        message: `stream responded ${response.status}`,
        status: response.status,
        body
      });
      return;
    }

    handlers.onStatus({ type: "START" });
    if (!response.body) {
      handlers.onStatus({ type: "STOP", reason: "empty body" });
      return;
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (signal.aborted) return;
        if (done) break;
        const text = decoder.decode(value, { stream: true });
        if (text.length > 0) handlers.onData(text);
      }
    } catch (err) {
      if (signal.aborted) return;
      handlers.onStatus({ type: "ERROR", message: errorMessage(err) });
      return;
    }

    const tail = decoder.decode();
    if (tail.length > 0) handlers.onData(tail);
    handlers.onStatus({ type: "STOP", reason: "end of stream" });
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
