import { vi } from "vitest";
import type { MqttPublisher, PublishOptions } from "../src/mqtt/publisher";

export interface PublishedMessage {
  topic: string;
  payload: string;
  retain: boolean;
}

export class RecordingPublisher implements MqttPublisher {
  readonly messages: PublishedMessage[] = [];
  failWith: Error | null = null;
  disconnected = false;

  async publish(topic: string, payload: string, options: PublishOptions = {}): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.messages.push({ topic, payload, retain: options.retain ?? false });
  }

  async disconnect(): Promise<void> {
    this.disconnected = true;
  }
}

export function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export async function flushMicrotasks(): Promise<void> {
  for (let i = 0; i < 20; i += 1) {
    await Promise.resolve();
  }
}

export function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), { status: 200, ...init });
}
