import type { ItemValue } from "@hc-bridge/schemas";

export interface FrameItem {
  key: string;
  value?: ItemValue;
  displayvalue?: string;
  unit?: string;
}

/** One complete SSE message, delimiter included. */
export function sseFrame(eventType: string, payload: unknown, id?: string): string {
  const lines = [`event: ${eventType}`, `data: ${JSON.stringify(payload)}`];
  if (id !== undefined) lines.push(`id: ${id}`);
  return `${lines.join("\n")}\n\n`;
}

export function itemsFrame(eventType: "STATUS" | "EVENT" | "NOTIFY", haId: string, items: FrameItem[]): string {
  return sseFrame(eventType, { haId, items }, haId);
}

export function connectivityFrame(state: "CONNECTED" | "DISCONNECTED", haId: string): string {
  return sseFrame(state, { haId }, haId);
}

export function keepAliveFrame(): string {
  return "event: KEEP-ALIVE\ndata: \n\n";
}
