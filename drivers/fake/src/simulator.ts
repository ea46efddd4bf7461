import { connectivityFrame, itemsFrame, keepAliveFrame } from "./frames";
import type { FakeStreamScript } from "./stream-transport";

/**
 * A short washer cycle per appliance, repeated on every reconnect. Used when
 * the bridge runs with `STREAM_TRANSPORT=fake`.
 */
export function createSimulatorScript(applianceIds: string[], intervalMs = 1000): FakeStreamScript {
  const chunks: string[] = [keepAliveFrame()];
  for (const haId of applianceIds) {
    chunks.push(
      connectivityFrame("CONNECTED", haId),
      itemsFrame("STATUS", haId, [
        { key: "BSH.Common.Status.DoorState", value: "BSH.Common.EnumType.DoorState.Closed" },
        { key: "BSH.Common.Status.OperationState", value: "BSH.Common.EnumType.OperationState.Run" }
      ]),
      itemsFrame("NOTIFY", haId, [{ key: "BSH.Common.Option.RemainingProgramTime", value: 3600, unit: "seconds" }]),
      itemsFrame("NOTIFY", haId, [{ key: "BSH.Common.Option.ProgramProgress", value: 50, unit: "%" }]),
      itemsFrame("EVENT", haId, [
        { key: "BSH.Common.Event.ProgramFinished", value: "BSH.Common.EnumType.EventPresentState.Present" }
      ])
    );
  }
  chunks.push(keepAliveFrame());
  return { chunks, intervalMs, startDelayMs: intervalMs };
}
