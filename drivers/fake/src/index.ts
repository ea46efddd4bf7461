export { FakeStreamTransport, type FakeStreamScript } from "./stream-transport";
export { StaticTokenProvider } from "./token-provider";
export { RecordingRegistry } from "./registry";
export { connectivityFrame, itemsFrame, keepAliveFrame, sseFrame, type FrameItem } from "./frames";
export { createSimulatorScript } from "./simulator";
