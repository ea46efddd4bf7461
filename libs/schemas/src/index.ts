export * from "./common/scalars";
export * from "./domain/appliance";
export * from "./domain/stream";
export * from "./domain/api";
