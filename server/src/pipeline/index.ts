export { Gateway, type GatewayDeps, type GatewayStats, type ModelInfo } from "./gateway.js";
export type * from "./types.js";
