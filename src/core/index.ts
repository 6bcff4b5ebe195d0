/**
 * Library entry point.
 */

export * from "./errors.js";
export * from "./compare-weight.js";
export * from "./sorted-sequence.js";
export * from "./bag.js";
export * from "./attachment.js";
export * from "./control-cache.js";
export * from "./types.js";
export * from "./mixer.js";
export * from "./open-mixer.js";
export * as simple from "./simple.js";
export * from "../transport/types.js";
export { VirtualCard } from "../transport/virtual-card.js";
export * from "../config/mixer-config.js";
export { getBackend, isMixerBackend, defaultBackendModule, clearBackendCache } from "../backends/index.js";
export { basicBackend, classifyControl } from "../backends/basic.js";
export { noneBackend, attachDevice } from "../backends/none.js";
export type { BackendContext, MixerBackend, OpenControl } from "../backends/types.js";
