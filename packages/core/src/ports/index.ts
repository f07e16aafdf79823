export type { SuggestPort } from "./SuggestPort.js";
export type { RenderPort, RenderOptions } from "./RenderPort.js";
export { silentLogger, type LoggerPort } from "./LoggerPort.js";
