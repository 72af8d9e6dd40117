export { createApp, ChatRequestSchema, DEFAULT_PUBLIC_DIR } from "./app.js";
export type { AppOptions, ChatRequest, ChatRun, LoopFactory } from "./app.js";

export { SseEmitter, toWireEvent, formatFrame } from "./stream-emitter.js";
export type { WireEvent } from "./stream-emitter.js";

export { listen, close } from "./server.js";
export type { ListenOptions } from "./server.js";
