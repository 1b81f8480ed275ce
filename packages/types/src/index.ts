export type * from "./foundational.js";
export type * from "./observability.js";
export type * from "./error.js";
export type * from "./event-bus.js";
export type * from "./tool.js";
export type * from "./agent.js";
