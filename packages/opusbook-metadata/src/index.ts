export * from "./fields.js";
export * from "./folder.js";
export * from "./markers.js";
export * from "./probe.js";
export * from "./speed.js";
export * from "./timeline.js";
export type * from "./types.js";
