export * from "./cli.js";
export * from "./commands.js";
export * from "./encode.js";
export * from "./filter-graph.js";
export * from "./noise-model.js";
export * from "./pipeline.js";
export * from "./progress.js";
