export * from "./interfaces";
export * from "./logger";
export * from "./path-guard";
export { createNodeFileSystem, createNodeHttpClient } from "./node";
