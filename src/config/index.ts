export * from "./endpoints";
export * from "./loadConfig";
export * from "./types";
