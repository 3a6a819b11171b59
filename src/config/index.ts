export * from "./dates";
export * from "./gapFile";
export * from "./loadConfig";
export * from "./types";
