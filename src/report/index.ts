export * from "./render";
export * from "./reporter";
