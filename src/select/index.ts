export * from "./selector";
