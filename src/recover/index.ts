export * from "./localPath";
export * from "./recoverer";
export * from "./recoverStage";
