import { AppConfig, getOutputPaths } from "../config";
import { JsonlStateStore } from "./jsonlStateStore";
import { StateStore } from "./types";

export function createStateStore(config: AppConfig): StateStore {
  return new JsonlStateStore(getOutputPaths(config).stateDir);
}

export * from "./jsonlLog";
export * from "./jsonlStateStore";
export * from "./memoryStore";
export * from "./types";
