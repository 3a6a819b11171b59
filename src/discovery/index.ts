export * from "./discovery";
export * from "./indexClient";
