export * from "./htmlRewriter";
export * from "./keyIndex";
export * from "./rewriteStage";
