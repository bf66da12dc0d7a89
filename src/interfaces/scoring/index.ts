export * from "./scoringConfigSource";
export * from "./baselineProvider";
