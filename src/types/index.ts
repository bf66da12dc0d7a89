export * from "./logger";
export * from "./config";
export * from "./company";
export * from "./contact";
export * from "./matching";
export * from "./normalization";
export * from "./scoringRun";
export * from "./tables";
export * from "./pipeline";
