export * from "./logger";
export * from "./config";
export * from "./nameNormalization";
export * from "./matching";
export * from "./companyScoring";
export * from "./contactScoring";
export * from "./leadScoring";
export * from "./normalization";
export * from "./tables";
export * from "./baseline";
