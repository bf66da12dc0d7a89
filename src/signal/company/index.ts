export * from "./statusDecay";
export * from "./volatility";
export * from "./companyScorer";
