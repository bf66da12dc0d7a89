export * from "./sequenceRatio";
export * from "./companyMatcher";
