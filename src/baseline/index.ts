export * from "./baselineJson";
export * from "./providers";
