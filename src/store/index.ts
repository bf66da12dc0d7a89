/**
 * Baseline store barrel exports
 */

export * from "./connection";
export * from "./repos/scoringRunsRepo";
