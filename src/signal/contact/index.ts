export * from "./titleScorer";
