/**
 * Lead scoring engine public API
 */

export * from "./types";
export * from "./interfaces/scoring";
export { normalizeCompanyName } from "./utils/text/companyName";
export type { CompanyNameOptions } from "./utils/text/companyName";
export {
  ScoringConfigValidationError,
  validateScoringConfigRaw,
} from "./utils/configValidation";
export * from "./scoringConfig";
export * from "./signal/matcher";
export * from "./signal/company";
export * from "./signal/contact";
export * from "./signal/lead";
export * from "./signal/normalization";
export * from "./pipeline";
export * from "./ingestion";
export * from "./export";
export * from "./io";
export * from "./baseline";
export {
  BaselineStoreError,
  openStore,
  closeStore,
  parseStoreDocument,
  recordScoringRun,
  getScoringRunById,
  getLatestScoringRun,
  getLatestBaseline,
} from "./store";
