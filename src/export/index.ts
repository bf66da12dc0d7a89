export * from "./scoredCompanyRows";
export * from "./scoredContactRows";
