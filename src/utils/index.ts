/**
 * Utils barrel exports
 */

export * from "./text/companyName";
export * from "./text/removeDiacritics";
export * from "./cellParsing";
export * from "./configValidation";
export * from "./math";
