/**
 * Ingestion module barrel exports
 */

export { RecordMappingError } from "./recordMappingError";

export { mapCompanyRow, mapCompanyRows } from "./companyRows";

export { mapContactRow, mapContactRows } from "./contactRows";
