/**
 * End-to-end scoring run
 *
 * Scores companies, orders them by company score, then scores contacts
 * against that ordering. No I/O: callers load records and the config, and
 * decide what to do with the result (export tables, record a baseline).
 */

import type {
  ScoredCompany,
  ScoringPipelineInput,
  ScoringPipelineResult,
} from "@/types";
import { scoreCompanies } from "@/signal/company";
import * as logger from "@/logger";
import { scoreContacts, summarizeContactBatch } from "./scoreContacts";

/**
 * Sort scored companies by descending company score (stable).
 */
export function sortByCompanyScore(
  companies: readonly ScoredCompany[],
): ScoredCompany[] {
  return [...companies].sort((a, b) => b.companyScore - a.companyScore);
}

export function runScoring(input: ScoringPipelineInput): ScoringPipelineResult {
  const log = logger.withContext({
    companies: input.companies.length,
    contacts: input.contacts.length,
  });
  log.info("Scoring run started", { baseline: input.baseline != null });

  const companies = sortByCompanyScore(
    scoreCompanies(input.companies, input.config, { now: input.now }),
  );
  const contacts = scoreContacts(input.contacts, companies, input.config, {
    baseline: input.baseline,
  });
  const stats = summarizeContactBatch(contacts);

  log.info("Scoring run finished", {
    matchedContacts: contacts.filter((contact) => contact.matchConfidence !== null)
      .length,
    rawContact: stats.rawContact,
    rawLead: stats.rawLead,
  });

  return { companies, contacts, stats };
}
