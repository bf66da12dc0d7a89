/**
 * ScoredContact → output row mapper (pure function)
 *
 * Cell order follows SCORED_CONTACT_COLUMNS.
 *
 * Formatting:
 * - Lead, Contact, Seniority, Domain, Warmth: rounded to integers
 * - Company Score, Match Confidence: rounded, empty unless positive
 */

import type { OutputTable, ScoredContact, TableCell } from "@/types";
import { SCORED_CONTACT_COLUMNS } from "@/constants/tables";

function formatPositiveScore(score: number | null): TableCell {
  return score !== null && score > 0 ? Math.round(score) : "";
}

export function mapScoredContactToRow(contact: ScoredContact): TableCell[] {
  return [
    contact.firstName,
    contact.lastName,
    contact.fullName,
    contact.jobTitle,
    contact.companyName,
    Math.round(contact.leadScore),
    Math.round(contact.contactScore),
    formatPositiveScore(contact.companyScore),
    Math.round(contact.seniorityScore),
    Math.round(contact.domainScore),
    Math.round(contact.warmthScore),
    contact.matchedCompany,
    formatPositiveScore(contact.matchConfidence),
    contact.source,
    contact.dateCreated,
    contact.dateUpdated,
    contact.extraData,
  ];
}

/**
 * Scored contact table, sorted by descending Lead Score (stable).
 */
export function buildScoredContactTable(
  contacts: readonly ScoredContact[],
): OutputTable {
  const sorted = [...contacts].sort((a, b) => b.leadScore - a.leadScore);
  return {
    header: SCORED_CONTACT_COLUMNS.map((column) => column.header),
    rows: sorted.map(mapScoredContactToRow),
  };
}
