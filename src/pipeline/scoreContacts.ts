/**
 * Contact scoring pipeline
 *
 * For each contact: title pillars → raw contact score → fuzzy match to a
 * scored company → raw lead score. Then both raw columns are normalized
 * over the whole batch (or against a baseline) and contacts are ordered by
 * lead score.
 */

import type {
  ContactBatchStats,
  ContactRecord,
  ContactScoringOptions,
  MatchCandidate,
  ScoredCompany,
  ScoredContact,
  ScoringConfig,
} from "@/types";
import { MIN_MATCH_CONFIDENCE } from "@/constants";
import { findBestMatch } from "@/signal/matcher";
import {
  computeContactScore,
  hasJobTitle,
  scoreTitle,
  scoreWarmth,
} from "@/signal/contact";
import { combineLeadScore } from "@/signal/lead";
import { normalizeScores } from "@/signal/normalization";
import { minMax, normalizeCompanyName } from "@/utils";
import * as logger from "@/logger";

/**
 * Comparison key for a contact's company: the pre-computed key when
 * present, else the normalized company name.
 */
export function resolveContactCompanyKey(
  contact: Pick<ContactRecord, "normalizedCompany" | "companyName">,
): string {
  return contact.normalizedCompany.trim() || normalizeCompanyName(contact.companyName);
}

function toCandidate(company: ScoredCompany): MatchCandidate {
  return {
    name: company.name,
    normalizedName: company.normalizedName,
    companyScore: company.companyScore,
  };
}

/**
 * Score a batch of contacts against already-scored companies.
 *
 * Companies are tried in the order given; on equal match scores the
 * earlier company wins.
 *
 * @param contacts - Contact records of one batch
 * @param scoredCompanies - Match candidates, usually sorted by score
 * @param config - Compiled scoring config
 * @param options - Optional normalization baseline
 * @returns Scored contacts, sorted by descending lead score (stable)
 */
export function scoreContacts(
  contacts: readonly ContactRecord[],
  scoredCompanies: readonly ScoredCompany[],
  config: ScoringConfig,
  options: ContactScoringOptions = {},
): ScoredContact[] {
  logger.info("Scoring contacts", {
    count: contacts.length,
    companies: scoredCompanies.length,
  });

  const candidates = scoredCompanies.map(toCandidate);

  const unnormalized = contacts.map((contact) => {
    const title = contact.jobTitle;
    const pillars = scoreTitle(title, config);
    const warmth = scoreWarmth(contact);
    const rawContactScore = computeContactScore(
      pillars.seniority,
      pillars.domain,
      warmth,
      config,
    );

    const match = findBestMatch(resolveContactCompanyKey(contact), candidates);
    const hasCompanyMatch = match.confidence >= MIN_MATCH_CONFIDENCE;
    const rawLeadScore = combineLeadScore(
      rawContactScore,
      match.companyScore ?? 0,
      hasCompanyMatch,
      hasJobTitle(title),
    );

    return {
      contact,
      seniority: pillars.seniority,
      domain: pillars.domain,
      warmth,
      rawContactScore,
      rawLeadScore,
      match,
      hasCompanyMatch,
    };
  });

  const baseline = options.baseline ?? null;
  const contactScores = normalizeScores(
    unnormalized.map((entry) => entry.rawContactScore),
    baseline?.contactScoreMin,
    baseline?.contactScoreMax,
  );
  const leadScores = normalizeScores(
    unnormalized.map((entry) => entry.rawLeadScore),
    baseline?.leadScoreMin,
    baseline?.leadScoreMax,
  );

  const scored = unnormalized.map(
    (entry, index): ScoredContact => ({
      firstName: entry.contact.firstName,
      lastName: entry.contact.lastName,
      fullName: `${entry.contact.firstName} ${entry.contact.lastName}`.trim(),
      jobTitle: entry.contact.jobTitle,
      companyName: entry.contact.companyName,
      seniorityScore: entry.seniority,
      domainScore: entry.domain,
      warmthScore: entry.warmth,
      rawContactScore: entry.rawContactScore,
      contactScore: contactScores[index],
      matchedCompany: entry.match.matchedName,
      matchConfidence: entry.hasCompanyMatch ? entry.match.confidence : null,
      companyScore: entry.hasCompanyMatch ? entry.match.companyScore : null,
      rawLeadScore: entry.rawLeadScore,
      leadScore: leadScores[index],
      source: entry.contact.source,
      dateCreated: entry.contact.dateCreated,
      dateUpdated: entry.contact.dateUpdated,
      extraData: entry.contact.extraData,
    }),
  );

  scored.sort((a, b) => b.leadScore - a.leadScore);

  logger.debug("Contact scoring complete", {
    count: scored.length,
    matched: scored.filter((contact) => contact.matchConfidence !== null).length,
  });

  return scored;
}

/**
 * Raw and normalized score ranges of a scored contact batch.
 */
export function summarizeContactBatch(
  contacts: readonly ScoredContact[],
): ContactBatchStats {
  return {
    count: contacts.length,
    rawContact: minMax(contacts.map((contact) => contact.rawContactScore)),
    rawLead: minMax(contacts.map((contact) => contact.rawLeadScore)),
    contact: minMax(contacts.map((contact) => contact.contactScore)),
    lead: minMax(contacts.map((contact) => contact.leadScore)),
  };
}
