/**
 * Test fixtures: records and a small scoring config
 *
 * All names, titles and figures are made up.
 */

import type {
  CompanyRecord,
  ContactRecord,
  ScoredCompany,
  ScoredContact,
  ScoringConfig,
  ScoringConfigRaw,
} from "@/types";
import { compileScoringConfig } from "@/scoringConfig";

/**
 * Helper: Create a CompanyRecord with every signal missing
 */
export function createTestCompany(
  overrides: Partial<CompanyRecord> = {},
): CompanyRecord {
  return {
    name: "Test Company",
    revenue30d: null,
    annualRevenue: null,
    totalFundingAmount: null,
    latestFundingAmount: null,
    latestFundingDate: null,
    employeeCount: null,
    employeeChangePct: null,
    revenueChangePct: null,
    closeStatus: null,
    closeStatusChangedAt: null,
    makesGames: false,
    freeToPlay: false,
    mobile: false,
    foundedYear: null,
    type: null,
    websiteUrl: null,
    linkedinUrl: null,
    country: null,
    flag: null,
    notes: null,
    discoverSource: null,
    createdDate: null,
    normalizedName: null,
    ...overrides,
  };
}

/**
 * Helper: Create a ContactRecord with empty fields
 */
export function createTestContact(
  overrides: Partial<ContactRecord> = {},
): ContactRecord {
  return {
    firstName: "Test",
    lastName: "Person",
    jobTitle: "",
    companyName: "",
    normalizedCompany: "",
    source: "",
    dateCreated: "",
    dateUpdated: "",
    extraData: "",
    ...overrides,
  };
}

/**
 * Helper: Create a ScoredCompany with neutral scores
 */
export function createTestScoredCompany(
  overrides: Partial<ScoredCompany> = {},
): ScoredCompany {
  return {
    name: "Test Company",
    companyScore: 50,
    alignment: 50,
    budget: 50,
    demand: 50,
    subcomponents: {
      dev: 0,
      f2p: 0,
      mobile: 0,
      fresh: 0,
      revenue: 0,
      funding: 0,
      headcount: 0,
      status: 0,
      volatility: 0,
      revenueDelta: 0,
      runwayDelta: 0,
      headcountDelta: 0,
      hiring: 0,
    },
    url: "",
    normalizedName: "test",
    country: "",
    flag: "",
    notes: "",
    discoverSource: "",
    createdDate: "",
    updatedDate: "2024-06-30",
    ...overrides,
  };
}

/**
 * Helper: Create an unmatched ScoredContact
 */
export function createTestScoredContact(
  overrides: Partial<ScoredContact> = {},
): ScoredContact {
  return {
    firstName: "Test",
    lastName: "Person",
    fullName: "Test Person",
    jobTitle: "",
    companyName: "",
    seniorityScore: 0,
    domainScore: 0,
    warmthScore: 0,
    rawContactScore: 0,
    contactScore: 0,
    matchedCompany: "",
    matchConfidence: null,
    companyScore: null,
    rawLeadScore: 5,
    leadScore: 0,
    source: "",
    dateCreated: "",
    dateUpdated: "",
    extraData: "",
    ...overrides,
  };
}

/**
 * Helper: Raw config with small, easy-to-trace pillars
 *
 * Weights: Seniority 0.5, Domain 0.5, Warmth 0 (contact score is the plain
 * average of seniority and domain).
 */
export function createTestConfigRaw(): ScoringConfigRaw {
  return {
    peopleScore: {
      pillars: {
        Seniority: {
          description: "0.5",
          components: {
            Executive: { "Keywords to Match": "CEO, Founder", Score: 95 },
            VP: { "Keywords to Match": "VP, Vice President", Score: 80 },
            Director: { "Keywords to Match": "Director, Head of", Score: 70 },
            Manager: { "Keywords to Match": "Manager", Score: 50 },
            Senior: { "Keywords to Match": "Senior, Sr", Score: "+10" },
            Junior: { "Keywords to Match": "Junior, Jr", Score: "-15" },
          },
        },
        Domain: {
          description: "0.5",
          components: {
            Product: {
              "Keywords to Match": "Product, Product Manager",
              Score: 90,
            },
            Growth: { "Keywords to Match": "Growth, UA", Score: 85 },
            Executive: { "Keywords to Match": "CEO, Founder", Score: 95 },
            Art: { "Keywords to Match": "Designer", Score: 20 },
          },
        },
        Warmth: {
          description: "0",
          components: {},
        },
        "One-Offs": {
          components: {
            "Game Director": {
              "Keywords to Match": "Game Director",
              Score: 85,
            },
          },
        },
      },
    },
    companyScore: {
      pillars: {
        Alignment: { weight: 1 },
        Budget: { weight: 1 },
        Demand: { weight: 1 },
      },
    },
  };
}

export function createTestConfig(): ScoringConfig {
  return compileScoringConfig(createTestConfigRaw());
}
