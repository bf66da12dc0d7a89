/**
 * Table schema constants
 *
 * Column headers of the company/contact input tables and of the scored
 * output tables. Output column arrays are the single source of truth for
 * the output layout; row mappers emit cells in this order.
 */

import type { TableColumn } from "@/types";

/**
 * Company input column headers.
 */
export const COMPANY_INPUT_COLUMNS = {
  name: "Company Name",
  revenue30d: "Rev <30D (ST)",
  annualRevenue: "Annual Revenue (Growjo)",
  totalFundingAmount: "Total Funding Amount",
  latestFundingAmount: "Latest Funding Amount",
  latestFundingDate: "Latest Funding Date",
  employeeCount: "Current Employee Count (GJ)",
  employeeChangePct: "Employee Change % (GJ)",
  revenueChangePct: "Rev Change % (ST)",
  closeStatus: "Close Status",
  closeStatusChangedAt: "Close Status Change Dt",
  makesGames: "Makes Games",
  freeToPlay: "F2P",
  mobile: "Mobile",
  foundedYear: "Founded Year",
  type: "Type",
  websiteUrl: "Website URL",
  linkedinUrl: "Company Linkedin URL",
  country: "Country",
  flag: "FLAG",
  notes: "Notes",
  discoverSource: "Discover Source",
  createdDate: "Created Date",
  normalizedName: "Normalized Name",
} as const;

/**
 * Contact input column headers.
 */
export const CONTACT_INPUT_COLUMNS = {
  firstName: "First Name",
  lastName: "Last Name",
  jobTitle: "Job Title",
  companyName: "Company Name",
  normalizedCompany: "Normal Company",
  source: "Source",
  dateCreated: "Date Created",
  dateUpdated: "Date Updated",
  extraData: "Extra Data",
} as const;

/**
 * Older contact exports carry the company under this header instead.
 */
export const LEGACY_CONTACT_COMPANY_COLUMN = "Company";

/**
 * Cell value that marks a binary company flag as set (case-insensitive).
 */
export const FLAG_SET_VALUE = "X";

/**
 * Characters stripped from numeric cells before parsing ("$1,200", "12%").
 */
export const NUMERIC_CELL_NOISE_PATTERN = /[$,%]/g;

/**
 * Scored company output columns.
 */
export const SCORED_COMPANY_COLUMNS: readonly TableColumn[] = [
  { id: "name", header: "Company Name" },
  { id: "companyScore", header: "Company Score" },
  { id: "alignment", header: "Alignment" },
  { id: "budget", header: "Budget" },
  { id: "demand", header: "Demand" },
  { id: "dev", header: "Dev" },
  { id: "f2p", header: "F2P" },
  { id: "mobile", header: "Mobile" },
  { id: "fresh", header: "Fresh" },
  { id: "revenue", header: "Revenue" },
  { id: "funding", header: "Funding" },
  { id: "headcount", header: "Headcount" },
  { id: "status", header: "Status" },
  { id: "volatility", header: "Volatility" },
  { id: "revenueDelta", header: "Revenue ∆" },
  { id: "runwayDelta", header: "Runway ∆" },
  { id: "headcountDelta", header: "Headcount ∆" },
  { id: "hiring", header: "Hiring" },
  { id: "url", header: "URL" },
  { id: "country", header: "Country" },
  { id: "flag", header: "FLAG" },
  { id: "notes", header: "Notes" },
  { id: "discoverSource", header: "Discover Source" },
  { id: "createdDate", header: "Created Date" },
  { id: "updatedDate", header: "Updated Date" },
  { id: "normalizedName", header: "Normalized Name" },
];

/**
 * Scored contact output columns.
 */
export const SCORED_CONTACT_COLUMNS: readonly TableColumn[] = [
  { id: "firstName", header: "First Name" },
  { id: "lastName", header: "Last Name" },
  { id: "fullName", header: "Full Name" },
  { id: "jobTitle", header: "Job Title" },
  { id: "companyName", header: "Company Name" },
  { id: "leadScore", header: "Lead Score" },
  { id: "contactScore", header: "Contact Score" },
  { id: "companyScore", header: "Company Score" },
  { id: "seniority", header: "Seniority" },
  { id: "domain", header: "Domain" },
  { id: "warmth", header: "Warmth" },
  { id: "matchedCompany", header: "Matched Company" },
  { id: "matchConfidence", header: "Match Confidence" },
  { id: "source", header: "Source" },
  { id: "dateCreated", header: "Date Created" },
  { id: "dateUpdated", header: "Date Updated" },
  { id: "extraData", header: "Extra Data" },
];
