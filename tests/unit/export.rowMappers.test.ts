/**
 * Unit tests for scored output row mappers
 */

import { describe, it, expect } from "vitest";
import {
  buildScoredCompanyTable,
  mapScoredCompanyToRow,
} from "@/export/scoredCompanyRows";
import {
  buildScoredContactTable,
  mapScoredContactToRow,
} from "@/export/scoredContactRows";
import {
  SCORED_COMPANY_COLUMNS,
  SCORED_CONTACT_COLUMNS,
} from "@/constants/tables";
import {
  createTestScoredCompany,
  createTestScoredContact,
} from "../helpers/fixtures";

describe("mapScoredCompanyToRow", () => {
  it("should emit one cell per output column", () => {
    const row = mapScoredCompanyToRow(createTestScoredCompany());

    expect(row).toHaveLength(SCORED_COMPANY_COLUMNS.length);
  });

  it("should emit scores and text in column order", () => {
    const row = mapScoredCompanyToRow(
      createTestScoredCompany({
        name: "Alpha",
        companyScore: 87.5,
        alignment: 100,
        budget: 62.3,
        demand: 0,
        url: "https://alpha.example",
        normalizedName: "alpha",
      }),
    );

    expect(row.slice(0, 5)).toEqual(["Alpha", 87.5, 100, 62.3, 0]);
    expect(row[18]).toBe("https://alpha.example");
    expect(row[24]).toBe("2024-06-30");
    expect(row[25]).toBe("alpha");
  });
});

describe("buildScoredCompanyTable", () => {
  it("should sort by descending company score and keep ties in order", () => {
    const table = buildScoredCompanyTable([
      createTestScoredCompany({ name: "Low", companyScore: 10 }),
      createTestScoredCompany({ name: "High", companyScore: 90 }),
      createTestScoredCompany({ name: "Low Too", companyScore: 10 }),
    ]);

    expect(table.header[0]).toBe("Company Name");
    expect(table.header).toHaveLength(26);
    expect(table.rows.map((row) => row[0])).toEqual(["High", "Low", "Low Too"]);
  });
});

describe("mapScoredContactToRow", () => {
  it("should round scores and blank out missing company scores", () => {
    const row = mapScoredContactToRow(
      createTestScoredContact({
        jobTitle: "VP of Growth",
        seniorityScore: 80,
        domainScore: 85,
        contactScore: 90.9,
        leadScore: 35.49,
      }),
    );

    expect(row).toEqual([
      "Test",
      "Person",
      "Test Person",
      "VP of Growth",
      "",
      35,
      91,
      "",
      80,
      85,
      0,
      "",
      "",
      "",
      "",
      "",
      "",
    ]);
    expect(row).toHaveLength(SCORED_CONTACT_COLUMNS.length);
  });

  it("should round matched company score and confidence", () => {
    const row = mapScoredContactToRow(
      createTestScoredContact({
        matchedCompany: "Alpha",
        companyScore: 55.6,
        matchConfidence: 98.0769,
      }),
    );

    expect(row[7]).toBe(56);
    expect(row[11]).toBe("Alpha");
    expect(row[12]).toBe(98);
  });

  it("should blank a matched company score of 0", () => {
    const row = mapScoredContactToRow(
      createTestScoredContact({ companyScore: 0, matchConfidence: 100 }),
    );

    expect(row[7]).toBe("");
    expect(row[12]).toBe(100);
  });
});

describe("buildScoredContactTable", () => {
  it("should sort by descending lead score", () => {
    const table = buildScoredContactTable([
      createTestScoredContact({ firstName: "B", leadScore: 20 }),
      createTestScoredContact({ firstName: "A", leadScore: 80 }),
    ]);

    expect(table.header[5]).toBe("Lead Score");
    expect(table.rows.map((row) => row[0])).toEqual(["A", "B"]);
  });
});
