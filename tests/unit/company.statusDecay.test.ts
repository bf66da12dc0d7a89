/**
 * Unit tests for funnel status decay
 */

import { describe, it, expect } from "vitest";
import { computeStatusScore, findStatusRule } from "@/signal/company/statusDecay";

const NOW = new Date("2024-06-30T00:00:00Z");

function daysBefore(days: number): Date {
  return new Date(NOW.getTime() - days * 24 * 60 * 60 * 1000);
}

describe("findStatusRule", () => {
  it("should match statuses case-insensitively by substring", () => {
    expect(findStatusRule("5 - Customer")?.points).toBe(8);
    expect(findStatusRule("  QUALIFIED ")?.points).toBe(5);
  });

  it("should only match the named meeting status", () => {
    expect(findStatusRule("Met with Matt")?.points).toBe(6);
    expect(findStatusRule("Met with Sam")).toBeNull();
    expect(computeStatusScore("Met with Sarah", null, NOW)).toBe(0);
  });

  it("should take the first rule in table order", () => {
    expect(findStatusRule("6 - Previous Customer")).toEqual({
      match: "6 - previous customer",
      points: 10,
      halfLifeDays: 730,
    });
  });

  it("should return null for unknown or empty statuses", () => {
    expect(findStatusRule("Cold")).toBeNull();
    expect(findStatusRule("   ")).toBeNull();
    expect(findStatusRule(null)).toBeNull();
  });
});

describe("computeStatusScore", () => {
  it("should halve the points after one half-life", () => {
    expect(computeStatusScore("Qualified", daysBefore(90), NOW)).toBe(2.5);
    expect(computeStatusScore("Disco Incoming", daysBefore(60), NOW)).toBe(0.5);
  });

  it("should give full points for a fresh status", () => {
    expect(computeStatusScore("5 - Customer", NOW, NOW)).toBe(8);
  });

  it("should skip decay without a usable date", () => {
    expect(computeStatusScore("Qualified", null, NOW)).toBe(5);
    expect(computeStatusScore("Qualified", new Date("not a date"), NOW)).toBe(5);
  });

  it("should treat a future change date as age 0", () => {
    expect(computeStatusScore("Qualified", new Date("2024-12-31T00:00:00Z"), NOW)).toBe(5);
  });

  it("should return 0 for an unknown status", () => {
    expect(computeStatusScore("Cold", daysBefore(1), NOW)).toBe(0);
    expect(computeStatusScore(null, null, NOW)).toBe(0);
  });
});
