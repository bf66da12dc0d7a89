/**
 * Unit tests for delimited text reading and writing
 */

import { describe, it, expect } from "vitest";
import {
  detectDelimiter,
  parseDelimited,
  stringifyDelimited,
} from "@/io/delimited";

describe("detectDelimiter", () => {
  it("should pick tab when the header line has one", () => {
    expect(detectDelimiter("First Name\tLast Name\nAda\tLovelace")).toBe("\t");
  });

  it("should default to comma", () => {
    expect(detectDelimiter("First Name,Last Name\nAda\tLovelace")).toBe(",");
    expect(detectDelimiter("")).toBe(",");
  });
});

describe("parseDelimited", () => {
  it("should key rows by trimmed header and skip blank lines", () => {
    const table = parseDelimited("Company Name , F2P\nAlpha,X\n\nBeta,\n");

    expect(table.headers).toEqual(["Company Name", "F2P"]);
    expect(table.rows).toEqual([
      { "Company Name": "Alpha", F2P: "X" },
      { "Company Name": "Beta", F2P: "" },
    ]);
  });

  it("should leave trailing cells of a short row absent", () => {
    const table = parseDelimited("Company Name,F2P\nGamma\n");

    expect(table.rows[0]["Company Name"]).toBe("Gamma");
    expect(table.rows[0].F2P).toBeUndefined();
  });

  it("should read tab-separated text", () => {
    const table = parseDelimited("First Name\tLast Name\nAda\tLovelace\n");

    expect(table.rows).toEqual([{ "First Name": "Ada", "Last Name": "Lovelace" }]);
  });

  it("should handle quotes and a byte-order mark", () => {
    const table = parseDelimited(
      '\uFEFFCompany Name,Notes\n"Acme, Inc","said ""hi"""\n',
    );

    expect(table.headers).toEqual(["Company Name", "Notes"]);
    expect(table.rows[0]).toEqual({
      "Company Name": "Acme, Inc",
      Notes: 'said "hi"',
    });
  });

  it("should return an empty table for empty text", () => {
    expect(parseDelimited("")).toEqual({ headers: [], rows: [] });
  });
});

describe("stringifyDelimited", () => {
  it("should quote cells that contain the delimiter", () => {
    const text = stringifyDelimited({
      header: ["Company Name", "Company Score"],
      rows: [
        ["Acme, Inc", 72.5],
        ["", 3],
      ],
    });

    expect(text).toBe('Company Name,Company Score\n"Acme, Inc",72.5\n,3\n');
  });

  it("should write tab-separated text", () => {
    expect(
      stringifyDelimited({ header: ["A", "B"], rows: [["x", 1]] }, "\t"),
    ).toBe("A\tB\nx\t1\n");
  });
});
