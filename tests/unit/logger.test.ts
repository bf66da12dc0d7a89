/**
 * Unit tests for the logger wrapper
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import * as logger from "@/logger";

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should write warnings with level and JSON meta", () => {
    const spy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.warn("Ignoring unparseable score modifier", { score: "+ten" });

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[WARN\] Ignoring unparseable score modifier \{"score":"\+ten"\}$/,
    );
  });

  it("should merge bound context into every call", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    logger.withContext({ companies: 2 }).error("Scoring failed", { contacts: 3 });

    expect(spy.mock.calls[0][0]).toMatch(
      /\[ERROR\] Scoring failed \{"companies":2,"contacts":3\}$/,
    );
  });

  it("should omit empty meta", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    logger.error("Plain message");

    expect(spy.mock.calls[0][0]).toMatch(/\[ERROR\] Plain message$/);
  });
});
