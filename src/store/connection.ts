/**
 * Baseline store file
 *
 * Single shared JSON file holding every recorded scoring run. Each run
 * carries its bounds in the baseline stats document shape.
 */

import * as fs from "fs";
import * as path from "path";
import type { ScoringRun, ScoringRunsDocument } from "@/types";
import {
  BASELINE_STORE_PATH,
  BASELINE_STORE_PATH_ENV,
} from "@/constants/baseline";
import { parseBaselineJson, toBaselineJson } from "@/baseline/baselineJson";
import { isRecord } from "@/utils/configValidation";

let storePath: string | null = null;

export class BaselineStoreError extends Error {
  constructor(message: string) {
    super(`Baseline store invalid: ${message}`);
    this.name = "BaselineStoreError";
  }
}

/**
 * Store file path: explicit argument, then BASELINE_STORE_PATH, then
 * data/scoring-runs.json
 */
function resolveStorePath(filePath?: string): string {
  const configured =
    filePath ?? process.env[BASELINE_STORE_PATH_ENV] ?? BASELINE_STORE_PATH;
  const resolved = path.resolve(process.cwd(), configured);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  return resolved;
}

/**
 * Open the store. Returns the current path if already open. The file
 * itself is created on the first recorded run.
 */
export function openStore(filePath?: string): string {
  if (storePath) {
    return storePath;
  }
  storePath = resolveStorePath(filePath);
  return storePath;
}

export function closeStore(): void {
  storePath = null;
}

/**
 * Get current store path (must be opened first)
 */
export function getStorePath(): string {
  if (!storePath) {
    throw new Error("Baseline store not opened. Call openStore() first.");
  }
  return storePath;
}

/**
 * Set store path for testing purposes only.
 *
 * @internal Test use only
 */
export function setStorePathForTesting(testPath: string | null): void {
  storePath = testPath;
}

function requireNumber(
  entry: Record<string, unknown>,
  field: string,
  index: number,
): number {
  const value = entry[field];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new BaselineStoreError(`runs[${index}].${field} must be a number`);
  }
  return value;
}

function requireString(
  entry: Record<string, unknown>,
  field: string,
  index: number,
): string {
  const value = entry[field];
  if (typeof value !== "string") {
    throw new BaselineStoreError(`runs[${index}].${field} must be a string`);
  }
  return value;
}

function parseRun(entry: unknown, index: number): ScoringRun {
  if (!isRecord(entry)) {
    throw new BaselineStoreError(`runs[${index}] must be an object`);
  }
  return {
    id: requireNumber(entry, "id", index),
    label: requireString(entry, "label", index),
    company_count: requireNumber(entry, "company_count", index),
    contact_count: requireNumber(entry, "contact_count", index),
    ...toBaselineJson(parseBaselineJson(entry)),
    created_at: requireString(entry, "created_at", index),
  };
}

/**
 * Parse a deserialized store document.
 *
 * @throws BaselineStoreError on a malformed document or run entry
 */
export function parseStoreDocument(raw: unknown): ScoringRunsDocument {
  const runs = isRecord(raw) ? raw.runs : undefined;
  if (!Array.isArray(runs)) {
    throw new BaselineStoreError('expected an object with a "runs" array');
  }
  return { runs: runs.map(parseRun) };
}

/**
 * Read every recorded run. A store file that does not exist yet holds no
 * runs.
 */
export function readStoreDocument(): ScoringRunsDocument {
  const filePath = getStorePath();
  if (!fs.existsSync(filePath)) {
    return { runs: [] };
  }
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  return parseStoreDocument(raw);
}

/**
 * Replace the store file. Written to a sibling file first, then renamed
 * over the old one.
 */
export function writeStoreDocument(document: ScoringRunsDocument): void {
  const filePath = getStorePath();
  const tempPath = `${filePath}.tmp`;
  fs.writeFileSync(
    tempPath,
    `${JSON.stringify(document, null, 2)}\n`,
    "utf-8",
  );
  fs.renameSync(tempPath, filePath);
}
