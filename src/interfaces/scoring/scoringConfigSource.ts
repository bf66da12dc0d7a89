/**
 * ScoringConfigSource interface: where a run gets its compiled scoring config
 *
 * The bundled JSON file is one source; a remote config endpoint would be
 * another. Every source hands back the compiled form, never raw JSON.
 */

import type { ScoringConfig } from "@/types";

export interface ScoringConfigSource {
  /**
   * Source identifier for logs
   */
  readonly name: string;

  /**
   * Load, validate and compile the scoring config
   */
  load(): Promise<ScoringConfig>;
}
