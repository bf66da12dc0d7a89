/**
 * File-backed scoring config source
 */

import type { ScoringConfig } from "@/types";
import type { ScoringConfigSource } from "@/interfaces/scoring";
import { loadScoringConfig, resolveScoringConfigPath } from "./loader";

export class FileScoringConfigSource implements ScoringConfigSource {
  readonly name: string;
  private readonly configPath: string;

  /**
   * @param configPath - Config file path; defaults to SCORING_CONFIG_PATH
   *   from the environment, then data/scoring-config.json
   */
  constructor(configPath?: string) {
    this.configPath = resolveScoringConfigPath(configPath);
    this.name = `file:${this.configPath}`;
  }

  async load(): Promise<ScoringConfig> {
    return loadScoringConfig(this.configPath);
  }
}
