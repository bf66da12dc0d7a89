/**
 * BaselineProvider interface: supplies normalization bounds from earlier runs
 *
 * A baseline keeps contact and lead scores comparable across batches.
 * Providers return null when no baseline exists; callers then normalize
 * against the batch's own range.
 */

import type { NormalizationBaseline } from "@/types";

export interface BaselineProvider {
  /**
   * Get the baseline to normalize the next batch against
   */
  getBaseline(): NormalizationBaseline | null;
}
