import type { ThresholdSettings, Thresholds } from "../../schema/src/types.js";

/**
 * One row per user. Absent row = the user is on fallback thresholds.
 */
export type ThresholdSettingsStore = {
  getSettings(user_id: string): Promise<ThresholdSettings | null>;

  /**
   * Atomic partial upsert. Fields missing from `patch` keep their stored
   * value; on first insert they take the value from `initial`.
   */
  upsertSettings(input: {
    user_id: string;
    patch: Partial<Thresholds>;
    initial: Thresholds;
    at: string;
  }): Promise<ThresholdSettings>;

  deleteSettings(user_id: string): Promise<{ deleted: number }>;
};
