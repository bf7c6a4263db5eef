// packages/thresholds/src/sqlite-settings-store.ts
import Database from "better-sqlite3";

import type { ThresholdSettings } from "../../schema/src/types.js";
import type { ThresholdSettingsStore } from "./store.js";

type SettingsRow = {
  user_id: string;
  warning_percentile: number;
  outlier_iqr_multiplier: number;
  updated_at: string;
};

export class SqliteThresholdSettingsStore implements ThresholdSettingsStore {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    this.migrate();
  }

  private migrate() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS threshold_settings (
        user_id                TEXT PRIMARY KEY,
        warning_percentile     REAL NOT NULL
          CHECK (warning_percentile BETWEEN 0.5 AND 0.95),
        outlier_iqr_multiplier REAL NOT NULL
          CHECK (outlier_iqr_multiplier BETWEEN 0.5 AND 3.0),
        updated_at             TEXT NOT NULL
      );
    `);
  }

  async getSettings(user_id: string): Promise<ThresholdSettings | null> {
    const row = this.db
      .prepare<[string], SettingsRow>(
        `SELECT user_id, warning_percentile, outlier_iqr_multiplier, updated_at
         FROM threshold_settings
         WHERE user_id = ?
         LIMIT 1`
      )
      .get(user_id);

    return row ?? null;
  }

  async upsertSettings(input: Parameters<ThresholdSettingsStore["upsertSettings"]>[0]): Promise<ThresholdSettings> {
    const wp = input.patch.warning_percentile ?? null;
    const m = input.patch.outlier_iqr_multiplier ?? null;

    // Single statement: concurrent partial saves of different fields both land.
    const row = this.db
      .prepare<
        {
          user_id: string;
          wp: number | null;
          m: number | null;
          wp_initial: number;
          m_initial: number;
          at: string;
        },
        SettingsRow
      >(
        `
        INSERT INTO threshold_settings(user_id, warning_percentile, outlier_iqr_multiplier, updated_at)
        VALUES (@user_id, COALESCE(@wp, @wp_initial), COALESCE(@m, @m_initial), @at)
        ON CONFLICT(user_id) DO UPDATE SET
          warning_percentile     = COALESCE(@wp, threshold_settings.warning_percentile),
          outlier_iqr_multiplier = COALESCE(@m, threshold_settings.outlier_iqr_multiplier),
          updated_at             = @at
        RETURNING user_id, warning_percentile, outlier_iqr_multiplier, updated_at
        `
      )
      .get({
        user_id: input.user_id,
        wp,
        m,
        wp_initial: input.initial.warning_percentile,
        m_initial: input.initial.outlier_iqr_multiplier,
        at: input.at,
      });

    if (!row) throw new Error(`Threshold upsert returned no row for user ${input.user_id}`);
    return row;
  }

  async deleteSettings(user_id: string): Promise<{ deleted: number }> {
    const info = this.db.prepare(`DELETE FROM threshold_settings WHERE user_id = ?`).run(user_id);
    return { deleted: info.changes };
  }
}
