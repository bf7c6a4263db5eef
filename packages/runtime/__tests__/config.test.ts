// packages/runtime/__tests__/config.test.ts
import { describe, expect, test } from "vitest";

import { loadConfig, thresholdFallbackFromConfig } from "../src/config.js";
import { ConfigError, TableValidationError, errorMessage } from "../src/errors.js";
import { createLogger } from "../src/logger.js";

describe("loadConfig", () => {
  test("applies defaults", () => {
    const c = loadConfig({});
    expect(c.NODE_ENV).toBe("development");
    expect(c.LOG_LEVEL).toBe("info");
    expect(c.EQUISTAT_DB_PATH).toBe("equistat.sqlite");
    expect(c.WARNING_PERCENTILE).toBeUndefined();
    expect(c.OUTLIER_IQR_MULTIPLIER).toBeUndefined();
  });

  test("passes threshold fallbacks through as raw strings", () => {
    const c = loadConfig({ WARNING_PERCENTILE: "0.9", OUTLIER_IQR_MULTIPLIER: "not-a-number" });
    expect(thresholdFallbackFromConfig(c)).toEqual({
      warning_percentile: "0.9",
      outlier_iqr_multiplier: "not-a-number",
    });
  });

  test("rejects an unknown log level", () => {
    let caught: unknown = null;
    try {
      loadConfig({ LOG_LEVEL: "loud" });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues).toHaveLength(1);
      expect(caught.issues[0]).toMatch(/^LOG_LEVEL: /);
    }
  });
});

describe("errors", () => {
  test("TableValidationError joins messages", () => {
    const e = new TableValidationError([
      { code: "A", message: "First." },
      { code: "B", message: "Second." },
    ]);
    expect(e.message).toBe("First. Second.");
    expect(e.violations.map((v) => v.code)).toEqual(["A", "B"]);
  });

  test("errorMessage", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });
});

describe("createLogger", () => {
  test("is silent under test", () => {
    expect(createLogger({ NODE_ENV: "test" }).silent).toBe(true);
    expect(createLogger({ NODE_ENV: "production", LOG_LEVEL: "warn" }).level).toBe("warn");
  });
});
