import { describe, expect, it } from "vitest";
import { loadConfig } from "../config.js";
import { InvalidMappingError } from "../errors.js";

describe("loadConfig", () => {
  it("uses the file defaults without environment overrides", () => {
    const config = loadConfig({});

    expect(config.storage.type).toBe("local");
    expect(config.output.prefix).toBe("reports");
    expect(config.metrics.repeat).toEqual({ minBuilds: 3, periodDays: 7 });
    expect(config.metrics.active).toEqual({ minDays: 3, recentLimitDays: 30 });
    expect(config.metrics.footprints.vhd).toBe("azure");
    expect(config.logging.format).toBe("pretty");
  });

  it("lets the environment override file values", () => {
    const config = loadConfig({
      REPEAT_MIN_BUILDS: "5",
      ACTIVE_RECENT_DAYS: "14",
      PERIOD_DAYS: "14",
      LOG_COLOR: "false",
      LOG_FORMAT: "json",
      BUCKET_TYPE: "s3",
      BUCKET_URI: "s3://metrics-bucket",
      USERINFO_PATH: "/data/userinfo.json"
    });

    expect(config.metrics.repeat.minBuilds).toBe(5);
    expect(config.metrics.active.recentLimitDays).toBe(14);
    expect(config.metrics.periodDays).toBe(14);
    expect(config.logging.color).toBe(false);
    expect(config.logging.format).toBe("json");
    expect(config.storage).toMatchObject({ type: "s3", bucket: "metrics-bucket" });
    expect(config.input.userInfoPath).toBe("/data/userinfo.json");
  });

  it("prefers BUCKET_NAME over BUCKET_URI", () => {
    const config = loadConfig({ BUCKET_NAME: "named", BUCKET_URI: "s3://from-uri" });

    expect(config.storage.bucket).toBe("named");
  });

  it("rejects a repeat threshold below two", () => {
    expect(() => loadConfig({ REPEAT_MIN_BUILDS: "1" })).toThrow();
  });

  it("requires a bucket for S3 storage", () => {
    expect(() => loadConfig({}, { storage: { type: "s3" } })).toThrow("Missing BUCKET_NAME/BUCKET_URI for S3 storage.");
  });

  it("fills unset sections from schema defaults", () => {
    const config = loadConfig({}, {});

    expect(config.metrics.periodDays).toBe(7);
    expect(config.metrics.footprints).toEqual({});
    expect(config.logging.format).toBe("json");
  });

  it("rejects a footprint table that maps a footprint again", () => {
    expect(() => loadConfig({}, { metrics: { footprints: { vhd: "hyperv", hyperv: "azure" } } })).toThrow(
      InvalidMappingError
    );
  });
});
