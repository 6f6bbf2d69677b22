import { afterEach, describe, expect, it } from "vitest";
import { getBaseConfig, loadBaseConfig, resetBaseConfig } from "./config.js";
import { ConfigError } from "./errors.js";

afterEach(() => {
  resetBaseConfig();
});

describe("loadBaseConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadBaseConfig({});

    expect(config.supabase).toBeUndefined();
    expect(config.scoring.referenceYear).toBeUndefined();
    expect(config.env.logLevel).toBe("info");
    expect(config.env.nodeEnv).toBe("development");
  });

  it("builds the supabase block only when both url and key are set", () => {
    expect(loadBaseConfig({ SUPABASE_URL: "http://localhost:54321" }).supabase).toBeUndefined();

    const config = loadBaseConfig({
      SUPABASE_URL: "http://localhost:54321",
      SUPABASE_KEY: "test-key",
    });
    expect(config.supabase).toEqual({ url: "http://localhost:54321", key: "test-key" });
  });

  it("coerces the scoring reference year", () => {
    const config = loadBaseConfig({ SCORING_REFERENCE_YEAR: "2025" });
    expect(config.scoring.referenceYear).toBe(2025);
  });

  it("names every invalid variable", () => {
    const load = () => loadBaseConfig({ LOG_LEVEL: "loud", SCORING_REFERENCE_YEAR: "soon" });

    expect(load).toThrow(ConfigError);
    expect(load).toThrow(/ {2}- LOG_LEVEL:/);
    expect(load).toThrow(/ {2}- SCORING_REFERENCE_YEAR:/);
  });
});

describe("getBaseConfig", () => {
  it("returns the same instance until reset", () => {
    const first = getBaseConfig();
    expect(getBaseConfig()).toBe(first);

    resetBaseConfig();
    expect(getBaseConfig()).not.toBe(first);
  });
});
