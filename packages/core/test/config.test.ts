import { describe, expect, it } from "vitest";
import {
  ConfigError,
  configFromEnv,
  DEFAULT_SETTINGS,
  resolveSettings,
  validateSettings,
} from "~/app/config.ts";

function issuesOf(run: () => unknown): ConfigError["issues"] {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigError) return error.issues;
    throw error;
  }
  throw new Error("expected a ConfigError");
}

describe("resolveSettings", () => {
  it("should fill in defaults", () => {
    expect(resolveSettings({})).toEqual(DEFAULT_SETTINGS);
  });

  it("should keep provided values", () => {
    const settings = resolveSettings({
      debug: true,
      fallback: "json",
      lookup: "global",
    });
    expect(settings.debug).toBe(true);
    expect(settings.fallback).toBe("json");
    expect(settings.lookup).toBe("global");
    expect(settings.prefix).toBe("/");
    expect(settings.noisyExceptions).toBe(false);
  });
});

describe("validateSettings", () => {
  it("should reject unknown formats", () => {
    const issues = issuesOf(() => validateSettings({ fallback: "xml" }));
    expect(issues.map((issue) => issue.field)).toContain("fallback");
  });

  it("should reject prefixes without a leading slash", () => {
    const issues = issuesOf(() => validateSettings({ prefix: "api" }));
    expect(issues.map((issue) => issue.field)).toContain("prefix");
  });

  it("should reject unknown log levels", () => {
    const issues = issuesOf(() => validateSettings({ logLevel: "loud" }));
    expect(issues.map((issue) => issue.field)).toContain("logLevel");
  });

  it("should report non-objects at the root", () => {
    const issues = issuesOf(() => validateSettings("nope"));
    expect(issues[0].field).toBe("(root)");
  });

  it("should summarize issues in the message", () => {
    expect(() => validateSettings({ debug: "yes" })).toThrow(
      /^Invalid configuration: debug: /,
    );
  });
});

describe("configFromEnv", () => {
  it("should read FAULTLINE_ variables", () => {
    expect(
      configFromEnv({
        FAULTLINE_DEBUG: "1",
        FAULTLINE_FALLBACK_ERROR_FORMAT: "json",
        FAULTLINE_NOISY_EXCEPTIONS: "no",
        FAULTLINE_LOG_LEVEL: "warn",
        FAULTLINE_LOG_JSON: "TRUE",
        FAULTLINE_PREFIX: "/api",
      }),
    ).toEqual({
      debug: true,
      fallback: "json",
      noisyExceptions: false,
      logLevel: "warn",
      logJson: true,
      prefix: "/api",
    });
  });

  it("should skip unset and empty variables", () => {
    expect(configFromEnv({ FAULTLINE_DEBUG: "", OTHER: "1" })).toEqual({});
  });

  it("should reject unparseable booleans", () => {
    const issues = issuesOf(() => configFromEnv({ FAULTLINE_DEBUG: "maybe" }));
    expect(issues.map((issue) => issue.field)).toEqual(["debug"]);
  });
});
