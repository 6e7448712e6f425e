import { describe, it, expect } from "vitest";
import { parseConfig, useColor } from "../config.js";

describe("parseConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(parseConfig({})).toEqual({
      DATABASE_PATH: "website_content.db",
      STALENESS_WINDOW_MINUTES: 60,
      FETCH_TIMEOUT_MS: 0,
      DIFF_COLOR: "auto",
    });
  });

  it("reads numeric settings from strings", () => {
    const config = parseConfig({ STALENESS_WINDOW_MINUTES: "15", FETCH_TIMEOUT_MS: "5000" });
    expect(config.STALENESS_WINDOW_MINUTES).toBe(15);
    expect(config.FETCH_TIMEOUT_MS).toBe(5000);
  });

  it("names the offending variable when invalid", () => {
    expect(() => parseConfig({ STALENESS_WINDOW_MINUTES: "soon" })).toThrow(
      "Invalid configuration: STALENESS_WINDOW_MINUTES: must be a non-negative integer",
    );
  });

  it("rejects an unknown color mode", () => {
    expect(() => parseConfig({ DIFF_COLOR: "sometimes" })).toThrow(/^Invalid configuration: DIFF_COLOR: /);
  });
});

describe("useColor", () => {
  it("follows the terminal in auto mode", () => {
    expect(useColor("auto", true)).toBe(true);
    expect(useColor("auto", false)).toBe(false);
  });

  it("honours explicit settings", () => {
    expect(useColor("always", false)).toBe(true);
    expect(useColor("never", true)).toBe(false);
  });
});
