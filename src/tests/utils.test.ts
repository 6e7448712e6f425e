import { describe, it, expect } from "vitest";
import { minutesSince, sha256 } from "../utils.js";

describe("sha256", () => {
  it("hashes known content to its hex digest", () => {
    expect(sha256("hello")).toBe("2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824");
  });

  it("is deterministic across calls", () => {
    expect(sha256("pricing: $99/mo")).toBe(sha256("pricing: $99/mo"));
  });

  it("differs for different content", () => {
    expect(sha256("v1")).not.toBe(sha256("v2"));
  });

  it("returns a 64-character lowercase hex string", () => {
    expect(sha256("")).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe("minutesSince", () => {
  it("measures elapsed minutes between two dates", () => {
    const then = new Date("2026-01-01T00:00:00Z");
    const now = new Date("2026-01-01T01:30:00Z");
    expect(minutesSince(then, now)).toBe(90);
  });
});
