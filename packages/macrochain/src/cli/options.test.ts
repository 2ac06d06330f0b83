import { describe, it, expect } from "vitest";

import { Result } from "#result";

import { parseFormat, parseMaxExponent, parseRangeTier } from "./options";

describe("CLI option values", () => {
  it("parses range tiers", () => {
    expect(parseRangeTier("512")).toMatchObject({ success: true, value: 512 });
    expect(parseRangeTier("300").success).toBe(false);
    expect(Result.errors(parseRangeTier("wide"))[0]?.message).toBe(
      'Invalid configuration value: range must be a number, got "wide"',
    );
  });

  it("parses exponent bounds", () => {
    expect(parseMaxExponent("20")).toMatchObject({ success: true, value: 20 });
    expect(parseMaxExponent("-1").success).toBe(false);
    expect(parseMaxExponent("5000").success).toBe(false);
  });

  it("parses output formats", () => {
    expect(parseFormat("json")).toMatchObject({ success: true, value: "json" });
    expect(parseFormat("xml").success).toBe(false);
  });
});
