import { describe, expect, it } from "vitest";
import { INVALID_INPUT_RESPONSE, MAX_DECIMAL_DIGITS, convert } from "./converter";

describe("convert", () => {
  it("encodes plain decimal input", () => {
    expect(convert("12345")).toBe("C1S");
    expect(convert("0")).toBe("00");
    expect(convert("7")).toBe("07");
  });

  it("trims surrounding whitespace", () => {
    expect(convert("  42  ")).toBe("1A");
  });

  it("decodes anything that is not all digits", () => {
    expect(convert("C1S")).toBe("12345");
    expect(convert("c1s")).toBe("12345");
    expect(convert("uu")).toBe("891");
    expect(convert("UU")).toBe("891");
  });

  it("forces decoding when the input ends in b32", () => {
    expect(convert("10b32")).toBe("32");
    expect(convert("10B32")).toBe("32");
    expect(convert("123b32")).toBe("1091");
  });

  it("treats empty payloads as zero", () => {
    expect(convert("b32")).toBe("0");
    expect(convert("   ")).toBe("0");
  });

  it("reports symbols outside the alphabet", () => {
    expect(convert("HELLO")).toBe(INVALID_INPUT_RESPONSE);
    expect(convert("-5")).toBe(INVALID_INPUT_RESPONSE);
    expect(convert("1.5")).toBe(INVALID_INPUT_RESPONSE);
  });

  it("encodes decimal digits from any script", () => {
    expect(convert("١٢")).toBe("0C");
    expect(convert("１２")).toBe("0C");
    expect(convert("1٢")).toBe("0C");
    expect(convert("𝟗𝟗")).toBe("33");
  });

  it("rejects digit-like characters that are not decimal digits", () => {
    expect(convert("²")).toBe(INVALID_INPUT_RESPONSE);
  });

  it("limits decimal strings in both directions", () => {
    expect(convert("1".repeat(MAX_DECIMAL_DIGITS + 1))).toBe(INVALID_INPUT_RESPONSE);
    expect(convert("Y".repeat(2900))).toBe(INVALID_INPUT_RESPONSE);
    expect(convert("1".repeat(MAX_DECIMAL_DIGITS))).not.toBe(INVALID_INPUT_RESPONSE);
  });
});
