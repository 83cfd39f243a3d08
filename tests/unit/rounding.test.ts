import { parsePredictedValue, roundHalfUpTwoDecimals } from "../../src/core/predictions/rounding";

describe("roundHalfUpTwoDecimals", () => {
  it.each([
    [12.345, 12.35],
    [12.344, 12.34],
    [-12.345, -12.35],
    [1.005, 1.01],
    [2.5, 2.5],
    [7, 7]
  ])("rounds %p to %p", (input, expected) => {
    expect(roundHalfUpTwoDecimals(input)).toBe(expected);
  });

  it("does not produce negative zero", () => {
    expect(Object.is(roundHalfUpTwoDecimals(-0.001), 0)).toBe(true);
  });

  it("handles values printed in exponent form", () => {
    expect(roundHalfUpTwoDecimals(1e-7)).toBe(0);
  });

  it.each([1e15, 1e19, 1e20, -2e20, 5e20])("returns %p unchanged since it has no fraction left", (value) => {
    expect(roundHalfUpTwoDecimals(value)).toBe(value);
  });

  it("still rounds just below the whole-number range", () => {
    expect(roundHalfUpTwoDecimals(123456789012.345)).toBe(123456789012.35);
  });
});

describe("parsePredictedValue", () => {
  it("parses and rounds trimmed numbers", () => {
    expect(parsePredictedValue(" 3.14159 ")).toBe(3.14);
  });

  it("keeps very large predictions finite", () => {
    expect(parsePredictedValue("500000000000000000000")).toBe(5e20);
    expect(parsePredictedValue("-2e20")).toBe(-2e20);
  });

  it.each(["", "   ", "abc", "Infinity"])("rejects %p", (raw) => {
    expect(parsePredictedValue(raw)).toBeUndefined();
  });
});
