import { describe, it, expect } from "vitest";
import { findBarIssues, validateBars } from "../barValidator.js";
import { InvalidBarsError } from "../../utils/errors.js";
import { waveBars } from "../../__tests__/helpers/bars.js";

describe("bar validator", () => {
  it("accepts a well-formed sequence", () => {
    expect(findBarIssues(waveBars(30), 30)).toEqual([]);
    expect(() => validateBars(waveBars(30), 30)).not.toThrow();
  });

  it("reports a short sequence", () => {
    expect(findBarIssues(waveBars(10), 20)).toEqual(["expected at least 20 bars, got 10"]);
  });

  it("reports timestamps that do not increase", () => {
    const bars = waveBars(5);
    const reordered = [bars[0], bars[2], bars[1], bars[3], bars[4]];
    expect(findBarIssues(reordered, 5)).toEqual([
      `row 2: timestamp ${bars[1].timestamp} does not follow ${bars[2].timestamp}`,
    ]);
  });

  it("reports inconsistent prices and volume", () => {
    const [first, second] = waveBars(2);
    const issues = findBarIssues(
      [
        { ...first, high: first.low - 1 },
        { ...second, volume: -5 },
      ],
      2
    );
    expect(issues).toEqual([
      "row 0: high/low do not bound open and close",
      "row 1: volume must be a non-negative integer",
    ]);
  });

  it("reports non-positive prices", () => {
    const [bar] = waveBars(1);
    expect(findBarIssues([{ ...bar, low: 0 }], 1)).toEqual(["row 0: prices must be positive"]);
  });

  it("keeps checking a row after a bad price", () => {
    const [first, second] = waveBars(2);
    const issues = findBarIssues(
      [
        { ...first, low: 0, volume: -5 },
        { ...second, open: NaN, timestamp: first.timestamp },
      ],
      2
    );
    expect(issues).toEqual([
      "row 0: prices must be positive",
      "row 0: volume must be a non-negative integer",
      "row 1: prices must be positive",
      `row 1: timestamp ${first.timestamp} does not follow ${first.timestamp}`,
    ]);
  });

  it("throws with every issue attached", () => {
    let caught: unknown;
    try {
      validateBars(waveBars(3), 10);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidBarsError);
    if (caught instanceof InvalidBarsError) {
      expect(caught.issues).toEqual(["expected at least 10 bars, got 3"]);
    }
  });
});
