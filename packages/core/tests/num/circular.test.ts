import { describe, it, expect } from "vitest";
import { circularIndex } from "../../src/num/circular.js";
import { InvalidArgumentError } from "../../src/errors.js";

describe("circularIndex", () => {
  it("should leave in-range indices alone", () => {
    expect(circularIndex(0, 5)).toBe(0);
    expect(circularIndex(3, 5)).toBe(3);
  });

  it("should wrap indices past the end", () => {
    expect(circularIndex(5, 5)).toBe(0);
    expect(circularIndex(7, 5)).toBe(2);
    expect(circularIndex(12, 5)).toBe(2);
  });

  it("should wrap negative indices to the high end", () => {
    expect(circularIndex(-1, 5)).toBe(4);
    expect(circularIndex(-6, 5)).toBe(4);
  });

  it("should never return negative zero", () => {
    expect(Object.is(circularIndex(-5, 5), 0)).toBe(true);
    expect(Object.is(circularIndex(-10, 5), 0)).toBe(true);
  });

  it("should reject sizes that are not positive integers", () => {
    expect(() => circularIndex(1, 0)).toThrow(InvalidArgumentError);
    expect(() => circularIndex(1, -3)).toThrow(InvalidArgumentError);
    expect(() => circularIndex(1, 2.5)).toThrow(InvalidArgumentError);
  });
});
