import { describe, it, expect } from "vitest";
import { isCalendarDate } from "../utils/dates";

describe("isCalendarDate", () => {
  it("follows month lengths and leap years", () => {
    expect(isCalendarDate(2019, 1, 31)).toBe(true);
    expect(isCalendarDate(2019, 4, 31)).toBe(false);
    expect(isCalendarDate(2019, 2, 29)).toBe(false);
    expect(isCalendarDate(2020, 2, 29)).toBe(true);
    expect(isCalendarDate(1900, 2, 29)).toBe(false);
  });

  it("rejects month and day zero or out of range", () => {
    expect(isCalendarDate(2019, 0, 1)).toBe(false);
    expect(isCalendarDate(2019, 13, 1)).toBe(false);
    expect(isCalendarDate(2019, 5, 0)).toBe(false);
  });
});
