import { describe, it, expect } from "@jest/globals";
import {
  formatIsoDate,
  formatIsoDateTime,
  strftime,
} from "../../fields/strftime";

// Sunday, 2015-03-08 14:05:09.042 UTC, day 67 of the year
const at = new Date(Date.UTC(2015, 2, 8, 14, 5, 9, 42));

describe("strftime", () => {
  it.each([
    ["%Y-%m-%d", "2015-03-08"],
    ["%d/%m/%y", "08/03/15"],
    ["%H:%M:%S.%L", "14:05:09.042"],
    ["%S.%f", "09.042000"],
    ["%I %p", "02 PM"],
    ["%j", "067"],
    ["%a %A", "Sun Sunday"],
    ["%b %B", "Mar March"],
    ["[%e]", "[ 8]"],
    ["%z %Z", "+0000 UTC"],
    ["100%%", "100%"],
    ["plain text", "plain text"],
  ])("formats %s", (pattern, expected) => {
    expect(strftime(at, pattern)).toEqual({ ok: true, value: expected });
  });

  it("renders midnight as 12 AM", () => {
    const midnight = new Date(Date.UTC(2015, 0, 1));
    expect(strftime(midnight, "%I%p")).toEqual({ ok: true, value: "12AM" });
  });

  it("rejects unknown and dangling directives", () => {
    expect(strftime(at, "%Y-%k")).toEqual({
      ok: false,
      reason: 'unsupported format directive "%k" in "%Y-%k"',
    });
    expect(strftime(at, "%Y%")).toEqual({
      ok: false,
      reason: 'unsupported format directive "%" in "%Y%"',
    });
  });
});

describe("ISO-8601 formatting", () => {
  it("formats dates and date-times in UTC", () => {
    expect(formatIsoDate(at)).toBe("2015-03-08");
    expect(formatIsoDateTime(at)).toBe("2015-03-08T14:05:09.042Z");
    expect(formatIsoDateTime(new Date(Date.UTC(2015, 0, 1, 10, 30)))).toBe(
      "2015-01-01T10:30:00Z",
    );
  });

  it("pads years below 1000", () => {
    const early = new Date(Date.UTC(2000, 0, 1));
    early.setUTCFullYear(812);
    expect(formatIsoDate(early)).toBe("0812-01-01");
  });
});
