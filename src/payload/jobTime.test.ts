import { describe, expect, it } from "vitest";
import { TimestampFormatError } from "../core/errors";
import { formatJobTime, isWireJobTime, parseJobTime, retypeJobTime } from "./jobTime";

describe("job time", () => {
  it("re-serializes the wire format", () => {
    expect(retypeJobTime("06/17/18 04:15:08")).toBe("2018-06-17 04:15:08");
    expect(retypeJobTime("12/31/99 23:59:59")).toBe("1999-12-31 23:59:59");
    expect(retypeJobTime("01/02/68 00:00:00")).toBe("2068-01-02 00:00:00");
    expect(retypeJobTime("01/02/69 00:00:00")).toBe("1969-01-02 00:00:00");
  });

  it("keeps the wall-clock fields in UTC", () => {
    expect(parseJobTime("06/17/18 04:15:08").toISOString()).toBe("2018-06-17T04:15:08.000Z");
    expect(formatJobTime(new Date(Date.UTC(2020, 1, 29, 7, 5, 3)))).toBe("2020-02-29 07:05:03");
  });

  it("leaves blank cells blank", () => {
    expect(retypeJobTime("")).toBe("");
    expect(retypeJobTime("   ")).toBe("");
  });

  it("rejects values that do not match the format", () => {
    expect(() => retypeJobTime("2018-06-17 04:15:08")).toThrow(TimestampFormatError);
    expect(() => retypeJobTime("6/17/18 04:15:08")).toThrow(TimestampFormatError);
    expect(() => retypeJobTime("06/17/18 04:15")).toThrow(
      'Value "06/17/18 04:15" does not match timestamp format MM/DD/YY HH:mm:ss',
    );
  });

  it("rejects impossible dates", () => {
    expect(() => parseJobTime("02/30/18 00:00:00")).toThrow(TimestampFormatError);
    expect(() => parseJobTime("13/01/18 00:00:00")).toThrow(TimestampFormatError);
    expect(() => parseJobTime("01/01/18 24:00:00")).toThrow(TimestampFormatError);
  });

  it("recognizes wire timestamps without throwing", () => {
    expect(isWireJobTime("06/17/18 04:15:08")).toBe(true);
    expect(isWireJobTime("(datetime)")).toBe(false);
    expect(isWireJobTime("02/30/18 00:00:00")).toBe(false);
    expect(isWireJobTime("")).toBe(false);
  });
});
