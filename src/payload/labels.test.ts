import { describe, expect, it } from "vitest";
import { LabelNormalizationError } from "../core/errors";
import { normalizeLabel, stripUnitParentheses } from "./labels";

describe("normalizeLabel", () => {
  it("lowercases and underscores spaces", () => {
    expect(normalizeLabel("JOB TIME")).toBe("job_time");
    expect(normalizeLabel("Slurry Rate")).toBe("slurry_rate");
    expect(normalizeLabel("PROPPANT  CONC")).toBe("proppant__conc");
  });

  it("rejects labels that still hold whitespace", () => {
    expect(() => normalizeLabel("JOB\tTIME")).toThrow(LabelNormalizationError);
    expect(() => normalizeLabel("SLURRY\nRATE")).toThrow(
      'Column label "SLURRY\nRATE" normalized to "slurry\nrate", which is not lowercase without spaces',
    );
  });

  it("is idempotent", () => {
    for (const label of ["JOB TIME", "Stage Time0", "already_normal"]) {
      const once = normalizeLabel(label);
      expect(normalizeLabel(once)).toBe(once);
    }
  });
});

describe("stripUnitParentheses", () => {
  it("removes one enclosing pair", () => {
    expect(stripUnitParentheses("(lbs/gal)")).toBe("lbs/gal");
    expect(stripUnitParentheses("(bpm)")).toBe("bpm");
    expect(stripUnitParentheses("((psi))")).toBe("(psi)");
  });

  it("leaves bare and empty units alone", () => {
    expect(stripUnitParentheses("bpm")).toBe("bpm");
    expect(stripUnitParentheses("")).toBe("");
  });
});
