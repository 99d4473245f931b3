import { LabelNormalizationError } from "../core/errors";

export function normalizeLabel(label: string): string {
  const normalized = label.toLowerCase().replace(/ /g, "_");
  if (!/^[^\sA-Z]*$/u.test(normalized)) {
    throw new LabelNormalizationError(label, normalized);
  }
  return normalized;
}

export function stripUnitParentheses(unit: string): string {
  return unit.replace(/^\(/, "").replace(/\)$/, "");
}
