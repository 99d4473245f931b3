const ISO_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:?\d{2})?$/i;

export function parseUtcTimestamp(value: string | null | undefined): Date | null {
  if (value === null || value === undefined) {
    return null;
  }
  const match = ISO_TIMESTAMP.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, datePart, timePart, zone] = match;
  const parsed = new Date(`${datePart}T${timePart}${zone ?? "Z"}`);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export function toIsoOrNull(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

export function sameInstant(left: Date | null, right: Date | null): boolean {
  if (left === null || right === null) {
    return false;
  }
  return left.getTime() === right.getTime();
}
