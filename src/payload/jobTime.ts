import { TimestampFormatError } from "../core/errors";

export const JOB_TIME_LABEL = "job_time";
export const JOB_TIME_WIRE_FORMAT = "MM/DD/YY HH:mm:ss";

const WIRE_PATTERN = /^(\d{2})\/(\d{2})\/(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function expandYear(twoDigit: number): number {
  return twoDigit >= 69 ? 1900 + twoDigit : 2000 + twoDigit;
}

export function parseJobTime(value: string): Date {
  const match = WIRE_PATTERN.exec(value);
  if (!match) {
    throw new TimestampFormatError(value, JOB_TIME_WIRE_FORMAT);
  }
  const [month, day, year, hour, minute, second] = match.slice(1).map((part) => Number.parseInt(part, 10));
  const fullYear = expandYear(year);
  const date = new Date(Date.UTC(fullYear, month - 1, day, hour, minute, second));
  const roundTrips =
    date.getUTCFullYear() === fullYear &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day &&
    date.getUTCHours() === hour &&
    date.getUTCMinutes() === minute &&
    date.getUTCSeconds() === second;
  if (!roundTrips) {
    throw new TimestampFormatError(value, JOB_TIME_WIRE_FORMAT);
  }
  return date;
}

export function isWireJobTime(value: string): boolean {
  try {
    parseJobTime(value);
    return true;
  } catch (error) {
    if (error instanceof TimestampFormatError) {
      return false;
    }
    throw error;
  }
}

export function formatJobTime(date: Date): string {
  return (
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

export function retypeJobTime(value: string): string {
  if (value.trim() === "") {
    return "";
  }
  return formatJobTime(parseJobTime(value));
}
