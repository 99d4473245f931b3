export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ContractViolationError";
  }
}

export class InvalidFetchPolicyError extends ContractViolationError {
  constructor(message: string) {
    super(`Invalid fetch policy: ${message}`);
    this.name = "InvalidFetchPolicyError";
  }
}

export class MissingColumnError extends ContractViolationError {
  readonly column: string;

  constructor(column: string, available: string[]) {
    super(`Required column "${column}" not found (columns: ${available.join(", ") || "<none>"})`);
    this.name = "MissingColumnError";
    this.column = column;
  }
}

export class HeaderShapeError extends ContractViolationError {
  constructor(message: string) {
    super(`Unexpected job header shape: ${message}`);
    this.name = "HeaderShapeError";
  }
}

export class LabelNormalizationError extends ContractViolationError {
  constructor(label: string, normalized: string) {
    super(`Column label "${label}" normalized to "${normalized}", which is not lowercase without spaces`);
    this.name = "LabelNormalizationError";
  }
}

export class TimestampFormatError extends ContractViolationError {
  readonly value: string;

  constructor(value: string, format: string) {
    super(`Value "${value}" does not match timestamp format ${format}`);
    this.name = "TimestampFormatError";
    this.value = value;
  }
}

export class MalformedPayloadError extends ContractViolationError {
  constructor(message: string) {
    super(`Malformed payload: ${message}`);
    this.name = "MalformedPayloadError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
