// src/errors.ts
import type { DatasetIssue } from "./types/iscc";

export class IsccNbsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Reference data is malformed or inconsistent; the load that raised it yields nothing. */
export class DatasetIntegrityError extends IsccNbsError {
  readonly issues: readonly DatasetIssue[];

  constructor(message: string, options?: { cause?: unknown; issues?: DatasetIssue[] }) {
    super(message, options);
    this.issues = options?.issues ?? [];
  }
}

export type CoordinateField = "hue" | "value" | "chroma";

export class InvalidCoordinateError extends IsccNbsError {
  readonly field: CoordinateField;

  constructor(field: CoordinateField, message: string) {
    super(message);
    this.field = field;
  }
}

export class NotFoundError extends IsccNbsError {
  readonly colorId: number;
  readonly level: number;

  constructor(colorId: number, level: number) {
    super(`No color name with id ${colorId} at level ${level}`);
    this.colorId = colorId;
    this.level = level;
  }
}
