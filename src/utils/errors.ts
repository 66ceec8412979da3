// src/utils/errors.ts
import type { CanonicalField } from "../types/trade";

/** Fatal for a whole file: unsupported format or unresolved columns. */
export class ParseError extends Error {
  readonly missing: CanonicalField[];
  readonly found: string[];

  constructor(message: string, details: { missing?: CanonicalField[]; found?: string[] } = {}) {
    super(message);
    this.name = "ParseError";
    this.missing = details.missing ?? [];
    this.found = details.found ?? [];
  }
}

/** Thrown while coercing a single row; the parser drops the row and moves on. */
export class RowCoercionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RowCoercionError";
  }
}

export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
  }
}
