/**
 * Input Validation: SQL injection prevention + row validation.
 *
 * Provides:
 *   1. validateIdentifier() / validateIataCode() / validateModelName(): strict
 *      regexes for values interpolated into warehouse or Postgres SQL
 *   2. parseRows(): partial validation of rows returned by a driver
 */

import { z } from "zod";

const SAFE_IDENTIFIER_RE = /^[a-zA-Z0-9_]+$/;
const QUALIFIED_NAME_RE = /^[a-zA-Z0-9_]+(\.[a-zA-Z0-9_]+)*$/;
const IATA_RE = /^[A-Z]{3}$/;
const MODEL_NAME_RE = /^[a-zA-Z0-9._-]+$/;
const MAX_IDENTIFIER_LENGTH = 255;

export class IdentifierValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IdentifierValidationError";
  }
}

function checkLength(trimmed: string, label: string): void {
  if (!trimmed) {
    throw new IdentifierValidationError(`${label} cannot be empty`);
  }
  if (trimmed.length > MAX_IDENTIFIER_LENGTH) {
    throw new IdentifierValidationError(
      `${label} exceeds maximum length (${MAX_IDENTIFIER_LENGTH})`
    );
  }
}

/**
 * Validate a single SQL identifier (schema or table name).
 * Rejects anything with special characters that could enable SQL injection.
 */
export function validateIdentifier(value: string, label: string): string {
  const trimmed = value.trim();
  checkLength(trimmed, label);
  if (!SAFE_IDENTIFIER_RE.test(trimmed)) {
    throw new IdentifierValidationError(
      `${label} contains invalid characters: ${trimmed}`
    );
  }
  return trimmed;
}

/**
 * Validate a dotted name such as catalog.schema.table.
 */
export function validateQualifiedName(value: string, label: string): string {
  const trimmed = value.trim();
  checkLength(trimmed, label);
  if (!QUALIFIED_NAME_RE.test(trimmed)) {
    throw new IdentifierValidationError(
      `${label} is not a valid qualified name: ${trimmed}`
    );
  }
  return trimmed;
}

/**
 * Validate and upper-case a three-letter IATA airport code.
 */
export function validateIataCode(value: string, label: string): string {
  const code = value.trim().toUpperCase();
  if (!IATA_RE.test(code)) {
    throw new IdentifierValidationError(
      `${label} is not a three-letter IATA code: ${value}`
    );
  }
  return code;
}

/**
 * Validate a serving endpoint / model name passed to ai_query().
 */
export function validateModelName(value: string): string {
  const trimmed = value.trim();
  checkLength(trimmed, "Model name");
  if (!MODEL_NAME_RE.test(trimmed)) {
    throw new IdentifierValidationError(`Model name contains invalid characters: ${trimmed}`);
  }
  return trimmed;
}

/* ── Row validation ── */

/** Numeric column as returned by the drivers (number, bigint or decimal string) */
export const NumericColumn = z
  .union([z.number(), z.bigint(), z.string()])
  .transform((v) => Number(v))
  .refine((v) => Number.isFinite(v), { message: "expected a finite number" });

export const NullableNumericColumn = NumericColumn.nullable();

/**
 * Validate an array of driver rows against a Zod schema.
 * Gracefully skips invalid rows and logs warnings.
 */
export function parseRows<T>(
  items: unknown[],
  schema: z.ZodType<T>,
  context: string
): T[] {
  const valid: T[] = [];
  for (let i = 0; i < items.length; i++) {
    const result = schema.safeParse(items[i]);
    if (result.success) {
      valid.push(result.data);
    } else {
      console.warn(
        `[validation] ${context}: row ${i} invalid:`,
        result.error.issues.map((iss) => iss.message).join(", ")
      );
    }
  }
  return valid;
}
