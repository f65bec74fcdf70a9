import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  validateIdentifier,
  validateQualifiedName,
  validateIataCode,
  validateModelName,
  parseRows,
  NumericColumn,
  NullableNumericColumn,
  IdentifierValidationError,
} from "../validation";

describe("validateIdentifier", () => {
  it("accepts schema names", () => {
    expect(validateIdentifier("vacation_prod", "schema")).toBe("vacation_prod");
    expect(validateIdentifier("Sources01", "schema")).toBe("Sources01");
  });

  it("trims whitespace", () => {
    expect(validateIdentifier("  vacation_dev  ", "schema")).toBe("vacation_dev");
  });

  it("rejects empty strings", () => {
    expect(() => validateIdentifier("", "schema")).toThrow(IdentifierValidationError);
    expect(() => validateIdentifier("   ", "schema")).toThrow(IdentifierValidationError);
  });

  it("rejects SQL injection attempts", () => {
    expect(() => validateIdentifier("x; DROP TABLE users", "schema")).toThrow();
    expect(() => validateIdentifier("x'--", "schema")).toThrow();
    expect(() => validateIdentifier("x' OR '1'='1", "schema")).toThrow();
  });

  it("rejects dots, hyphens and spaces", () => {
    expect(() => validateIdentifier("a.b", "schema")).toThrow();
    expect(() => validateIdentifier("my-schema", "schema")).toThrow();
    expect(() => validateIdentifier("my schema", "schema")).toThrow();
  });

  it("rejects strings exceeding max length", () => {
    expect(() => validateIdentifier("a".repeat(256), "schema")).toThrow("exceeds maximum length");
  });
});

describe("validateQualifiedName", () => {
  it("accepts dotted names", () => {
    expect(validateQualifiedName("cat.schema.table", "table")).toBe("cat.schema.table");
  });

  it("rejects empty segments and quotes", () => {
    expect(() => validateQualifiedName("cat..table", "table")).toThrow(IdentifierValidationError);
    expect(() => validateQualifiedName("cat.schema.`t`", "table")).toThrow(IdentifierValidationError);
  });
});

describe("validateIataCode", () => {
  it("upper-cases valid codes", () => {
    expect(validateIataCode(" lax ", "origin")).toBe("LAX");
  });

  it("rejects anything but three letters", () => {
    expect(() => validateIataCode("LA", "origin")).toThrow("origin is not a three-letter IATA code: LA");
    expect(() => validateIataCode("L4X", "origin")).toThrow(IdentifierValidationError);
    expect(() => validateIataCode("LAX'", "origin")).toThrow(IdentifierValidationError);
  });
});

describe("validateModelName", () => {
  it("accepts serving endpoint names", () => {
    expect(validateModelName("databricks-meta-llama-3-3-70b-instruct")).toBe(
      "databricks-meta-llama-3-3-70b-instruct"
    );
    expect(validateModelName("my_model.v2")).toBe("my_model.v2");
  });

  it("rejects quotes", () => {
    expect(() => validateModelName("model', 'x")).toThrow(IdentifierValidationError);
  });
});

describe("NumericColumn", () => {
  it("coerces driver numerics", () => {
    expect(NumericColumn.parse(12)).toBe(12);
    expect(NumericColumn.parse("310.5")).toBe(310.5);
    expect(NumericColumn.parse(BigInt(7))).toBe(7);
  });

  it("rejects non-numeric strings", () => {
    expect(NumericColumn.safeParse("n/a").success).toBe(false);
  });

  it("allows null only in the nullable variant", () => {
    expect(NullableNumericColumn.parse(null)).toBeNull();
    expect(NumericColumn.safeParse(null).success).toBe(false);
  });
});

describe("parseRows", () => {
  const schema = z.object({ city: z.string(), count: NumericColumn });

  it("keeps valid rows and skips invalid ones", () => {
    const rows = parseRows(
      [{ city: "Austin", count: "3" }, { city: "Dallas" }, null, { city: "Miami", count: 1 }],
      schema,
      "test"
    );
    expect(rows).toEqual([
      { city: "Austin", count: 3 },
      { city: "Miami", count: 1 },
    ]);
  });

  it("returns an empty array for all-invalid rows", () => {
    expect(parseRows([42, "string", undefined], schema, "test")).toEqual([]);
  });
});
