import { describe, it, expect } from "vitest";
import { isDatabaseAuthError } from "../database";

describe("isDatabaseAuthError", () => {
  it("detects rejected credentials", () => {
    expect(isDatabaseAuthError(new Error('password authentication failed for user "vacation"'))).toBe(true);
    expect(isDatabaseAuthError(new Error("no pg_hba.conf entry for host"))).toBe(true);
    expect(isDatabaseAuthError("FATAL: password authentication failed")).toBe(true);
  });

  it("ignores query errors", () => {
    expect(isDatabaseAuthError(new Error('relation "vacation_prod.vacation_spots" does not exist'))).toBe(false);
    expect(isDatabaseAuthError(42)).toBe(false);
  });
});
