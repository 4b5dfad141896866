import { describe, expect, it } from "vitest";
import { Algorithm, ErrorCode } from "@phi-shield/shared";
import { FieldPolicy } from "./field-policy.js";

const policy = FieldPolicy.fromTable({
  patient: {
    email: { algorithm: "deterministic" },
    notes: { algorithm: "random" },
  },
});

describe("FieldPolicy", () => {
  it("returns the configured algorithm", () => {
    expect(policy.algorithmFor("patient", "email")).toBe(Algorithm.DETERMINISTIC);
    expect(policy.algorithmFor("patient", "notes")).toBe(Algorithm.RANDOM);
  });

  it("resolves unknown fields and kinds to none", () => {
    expect(policy.algorithmFor("patient", "createdAt")).toBe(Algorithm.NONE);
    expect(policy.algorithmFor("invoice", "email")).toBe(Algorithm.NONE);
  });

  it("lists governed fields", () => {
    expect(policy.governedFields("patient")).toEqual([
      ["email", Algorithm.DETERMINISTIC],
      ["notes", Algorithm.RANDOM],
    ]);
    expect(policy.governedFields("invoice")).toEqual([]);
  });

  it("is frozen", () => {
    expect(Object.isFrozen(policy)).toBe(true);
  });

  it("rejects a range algorithm", () => {
    expect(() => FieldPolicy.fromTable({ patient: { birthDate: { algorithm: "range" } } })).toThrow(
      expect.objectContaining({ code: ErrorCode.CONFIG_INVALID }),
    );
  });

  it("rejects unknown entry keys", () => {
    try {
      FieldPolicy.fromTable({ patient: { ssn: { algorithm: "random", keyAltName: "x" } } });
      expect.unreachable();
    } catch (e) {
      expect(e).toMatchObject({ code: ErrorCode.CONFIG_INVALID, message: "Invalid field policy table" });
    }
  });
});
