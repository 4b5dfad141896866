import { describe, expect, it } from "vitest";
import type { CompositeValue } from "@phi-shield/shared";
import { canonicalize, decanonicalize, emptyComposite } from "./canonical.js";

const str = (value: string) => ({ kind: "string", value }) as const;

describe("canonicalize", () => {
  it("sorts map keys", () => {
    const value: CompositeValue = {
      kind: "map",
      entries: { b: { kind: "number", value: 1 }, a: str("x") },
    };
    expect(canonicalize(value)).toBe('{"a":"x","b":1}');
  });

  it("marks timestamps and ids", () => {
    const value: CompositeValue = {
      kind: "list",
      items: [
        { kind: "timestamp", value: new Date("2024-05-06T07:08:09.000Z") },
        { kind: "id", value: "u1" },
        { kind: "boolean", value: false },
      ],
    };
    expect(canonicalize(value)).toBe('[{"$date":"2024-05-06T07:08:09.000Z"},{"$oid":"u1"},false]');
  });

  it("escapes maps whose keys look like markers", () => {
    const value: CompositeValue = { kind: "map", entries: { $date: str("x") } };
    expect(canonicalize(value)).toBe('{"$map":{"$date":"x"}}');
  });

  it("rejects non-finite numbers", () => {
    expect(() =>
      canonicalize({ kind: "list", items: [{ kind: "number", value: Number.POSITIVE_INFINITY }] }),
    ).toThrow("Cannot canonicalize non-finite number Infinity");
  });
});

describe("decanonicalize", () => {
  it("parses the canonical encoding of a list", () => {
    expect(decanonicalize(str('[1,"a"]'), "list")).toEqual({
      ok: true,
      value: { kind: "list", items: [{ kind: "number", value: 1 }, str("a")] },
    });
  });

  it("restores marker-like keys", () => {
    const value: CompositeValue = { kind: "map", entries: { $date: str("x") } };
    expect(decanonicalize(str(canonicalize(value)), "map")).toEqual({ ok: true, value });
  });

  it("returns native composites of the right shape unchanged", () => {
    const value: CompositeValue = { kind: "list", items: [str("a")] };
    expect(decanonicalize(value, "list")).toEqual({ ok: true, value });
  });

  it("reports a shape mismatch", () => {
    expect(decanonicalize(str('{"a":1}'), "list")).toEqual({
      ok: false,
      error: "expected list, found map",
    });
    expect(decanonicalize({ kind: "number", value: 3 }, "map")).toEqual({
      ok: false,
      error: "expected map, found number",
    });
  });

  it("does not quote unparseable text", () => {
    expect(decanonicalize(str("5"), "list")).toEqual({
      ok: false,
      error: "expected list, found number",
    });
    expect(decanonicalize(str("not json at all"), "list")).toEqual({
      ok: false,
      error: "not a canonical list",
    });
  });
});

describe("emptyComposite", () => {
  it("builds an empty value of each shape", () => {
    expect(emptyComposite("list")).toEqual({ kind: "list", items: [] });
    expect(emptyComposite("map")).toEqual({ kind: "map", entries: {} });
  });
});
