import { describe, expect, it } from "vitest";
import { ExactNumber, canonicalDecimal, canonicalSerialize } from "../src/core/canonical.js";
import { deepFreeze } from "../src/core/freeze.js";

describe("canonicalSerialize", () => {
  it("sorts keys at every level and drops whitespace", () => {
    expect(canonicalSerialize({ b: 1, a: { d: [true, null, "x"], c: "y" } })).toBe(
      '{"a":{"c":"y","d":[true,null,"x"]},"b":1}',
    );
  });

  it("is independent of key insertion order", () => {
    const one = { engine: { version: "1.0.0", name: "e" }, timestamp: "t" };
    const two = { timestamp: "t", engine: { name: "e", version: "1.0.0" } };
    expect(canonicalSerialize(one)).toBe(canonicalSerialize(two));
  });

  it("orders integer-like keys by code unit, not numerically", () => {
    expect(canonicalSerialize({ b: 0, "9": 1, "10": 2 })).toBe('{"10":2,"9":1,"b":0}');
  });

  it("keeps array order", () => {
    expect(canonicalSerialize([3, 1, 2])).toBe("[3,1,2]");
  });

  it("skips undefined members and writes undefined array slots as null", () => {
    expect(canonicalSerialize({ a: undefined, b: [undefined] })).toBe('{"b":[null]}');
  });

  it("encodes values JSON has no form for", () => {
    expect(canonicalSerialize({ n: Number.NaN, i: Number.POSITIVE_INFINITY, big: 12n })).toBe(
      '{"big":"12n","i":"Infinity","n":"NaN"}',
    );
    expect(canonicalSerialize(new Date("2026-01-02T03:04:05.000Z"))).toBe('"2026-01-02T03:04:05.000Z"');
  });

  it("treats Map as an object and Set as an array", () => {
    expect(canonicalSerialize(new Map<string, number>([["z", 1], ["a", 2]]))).toBe('{"a":2,"z":1}');
    expect(canonicalSerialize(new Set(["x", "y"]))).toBe('["x","y"]');
  });

  it("escapes strings the way JSON does", () => {
    expect(canonicalSerialize({ 'k"': "line\nbreak" })).toBe('{"k\\"":"line\\nbreak"}');
  });
});

describe("deepFreeze", () => {
  it("freezes nested objects and arrays", () => {
    const value = deepFreeze({ outer: { inner: [1, 2] } });
    expect(Object.isFrozen(value)).toBe(true);
    expect(Object.isFrozen(value.outer)).toBe(true);
    expect(Object.isFrozen(value.outer.inner)).toBe(true);
  });

  it("leaves buffers writable", () => {
    const value = deepFreeze({ content: Buffer.from("abc") });
    expect(Object.isFrozen(value.content)).toBe(false);
  });
});

describe("canonicalDecimal", () => {
  it("writes one spelling per value", () => {
    expect(canonicalDecimal("1.50")).toBe("1.5");
    expect(canonicalDecimal("+2.5e3")).toBe("2500");
    expect(canonicalDecimal("000.0012")).toBe("0.0012");
    expect(canonicalDecimal("-1e-9")).toBe("-1e-9");
    expect(canonicalDecimal("7e30")).toBe("7e30");
    expect(canonicalDecimal("0e5")).toBe("0");
  });

  it("rejects text that is not a decimal literal", () => {
    expect(canonicalDecimal(".")).toBeNull();
    expect(canonicalDecimal("0x1f")).toBeNull();
    expect(canonicalDecimal("Infinity")).toBeNull();
  });

  it("is written as a bare number by canonicalSerialize", () => {
    expect(canonicalSerialize({ seed: new ExactNumber("12345678901234567890") })).toBe('{"seed":12345678901234567890}');
  });
});
