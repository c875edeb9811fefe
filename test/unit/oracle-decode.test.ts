import { describe, it, expect } from "vitest";
import { z } from "zod";
import { decodeStructured, decodeWith, ParseError } from "../../src/oracle/decode.js";

function parseErrorOf(fn: () => unknown): ParseError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error("expected a ParseError");
}

describe("decodeStructured", () => {
  it("parses clean JSON strictly", () => {
    expect(decodeStructured('  {"a": 1}  ', "object")).toEqual({ a: 1 });
    expect(decodeStructured("[1, 2]", "array")).toEqual([1, 2]);
  });

  it("extracts an object wrapped in prose and code fences", () => {
    const text = 'Sure! Here it is:\n```json\n{"action": "skip", "reason": "quiet"}\n```\nHope that helps.';
    expect(decodeStructured(text, "object")).toEqual({ action: "skip", reason: "quiet" });
  });

  it("extracts an array from the first [ to the last ]", () => {
    expect(decodeStructured("ids: [3, 5] done", "array")).toEqual([3, 5]);
  });

  it("does not accept an array when an object is wanted", () => {
    const err = parseErrorOf(() => decodeStructured("[1]", "object"));
    expect(err.kind).toBe("not_found");
  });

  it("reports missing structure as not_found", () => {
    const err = parseErrorOf(() => decodeStructured("no json here", "object"));
    expect(err.kind).toBe("not_found");
    expect(err.raw).toBe("no json here");
  });

  it("reports broken JSON as malformed", () => {
    const err = parseErrorOf(() => decodeStructured('{"a": 1,, }', "object"));
    expect(err.kind).toBe("malformed");
  });
});

describe("decodeWith", () => {
  const schema = z.object({ name: z.string() });

  it("returns validated data", () => {
    expect(decodeWith('{"name": "x", "extra": 1}', "object", schema)).toEqual({ name: "x" });
  });

  it("reports a shape mismatch as malformed", () => {
    const err = parseErrorOf(() => decodeWith('{"name": 3}', "object", schema));
    expect(err.kind).toBe("malformed");
    expect(err.message).toMatch(/^Unexpected object shape/);
  });
});
