import type { z } from "zod";

export type StructureKind = "object" | "array";

export type ParseErrorKind = "not_found" | "malformed";

export class ParseError extends Error {
  constructor(
    readonly kind: ParseErrorKind,
    message: string,
    readonly raw: string,
  ) {
    super(message);
    this.name = "ParseError";
  }
}

type ParseAttempt = { ok: true; value: unknown } | { ok: false; reason: string };

function tryParse(text: string): ParseAttempt {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
}

function hasKind(value: unknown, kind: StructureKind): boolean {
  if (kind === "array") return Array.isArray(value);
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const BRACKETS: Record<StructureKind, [string, string]> = {
  object: ["{", "}"],
  array: ["[", "]"],
};

/**
 * Extracts a JSON object or array from oracle output. The trimmed text is
 * parsed strictly first; failing that, the span between the first opening and
 * the last closing bracket of the wanted kind is parsed.
 */
export function decodeStructured(text: string, kind: StructureKind): unknown {
  const trimmed = text.trim();
  const strict = tryParse(trimmed);
  if (strict.ok && hasKind(strict.value, kind)) return strict.value;

  const [open, close] = BRACKETS[kind];
  const start = trimmed.indexOf(open);
  const end = trimmed.lastIndexOf(close);
  if (start === -1 || end <= start) {
    throw new ParseError("not_found", `No JSON ${kind} found in oracle output`, text);
  }

  const lenient = tryParse(trimmed.slice(start, end + 1));
  if (!lenient.ok) {
    throw new ParseError("malformed", `Malformed JSON ${kind}: ${lenient.reason}`, text);
  }
  if (!hasKind(lenient.value, kind)) {
    throw new ParseError("malformed", `Expected a JSON ${kind}`, text);
  }
  return lenient.value;
}

/** Decodes and validates against `schema`; a shape mismatch is reported as malformed. */
export function decodeWith<S extends z.ZodTypeAny>(
  text: string,
  kind: StructureKind,
  schema: S,
): z.output<S> {
  const value = decodeStructured(text, kind);
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ParseError("malformed", `Unexpected ${kind} shape: ${result.error.message}`, text);
  }
  return result.data;
}
