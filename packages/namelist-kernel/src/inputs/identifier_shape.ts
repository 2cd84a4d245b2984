// Name-list Kernel - Input shape guards (v0)
//
// The registry is trusted for content (no validation of what a name looks like,
// no deduplication) but not for shape: every entry must be a plain string.
// A nested or multi-field entry would end up pasted into generated source, so
// the whole run fails instead of skipping it.

/**
 * Throws unless `input` is an array whose every element is a string.
 *
 * @param input - Candidate identifier list (typically straight from a registry snapshot).
 * @param context - Human-friendly location string to aid debugging.
 * @returns The same elements, typed as a string array.
 */
export function assertIdentifierListV0(input: unknown, context: string): string[] {
  if (!Array.isArray(input)) {
    throw new Error(`IDENTIFIER_SHAPE_INVALID: expected array, got ${describeShape(input)} @ ${context}`);
  }

  const out: string[] = [];
  input.forEach((entry: unknown, i: number) => {
    if (typeof entry !== "string") {
      throw new Error(`IDENTIFIER_SHAPE_INVALID: [${i}] is ${describeShape(entry)} @ ${context}`);
    }
    out.push(entry);
  });
  return out;
}

/**
 * Throws unless `prefixes` is an array of strings.
 *
 * Empty arrays and empty strings are accepted here: the kernel's edge-case
 * semantics cover them. Non-emptiness is enforced at config admission.
 */
export function assertPrefixListV0(prefixes: unknown, context: string): ReadonlyArray<string> {
  if (!Array.isArray(prefixes)) {
    throw new Error(`FILTER_PREFIXES_INVALID: expected array, got ${describeShape(prefixes)} @ ${context}`);
  }
  const out: string[] = [];
  for (const p of prefixes) {
    if (typeof p !== "string") {
      throw new Error(`FILTER_PREFIXES_INVALID: entry is ${describeShape(p)} @ ${context}`);
    }
    out.push(p);
  }
  return out;
}

function describeShape(v: unknown): string {
  if (v === null) return "null";
  if (Array.isArray(v)) return "array";
  return typeof v;
}
