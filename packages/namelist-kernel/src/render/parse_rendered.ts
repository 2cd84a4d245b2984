// Name-list Kernel - Rendered snippet reader (v0)
//
// Reads `a=a,b=b` back into ["a", "b"]. Used to check a pasted snippet against
// a fresh run and to state the partition law in tests.
//
// Names containing `,` cannot be read back; the rendered form has no escaping.

import { ENTRY_ASSIGN_V0, ENTRY_SEPARATOR_V0 } from "./entries";

/**
 * Parses a rendered name list. Throws on any segment that is not `x=x`.
 */
export function parseRenderedNameListV0(rendered: string): string[] {
  if (rendered === "") {
    return [];
  }

  return rendered.split(ENTRY_SEPARATOR_V0).map((segment, i) => {
    // A self-assignment has odd length with `=` exactly in the middle, which
    // also covers names that themselves contain `=`.
    const mid = (segment.length - 1) / 2;
    const left = segment.slice(0, mid);
    const right = segment.slice(mid + 1);
    if (!Number.isInteger(mid) || segment[mid] !== ENTRY_ASSIGN_V0 || left !== right) {
      throw new Error(`RENDERED_ENTRY_MALFORMED: [${i}] ${JSON.stringify(segment)}`);
    }
    return left;
  });
}
