// Name-list Kernel - Filter modes (v0)
//
// Engineering rule:
// - Treat filter modes as an allowlist (not a free-form string).
// - There are exactly two modes. Adding a third changes the partition law
//   that ALLOW/DISALLOW runs rely on, so do not extend this list.

/**
 * Filter modes frozen in v0.
 */
export const FILTER_MODES_V0 = Object.freeze([
  // ALLOW: keep only names matching at least one prefix.
  "ALLOW",
  // DISALLOW: drop names matching any prefix, keep everything else.
  "DISALLOW"
] as const);

/**
 * Literal type representing the frozen filter modes.
 */
export type FilterModeV0 = (typeof FILTER_MODES_V0)[number];

/**
 * Checks whether a string is a valid filter mode according to the v0 allowlist.
 *
 * @param mode - Candidate mode string.
 * @returns True if the mode is ALLOW or DISALLOW; false otherwise.
 */
export function isValidFilterModeV0(mode: string): mode is FilterModeV0 {
  return FILTER_MODE_SET_V0.has(mode);
}

/**
 * Throws if a mode is not in the v0 allowlist.
 *
 * @param mode - Candidate mode value. Typed loosely because callers may hand us
 *   values straight from JSON or argv.
 * @param context - Human-friendly location string to aid debugging.
 */
export function assertValidFilterModeV0(mode: unknown, context: string): asserts mode is FilterModeV0 {
  // Unknown modes are configuration errors; never default silently.
  if (typeof mode !== "string" || !isValidFilterModeV0(mode)) {
    throw new Error(`FILTER_MODE_NOT_ALLOWED: ${String(mode)} @ ${context}`);
  }
}

// Internal Set derived from the frozen allowlist.
const FILTER_MODE_SET_V0: ReadonlySet<string> = new Set<string>(FILTER_MODES_V0);
