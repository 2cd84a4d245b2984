// Name-list Kernel - Prefix filter (v0)
//
// Sorts an identifier list and splits it by a FilterRule.
// - Matching is literal and case-sensitive (no wildcards).
// - A name equal to a prefix matches that prefix.
// - Filtering is per element: duplicates are kept or dropped together but stay separate.

import type { FilterRuleV0, NameListPartitionV0 } from "./types";

/**
 * Returns true if any prefix of the rule is a literal prefix of `name`.
 */
export function matchesAnyPrefixV0(rule: FilterRuleV0, name: string): boolean {
  for (const p of rule.prefixes) {
    if (name.startsWith(p)) {
      return true;
    }
  }
  return false;
}

/**
 * Decides whether a single name survives the rule.
 */
export function keepsNameV0(rule: FilterRuleV0, name: string): boolean {
  const matched = matchesAnyPrefixV0(rule, name);

  if (rule.mode === "ALLOW") {
    return matched;
  }

  if (rule.mode === "DISALLOW") {
    return !matched;
  }

  // Exhaustiveness guard.
  const _never: never = rule.mode;
  throw new Error(`UNREACHABLE_FILTER_MODE: ${String(_never)}`);
}

/**
 * Ordinal comparison on UTF-16 code units (what `<` does on strings).
 * localeCompare is not used: output must not depend on the machine's locale.
 */
export function compareOrdinalV0(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Returns a sorted copy; the input is left untouched.
 */
export function sortIdentifiersV0(identifiers: ReadonlyArray<string>): string[] {
  return [...identifiers].sort(compareOrdinalV0);
}

/**
 * Sorts once, then splits into kept and dropped halves.
 *
 * Running the same prefixes under ALLOW and DISALLOW swaps the two halves.
 */
export function partitionIdentifiersV0(
  identifiers: ReadonlyArray<string>,
  rule: FilterRuleV0
): NameListPartitionV0 {
  const kept: string[] = [];
  const dropped: string[] = [];

  for (const name of sortIdentifiersV0(identifiers)) {
    if (keepsNameV0(rule, name)) {
      kept.push(name);
    } else {
      dropped.push(name);
    }
  }

  return { kept, dropped };
}
