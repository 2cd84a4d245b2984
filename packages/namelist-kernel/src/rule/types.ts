// Name-list Kernel - Rule and entry types (v0)

import type { FilterModeV0 } from "./filter_mode";

/**
 * FilterRule v0: the inclusion/exclusion rule applied to one run.
 *
 * The kernel only reads `mode` and `prefixes`, so any admitted rule document
 * (which carries extra audit fields) can be passed in directly.
 */
export interface FilterRuleV0 {
  // ALLOW keeps matching names; DISALLOW keeps non-matching names.
  mode: FilterModeV0;

  // Literal, case-sensitive prefixes in the order they were configured.
  prefixes: ReadonlyArray<string>;
}

/**
 * A surviving name with its dense 0-based rank in the filtered subsequence.
 */
export interface IndexedEntryV0 {
  name: string;
  index: number;
}

/**
 * Both halves of a sorted identifier list under one rule.
 */
export interface NameListPartitionV0 {
  // Names that survive the filter, in ascending order.
  kept: ReadonlyArray<string>;

  // Names removed by the filter, in ascending order.
  dropped: ReadonlyArray<string>;
}
