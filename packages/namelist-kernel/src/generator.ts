// Name-list Kernel - Pure generation entrypoint (v0)
//
// This module exports a single pure function that:
// 1) Checks the rule mode and the identifier list shape (fail fast, before filtering).
// 2) Sorts and filters the identifiers by prefix.
// 3) Indexes the survivors and renders them as `name=name` entries.
//
// No IO. No side effects. No retained state.

import { assertValidFilterModeV0 } from "./rule/filter_mode";
import { partitionIdentifiersV0 } from "./rule/prefix_filter";
import type { FilterRuleV0, NameListPartitionV0 } from "./rule/types";
import { assertIdentifierListV0, assertPrefixListV0 } from "./inputs/identifier_shape";
import { indexEntriesV0, renderEntriesV0 } from "./render/entries";

/**
 * Checks both inputs and returns the sorted kept/dropped halves.
 *
 * @param identifiers - Registry snapshot; may be empty and may contain duplicates.
 * @param rule - Filter rule for this run.
 */
export function partitionNameListV0(
  identifiers: ReadonlyArray<string>,
  rule: FilterRuleV0
): NameListPartitionV0 {
  // Configuration errors are reported before any name is looked at.
  assertValidFilterModeV0(rule.mode, "rule.mode");
  const prefixes = assertPrefixListV0(rule.prefixes, "rule.prefixes");

  // Shape errors abort the whole run; no partial output.
  const names = assertIdentifierListV0(identifiers, "identifiers");

  return partitionIdentifiersV0(names, { mode: rule.mode, prefixes });
}

/**
 * Renders the filtered, sorted identifier list as `a=a,b=b,...`.
 *
 * Returns "" when nothing survives the filter.
 */
export function generateNameListV0(identifiers: ReadonlyArray<string>, rule: FilterRuleV0): string {
  const { kept } = partitionNameListV0(identifiers, rule);
  return renderEntriesV0(indexEntriesV0(kept));
}
