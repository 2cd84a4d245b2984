import { FilterRuleV0Z } from "./filter_rule_v0_zod"; // structural schema: close the shape first
import type { FilterRuleV0Parsed } from "./filter_rule_v0_zod";
import { assertValidFilterModeV0 } from "@namelist/kernel"; // mode allowlist: owned by the kernel
import type { FilterModeV0, FilterRuleV0 } from "@namelist/kernel";

/**
 * An admitted rule document. Structurally a kernel FilterRuleV0, so it can be
 * handed to generateNameListV0 as-is.
 */
export type FilterRuleDocumentV0 = Omit<FilterRuleV0Parsed, "mode"> & FilterRuleV0;

function ensureKnownMode(mode: string): FilterModeV0 {
  try {
    assertValidFilterModeV0(mode, "name_filter_rule_v0.mode"); // allowlist: throw on unknown
    return mode;
  } catch {
    throw new Error(`mode not in filter modes v0 (ALLOW|DISALLOW): ${mode}`); // normalized message
  }
}

export function validateFilterRuleV0(input: unknown): FilterRuleDocumentV0 {
  const parsed = FilterRuleV0Z.parse(input); // gate 1: strict structural parse

  const mode = ensureKnownMode(parsed.mode); // gate 2: mode must be ALLOW or DISALLOW

  const seen = new Set<string>();
  for (const p of parsed.prefixes) {
    if (seen.has(p)) {
      throw new Error(`duplicate prefix in prefixes[]: ${p}`); // gate 3: each prefix listed once
    }
    seen.add(p);
  }

  return { ...parsed, mode }; // admitted, strongly typed rule document
}

export function isFilterRuleV0(input: unknown): input is FilterRuleDocumentV0 {
  try {
    validateFilterRuleV0(input);
    return true;
  } catch {
    return false;
  }
}
