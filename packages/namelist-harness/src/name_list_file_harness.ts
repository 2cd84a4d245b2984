import fs from "node:fs"; // Harness-only file IO for rule documents and registry snapshots.
import crypto from "node:crypto"; // Content hashing for offline-recomputable input refs.
import { ZodError } from "zod";

import { assertValidFilterModeV0, partitionNameListV0, indexEntriesV0, renderEntriesV0 } from "@namelist/kernel"; // Pure kernel (no IO).
import type { FilterRuleV0 } from "@namelist/kernel";
import { validateFilterRuleV0, validateIdentifierRegistryV0 } from "@namelist/rule-validator"; // Admission validators.
import type { FilterRuleDocumentV0, IdentifierRegistryV0 } from "@namelist/rule-validator";

export type InputStatusV0 = "APPLIED" | "MISSING" | "INVALID";

export type InputErrorCodeV0 = "JSON_PARSE_INVALID" | "SCHEMA_INVALID" | "ADMISSION_INVALID";

export type FileLoadResultV0<T> =
  | { status: "APPLIED"; ref: string; value: T }
  | { status: "MISSING"; ref: "MISSING" }
  | { status: "INVALID"; ref: string; error_code: InputErrorCodeV0; message: string };

function sha256Hex(bytes: Buffer): string {
  return crypto.createHash("sha256").update(bytes).digest("hex");
}

function refFromBytes(bytes: Buffer): string {
  return `sha256:${sha256Hex(bytes)}`; // Stable, offline recomputable.
}

function errorToCode(e: unknown): InputErrorCodeV0 {
  if (e instanceof SyntaxError) return "JSON_PARSE_INVALID";
  if (e instanceof ZodError) return "SCHEMA_INVALID";
  return "ADMISSION_INVALID";
}

function firstLine(e: unknown): string {
  if (e instanceof ZodError) {
    return e.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
  }
  return e instanceof Error ? e.message : String(e);
}

function loadJsonFile<T>(filePath: string, admit: (json: unknown) => T): FileLoadResultV0<T> {
  // Loading is explicit: caller passes the exact path. No scanning, no discovery.
  if (!fs.existsSync(filePath)) {
    return { status: "MISSING", ref: "MISSING" };
  }

  const bytes = fs.readFileSync(filePath);
  const ref = refFromBytes(bytes);

  try {
    const json: unknown = JSON.parse(bytes.toString("utf8"));
    return { status: "APPLIED", ref, value: admit(json) };
  } catch (e) {
    return { status: "INVALID", ref, error_code: errorToCode(e), message: firstLine(e) };
  }
}

export function loadFilterRuleFromFile(filePath: string): FileLoadResultV0<FilterRuleDocumentV0> {
  return loadJsonFile(filePath, validateFilterRuleV0);
}

export function loadIdentifierRegistryFromFile(filePath: string): FileLoadResultV0<IdentifierRegistryV0> {
  return loadJsonFile(filePath, validateIdentifierRegistryV0);
}

function requireApplied<T>(kind: string, filePath: string, loaded: FileLoadResultV0<T>): { ref: string; value: T } {
  if (loaded.status === "APPLIED") return { ref: loaded.ref, value: loaded.value };
  if (loaded.status === "MISSING") throw new Error(`NAMELIST_INPUT_MISSING: ${kind} ${filePath}`);
  throw new Error(`NAMELIST_INPUT_INVALID: ${kind} ${filePath} (${loaded.error_code}) ${loaded.message}`);
}

/**
 * One-run tweaks on top of the rule file (CLI flags).
 * `mode` is typed loosely because it comes straight from argv.
 */
export type RuleOverridesV0 = {
  mode?: string;
  prefixes?: ReadonlyArray<string>;
};

export type GenerateFromFilesInputV0 = {
  registryPath: string; // Registry snapshot (required).
  rulePath?: string; // Rule document; may be omitted only when overrides give both mode and prefixes.
  overrides?: RuleOverridesV0;
};

export type NameListRunResultV0 = {
  output: string; // Rendered snippet.
  kept_count: number;
  dropped_count: number;
  total_count: number;
  rule_id: string; // Rule document id, or "cli" when the rule came from overrides only.
  rule: FilterRuleV0; // Effective rule after overrides.
  registry_ref: string;
  rule_ref: string; // sha256 of the rule file, or "CLI" when no file was read.
};

/**
 * Folds overrides into a base rule. The mode override is checked here, so an
 * unknown mode fails even when the rule file itself is fine.
 */
export function applyRuleOverridesV0(base: FilterRuleV0 | undefined, overrides: RuleOverridesV0 = {}): FilterRuleV0 {
  let mode = base?.mode;
  const requested = overrides.mode;
  if (requested !== undefined) {
    assertValidFilterModeV0(requested, "overrides.mode");
    mode = requested;
  }
  const prefixes = overrides.prefixes ?? base?.prefixes;

  if (mode === undefined || prefixes === undefined) {
    throw new Error("NAMELIST_RULE_UNDEFINED: no rule file and overrides do not give both mode and prefixes");
  }
  return { mode, prefixes: [...prefixes] };
}

export function generateNameListFromFilesV0(input: GenerateFromFilesInputV0): NameListRunResultV0 {
  const overrides = input.overrides ?? {};

  // Configuration errors first: a bad --mode must not wait on file IO.
  if (overrides.mode !== undefined) {
    assertValidFilterModeV0(overrides.mode, "overrides.mode");
  }

  let baseRule: FilterRuleDocumentV0 | undefined;
  let rule_ref = "CLI";
  if (input.rulePath !== undefined) {
    const loaded = requireApplied("rule", input.rulePath, loadFilterRuleFromFile(input.rulePath));
    baseRule = loaded.value;
    rule_ref = loaded.ref;
  }
  const rule = applyRuleOverridesV0(baseRule, overrides);

  const registry = requireApplied(
    "registry",
    input.registryPath,
    loadIdentifierRegistryFromFile(input.registryPath)
  );

  const { kept, dropped } = partitionNameListV0(registry.value.identifiers, rule);

  return {
    output: renderEntriesV0(indexEntriesV0(kept)),
    kept_count: kept.length,
    dropped_count: dropped.length,
    total_count: registry.value.identifiers.length,
    rule_id: baseRule?.rule_id ?? "cli",
    rule,
    registry_ref: registry.ref,
    rule_ref
  };
}
