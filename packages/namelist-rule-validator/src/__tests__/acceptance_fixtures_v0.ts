// Fixture-driven acceptance for rule and registry admission.
//
// Every file under fixtures/rules_v0 and fixtures/registries_v0 must be named
// *_ok_* (must pass) or *_bad_* (must fail).

import fs from "node:fs";
import path from "node:path";

import { validateFilterRuleV0 } from "../rule/filter_rule_v0_validator";
import { validateIdentifierRegistryV0 } from "../registry/identifier_registry_v0_validator";

function listJsonFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir)
    .filter((n) => n.endsWith(".json"))
    .map((n) => path.join(dir, n))
    .sort();
}

function readJson(file: string): unknown {
  const raw = fs.readFileSync(file, "utf8");
  return JSON.parse(raw) as unknown;
}

function runDir(dir: string, prefix: string, validate: (obj: unknown) => unknown): number {
  const files = listJsonFiles(dir);
  for (const f of files) {
    const name = path.basename(f);
    const obj = readJson(f);

    if (name.startsWith(`${prefix}_ok_`)) {
      validate(obj);
      console.log(`[OK] ${name}`);
    } else if (name.startsWith(`${prefix}_bad_`)) {
      let failed = false;
      try {
        validate(obj);
      } catch (e) {
        failed = true;
        console.log(`[FAIL-AS-EXPECTED] ${name}: ${e instanceof Error ? e.message.split("\n")[0] : String(e)}`);
      }
      if (!failed) throw new Error(`expected fail but passed: ${name}`);
    } else {
      throw new Error(`unexpected fixture filename (must be ${prefix}_ok_* or ${prefix}_bad_*): ${name}`);
    }
  }
  return files.length;
}

const fixturesRoot = path.resolve(__dirname, "../../fixtures");

const ruleCount = runDir(path.join(fixturesRoot, "rules_v0"), "rule", validateFilterRuleV0);
const registryCount = runDir(path.join(fixturesRoot, "registries_v0"), "registry", validateIdentifierRegistryV0);

if (ruleCount === 0 || registryCount === 0) {
  throw new Error("fixture directories are empty");
}

console.log(`rule-validator fixture acceptance ok (${ruleCount} rules, ${registryCount} registries)`);
