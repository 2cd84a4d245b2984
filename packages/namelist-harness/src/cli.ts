#!/usr/bin/env node
/**
 * Known-names generator CLI
 *
 * Prints the filtered, sorted `name=name,...` snippet for a registry snapshot.
 * stdout carries only the snippet; everything else goes to stderr.
 *
 * Usage:
 *   npm run generate -- --registry ./registry.json
 *   npm run generate -- --registry ./registry.json --rule ./config/namelist/default.json --stats
 *   npm run generate -- --registry ./registry.json --mode DISALLOW --prefixes Binary,DateTime
 */

import path from "node:path";

import { isValidFilterModeV0, NAME_LIST_GENERATOR_META_V0 } from "@namelist/kernel";
import { defaultRulePath } from "./config_root";
import { generateNameListFromFilesV0 } from "./name_list_file_harness";

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_USAGE = 2;

export const USAGE = [
  "Usage: namelist-gen --registry <file> [options]",
  "",
  "  --registry <file>        identifier registry snapshot (JSON document or string array)",
  "  --rule <file>            filter rule document (default: config/namelist/default.json)",
  "  --mode ALLOW|DISALLOW    override the rule's mode for this run",
  "  --prefixes <a,b,...>     override the rule's prefixes for this run",
  "  --stats                  print kept/total counts to stderr",
  "  --describe               print what this generator does and exit",
  "  --help                   print this text and exit"
].join("\n");

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  cwd: string;
};

/* -------------------- argv utils -------------------- */

class UsageError extends Error {}

function arg(argv: ReadonlyArray<string>, name: string): string | null {
  const i = argv.indexOf(name);
  if (i === -1) return null;
  const v = argv[i + 1];
  if (v === undefined || v.startsWith("--")) {
    throw new UsageError(`${name} needs a value`);
  }
  return v;
}

function flag(argv: ReadonlyArray<string>, name: string): boolean {
  return argv.includes(name);
}

function splitList(v: string): string[] {
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/* -------------------- main -------------------- */

export function runCli(argv: ReadonlyArray<string>, io: CliIo): number {
  try {
    if (flag(argv, "--help")) {
      io.stdout(`${USAGE}\n`);
      return EXIT_OK;
    }

    if (flag(argv, "--describe")) {
      io.stdout(`${NAME_LIST_GENERATOR_META_V0.display_name}\n${NAME_LIST_GENERATOR_META_V0.description}\n`);
      return EXIT_OK;
    }

    const mode = arg(argv, "--mode");
    if (mode !== null && !isValidFilterModeV0(mode)) {
      io.stderr(`FILTER_MODE_NOT_ALLOWED: ${mode} @ --mode`);
      return EXIT_ERROR;
    }

    const registry = arg(argv, "--registry");
    if (registry === null) {
      throw new UsageError("missing required --registry <file>");
    }

    const prefixesRaw = arg(argv, "--prefixes");
    const prefixes = prefixesRaw === null ? undefined : splitList(prefixesRaw);

    const ruleArg = arg(argv, "--rule");
    let rulePath: string | undefined;
    if (ruleArg !== null) {
      rulePath = path.resolve(io.cwd, ruleArg);
    } else if (mode === null || prefixes === undefined) {
      // Only fall back to the default file when the flags do not define the whole rule.
      rulePath = defaultRulePath(io.env, io.cwd);
    }

    const result = generateNameListFromFilesV0({
      registryPath: path.resolve(io.cwd, registry),
      rulePath,
      overrides: { mode: mode ?? undefined, prefixes }
    });

    io.stdout(`${result.output}\n`);

    if (flag(argv, "--stats")) {
      io.stderr(
        `kept ${result.kept_count} of ${result.total_count} identifiers ` +
          `(rule ${result.rule_id} ${result.rule.mode} [${result.rule.prefixes.join(",")}], registry ${result.registry_ref})`
      );
    }
    return EXIT_OK;
  } catch (e) {
    if (e instanceof UsageError) {
      io.stderr(`${e.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    io.stderr(e instanceof Error ? e.message : String(e));
    return EXIT_ERROR;
  }
}

function main(): void {
  const code = runCli(process.argv.slice(2), {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => console.error(text),
    env: process.env,
    cwd: process.cwd()
  });
  process.exitCode = code;
}

if (require.main === module) main();
