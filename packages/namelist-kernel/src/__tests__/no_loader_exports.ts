// Negative acceptance: @namelist/kernel must stay IO-free.
//
// 1) No export may look like a loader (registry/rule files are the harness's job).
// 2) No kernel source file may import fs/path/process-level modules or another workspace package.

import assert from "node:assert";
import fs from "node:fs";
import path from "node:path";

import * as pkg from "../index";

const forbiddenNamePatterns: RegExp[] = [/load/i, /read/i, /file/i, /fetch/i, /scan/i, /watch/i, /dir/i];

for (const k of Object.keys(pkg)) {
  for (const re of forbiddenNamePatterns) {
    assert.ok(!re.test(k), `forbidden export found in @namelist/kernel: ${k}`);
  }
}

const forbiddenImports: RegExp[] = [
  /from\s+"(node:)?(fs|path|child_process|net|http|https|os)"/,
  /from\s+"@namelist\//
];

function walk(dir: string, out: string[]): void {
  for (const ent of fs.readdirSync(dir, { withFileTypes: true })) {
    if (ent.name === "__tests__") continue; // Tests may use IO.
    const full = path.join(dir, ent.name);
    if (ent.isDirectory()) walk(full, out);
    else if (ent.isFile() && ent.name.endsWith(".ts")) out.push(full);
  }
}

const sources: string[] = [];
walk(path.resolve(__dirname, ".."), sources);
assert.ok(sources.length > 0, "expected kernel sources to scan");

for (const file of sources) {
  const text = fs.readFileSync(file, "utf8");
  for (const re of forbiddenImports) {
    assert.ok(!re.test(text), `forbidden import in ${path.basename(file)}: ${re.source}`);
  }
}

console.log("namelist-kernel negative acceptance ok: no loader exports, no IO imports");
