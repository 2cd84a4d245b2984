import fs from "node:fs"; // FS: read package.json files for structural dependency guard.
import path from "node:path";

const HARNESS_PKG = "@namelist/harness"; // Package name no other workspace package may depend on.
const KERNEL_PKG = "@namelist/kernel"; // Must stay dependency-free.

type PkgJson = {
  name?: string;
  dependencies?: Record<string, string>;
  devDependencies?: Record<string, string>;
  optionalDependencies?: Record<string, string>;
  peerDependencies?: Record<string, string>;
};

function readJson(p: string): PkgJson {
  const txt = fs.readFileSync(p, "utf8");
  return JSON.parse(txt) as PkgJson;
}

function depNames(pkg: PkgJson): string[] {
  return [
    ...Object.keys(pkg.dependencies ?? {}),
    ...Object.keys(pkg.devDependencies ?? {}),
    ...Object.keys(pkg.optionalDependencies ?? {}),
    ...Object.keys(pkg.peerDependencies ?? {})
  ];
}

export function assertWorkspaceDependencyDirection(): void {
  const packagesDir = path.resolve(__dirname, "..", "..", ".."); // packages/
  const manifests = fs
    .readdirSync(packagesDir, { withFileTypes: true })
    .filter((ent) => ent.isDirectory())
    .map((ent) => path.join(packagesDir, ent.name, "package.json"))
    .filter((p) => fs.existsSync(p));

  if (manifests.length === 0) {
    throw new Error(`no workspace package.json found under ${packagesDir}`);
  }

  const violations: string[] = [];
  for (const pj of manifests) {
    const pkg = readJson(pj);
    const deps = depNames(pkg);

    if (pkg.name !== HARNESS_PKG && deps.includes(HARNESS_PKG)) violations.push(`${pj} -> ${HARNESS_PKG}`);
    if (pkg.name === KERNEL_PKG && deps.length > 0) violations.push(`${pj} -> ${deps.join(", ")}`);
  }

  if (violations.length > 0) {
    throw new Error(`workspace dependency violation: ${violations.join("; ")}`);
  }
}

// Execute immediately when imported by the test runner.
assertWorkspaceDependencyDirection();
console.log("namelist-harness negative guard ok: dependency direction harness -> validator -> kernel");
