import fs from "node:fs";
import path from "node:path";

// Relative location of the hand-edited default rule under the config root.
export const DEFAULT_RULE_RELATIVE_PATH = path.join("config", "namelist", "default.json");

export const CONFIG_ROOT_ENV = "NAMELIST_REPO_ROOT";

/**
 * Find the config root by walking upward from `startDir` until `requiredRelativePath` exists.
 *
 * In npm workspaces, process.cwd() may be the repo root or a package subdir,
 * while config/ lives at the repo root.
 *
 * Throws if nothing is found within `maxHops`.
 */
export function findConfigRoot(startDir: string, requiredRelativePath: string, maxHops = 8): string {
  let cur = path.resolve(startDir);

  for (let hop = 0; hop <= maxHops; hop++) {
    const probe = path.join(cur, requiredRelativePath);
    if (fs.existsSync(probe)) return cur;

    const parent = path.dirname(cur);
    if (parent === cur) break; // reached filesystem root
    cur = parent;
  }

  throw new Error(`CONFIG_ROOT_NOT_FOUND: no ${requiredRelativePath} above ${startDir}`);
}

/**
 * 1) explicit override through NAMELIST_REPO_ROOT
 * 2) walk upward from cwd until config/namelist/default.json exists
 */
export function resolveConfigRoot(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): string {
  const override = env[CONFIG_ROOT_ENV];
  if (override && override.trim().length > 0) return path.resolve(override.trim());

  return findConfigRoot(cwd, DEFAULT_RULE_RELATIVE_PATH);
}

export function defaultRulePath(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): string {
  return path.join(resolveConfigRoot(env, cwd), DEFAULT_RULE_RELATIVE_PATH);
}
