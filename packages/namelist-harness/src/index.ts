// @namelist/harness
// Explicit-path file loading + admission + kernel generation, and the CLI.
//
// Hard boundaries:
// - This package is CLI/test-only. The kernel and the validator must NOT depend on it.
// - File IO (fs) is allowed ONLY here; @namelist/kernel must remain IO-free.

export * from "./config_root";
export * from "./name_list_file_harness";
export { runCli, USAGE, EXIT_OK, EXIT_ERROR, EXIT_USAGE } from "./cli";
export type { CliIo } from "./cli";
