import { z } from "zod"; // zod: runtime schema check for hand-edited rule files

export const SemVerZ = z.string().regex(/^\d+\.\d+\.\d+$/); // SemVer: no free-text versions

// Mode is only shape-checked here (non-empty string); the allowlist lives in the kernel
// so there is exactly one place that knows ALLOW/DISALLOW.
export const FilterRuleV0Z = z
  .object({
    type: z.literal("name_filter_rule_v0"), // discriminator: frozen
    schema_version: SemVerZ,
    rule_id: z.string().min(1), // stable id, echoed in --stats output
    description: z.string().optional(), // free text for the maintainer; never read by the kernel
    mode: z.string().min(1),
    prefixes: z.array(z.string().min(1)).min(1) // literal prefixes, non-empty, in configured order
  })
  .strict(); // reject unknown fields (typos like "prefix" must not pass silently)

export type FilterRuleV0Parsed = z.infer<typeof FilterRuleV0Z>;
