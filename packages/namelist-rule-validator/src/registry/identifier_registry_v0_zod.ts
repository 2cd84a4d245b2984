import { z } from "zod"; // zod: runtime schema check for registry snapshots

import { SemVerZ } from "../rule/filter_rule_v0_zod";

// Entries are left as unknown here: the per-entry shape check is the kernel's
// (assertIdentifierListV0), so a nested entry reports IDENTIFIER_SHAPE_INVALID with its index.
export const IdentifierRegistryV0Z = z
  .object({
    type: z.literal("identifier_registry_v0"), // discriminator: frozen
    schema_version: SemVerZ,
    source: z.string().min(1).optional(), // where the snapshot was taken (host name/version), audit only
    captured_at: z.string().min(1).optional(), // when it was taken, audit only
    identifiers: z.array(z.unknown()) // may be empty; duplicates allowed
  })
  .strict();

// A bare JSON array is accepted too: it is what most hosts print when asked for their names.
export const IdentifierRegistryInputV0Z = z.union([IdentifierRegistryV0Z, z.array(z.unknown())]);

export type IdentifierRegistryV0Parsed = z.infer<typeof IdentifierRegistryV0Z>;
