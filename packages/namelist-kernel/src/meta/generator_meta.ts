// Display metadata for documentation surfaces (`--describe`, help browsers).
// Cosmetic only: nothing in the pipeline reads it.

export const NAME_LIST_GENERATOR_META_V0 = Object.freeze({
  display_name: "Known names list",
  description:
    "Filters the host's builtin identifiers by prefix (ALLOW or DISALLOW), sorts them, " +
    "and renders them as name=name pairs joined by commas for pasting into a generated template."
} as const);

export type NameListGeneratorMetaV0 = typeof NAME_LIST_GENERATOR_META_V0;
