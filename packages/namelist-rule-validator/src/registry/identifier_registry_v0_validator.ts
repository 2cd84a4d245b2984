import { IdentifierRegistryInputV0Z } from "./identifier_registry_v0_zod";
import type { IdentifierRegistryV0Parsed } from "./identifier_registry_v0_zod";
import { assertIdentifierListV0 } from "@namelist/kernel"; // per-entry shape: owned by the kernel

export type IdentifierRegistryV0 = Omit<IdentifierRegistryV0Parsed, "identifiers"> & {
  identifiers: string[];
};

/**
 * Admits a registry snapshot, normalizing a bare array into the document form.
 */
export function validateIdentifierRegistryV0(input: unknown): IdentifierRegistryV0 {
  const parsed = IdentifierRegistryInputV0Z.parse(input);

  if (Array.isArray(parsed)) {
    return {
      type: "identifier_registry_v0",
      schema_version: "0.1.0",
      identifiers: assertIdentifierListV0(parsed, "identifier_registry_v0[]")
    };
  }

  return {
    ...parsed,
    identifiers: assertIdentifierListV0(parsed.identifiers, "identifier_registry_v0.identifiers")
  };
}

export function isIdentifierRegistryV0(input: unknown): boolean {
  try {
    validateIdentifierRegistryV0(input);
    return true;
  } catch {
    return false;
  }
}
