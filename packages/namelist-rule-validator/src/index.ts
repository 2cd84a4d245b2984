// @namelist/rule-validator
// Admission control for filter rule documents and identifier registry snapshots.

export * from "./rule/filter_rule_v0_zod";
export * from "./rule/filter_rule_v0_validator";
export * from "./registry/identifier_registry_v0_zod";
export * from "./registry/identifier_registry_v0_validator";
