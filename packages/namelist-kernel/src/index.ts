// @namelist/kernel
// Entry point exports for the name-list generator kernel.

export * from "./generator";
export * from "./rule/filter_mode";
export * from "./rule/types";
export * from "./rule/prefix_filter";
export * from "./inputs/identifier_shape";
export * from "./render/entries";
export * from "./render/parse_rendered";
export * from "./meta/generator_meta";
