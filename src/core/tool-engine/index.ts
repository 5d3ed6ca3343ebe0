/**
 * Tool engine: compile tool source, evaluate it into a namespace snapshot,
 * publish snapshots and run calls against them.
 */

export { compile, validateToolDefinition, MAX_NAME_LENGTH, MAX_SOURCE_LENGTH } from "./compiler";
export type { CompiledUnit } from "./compiler";
export { Namespace } from "./namespace";
export type { NativeBinding, NativeBindings, NamespaceOptions } from "./namespace";
export { ToolRegistry, renderValue } from "./registry";
export type { CreateResult, ToolRegistryOptions } from "./registry";
