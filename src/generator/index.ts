/**
 * GDScript to C# bridge generation
 */

export {
  BatchGenerator,
  type BatchFileResult,
  type BatchGeneratorOptions,
  type BatchResult,
} from "./batch/batch_generator.js";
export {
  discoverProjectFiles,
  findConfigurationFile,
} from "./batch/file_discovery.js";
export {
  type GeneratedUnit,
  type GenerationInput,
  type GenerationResult,
  generateBridges,
} from "./bridge_generator.js";
export {
  loadStubSources,
  readNativeStubs,
} from "./catalog/native_stub_reader.js";
export { scanProjectTypes } from "./catalog/project_type_scanner.js";
export { buildCatalog, TypeCatalog } from "./catalog/type_catalog.js";
export type {
  AvailableType,
  NativeMember,
  NativeTypeInfo,
} from "./catalog/types.js";
export { emitBridge } from "./codegen/bridge_emitter.js";
export { BridgeWriter } from "./codegen/bridge_writer.js";
export { emitProxy } from "./codegen/proxy_emitter.js";
export { ScriptTypeMapper } from "./codegen/script_type_mapper.js";
export { SourceWriter } from "./codegen/source_writer.js";
export {
  type BridgeConfiguration,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIGURATION,
  loadConfiguration,
  parseConfiguration,
} from "./config/configuration.js";
export { ErrorCollector } from "./errors/error_collector.js";
export {
  AggregateGeneratorError,
  GeneratorError,
  ScriptParseError,
} from "./errors/generator_errors.js";
export { BridgeNaming } from "./frontend/bridge_naming.js";
export { GDScriptParser, parseScript } from "./frontend/gdscript_parser.js";
export {
  INVALID_BASE,
  InheritanceResolver,
  type Resolution,
  type ResolvedClass,
  UsedNativeTypes,
} from "./frontend/inheritance_resolver.js";
export { NativeKind } from "./frontend/native_kinds.js";
export { ScriptRegistry } from "./frontend/script_registry.js";
export type { BaseRef, ScriptClass, SourceText } from "./frontend/types.js";
