/**
 * Generation run: parse scripts, resolve inheritance, emit one bridge per
 * eligible class and one proxy per native type those bridges rest on.
 */

import type { TypeCatalog } from "./catalog/type_catalog.js";
import {
  collectInheritedNames,
  emitBridge,
} from "./codegen/bridge_emitter.js";
import { emitProxy } from "./codegen/proxy_emitter.js";
import { ScriptTypeMapper } from "./codegen/script_type_mapper.js";
import {
  type BridgeConfiguration,
  DEFAULT_CONFIGURATION,
} from "./config/configuration.js";
import { ErrorCollector } from "./errors/error_collector.js";
import {
  GeneratorError,
  ScriptParseError,
} from "./errors/generator_errors.js";
import { BridgeNaming } from "./frontend/bridge_naming.js";
import { GDScriptParser } from "./frontend/gdscript_parser.js";
import {
  InheritanceResolver,
  type Resolution,
} from "./frontend/inheritance_resolver.js";
import { ScriptRegistry } from "./frontend/script_registry.js";
import type { ScriptClass, SourceText } from "./frontend/types.js";

export const GENERATED_FILE_EXTENSION = ".g.cs";

export interface GeneratedUnit {
  /** File name for the unit, e.g. `Player.g.cs`. */
  hintName: string;
  typeName: string;
  kind: "bridge" | "proxy";
  source: string;
}

export interface GenerationInput {
  scripts: SourceText[];
  catalog: TypeCatalog;
  configuration?: Readonly<BridgeConfiguration>;
}

export interface GenerationResult {
  units: GeneratedUnit[];
  diagnostics: GeneratorError[];
  /** Native types that received a proxy, sorted by name. */
  usedNativeTypes: string[];
}

export function generateBridges(input: GenerationInput): GenerationResult {
  const { catalog } = input;
  const configuration = input.configuration ?? DEFAULT_CONFIGURATION;
  const errorCollector = new ErrorCollector();
  const registry = registerScripts(input.scripts, errorCollector);

  const naming = new BridgeNaming(catalog, configuration);
  const resolver = new InheritanceResolver(
    registry,
    catalog,
    naming,
    errorCollector,
  );
  const resolutions = resolver.resolveAll();

  const scriptRoots = new Map<string, string>();
  for (const [name, resolution] of resolutions) {
    if (resolution.status === "resolved") {
      scriptRoots.set(name, resolution.resolved.nativeRootTypeName);
    }
  }
  const typeMapper = new ScriptTypeMapper(catalog, scriptRoots);

  const units: GeneratedUnit[] = [];
  const emitted: Resolution[] = [];

  for (const scriptClass of registry.getAllClasses()) {
    const resolution = resolutions.get(scriptClass.name);
    if (!resolution || resolution.status === "cyclic") continue;
    const { resolved } = resolution;
    if (
      configuration.generateOnlyForExistingPartial &&
      !naming.hasExistingType(resolved.bridgeTypeName)
    ) {
      continue;
    }

    try {
      const source = emitBridge(resolved, {
        typeMapper,
        inherited: collectInheritedNames(registry, scriptClass),
      });
      units.push({
        hintName: `${resolved.bridgeTypeName}${GENERATED_FILE_EXTENSION}`,
        typeName: resolved.bridgeTypeName,
        kind: "bridge",
        source,
      });
      emitted.push(resolution);
    } catch (e) {
      errorCollector.add(toInternalError(e, scriptClass.sourcePath));
    }
  }

  const usedNativeTypes =
    InheritanceResolver.collectUsedNativeTypes(emitted).values();
  for (const nativeTypeName of usedNativeTypes) {
    const proxyTypeName = naming.proxyTypeName(nativeTypeName);
    try {
      const namespace = naming.namespaceFor(proxyTypeName);
      units.push({
        hintName: `${proxyTypeName}${GENERATED_FILE_EXTENSION}`,
        typeName: proxyTypeName,
        kind: "proxy",
        source: emitProxy(nativeTypeName, catalog, namespace ? { namespace } : {}),
      });
    } catch (e) {
      errorCollector.add(toInternalError(e, "<catalog>"));
    }
  }

  return {
    units,
    diagnostics: errorCollector.getDiagnostics(),
    usedNativeTypes,
  };
}

/**
 * Parse every script into the registry. Malformed files and later
 * duplicates of a class name are dropped with a warning.
 */
function registerScripts(
  scripts: SourceText[],
  errorCollector: ErrorCollector,
): ScriptRegistry {
  const parser = new GDScriptParser();
  const registry = new ScriptRegistry();

  for (const script of scripts) {
    let scriptClass: ScriptClass | null;
    try {
      scriptClass = parser.parse(script.text, script.path);
    } catch (e) {
      if (!(e instanceof ScriptParseError)) throw e;
      errorCollector.add(e.toGeneratorError());
      continue;
    }
    if (!scriptClass) continue;

    const existing = registry.register(scriptClass);
    if (existing) {
      errorCollector.add(
        new GeneratorError(
          "DuplicateClass",
          "warning",
          `Class '${scriptClass.name}' is already declared in ${existing.sourcePath}`,
          { filePath: scriptClass.sourcePath, line: 1, column: 1 },
          "Rename one of the classes; this file was skipped.",
        ),
      );
    }
  }

  return registry;
}

function toInternalError(error: unknown, filePath: string): GeneratorError {
  if (error instanceof GeneratorError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new GeneratorError(
    "InternalError",
    "error",
    `Emission failed: ${message}`,
    { filePath, line: 1, column: 1 },
  );
}
