/**
 * Assembles one complete bridge unit for a resolved script class
 */

import {
  INVALID_BASE,
  type ResolvedClass,
} from "../frontend/inheritance_resolver.js";
import {
  type ScriptRegistry,
  toResourceKey,
} from "../frontend/script_registry.js";
import type { ScriptClass } from "../frontend/types.js";
import { BridgeWriter } from "./bridge_writer.js";
import { toStringLiteral } from "./csharp_identifiers.js";
import type { ScriptTypeMapper } from "./script_type_mapper.js";
import { SourceWriter } from "./source_writer.js";
import { writeUnitPreamble } from "./unit_preamble.js";

/** Member names declared by a class's script ancestors, per kind. */
export interface InheritedScriptNames {
  properties: ReadonlySet<string>;
  methods: ReadonlySet<string>;
  signals: ReadonlySet<string>;
}

export interface BridgeEmitContext {
  typeMapper: ScriptTypeMapper;
  inherited?: InheritedScriptNames;
}

const NO_INHERITED_NAMES: InheritedScriptNames = {
  properties: new Set(),
  methods: new Set(),
  signals: new Set(),
};

export function collectInheritedNames(
  registry: ScriptRegistry,
  scriptClass: ScriptClass,
): InheritedScriptNames {
  const properties = new Set<string>();
  const methods = new Set<string>();
  const signals = new Set<string>();
  for (const name of registry.getInheritanceChain(scriptClass.name).slice(1)) {
    const ancestor = registry.getClass(name);
    if (!ancestor || ancestor.name === scriptClass.name) continue;
    for (const variable of ancestor.variables) properties.add(variable.name);
    for (const fn of ancestor.functions) methods.add(fn.name);
    for (const signal of ancestor.signals) signals.add(signal.name);
  }
  return { properties, methods, signals };
}

/** `res://` path the engine loads the script from. */
export function toScriptResourcePath(sourcePath: string): string {
  return `res://${toResourceKey(sourcePath).replace(/^\/+/, "")}`;
}

export function emitBridge(
  resolved: ResolvedClass,
  context: BridgeEmitContext,
): string {
  const { scriptClass } = resolved;
  const inherited = context.inherited ?? NO_INHERITED_NAMES;
  const writer = new SourceWriter();
  const members = new BridgeWriter(writer, context.typeMapper);
  // Constants and LoadScript hide those of a parent bridge.
  const hides =
    !resolved.baseIsNative && resolved.baseBridgeTypeName !== INVALID_BASE
      ? "new "
      : "";

  writeUnitPreamble(writer, resolved.namespace);
  writer
    .openBlock(
      `public partial class ${resolved.bridgeTypeName} : ${resolved.baseBridgeTypeName}`,
    )
    .writeLine(
      `public ${resolved.bridgeTypeName}(${resolved.nativeRootTypeName} native) : base(native) { }`,
    )
    .writeEmptyLines(1)
    .writeLine(
      `public ${hides}const string ScriptClassName = ${toStringLiteral(scriptClass.name)};`,
    )
    .writeLine(
      `public ${hides}const string ScriptPath = ${toStringLiteral(toScriptResourcePath(scriptClass.sourcePath))};`,
    )
    .writeEmptyLines(1)
    .writeLine(
      `public ${hides}static Script LoadScript() => GD.Load<Script>(ScriptPath);`,
    )
    .writeEmptyLines(1);

  members
    .properties(scriptClass.variables, inherited.properties)
    .methods(scriptClass.functions, inherited.methods)
    .signals(scriptClass.signals, inherited.signals)
    .propertyNames(
      scriptClass.variables,
      resolved.baseBridgeTypeName,
      inherited.properties,
    );
  writer.writeEmptyLines(1);
  members.methodNames(
    scriptClass.functions,
    resolved.baseBridgeTypeName,
    inherited.methods,
  );
  writer.writeEmptyLines(1);
  members.signalNames(
    scriptClass.signals,
    resolved.baseBridgeTypeName,
    inherited.signals,
  );

  writer.closeAllBlocks();
  return writer.toString();
}
