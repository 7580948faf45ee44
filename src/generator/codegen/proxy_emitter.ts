/**
 * Proxy emission: one forwarding type per native engine type used as a
 * bridge root.
 */

import type { TypeCatalog } from "../catalog/type_catalog.js";
import {
  ENGINE_NAMESPACE,
  type NativeEvent,
  type NativeMember,
  type NativeMethod,
  type NativeParameter,
  type NativeProperty,
} from "../catalog/types.js";
import { GeneratorError } from "../errors/generator_errors.js";
import { PROXY_SUFFIX } from "../frontend/bridge_naming.js";
import { UNIVERSAL_NATIVE_ROOT } from "../frontend/native_kinds.js";
import { escapeIdentifier, toStringLiteral } from "./csharp_identifiers.js";
import type { NameContainer } from "./bridge_writer.js";
import { SourceWriter } from "./source_writer.js";
import { writeUnitPreamble } from "./unit_preamble.js";

export interface ProxyEmitOptions {
  namespace?: string;
}

/** Forwarded with the instance re-fetched afterwards. */
const INSTANCE_REPLACING_METHODS = new Set(["SetScript"]);
const OBSOLETE_WARNINGS = "CS0612, CS0618";
const NAME_CONTAINERS: readonly NameContainer[] = [
  "PropertyName",
  "MethodName",
  "SignalName",
];

export function emitProxy(
  nativeTypeName: string,
  catalog: TypeCatalog,
  options: ProxyEmitOptions = {},
): string {
  if (!catalog.isNativeRoot(nativeTypeName)) {
    throw new GeneratorError(
      "InternalError",
      "error",
      `'${nativeTypeName}' is not an engine object type`,
      { filePath: "<catalog>", line: 1, column: 1 },
      "Only types deriving from GodotObject can be proxied.",
    );
  }

  const proxyTypeName = `${nativeTypeName}${PROXY_SUFFIX}`;
  const writer = new SourceWriter();
  const emitter = new ProxyMemberWriter(writer, nativeTypeName);

  writeUnitPreamble(writer, options.namespace);
  writer
    .openBlock(`public partial class ${proxyTypeName}`)
    .writeLine(`private ${nativeTypeName} _native;`)
    .writeEmptyLines(1)
    .openBlock(`public ${proxyTypeName}(${nativeTypeName} native)`)
    .writeLine("_native = native;")
    .closeBlock()
    .writeEmptyLines(1)
    .writeLine(`public ${nativeTypeName} Native => _native;`)
    .writeEmptyLines(1);

  for (const member of catalog.nativeMembersOf(nativeTypeName)) {
    emitter.member(member);
    writer.writeEmptyLines(1);
  }

  NAME_CONTAINERS.forEach((container, index) => {
    if (index > 0) writer.writeEmptyLines(1);
    writer
      .openBlock(
        `public class ${container} : global::${ENGINE_NAMESPACE}.${nativeTypeName}.${container}`,
      )
      .closeBlock();
  });

  writer.closeAllBlocks();
  return writer.toString();
}

class ProxyMemberWriter {
  constructor(
    private writer: SourceWriter,
    private nativeTypeName: string,
  ) {}

  member(member: NativeMember): void {
    const obsolete = member.obsolete.present;
    if (obsolete) {
      this.writer.writeLine(`#pragma warning disable ${OBSOLETE_WARNINGS}`);
    }
    this.writer.writeLine(
      `/// <inheritdoc cref="${ENGINE_NAMESPACE}.${member.declaringType}.${crefName(member)}"/>`,
    );
    if (obsolete) {
      this.writer.writeLine(
        member.obsolete.message !== undefined
          ? `[System.Obsolete(${toStringLiteral(member.obsolete.message)})]`
          : "[System.Obsolete]",
      );
    }

    switch (member.kind) {
      case "property":
        this.property(member);
        break;
      case "event":
        this.event(member);
        break;
      case "method":
        this.method(member);
        break;
    }

    if (obsolete) {
      this.writer.writeLine(`#pragma warning restore ${OBSOLETE_WARNINGS}`);
    }
  }

  private property(property: NativeProperty): void {
    const name = escapeIdentifier(property.name);
    this.writer.openBlock(`public ${property.type} ${name}`);
    if (property.hasGetter) this.writer.writeLine(`get => _native.${name};`);
    if (property.hasSetter) {
      this.writer.writeLine(`set => _native.${name} = value;`);
    }
    this.writer.closeBlock();
  }

  private event(event: NativeEvent): void {
    const name = escapeIdentifier(event.name);
    this.writer.openBlock(`public event ${event.handlerType} ${name}`);
    if (event.hasAdd) this.writer.writeLine(`add => _native.${name} += value;`);
    if (event.hasRemove) {
      this.writer.writeLine(`remove => _native.${name} -= value;`);
    }
    this.writer.closeBlock();
  }

  private method(method: NativeMethod): void {
    const name = escapeIdentifier(method.name);
    const typeParams =
      method.typeParameters.length > 0
        ? `<${method.typeParameters.map((param) => param.name).join(", ")}>`
        : "";
    const constraints = method.typeParameters
      .filter((param) => param.constraint !== undefined)
      .map((param) => ` where ${param.name} : ${param.constraint}`)
      .join("");
    const params = method.parameters.map(declareParameter).join(", ");
    const args = method.parameters
      .map((param) => escapeIdentifier(param.name))
      .join(", ");
    const call = `_native.${name}${typeParams}(${args})`;

    if (
      method.name === "ToString" &&
      method.parameters.length === 0 &&
      method.typeParameters.length === 0
    ) {
      this.writer.writeLine(`public override string ToString() => ${call};`);
      return;
    }

    const signature = `public ${method.returnType} ${name}${typeParams}(${params})${constraints}`;

    if (INSTANCE_REPLACING_METHODS.has(method.name) && method.returnType === "void") {
      this.writer
        .openBlock(signature)
        .writeLine("var instanceId = _native.GetInstanceId();")
        .writeLine(`${call};`)
        .writeLine(
          `_native = ${UNIVERSAL_NATIVE_ROOT}.InstanceFromId(instanceId) as ${this.nativeTypeName};`,
        )
        .closeBlock();
      return;
    }

    this.writer.writeLine(`${signature} => ${call};`);
  }
}

function declareParameter(param: NativeParameter): string {
  const name = escapeIdentifier(param.name);
  if (param.isRest) return `params ${param.type} ${name}`;
  const declaration = `${param.type} ${name}`;
  return param.isOptional ? `${declaration} = default` : declaration;
}

function crefName(member: NativeMember): string {
  if (member.kind !== "method" || member.typeParameters.length === 0) {
    return member.name;
  }
  return `${member.name}{${member.typeParameters.map((param) => param.name).join(", ")}}`;
}
