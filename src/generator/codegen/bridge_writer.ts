/**
 * Member emission for one bridge class.
 *
 * Each pass is independent and appends to the shared writer: forwarding
 * properties, methods and signals, then the name-constant containers that
 * mirror the class's own inheritance chain.
 */

import {
  isPrivateByConvention,
  type ScriptFunction,
  type ScriptParameter,
  type ScriptSignal,
  type ScriptVariable,
} from "../frontend/types.js";
import { escapeIdentifier, toStringLiteral } from "./csharp_identifiers.js";
import { type ScriptTypeMapper, VARIANT_TYPE } from "./script_type_mapper.js";
import type { SourceWriter } from "./source_writer.js";

export type NameContainer = "PropertyName" | "MethodName" | "SignalName";

export class BridgeWriter {
  constructor(
    private writer: SourceWriter,
    private typeMapper: ScriptTypeMapper,
  ) {}

  properties(
    variables: readonly ScriptVariable[],
    inherited: ReadonlySet<string> = new Set(),
  ): this {
    for (const variable of variables) {
      const type = this.typeMapper.map(variable.type);
      const key = this.memberKey("PropertyName", variable.name);
      const getter =
        type === VARIANT_TYPE
          ? `Native.Get(${key})`
          : `Native.Get(${key}).As<${type}>()`;
      this.writer
        .openBlock(
          `public ${hides(inherited, variable.name)}${type} ${escapeIdentifier(variable.name)}`,
        )
        .writeLine(`get => ${getter};`)
        .writeLine(`set => Native.Set(${key}, ${toVariant("value", type)});`)
        .closeBlock()
        .writeEmptyLines(1);
    }
    return this;
  }

  methods(
    functions: readonly ScriptFunction[],
    inherited: ReadonlySet<string> = new Set(),
  ): this {
    for (const fn of functions) {
      const returnType = this.typeMapper.map(fn.returnType ?? "void");
      const params = fn.parameters.map((param) => this.parameter(param));
      const args = fn.parameters.map((param) =>
        toVariant(escapeIdentifier(param.name), this.typeMapper.map(param.type)),
      );
      // one overload per omittable tail, so the script's own defaults apply
      const required = requiredCount(fn.parameters);
      for (let count = required; count <= fn.parameters.length; count++) {
        const call = `Native.Call(${[this.memberKey("MethodName", fn.name), ...args.slice(0, count)].join(", ")})`;
        const body =
          returnType === "void" || returnType === VARIANT_TYPE
            ? call
            : `${call}.As<${returnType}>()`;
        this.writer
          .writeLine(
            `public ${hides(inherited, fn.name)}${returnType} ${escapeIdentifier(fn.name)}(${params.slice(0, count).join(", ")}) => ${body};`,
          )
          .writeEmptyLines(1);
      }
    }
    return this;
  }

  signals(
    signals: readonly ScriptSignal[],
    inherited: ReadonlySet<string> = new Set(),
  ): this {
    for (const signal of signals) {
      const argTypes = signal.parameters.map((param) =>
        this.typeMapper.map(param.type),
      );
      const handler =
        argTypes.length > 0 ? `Action<${argTypes.join(", ")}>` : "Action";
      const key = this.memberKey("SignalName", signal.name);
      this.writer
        .openBlock(
          `public ${hides(inherited, signal.name)}event ${handler} ${escapeIdentifier(signal.name)}`,
        )
        .writeLine(`add => Native.Connect(${key}, Callable.From(value));`)
        .writeLine(`remove => Native.Disconnect(${key}, Callable.From(value));`)
        .closeBlock()
        .writeEmptyLines(1);
    }
    return this;
  }

  propertyNames(
    variables: readonly ScriptVariable[],
    baseBridgeTypeName: string,
    inherited: ReadonlySet<string> = new Set(),
  ): this {
    return this.nameContainer("PropertyName", variables, baseBridgeTypeName, inherited);
  }

  methodNames(
    functions: readonly ScriptFunction[],
    baseBridgeTypeName: string,
    inherited: ReadonlySet<string> = new Set(),
  ): this {
    return this.nameContainer("MethodName", functions, baseBridgeTypeName, inherited);
  }

  signalNames(
    signals: readonly ScriptSignal[],
    baseBridgeTypeName: string,
    inherited: ReadonlySet<string> = new Set(),
  ): this {
    return this.nameContainer("SignalName", signals, baseBridgeTypeName, inherited);
  }

  /**
   * Nested container listing the class's own public member names. It
   * derives from the base bridge's container of the same kind, so
   * inherited names stay reachable without being repeated.
   */
  private nameContainer(
    container: NameContainer,
    members: ReadonlyArray<{ name: string }>,
    baseBridgeTypeName: string,
    inherited: ReadonlySet<string>,
  ): this {
    this.writer.openBlock(
      `public new class ${container} : ${baseBridgeTypeName}.${container}`,
    );
    for (const member of members) {
      if (isPrivateByConvention(member.name)) continue;
      this.writer.writeLine(
        `public ${hides(inherited, member.name)}const string ${escapeIdentifier(member.name)} = ${toStringLiteral(member.name)};`,
      );
    }
    this.writer.closeBlock();
    return this;
  }

  /** Private-by-convention names have no constant; use the literal. */
  private memberKey(container: NameContainer, name: string): string {
    return isPrivateByConvention(name)
      ? toStringLiteral(name)
      : `${container}.${escapeIdentifier(name)}`;
  }

  private parameter(param: ScriptParameter): string {
    return `${this.typeMapper.map(param.type)} ${escapeIdentifier(param.name)}`;
  }
}

function hides(inherited: ReadonlySet<string>, name: string): string {
  return inherited.has(name) ? "new " : "";
}

/** Parameters up to and including the last one without a default. */
function requiredCount(parameters: readonly ScriptParameter[]): number {
  let count = 0;
  parameters.forEach((param, index) => {
    if (!param.hasDefault) count = index + 1;
  });
  return count;
}

function toVariant(expression: string, type: string): string {
  return type === VARIANT_TYPE ? expression : `Variant.From(${expression})`;
}
