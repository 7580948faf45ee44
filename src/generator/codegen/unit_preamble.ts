import type { SourceWriter } from "./source_writer.js";

export const GENERATED_HEADER = [
  "// <auto-generated>",
  "//     This file was generated by gdscript-bridge. Do not edit it by hand.",
  "// </auto-generated>",
].join("\n");

const USINGS = ["using System;", "using Godot;"];

/**
 * Header, nullable context, optional namespace block and usings. The
 * caller closes every block it leaves open.
 */
export function writeUnitPreamble(
  writer: SourceWriter,
  namespace: string | undefined,
): void {
  writer.writeLine(GENERATED_HEADER).writeLine("#nullable disable").writeEmptyLines(1);
  if (namespace) writer.openBlock(`namespace ${namespace}`);
  for (const using of USINGS) writer.writeLine(using);
  writer.writeEmptyLines(1);
}
