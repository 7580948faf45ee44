/**
 * Script class model produced by the GDScript parser
 */

import type { NativeKind } from "./native_kinds.js";

export type BaseRef =
  | { kind: "native"; id: NativeKind; nativeName: string }
  | { kind: "named"; name: string }
  | { kind: "path"; path: string };

export interface ScriptParameter {
  name: string;
  type?: string;
  hasDefault: boolean;
}

export interface ScriptVariable {
  name: string;
  type?: string;
  line: number;
}

export interface ScriptFunction {
  name: string;
  parameters: readonly ScriptParameter[];
  returnType?: string;
  line: number;
}

export interface ScriptSignal {
  name: string;
  parameters: readonly ScriptParameter[];
  line: number;
}

export interface ScriptClass {
  readonly name: string;
  readonly baseRef?: BaseRef;
  readonly variables: readonly ScriptVariable[];
  readonly functions: readonly ScriptFunction[];
  readonly signals: readonly ScriptSignal[];
  /** Originating path with forward slashes. */
  readonly sourcePath: string;
}

/** A source file handed to the generator: its path and text. */
export interface SourceText {
  path: string;
  text: string;
}

export const PRIVATE_MEMBER_PREFIX = "_";

export function isPrivateByConvention(name: string): boolean {
  return name.startsWith(PRIVATE_MEMBER_PREFIX);
}

export function normalizeSourcePath(filePath: string): string {
  return filePath.replace(/\\/g, "/");
}
