/**
 * Built-in engine root kinds recognised directly in `extends` clauses
 */

export enum NativeKind {
  Object = "Object",
  RefCounted = "RefCounted",
  Resource = "Resource",
  Node = "Node",
  CanvasItem = "CanvasItem",
  Node2D = "Node2D",
  Node3D = "Node3D",
  Control = "Control",
}

/** Engine type every native type ultimately derives from. */
export const UNIVERSAL_NATIVE_ROOT = "GodotObject";

const NATIVE_KIND_TYPE_NAMES: ReadonlyMap<NativeKind, string> = new Map([
  [NativeKind.Object, UNIVERSAL_NATIVE_ROOT],
  [NativeKind.RefCounted, "RefCounted"],
  [NativeKind.Resource, "Resource"],
  [NativeKind.Node, "Node"],
  [NativeKind.CanvasItem, "CanvasItem"],
  [NativeKind.Node2D, "Node2D"],
  [NativeKind.Node3D, "Node3D"],
  [NativeKind.Control, "Control"],
]);

const NATIVE_KINDS_BY_SCRIPT_NAME: ReadonlyMap<string, NativeKind> = new Map(
  Object.values(NativeKind).map((kind) => [kind, kind] as const),
);

export function nativeKindFromScriptName(name: string): NativeKind | null {
  return NATIVE_KINDS_BY_SCRIPT_NAME.get(name) ?? null;
}

export function nativeTypeNameOf(kind: NativeKind): string {
  return NATIVE_KIND_TYPE_NAMES.get(kind) ?? kind;
}
