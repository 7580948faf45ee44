/**
 * Maps GDScript type annotations to C# type text
 */

import type { TypeCatalog } from "../catalog/type_catalog.js";
import { splitTopLevel } from "../frontend/gdscript_parser.js";
import { UNIVERSAL_NATIVE_ROOT } from "../frontend/native_kinds.js";

export const VARIANT_TYPE = "Variant";

const SCRIPT_TO_CSHARP: ReadonlyMap<string, string> = new Map([
  ["int", "long"],
  ["float", "double"],
  ["bool", "bool"],
  ["String", "string"],
  ["void", "void"],
  ["Variant", VARIANT_TYPE],
  ["Object", UNIVERSAL_NATIVE_ROOT],
  ["Array", "Godot.Collections.Array"],
  ["Dictionary", "Godot.Collections.Dictionary"],
  // built-in value types whose C# name differs or that no stub declares
  ["StringName", "StringName"],
  ["NodePath", "NodePath"],
  ["Callable", "Callable"],
  ["Signal", "Signal"],
  ["Vector2i", "Vector2I"],
  ["Vector3i", "Vector3I"],
  ["Vector4i", "Vector4I"],
  ["Rect2i", "Rect2I"],
  ["AABB", "Aabb"],
  ["RID", "Rid"],
  ["Basis", "Basis"],
  ["Quaternion", "Quaternion"],
  ["Transform3D", "Transform3D"],
  ["Plane", "Plane"],
  ["Projection", "Projection"],
  ["Vector4", "Vector4"],
]);

const PACKED_ARRAYS: ReadonlyMap<string, string> = new Map([
  ["PackedByteArray", "byte[]"],
  ["PackedInt32Array", "int[]"],
  ["PackedInt64Array", "long[]"],
  ["PackedFloat32Array", "float[]"],
  ["PackedFloat64Array", "double[]"],
  ["PackedStringArray", "string[]"],
  ["PackedVector2Array", "Vector2[]"],
  ["PackedVector3Array", "Vector3[]"],
  ["PackedColorArray", "Color[]"],
]);

const GENERIC_ANNOTATION = /^([A-Za-z_][A-Za-z0-9_]*)\s*\[(.*)\]$/;

export class ScriptTypeMapper {
  /**
   * @param scriptRoots script class name to its resolved native root type
   */
  constructor(
    private catalog: TypeCatalog,
    private scriptRoots: ReadonlyMap<string, string>,
  ) {}

  /** No annotation, or one that names nothing known, maps to `Variant`. */
  map(annotation: string | undefined): string {
    const text = annotation?.trim();
    if (!text) return VARIANT_TYPE;

    const generic = GENERIC_ANNOTATION.exec(text);
    if (generic) return this.mapGeneric(generic[1], generic[2]);

    const direct = SCRIPT_TO_CSHARP.get(text) ?? PACKED_ARRAYS.get(text);
    if (direct) return direct;

    const scriptRoot = this.scriptRoots.get(text);
    if (scriptRoot) return scriptRoot;

    if (this.catalog.isNativeType(text)) return text;
    return VARIANT_TYPE;
  }

  private mapGeneric(container: string, argsText: string): string {
    const args = splitTopLevel(argsText, ",").map((arg) => this.map(arg));
    if (container === "Array" && args.length === 1) {
      return `Godot.Collections.Array<${args[0]}>`;
    }
    if (container === "Dictionary" && args.length === 2) {
      return `Godot.Collections.Dictionary<${args[0]}, ${args[1]}>`;
    }
    return VARIANT_TYPE;
  }
}
