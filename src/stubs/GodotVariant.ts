/**
 * Godot scalar aliases, variant and value type stubs.
 *
 * Value types are available to the catalog by name but are not engine
 * classes: they do not derive from GodotObject and never get a proxy.
 */

export type int = number;
export type uint = number;
export type long = number;
export type ulong = number;
export type float = number;
export type double = number;
export type byte = number;
export type bool = boolean;

/** Engine event; the type argument is the handler signature. */
export type EngineEvent<THandler> = { readonly handler?: THandler };

export declare enum Error {
  Ok = 0,
  Failed = 1,
}

export declare class Variant {
  VariantType: int;
}

export declare class StringName {
  IsEmpty(): bool;
}

export declare class NodePath {
  IsAbsolute(): bool;
  GetNameCount(): int;
}

export declare class Callable {
  Call(...args: Variant[]): Variant;
}

export declare class Vector2 {
  X: float;
  Y: float;
  Length(): float;
  Normalized(): Vector2;
}

export declare class Vector2I {
  X: int;
  Y: int;
}

export declare class Vector3 {
  X: float;
  Y: float;
  Z: float;
  Length(): float;
}

export declare class Color {
  R: float;
  G: float;
  B: float;
  A: float;
}

export declare class Rect2 {
  Position: Vector2;
  Size: Vector2;
}

export declare class Transform2D {
  Origin: Vector2;
}

export declare class Rid {
  IsValid: bool;
}

export declare class GodotArray<T> {
  readonly Count: int;
  Add(item: T): void;
}

export declare class GodotDictionary<TKey, TValue> {
  readonly Count: int;
  ContainsKey(key: TKey): bool;
  Get(key: TKey): TValue;
}
