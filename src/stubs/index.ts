/**
 * Engine stub barrel
 */

// Variant and value types
export type {
  bool,
  byte,
  Callable,
  Color,
  double,
  EngineEvent,
  Error,
  float,
  GodotArray,
  GodotDictionary,
  int,
  long,
  NodePath,
  Rect2,
  Rid,
  StringName,
  Transform2D,
  uint,
  ulong,
  Variant,
  Vector2,
  Vector2I,
  Vector3,
} from "./GodotVariant.js";
// Object root and resources
export type {
  GodotObject,
  PackedScene,
  RefCounted,
  Resource,
  Script,
  Texture2D,
} from "./GodotCore.js";
// Scene tree nodes
export type {
  Area2D,
  CanvasItem,
  CharacterBody2D,
  CollisionObject2D,
  Node,
  Node2D,
  Node3D,
  PhysicsBody2D,
  SceneTree,
  Sprite2D,
  Timer,
} from "./GodotNodes.js";
// UI controls
export type { BaseButton, Button, Control, Label } from "./GodotControls.js";
