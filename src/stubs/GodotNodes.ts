/**
 * Scene tree node stubs
 */

import { GodotObject, type Texture2D } from "./GodotCore.js";
import type {
  Color,
  EngineEvent,
  Error,
  GodotArray,
  NodePath,
  StringName,
  Vector2,
  Vector3,
  bool,
  double,
  float,
  int,
  uint,
} from "./GodotVariant.js";

export declare class SceneTree extends GodotObject {
  Paused: bool;
  CurrentScene: Node;

  readonly ProcessFrame: EngineEvent<() => void>;
  readonly NodeAdded: EngineEvent<(node: Node) => void>;

  Quit(exitCode?: int): void;
  ReloadCurrentScene(): Error;
}

export declare class Node extends GodotObject {
  Name: StringName;
  Owner: Node;
  SceneFilePath: string;
  UniqueNameInOwner: bool;

  /** @deprecated Use SceneFilePath instead. */
  get Filename(): string;

  readonly Ready: EngineEvent<() => void>;
  readonly TreeEntered: EngineEvent<() => void>;
  readonly TreeExiting: EngineEvent<() => void>;
  readonly ChildEnteredTree: EngineEvent<(node: Node) => void>;

  GetNode<T extends Node>(path: NodePath): T;
  GetNodeOrNull<T extends Node>(path: NodePath): T | null;
  GetParent(): Node;
  GetChildren(includeInternal?: bool): GodotArray<Node>;
  GetChildCount(includeInternal?: bool): int;
  AddChild(node: Node, forceReadableName?: bool): void;
  RemoveChild(node: Node): void;
  IsInsideTree(): bool;
  GetTree(): SceneTree;
  QueueFree(): void;
  SetProcess(enable: bool): void;

  _Ready(): void;
  _Process(delta: double): void;
  _PhysicsProcess(delta: double): void;
}

export declare class CanvasItem extends Node {
  Visible: bool;
  Modulate: Color;
  ZIndex: int;

  readonly Draw: EngineEvent<() => void>;
  readonly VisibilityChanged: EngineEvent<() => void>;

  Show(): void;
  Hide(): void;
  QueueRedraw(): void;
  IsVisibleInTree(): bool;
}

export declare class Node2D extends CanvasItem {
  Position: Vector2;
  Rotation: float;
  Scale: Vector2;
  GlobalPosition: Vector2;

  Translate(offset: Vector2): void;
  LookAt(point: Vector2): void;
  ToLocal(globalPoint: Vector2): Vector2;
}

export declare class Sprite2D extends Node2D {
  Texture: Texture2D;
  FlipH: bool;
  Frame: int;

  readonly FrameChanged: EngineEvent<() => void>;
  readonly TextureChanged: EngineEvent<() => void>;
}

export declare class CollisionObject2D extends Node2D {
  CollisionLayer: uint;
  CollisionMask: uint;

  readonly MouseEntered: EngineEvent<() => void>;
  readonly MouseExited: EngineEvent<() => void>;

  SetCollisionLayerValue(layerNumber: int, value: bool): void;
}

export declare class Area2D extends CollisionObject2D {
  Monitoring: bool;
  Monitorable: bool;

  readonly BodyEntered: EngineEvent<(body: Node2D) => void>;
  readonly BodyExited: EngineEvent<(body: Node2D) => void>;

  GetOverlappingBodies(): GodotArray<Node2D>;
  HasOverlappingBodies(): bool;
}

export declare abstract class PhysicsBody2D extends CollisionObject2D {
  AddCollisionExceptionWith(body: Node): void;
  RemoveCollisionExceptionWith(body: Node): void;
}

export declare class CharacterBody2D extends PhysicsBody2D {
  Velocity: Vector2;
  FloorMaxAngle: float;

  MoveAndSlide(): bool;
  IsOnFloor(): bool;
  IsOnWall(): bool;
  GetRealVelocity(): Vector2;
}

export declare class Node3D extends Node {
  Position: Vector3;
  Visible: bool;

  Show(): void;
  Hide(): void;
}

export declare class Timer extends Node {
  WaitTime: double;
  OneShot: bool;
  Autostart: bool;
  get TimeLeft(): double;

  readonly Timeout: EngineEvent<() => void>;

  Start(timeSec?: double): void;
  Stop(): void;
  IsStopped(): bool;
}
