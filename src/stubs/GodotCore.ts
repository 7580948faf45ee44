/**
 * Core engine class stubs: the object root, reference counting and resources
 */

import type { Node } from "./GodotNodes.js";
import type {
  Callable,
  EngineEvent,
  Error,
  Rid,
  StringName,
  Variant,
  bool,
  int,
  uint,
  ulong,
} from "./GodotVariant.js";

export declare class GodotObject {
  readonly ScriptChanged: EngineEvent<() => void>;
  readonly PropertyListChanged: EngineEvent<() => void>;

  static InstanceFromId(instanceId: ulong): GodotObject;
  static IsInstanceValid(instance: GodotObject): bool;

  GetInstanceId(): ulong;
  Get(property: StringName): Variant;
  Set(property: StringName, value: Variant): void;
  Call(method: StringName, ...args: Variant[]): Variant;
  HasMethod(method: StringName): bool;
  Connect(signal: StringName, callable: Callable, flags?: uint): Error;
  Disconnect(signal: StringName, callable: Callable): void;
  EmitSignal(signal: StringName, ...args: Variant[]): Error;
  IsConnected(signal: StringName, callable: Callable): bool;
  GetScript(): Variant;
  SetScript(script: Variant): void;
  IsQueuedForDeletion(): bool;
  Free(): void;
  ToString(): string;

  _Get(property: StringName): Variant;
  _Set(property: StringName, value: Variant): bool;
}

export declare class RefCounted extends GodotObject {
  InitRef(): bool;
  Reference(): bool;
  Unreference(): bool;
  GetReferenceCount(): int;
}

export declare class Resource extends RefCounted {
  ResourceName: string;
  ResourcePath: string;
  ResourceLocalToScene: bool;

  readonly Changed: EngineEvent<() => void>;

  Duplicate(subresources?: bool): Resource;
  EmitChanged(): void;
  GetRid(): Rid;

  /** @deprecated This method should only be called internally. */
  SetupLocalToScene(): void;
}

export declare class Script extends Resource {
  CanInstantiate(): bool;
  GetInstanceBaseType(): StringName;
}

export declare class Texture2D extends Resource {
  GetWidth(): int;
  GetHeight(): int;
}

export declare class PackedScene extends Resource {
  CanInstantiate(): bool;
  Instantiate(editState?: int): Node;
}
