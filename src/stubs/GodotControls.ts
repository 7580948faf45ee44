/**
 * GUI control stubs
 */

import { CanvasItem } from "./GodotNodes.js";
import type { EngineEvent, Vector2, bool } from "./GodotVariant.js";

export declare class Control extends CanvasItem {
  Size: Vector2;
  TooltipText: string;

  readonly FocusEntered: EngineEvent<() => void>;
  readonly Resized: EngineEvent<() => void>;

  GrabFocus(): void;
  HasFocus(): bool;
}

export declare class Label extends Control {
  Text: string;
  Uppercase: bool;
}

export declare abstract class BaseButton extends Control {
  Disabled: bool;
  ButtonPressed: bool;

  readonly Pressed: EngineEvent<() => void>;
  readonly Toggled: EngineEvent<(toggledOn: bool) => void>;
}

export declare class Button extends BaseButton {
  Text: string;
  Flat: bool;
}
