import { describe, expect, it } from "vitest";
import { buildCatalog } from "../../../src/generator/catalog/type_catalog.js";
import {
  collectInheritedNames,
  emitBridge,
  toScriptResourcePath,
} from "../../../src/generator/codegen/bridge_emitter.js";
import { ScriptTypeMapper } from "../../../src/generator/codegen/script_type_mapper.js";
import {
  type BridgeConfiguration,
  DEFAULT_CONFIGURATION,
} from "../../../src/generator/config/configuration.js";
import { ErrorCollector } from "../../../src/generator/errors/error_collector.js";
import { BridgeNaming } from "../../../src/generator/frontend/bridge_naming.js";
import { parseScript } from "../../../src/generator/frontend/gdscript_parser.js";
import { InheritanceResolver } from "../../../src/generator/frontend/inheritance_resolver.js";
import { ScriptRegistry } from "../../../src/generator/frontend/script_registry.js";
import { engineStubs } from "../../helpers/engine_stubs.js";

const PLAYER_SOURCE = [
  "class_name Player extends Node2D",
  "",
  "signal died",
  "signal hit(amount: int)",
  "",
  "@export var speed: float = 200.0",
  "var _secret := 1",
  "var data",
  "",
  "func jump(height: float, boost = 2) -> bool:",
  "\treturn true",
  "",
  "func _ready():",
  "\tpass",
].join("\n");

const BOSS_SOURCE = [
  "class_name Boss extends Player",
  "var speed: float",
  "func roar():",
  "\tpass",
].join("\n");

function emit(
  scripts: Array<[path: string, source: string]>,
  className: string,
  configuration: Readonly<BridgeConfiguration> = DEFAULT_CONFIGURATION,
): string {
  const registry = new ScriptRegistry();
  for (const [path, source] of scripts) {
    const parsed = parseScript(source, path);
    if (parsed) registry.register(parsed);
  }
  const catalog = buildCatalog({ stubSources: engineStubs(), projectSources: [] });
  const resolver = new InheritanceResolver(
    registry,
    catalog,
    new BridgeNaming(catalog, configuration),
    new ErrorCollector(),
  );
  const resolutions = resolver.resolveAll();
  const roots = new Map<string, string>();
  for (const [name, resolution] of resolutions) {
    if (resolution.status === "resolved") {
      roots.set(name, resolution.resolved.nativeRootTypeName);
    }
  }
  const resolution = resolutions.get(className);
  const scriptClass = registry.getClass(className);
  if (!resolution || resolution.status === "cyclic" || !scriptClass) {
    throw new Error(`${className} did not resolve`);
  }
  return emitBridge(resolution.resolved, {
    typeMapper: new ScriptTypeMapper(catalog, roots),
    inherited: collectInheritedNames(registry, scriptClass),
  });
}

describe("emitBridge", () => {
  it("writes a complete bridge for a class on an engine type", () => {
    const source = emit([["scripts/player.gd", PLAYER_SOURCE]], "Player");

    expect(source).toBe(
      [
        "// <auto-generated>",
        "//     This file was generated by gdscript-bridge. Do not edit it by hand.",
        "// </auto-generated>",
        "#nullable disable",
        "",
        "using System;",
        "using Godot;",
        "",
        "public partial class Player : Node2DProxy",
        "{",
        "    public Player(Node2D native) : base(native) { }",
        "",
        '    public const string ScriptClassName = "Player";',
        '    public const string ScriptPath = "res://scripts/player.gd";',
        "",
        "    public static Script LoadScript() => GD.Load<Script>(ScriptPath);",
        "",
        "    public double speed",
        "    {",
        "        get => Native.Get(PropertyName.speed).As<double>();",
        "        set => Native.Set(PropertyName.speed, Variant.From(value));",
        "    }",
        "",
        "    public long _secret",
        "    {",
        '        get => Native.Get("_secret").As<long>();',
        '        set => Native.Set("_secret", Variant.From(value));',
        "    }",
        "",
        "    public Variant data",
        "    {",
        "        get => Native.Get(PropertyName.data);",
        "        set => Native.Set(PropertyName.data, value);",
        "    }",
        "",
        "    public bool jump(double height) => Native.Call(MethodName.jump, Variant.From(height)).As<bool>();",
        "",
        "    public bool jump(double height, Variant boost) => Native.Call(MethodName.jump, Variant.From(height), boost).As<bool>();",
        "",
        '    public void _ready() => Native.Call("_ready");',
        "",
        "    public event Action died",
        "    {",
        "        add => Native.Connect(SignalName.died, Callable.From(value));",
        "        remove => Native.Disconnect(SignalName.died, Callable.From(value));",
        "    }",
        "",
        "    public event Action<long> hit",
        "    {",
        "        add => Native.Connect(SignalName.hit, Callable.From(value));",
        "        remove => Native.Disconnect(SignalName.hit, Callable.From(value));",
        "    }",
        "",
        "    public new class PropertyName : Node2DProxy.PropertyName",
        "    {",
        '        public const string speed = "speed";',
        '        public const string data = "data";',
        "    }",
        "",
        "    public new class MethodName : Node2DProxy.MethodName",
        "    {",
        '        public const string jump = "jump";',
        "    }",
        "",
        "    public new class SignalName : Node2DProxy.SignalName",
        "    {",
        '        public const string died = "died";',
        '        public const string hit = "hit";',
        "    }",
        "}",
        "",
      ].join("\n"),
    );
  });

  it("hides members and constants of a parent bridge", () => {
    const lines = emit(
      [
        ["scripts/player.gd", PLAYER_SOURCE],
        ["scripts/boss.gd", BOSS_SOURCE],
      ],
      "Boss",
    ).split("\n");

    expect(lines).toContain("public partial class Boss : Player");
    expect(lines).toContain("    public Boss(Node2D native) : base(native) { }");
    expect(lines).toContain('    public new const string ScriptClassName = "Boss";');
    expect(lines).toContain(
      "    public new static Script LoadScript() => GD.Load<Script>(ScriptPath);",
    );
    expect(lines).toContain("    public new double speed");
    expect(lines).toContain("    public void roar() => Native.Call(MethodName.roar);");
    expect(lines).toContain("    public new class PropertyName : Player.PropertyName");
    expect(lines).toContain('        public new const string speed = "speed";');
    expect(lines).toContain('        public const string roar = "roar";');
  });

  it("wraps the class in its namespace", () => {
    const lines = emit([["player.gd", PLAYER_SOURCE]], "Player", {
      ...DEFAULT_CONFIGURATION,
      appendSuffixToClassNames: true,
      defaultNamespace: "Game.Bridges",
    }).split("\n");

    expect(lines.slice(3, 12)).toEqual([
      "#nullable disable",
      "",
      "namespace Game.Bridges",
      "{",
      "    using System;",
      "    using Godot;",
      "",
      "    public partial class PlayerBridge : global::Game.Bridges.Node2DProxy",
      "    {",
    ]);
    expect(lines.slice(-3)).toEqual(["    }", "}", ""]);
  });

  it("uses the placeholder base when the chain is unresolved", () => {
    const lines = emit([["orc.gd", "class_name Orc extends Missing\n"]], "Orc").split(
      "\n",
    );

    expect(lines).toContain("public partial class Orc : __INVALID_BASE__");
    expect(lines).toContain("    public Orc(__INVALID_BASE__ native) : base(native) { }");
    expect(lines).toContain('    public const string ScriptClassName = "Orc";');
    expect(lines).toContain(
      "    public new class SignalName : __INVALID_BASE__.SignalName",
    );
  });
});

describe("toScriptResourcePath", () => {
  it("normalizes project-relative paths", () => {
    expect(toScriptResourcePath("scripts\\enemy.gd")).toBe("res://scripts/enemy.gd");
    expect(toScriptResourcePath("res://enemy.gd")).toBe("res://enemy.gd");
    expect(toScriptResourcePath("./enemy.gd")).toBe("res://enemy.gd");
  });
});
