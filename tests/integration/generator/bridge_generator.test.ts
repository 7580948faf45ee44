/**
 * End-to-end generation over in-memory scripts and the shared engine stubs
 */

import { describe, expect, it } from "vitest";
import { generateBridges } from "../../../src/generator/bridge_generator.js";
import { buildCatalog } from "../../../src/generator/catalog/type_catalog.js";
import {
  type BridgeConfiguration,
  DEFAULT_CONFIGURATION,
} from "../../../src/generator/config/configuration.js";
import type { SourceText } from "../../../src/generator/frontend/types.js";
import { engineStubs } from "../../helpers/engine_stubs.js";

function run(
  scripts: SourceText[],
  configuration: Readonly<BridgeConfiguration> = DEFAULT_CONFIGURATION,
  projectSources: SourceText[] = [],
) {
  const catalog = buildCatalog({ stubSources: engineStubs(), projectSources });
  return generateBridges({ scripts, catalog, configuration });
}

function unitNames(result: ReturnType<typeof run>): string[] {
  return result.units.map((unit) => unit.hintName);
}

function sourceOf(result: ReturnType<typeof run>, typeName: string): string {
  const unit = result.units.find((u) => u.typeName === typeName);
  if (!unit) throw new Error(`no unit for ${typeName}`);
  return unit.source;
}

describe("generateBridges", () => {
  it("emits one bridge and one proxy for a class on an engine type", () => {
    const result = run([
      { path: "hero.gd", text: "class_name Hero extends Node\nvar health: int = 100\n" },
    ]);

    expect(unitNames(result)).toEqual(["Hero.g.cs", "NodeProxy.g.cs"]);
    expect(result.units.map((u) => u.kind)).toEqual(["bridge", "proxy"]);
    expect(result.usedNativeTypes).toEqual(["Node"]);
    expect(result.diagnostics).toEqual([]);

    const lines = sourceOf(result, "Hero").split("\n");
    expect(lines).toContain("    public long health");
    expect(lines).toContain("        get => Native.Get(PropertyName.health).As<long>();");
    expect(lines).toContain(
      "        set => Native.Set(PropertyName.health, Variant.From(value));",
    );
  });

  it("bases a derived class on its parent bridge and shared engine root", () => {
    const result = run([
      { path: "b.gd", text: "class_name B extends A\n" },
      { path: "a.gd", text: "class_name A extends Node2D\n" },
    ]);

    expect(unitNames(result)).toEqual(["B.g.cs", "A.g.cs", "Node2DProxy.g.cs"]);
    const lines = sourceOf(result, "B").split("\n");
    expect(lines).toContain("public partial class B : A");
    expect(lines).toContain("    public B(Node2D native) : base(native) { }");
  });

  it("still emits a class whose base is unknown", () => {
    const result = run([
      { path: "orc.gd", text: "class_name Orc extends Missing\n" },
      { path: "hero.gd", text: "class_name Hero extends Node\n" },
    ]);

    expect(unitNames(result)).toEqual(["Orc.g.cs", "Hero.g.cs", "NodeProxy.g.cs"]);
    expect(sourceOf(result, "Orc").split("\n")).toContain(
      "public partial class Orc : __INVALID_BASE__",
    );
    expect(result.diagnostics.map((d) => `${d.code}:${d.severity}`)).toEqual([
      "UnresolvedBase:warning",
    ]);
  });

  it("skips classes without an existing partial type when asked to", () => {
    const result = run(
      [
        { path: "player.gd", text: "class_name Player extends Node2D\n" },
        { path: "enemy.gd", text: "class_name Enemy extends Node\n" },
      ],
      { ...DEFAULT_CONFIGURATION, generateOnlyForExistingPartial: true },
      [{ path: "Player.cs", text: "namespace Game { public partial class Player { } }" }],
    );

    expect(unitNames(result)).toEqual(["Player.g.cs", "Node2DProxy.g.cs"]);
    expect(sourceOf(result, "Player").split("\n").slice(5, 7)).toEqual([
      "namespace Game",
      "{",
    ]);
  });

  it("carries obsolete markers onto forwarded members", () => {
    const result = run([{ path: "hero.gd", text: "class_name Hero extends Node\n" }]);
    const lines = sourceOf(result, "NodeProxy").split("\n");
    const index = lines.indexOf('    [System.Obsolete("Use SceneFilePath instead.")]');

    expect(lines.slice(index - 2, index + 1)).toEqual([
      "    #pragma warning disable CS0612, CS0618",
      '    /// <inheritdoc cref="Godot.Node.Filename"/>',
      '    [System.Obsolete("Use SceneFilePath instead.")]',
    ]);
  });

  it("emits each used engine type exactly once", () => {
    const result = run([
      { path: "a.gd", text: "class_name First extends Node2D\n" },
      { path: "b.gd", text: "class_name Second extends Node2D\n" },
      { path: "c.gd", text: "class_name Third extends First\n" },
      { path: "d.gd", text: "class_name Fourth extends Node\n" },
      { path: "e.gd", text: "class_name Fifth extends Resource\n" },
    ]);

    expect(result.units.filter((u) => u.kind === "proxy").map((u) => u.typeName)).toEqual([
      "NodeProxy",
      "Node2DProxy",
      "ResourceProxy",
    ]);
    expect(result.usedNativeTypes).toEqual(["Node", "Node2D", "Resource"]);
  });

  it("produces identical output for identical input", () => {
    const scripts = [
      { path: "scripts/player.gd", text: "class_name Player extends Node2D\nvar hp := 3\n" },
      { path: "scripts/boss.gd", text: "class_name Boss extends Player\nfunc roar():\n\tpass\n" },
    ];

    expect(run(scripts).units).toEqual(run(scripts).units);
  });

  it("suffixes bridge names and applies the default namespace", () => {
    const result = run(
      [{ path: "player.gd", text: "class_name Player extends Node2D\n" }],
      {
        appendSuffixToClassNames: true,
        generateOnlyForExistingPartial: false,
        defaultNamespace: "Game.Bridges",
      },
    );

    expect(unitNames(result)).toEqual(["PlayerBridge.g.cs", "Node2DProxy.g.cs"]);
    expect(sourceOf(result, "PlayerBridge").split("\n")).toContain(
      "    public partial class PlayerBridge : global::Game.Bridges.Node2DProxy",
    );
    expect(sourceOf(result, "Node2DProxy").split("\n").slice(5, 7)).toEqual([
      "namespace Game.Bridges",
      "{",
    ]);
  });

  it("omits classes on an inheritance cycle and keeps the rest", () => {
    const result = run([
      { path: "a.gd", text: "class_name A extends B\n" },
      { path: "b.gd", text: "class_name B extends A\n" },
      { path: "c.gd", text: "class_name C extends Node\n" },
    ]);

    expect(unitNames(result)).toEqual(["C.g.cs", "NodeProxy.g.cs"]);
    expect(
      result.diagnostics.filter((d) => d.code === "CyclicInheritance"),
    ).toHaveLength(2);
  });

  it("drops malformed, class-less and duplicate scripts with warnings", () => {
    const result = run([
      { path: "broken.gd", text: "class_name Broken\nfunc (x):\n\tpass\n" },
      { path: "anonymous.gd", text: "extends Node\n" },
      { path: "a.gd", text: "class_name Dup extends Node\n" },
      { path: "b.gd", text: "class_name Dup extends Node2D\n" },
    ]);

    expect(unitNames(result)).toEqual(["Dup.g.cs", "NodeProxy.g.cs"]);
    expect(result.diagnostics.map((d) => d.code)).toEqual([
      "ParseError",
      "DuplicateClass",
    ]);
    expect(result.diagnostics[1]?.message).toBe("Class 'Dup' is already declared in a.gd");
    expect(result.diagnostics[1]?.location.filePath).toBe("b.gd");
  });
});
