import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  BatchGenerator,
  CACHE_FILE_NAME,
} from "../../../src/generator/batch/batch_generator.js";
import { AggregateGeneratorError } from "../../../src/generator/errors/generator_errors.js";

const PLAYER_SCRIPT = "class_name Player extends Node2D\nvar health: int = 100\n";

describe("BatchGenerator", () => {
  let projectDir: string;
  let outputDir: string;
  const generator = new BatchGenerator();

  const write = (relativePath: string, text: string) => {
    const filePath = path.join(projectDir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, text, "utf8");
  };

  beforeEach(() => {
    projectDir = fs.mkdtempSync(path.join(os.tmpdir(), "gdbridge-project-"));
    outputDir = path.join(projectDir, "Generated", "Bridges");
  });

  afterEach(() => {
    fs.rmSync(projectDir, { recursive: true, force: true });
  });

  it("writes every unit and skips an unchanged project", () => {
    write("scripts/player.gd", PLAYER_SCRIPT);

    const first = generator.generate({ projectDir, outputDir });

    expect(first.skipped).toBe(false);
    expect(first.outputs.map((o) => [o.typeName, o.kind, o.written])).toEqual([
      ["Player", "bridge", true],
      ["Node2DProxy", "proxy", true],
    ]);
    expect(fs.existsSync(path.join(outputDir, CACHE_FILE_NAME))).toBe(true);
    expect(
      fs.readFileSync(path.join(outputDir, "Player.g.cs"), "utf8").split("\n"),
    ).toContain('    public const string ScriptPath = "res://scripts/player.gd";');

    const second = generator.generate({ projectDir, outputDir });

    expect(second.skipped).toBe(true);
    expect(second.outputs.map((o) => [o.typeName, o.written])).toEqual([
      ["Player", false],
      ["Node2DProxy", false],
    ]);

    const forced = generator.generate({ projectDir, outputDir, useCache: false });

    expect(forced.skipped).toBe(false);
    expect(forced.outputs.map((o) => o.written)).toEqual([false, false]);
  });

  it("regenerates after a change and removes stale units", () => {
    write("scripts/player.gd", PLAYER_SCRIPT);
    generator.generate({ projectDir, outputDir });

    fs.rmSync(path.join(projectDir, "scripts", "player.gd"));
    write("scripts/enemy.gd", "class_name Enemy extends Node\n");
    const result = generator.generate({ projectDir, outputDir });

    expect(result.skipped).toBe(false);
    expect(result.outputs.map((o) => o.typeName)).toEqual(["Enemy", "NodeProxy"]);
    expect(fs.existsSync(path.join(outputDir, "Enemy.g.cs"))).toBe(true);
    expect(fs.existsSync(path.join(outputDir, "Player.g.cs"))).toBe(false);
    expect(fs.existsSync(path.join(outputDir, "Node2DProxy.g.cs"))).toBe(false);
  });

  it("applies the configuration file found in the project", () => {
    write("scripts/player.gd", PLAYER_SCRIPT);
    write("gdbridge.config.json", '{ "appendSuffixToClassNames": true }');

    const result = generator.generate({ projectDir, outputDir });

    expect(result.outputs.map((o) => o.typeName)).toEqual([
      "PlayerBridge",
      "Node2DProxy",
    ]);
  });

  it("warns about an invalid configuration and uses the defaults", () => {
    write("scripts/player.gd", PLAYER_SCRIPT);
    write("config/gdbridge.config.json", '{ "appendSuffixToClassNames": "yes" }');

    const result = generator.generate({ projectDir, outputDir });

    expect(result.outputs.map((o) => o.typeName)).toEqual(["Player", "Node2DProxy"]);
    expect(result.diagnostics.map((d) => `${d.code}:${d.severity}`)).toEqual([
      "ConfigurationError:warning",
    ]);
    expect(
      result.diagnostics[0]?.message.startsWith(
        "Ignoring configuration: appendSuffixToClassNames: ",
      ),
    ).toBe(true);
  });

  it("places bridges in the namespace of an existing partial class", () => {
    write("scripts/player.gd", PLAYER_SCRIPT);
    write("Code/Player.cs", "namespace Game\n{\n    public partial class Player { }\n}\n");

    generator.generate({ projectDir, outputDir });
    const lines = fs
      .readFileSync(path.join(outputDir, "Player.g.cs"), "utf8")
      .split("\n");

    expect(lines.slice(5, 7)).toEqual(["namespace Game", "{"]);
    expect(lines).toContain("    public partial class Player : Node2DProxy");
  });

  it("reads engine types from extra stub directories", () => {
    const stubDir = fs.mkdtempSync(path.join(os.tmpdir(), "gdbridge-stubs-"));
    try {
      fs.writeFileSync(
        path.join(stubDir, "Turret.ts"),
        "export declare class Turret extends Node2D { Fire(): void; }\n",
      );
      write("tower.gd", "class_name Tower extends Turret\n");

      const result = generator.generate({ projectDir, outputDir, stubDirs: [stubDir] });

      expect(result.outputs.map((o) => o.typeName)).toEqual(["Tower", "TurretProxy"]);
      expect(
        fs.readFileSync(path.join(outputDir, "TurretProxy.g.cs"), "utf8").split("\n"),
      ).toContain("    public void Fire() => _native.Fire();");
    } finally {
      fs.rmSync(stubDir, { recursive: true, force: true });
    }
  });

  it("throws for error diagnostics only in strict mode", () => {
    write("a.gd", "class_name A extends B\n");
    write("b.gd", "class_name B extends A\n");

    const lenient = generator.generate({ projectDir, outputDir });

    expect(lenient.diagnostics.map((d) => d.code)).toEqual([
      "CyclicInheritance",
      "CyclicInheritance",
    ]);
    expect(() =>
      generator.generate({ projectDir, outputDir, strict: true, useCache: false }),
    ).toThrow(AggregateGeneratorError);
  });

  it("reports cached diagnostics again when the project is unchanged", () => {
    write("a.gd", "class_name A extends B\n");
    write("b.gd", "class_name B extends A\n");

    const first = generator.generate({ projectDir, outputDir });
    const second = generator.generate({ projectDir, outputDir });

    expect(second.skipped).toBe(true);
    expect(second.diagnostics.map(AggregateGeneratorError.formatLine)).toEqual(
      first.diagnostics.map(AggregateGeneratorError.formatLine),
    );
    expect(second.diagnostics.map((d) => `${d.code}:${d.severity}`)).toEqual([
      "CyclicInheritance:error",
      "CyclicInheritance:error",
    ]);
  });

  it("fails every strict run of an unchanged broken project", () => {
    write("a.gd", "class_name A extends B\n");
    write("b.gd", "class_name B extends A\n");

    expect(() => generator.generate({ projectDir, outputDir, strict: true })).toThrow(
      AggregateGeneratorError,
    );
    expect(() => generator.generate({ projectDir, outputDir, strict: true })).toThrow(
      AggregateGeneratorError,
    );
  });
});
