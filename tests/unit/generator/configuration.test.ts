import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  DEFAULT_CONFIGURATION,
  loadConfiguration,
  parseConfiguration,
} from "../../../src/generator/config/configuration.js";

describe("parseConfiguration", () => {
  it("fills in defaults for missing flags", () => {
    expect(parseConfiguration('{ "appendSuffixToClassNames": true }')).toEqual({
      configuration: {
        appendSuffixToClassNames: true,
        generateOnlyForExistingPartial: false,
      },
    });
  });

  it("trims the default namespace and drops an empty one", () => {
    expect(
      parseConfiguration('{ "defaultNamespace": "  Game.Bridges " }').configuration
        .defaultNamespace,
    ).toBe("Game.Bridges");
    expect(
      parseConfiguration('{ "defaultNamespace": "   " }').configuration
        .defaultNamespace,
    ).toBeUndefined();
  });

  it("falls back to defaults for malformed JSON", () => {
    const result = parseConfiguration("{ not json");

    expect(result.configuration).toBe(DEFAULT_CONFIGURATION);
    expect(result.problem?.startsWith("Invalid JSON: ")).toBe(true);
  });

  it("never applies a document with a wrongly typed field", () => {
    const result = parseConfiguration(
      '{ "appendSuffixToClassNames": true, "generateOnlyForExistingPartial": "yes" }',
    );

    expect(result.configuration).toBe(DEFAULT_CONFIGURATION);
    expect(result.problem?.startsWith("generateOnlyForExistingPartial: ")).toBe(true);
  });
});

describe("loadConfiguration", () => {
  const tempDirs: string[] = [];

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("uses defaults without a path", () => {
    expect(loadConfiguration()).toEqual({ configuration: DEFAULT_CONFIGURATION });
  });

  it("reads a configuration file", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "gdbridge-config-"));
    tempDirs.push(dir);
    const file = path.join(dir, "gdbridge.config.json");
    fs.writeFileSync(file, '{ "generateOnlyForExistingPartial": true }');

    expect(loadConfiguration(file).configuration.generateOnlyForExistingPartial).toBe(
      true,
    );
  });

  it("reports an unreadable file", () => {
    const result = loadConfiguration(path.join(os.tmpdir(), "gdbridge-missing", "x.json"));

    expect(result.configuration).toBe(DEFAULT_CONFIGURATION);
    expect(result.problem).toBeDefined();
  });
});
