import { describe, expect, it } from "vitest";
import { parseArgs } from "../../../src/cli/index.js";

describe("CLI arguments", () => {
  it("reads flags and repeatable stub directories", () => {
    expect(
      parseArgs([
        "-p",
        "game",
        "-o",
        "out",
        "--stubs",
        "a",
        "--stubs",
        "b",
        "--config",
        "cfg.json",
        "-v",
        "--strict",
        "--no-cache",
      ]),
    ).toEqual({
      project: "game",
      output: "out",
      stubDirs: ["a", "b"],
      config: "cfg.json",
      verbose: true,
      strict: true,
      cache: false,
      help: false,
    });
  });

  it("accepts the project as a positional argument", () => {
    const opts = parseArgs(["game", "--help"]);

    expect(opts.project).toBe("game");
    expect(opts.help).toBe(true);
  });

  it("rejects a missing value and unknown options", () => {
    expect(() => parseArgs(["-o"])).toThrow("Missing value for -o/--output");
    expect(() => parseArgs(["-p", "--strict"])).toThrow(
      "Missing value for -p/--project",
    );
    expect(() => parseArgs(["--watch"])).toThrow("Unknown option: --watch");
    expect(() => parseArgs(["game", "other"])).toThrow("Unknown option: other");
  });
});
