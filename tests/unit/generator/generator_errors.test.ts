import { describe, expect, it } from "vitest";
import { ErrorCollector } from "../../../src/generator/errors/error_collector.js";
import {
  AggregateGeneratorError,
  GeneratorError,
  ScriptParseError,
} from "../../../src/generator/errors/generator_errors.js";

describe("generator errors", () => {
  it("formats a diagnostic with its location and hint", () => {
    const error = new GeneratorError(
      "UnresolvedBase",
      "warning",
      "Base 'Missing' of 'Orc' is neither a script class nor an engine type",
      { filePath: "orc.gd", line: 1, column: 1 },
      "Check the extends clause.",
    );

    expect(AggregateGeneratorError.formatLine(error)).toBe(
      "- [UnresolvedBase] orc.gd:1:1 Base 'Missing' of 'Orc' is neither a script class nor an engine type (hint: Check the extends clause.)",
    );
  });

  it("converts parse errors into warnings", () => {
    const diagnostic = new ScriptParseError("Duplicate class_name declaration", "a.gd", 3).toGeneratorError();

    expect(diagnostic.code).toBe("ParseError");
    expect(diagnostic.severity).toBe("warning");
    expect(diagnostic.location).toEqual({ filePath: "a.gd", line: 3, column: 1 });
  });

  it("throws only for error severity", () => {
    const collector = new ErrorCollector();
    collector.add(
      new GeneratorError("DuplicateClass", "warning", "dup", {
        filePath: "b.gd",
        line: 1,
        column: 1,
      }),
    );
    expect(() => collector.throwIfErrors()).not.toThrow();

    collector.add(
      new GeneratorError("CyclicInheritance", "error", "cycle", {
        filePath: "c.gd",
        line: 1,
        column: 1,
      }),
    );

    expect(collector.hasErrors()).toBe(true);
    expect(collector.getDiagnostics()).toHaveLength(2);
    expect(() => collector.throwIfErrors()).toThrow(
      "Bridge generation failed with 1 error(s):\n- [CyclicInheritance] c.gd:1:1 cycle",
    );
  });
});
