import { describe, expect, it } from "vitest";
import {
  escapeIdentifier,
  isCSharpKeyword,
  toStringLiteral,
} from "../../../src/generator/codegen/csharp_identifiers.js";

describe("C# identifiers", () => {
  it("escapes reserved words only", () => {
    expect(isCSharpKeyword("event")).toBe(true);
    expect(isCSharpKeyword("Event")).toBe(false);
    expect(escapeIdentifier("base")).toBe("@base");
    expect(escapeIdentifier("object")).toBe("@object");
    expect(escapeIdentifier("speed")).toBe("speed");
    // contextual keywords stay usable as names
    expect(escapeIdentifier("value")).toBe("value");
  });

  it("quotes and escapes string literals", () => {
    expect(toStringLiteral("health")).toBe('"health"');
    expect(toStringLiteral('say "hi"')).toBe('"say \\"hi\\""');
    expect(toStringLiteral("a\\b\nc")).toBe('"a\\\\b\\nc"');
  });
});
