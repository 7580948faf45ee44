/**
 * C# identifier and literal helpers
 */

import keywords from "./csharp_keywords.json" with { type: "json" };

const CSHARP_KEYWORDS: ReadonlySet<string> = new Set(keywords);

export function isCSharpKeyword(name: string): boolean {
  return CSHARP_KEYWORDS.has(name);
}

/** Prefix reserved words with `@` so they can be used as member names. */
export function escapeIdentifier(name: string): string {
  return isCSharpKeyword(name) ? `@${name}` : name;
}

/** Quoted regular C# string literal. */
export function toStringLiteral(value: string): string {
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\r/g, "\\r")
    .replace(/\n/g, "\\n")
    .replace(/\t/g, "\\t")
    .replace(/\0/g, "\\0");
  return `"${escaped}"`;
}
