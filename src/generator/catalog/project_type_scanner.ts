/**
 * Lightweight scanner for types already declared in the project's C# sources.
 *
 * Only top-level declarations are recorded, with the namespace that
 * encloses them (block-scoped or file-scoped). Nested types are ignored.
 */

import type { SourceText } from "../frontend/types.js";
import type { AvailableType } from "./types.js";

const TYPE_KEYWORDS = new Set(["class", "struct", "interface", "record", "enum"]);

type Token =
  | { kind: "word"; text: string; verbatim: boolean }
  | { kind: "punct"; text: "{" | "}" | ";" | "." };

type FrameKind = "namespace" | "type" | "other";

interface Frame {
  kind: FrameKind;
  namespace?: string;
}

export function scanProjectTypes(sources: SourceText[]): AvailableType[] {
  const types: AvailableType[] = [];
  for (const source of sources) {
    types.push(...scanSource(source.text));
  }
  return types;
}

function scanSource(text: string): AvailableType[] {
  const tokens = tokenize(stripTrivia(text));
  const types: AvailableType[] = [];
  const frames: Frame[] = [];
  let fileNamespace: string | undefined;
  let pending: { kind: "namespace"; name: string } | { kind: "type" } | null =
    null;

  const currentNamespace = (): string | undefined => {
    for (let i = frames.length - 1; i >= 0; i--) {
      const ns = frames[i].namespace;
      if (ns !== undefined) return ns;
    }
    return fileNamespace;
  };
  const atTopLevel = () => frames.every((frame) => frame.kind === "namespace");

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];

    if (token.kind === "punct") {
      if (token.text === "{") {
        if (pending?.kind === "namespace") {
          const outer = currentNamespace();
          frames.push({
            kind: "namespace",
            namespace: outer ? `${outer}.${pending.name}` : pending.name,
          });
        } else {
          frames.push({ kind: pending?.kind === "type" ? "type" : "other" });
        }
        pending = null;
      } else if (token.text === "}") {
        frames.pop();
        pending = null;
      } else if (token.text === ";") {
        if (pending?.kind === "namespace") fileNamespace = pending.name;
        pending = null;
      }
      continue;
    }

    if (token.verbatim) continue;

    if (token.text === "namespace") {
      const { name, next } = readQualifiedName(tokens, i + 1);
      if (name) {
        pending = { kind: "namespace", name };
        i = next - 1;
      }
      continue;
    }

    if (!TYPE_KEYWORDS.has(token.text)) continue;

    let nameIndex = i + 1;
    const afterRecord = tokens[nameIndex];
    if (
      token.text === "record" &&
      afterRecord?.kind === "word" &&
      !afterRecord.verbatim &&
      (afterRecord.text === "class" || afterRecord.text === "struct")
    ) {
      nameIndex++;
    }
    const nameToken = tokens[nameIndex];
    if (nameToken?.kind !== "word") continue;
    if (!nameToken.verbatim && TYPE_KEYWORDS.has(nameToken.text)) continue;

    if (atTopLevel() && pending === null) {
      const namespace = currentNamespace();
      types.push({
        name: nameToken.text,
        ...(namespace ? { namespace } : {}),
        isNative: false,
      });
    }
    pending ??= { kind: "type" };
    i = nameIndex;
  }

  return types;
}

function readQualifiedName(
  tokens: Token[],
  start: number,
): { name: string | null; next: number } {
  const parts: string[] = [];
  let i = start;
  while (i < tokens.length) {
    const token = tokens[i];
    if (token.kind !== "word") break;
    parts.push(token.text);
    i++;
    const dot = tokens[i];
    if (dot?.kind !== "punct" || dot.text !== ".") break;
    i++;
  }
  return { name: parts.length > 0 ? parts.join(".") : null, next: i };
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  const word = /@?[A-Za-z_][A-Za-z0-9_]*/y;
  for (let i = 0; i < text.length; ) {
    const c = text[i];
    if (c === "{" || c === "}" || c === ";" || c === ".") {
      tokens.push({ kind: "punct", text: c });
      i++;
      continue;
    }
    word.lastIndex = i;
    const match = word.exec(text);
    if (match) {
      const raw = match[0];
      const verbatim = raw.startsWith("@");
      tokens.push({ kind: "word", text: verbatim ? raw.slice(1) : raw, verbatim });
      i += raw.length;
      continue;
    }
    i++;
  }
  return tokens;
}

/**
 * Replace comments, string literals and character literals with spaces.
 */
export function stripTrivia(text: string): string {
  let out = "";
  let i = 0;
  while (i < text.length) {
    const c = text[i];
    const next = text[i + 1];

    if (c === "/" && next === "/") {
      while (i < text.length && text[i] !== "\n") i++;
      continue;
    }
    if (c === "/" && next === "*") {
      const end = text.indexOf("*/", i + 2);
      i = end < 0 ? text.length : end + 2;
      out += " ";
      continue;
    }

    const verbatim = /^\$?@\$?"/.exec(text.slice(i, i + 3));
    if (verbatim) {
      i += verbatim[0].length;
      while (i < text.length) {
        if (text[i] === '"' && text[i + 1] === '"') i += 2;
        else if (text[i] === '"') break;
        else i++;
      }
      i++;
      out += " ";
      continue;
    }
    if (c === '"' || c === "'" || (c === "$" && next === '"')) {
      const quote = c === "$" ? '"' : c;
      i += c === "$" ? 2 : 1;
      while (i < text.length && text[i] !== quote && text[i] !== "\n") {
        i += text[i] === "\\" ? 2 : 1;
      }
      i++;
      out += " ";
      continue;
    }

    out += c;
    i++;
  }
  return out;
}
