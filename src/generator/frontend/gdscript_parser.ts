/**
 * Declaration-level GDScript parser.
 *
 * Only top-level statements are inspected: `class_name`, `extends`, `var`,
 * `func` and `signal`. Statement bodies, accessor blocks and inner classes
 * are indented and therefore skipped.
 */

import { ScriptParseError } from "../errors/generator_errors.js";
import { nativeKindFromScriptName, nativeTypeNameOf } from "./native_kinds.js";
import {
  type BaseRef,
  normalizeSourcePath,
  type ScriptClass,
  type ScriptFunction,
  type ScriptParameter,
  type ScriptSignal,
  type ScriptVariable,
} from "./types.js";

interface LogicalLine {
  text: string;
  line: number;
  indented: boolean;
}

interface ScanResult {
  lines: LogicalLine[];
  error: ScriptParseError | null;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*/;
const OPENING = "([{";
const CLOSING = ")]}";

export class GDScriptParser {
  private filePath = "<inline>";
  private firstError: ScriptParseError | null = null;

  /**
   * Parse one script. Returns null when the source declares no
   * `class_name`; throws ScriptParseError for a malformed declaration.
   */
  parse(source: string, filePath = "<inline>"): ScriptClass | null {
    this.filePath = filePath;
    this.firstError = null;

    const scan = scanLogicalLines(source, filePath);
    this.firstError = scan.error;

    let className: string | null = null;
    let baseRef: BaseRef | undefined;
    const variables: ScriptVariable[] = [];
    const functions: ScriptFunction[] = [];
    const signals: ScriptSignal[] = [];

    for (const logical of scan.lines) {
      if (logical.indented) continue;

      // `@export`, `@onready` and friends do not change the bridge surface
      const rest = stripAnnotations(logical.text);
      if (rest.length === 0) continue;

      try {
        if (/^class_name\b/.test(rest)) {
          const parsed = this.parseClassName(rest, logical.line);
          if (className !== null) {
            throw this.error("Duplicate class_name declaration", logical.line);
          }
          className = parsed.name;
          if (parsed.baseRef) {
            baseRef = this.assignBase(baseRef, parsed.baseRef, logical.line);
          }
          continue;
        }
        if (/^extends\b/.test(rest)) {
          const target = rest.slice("extends".length).trim();
          baseRef = this.assignBase(
            baseRef,
            this.parseExtendsTarget(target, logical.line),
            logical.line,
          );
          continue;
        }
        if (/^var\b/.test(rest)) {
          const variable = this.parseVariable(rest, logical.line);
          this.ensureUnique(variables, variable.name, "variable", logical.line);
          variables.push(variable);
          continue;
        }
        if (/^func\b/.test(rest)) {
          const fn = this.parseFunction(rest, logical.line);
          this.ensureUnique(functions, fn.name, "function", logical.line);
          functions.push(fn);
          continue;
        }
        if (/^signal\b/.test(rest)) {
          const signal = this.parseSignal(rest, logical.line);
          this.ensureUnique(signals, signal.name, "signal", logical.line);
          signals.push(signal);
        }
        // static var/func, const, enum, inner classes: not part of the bridge
      } catch (e) {
        if (!(e instanceof ScriptParseError)) throw e;
        this.firstError ??= e;
      }
    }

    if (className === null) return null;
    if (this.firstError) throw this.firstError;

    return Object.freeze({
      name: className,
      baseRef,
      variables: Object.freeze(variables),
      functions: Object.freeze(functions),
      signals: Object.freeze(signals),
      sourcePath: normalizeSourcePath(filePath),
    });
  }

  private error(message: string, line: number): ScriptParseError {
    return new ScriptParseError(message, this.filePath, line);
  }

  private ensureUnique(
    existing: ReadonlyArray<{ name: string }>,
    name: string,
    kind: string,
    line: number,
  ): void {
    if (existing.some((member) => member.name === name)) {
      throw this.error(`Duplicate ${kind} '${name}'`, line);
    }
  }

  private assignBase(
    current: BaseRef | undefined,
    next: BaseRef,
    line: number,
  ): BaseRef {
    if (current) throw this.error("Duplicate extends declaration", line);
    return next;
  }

  private parseClassName(
    text: string,
    line: number,
  ): { name: string; baseRef?: BaseRef } {
    const match = /^class_name\s+([A-Za-z_][A-Za-z0-9_]*)(.*)$/.exec(text);
    if (!match) throw this.error("Expected a class name after class_name", line);
    const name = match[1];
    const rest = match[2].trim();
    if (rest.length === 0 || rest.startsWith(",")) {
      // `class_name Foo, "res://icon.svg"` carries an editor icon only
      return { name };
    }
    const extendsMatch = /^extends\s+(.+)$/.exec(rest);
    if (!extendsMatch) {
      throw this.error(`Unexpected '${rest}' after class_name ${name}`, line);
    }
    return { name, baseRef: this.parseExtendsTarget(extendsMatch[1].trim(), line) };
  }

  private parseExtendsTarget(target: string, line: number): BaseRef {
    const quoted = /^(["'])(.*)\1$/.exec(target);
    if (quoted) {
      return { kind: "path", path: normalizeSourcePath(quoted[2]) };
    }
    if (!/^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/.test(target)) {
      throw this.error(`Invalid extends target '${target}'`, line);
    }
    const nativeKind = nativeKindFromScriptName(target);
    if (nativeKind) {
      return {
        kind: "native",
        id: nativeKind,
        nativeName: nativeTypeNameOf(nativeKind),
      };
    }
    return { kind: "named", name: target };
  }

  private parseVariable(text: string, line: number): ScriptVariable {
    const match = /^var\s+([A-Za-z_][A-Za-z0-9_]*)(.*)$/.exec(text);
    if (!match) throw this.error("Expected a variable name after var", line);
    const name = match[1];
    let rest = match[2]
      .replace(/\s+setget\b.*$/, "")
      // one-line accessors: `var hp: int: get = _get_hp, set = _set_hp`
      .replace(/:\s*(?:get|set)\s*=.*$/, "")
      .trim();
    if (rest.endsWith(":") && !rest.endsWith(":=")) {
      // property with an indented get/set block
      rest = rest.slice(0, -1).trim();
    }
    const typed = this.parseTypedRest(rest, line, `variable '${name}'`);
    return {
      name,
      type: typed.type,
      line,
    };
  }

  private parseFunction(text: string, line: number): ScriptFunction {
    const match = /^func\s+([A-Za-z_][A-Za-z0-9_]*)\s*/.exec(text);
    if (!match) throw this.error("Expected a function name after func", line);
    const name = match[1];
    const openIndex = match[0].length;
    if (text[openIndex] !== "(") {
      throw this.error(`Expected '(' after function name '${name}'`, line);
    }
    const closeIndex = findClosing(text, openIndex);
    if (closeIndex < 0) {
      throw this.error(`Unclosed parameter list for '${name}'`, line);
    }
    const parameters = this.parseParameters(
      text.slice(openIndex + 1, closeIndex),
      line,
    );
    const tail = /^\s*(?:->\s*([^:]+?))?\s*:/.exec(text.slice(closeIndex + 1));
    if (!tail) {
      throw this.error(`Expected ':' after signature of '${name}'`, line);
    }
    const returnType = tail[1]?.trim();
    return {
      name,
      parameters,
      ...(returnType ? { returnType } : {}),
      line,
    };
  }

  private parseSignal(text: string, line: number): ScriptSignal {
    const match = /^signal\s+([A-Za-z_][A-Za-z0-9_]*)\s*(.*)$/.exec(text);
    if (!match) throw this.error("Expected a signal name after signal", line);
    const name = match[1];
    const rest = match[2];
    if (rest.length === 0) return { name, parameters: [], line };
    if (!rest.startsWith("(")) {
      throw this.error(`Unexpected '${rest}' after signal '${name}'`, line);
    }
    const closeIndex = findClosing(rest, 0);
    if (closeIndex < 0) {
      throw this.error(`Unclosed parameter list for signal '${name}'`, line);
    }
    if (rest.slice(closeIndex + 1).trim().length > 0) {
      throw this.error(`Unexpected text after signal '${name}'`, line);
    }
    return {
      name,
      parameters: this.parseParameters(rest.slice(1, closeIndex), line),
      line,
    };
  }

  private parseParameters(text: string, line: number): ScriptParameter[] {
    const parts = splitTopLevel(text, ",").map((part) => part.trim());
    if (parts.length > 0 && parts[parts.length - 1] === "") parts.pop();
    return parts.map((part) => {
      const match = IDENTIFIER.exec(part);
      if (!match) throw this.error(`Invalid parameter '${part}'`, line);
      const name = match[0];
      const typed = this.parseTypedRest(
        part.slice(name.length).trim(),
        line,
        `parameter '${name}'`,
      );
      return {
        name,
        ...(typed.type ? { type: typed.type } : {}),
        hasDefault: typed.hasDefault,
      };
    });
  }

  /**
   * Parse `[: Type][ = value]` or `:= value` following a declared name.
   */
  private parseTypedRest(
    rest: string,
    line: number,
    what: string,
  ): { type?: string; hasDefault: boolean } {
    if (rest.length === 0) return { hasDefault: false };
    if (rest.startsWith(":=")) {
      const inferred = inferLiteralType(rest.slice(2).trim());
      return { ...(inferred ? { type: inferred } : {}), hasDefault: true };
    }
    if (rest.startsWith(":")) {
      const [typeText, ...valueParts] = splitTopLevel(rest.slice(1), "=");
      const type = typeText.trim();
      if (!/^[A-Za-z_][A-Za-z0-9_.]*(\[.+\])?$/.test(type)) {
        throw this.error(`Invalid type annotation for ${what}`, line);
      }
      return { type, hasDefault: valueParts.length > 0 };
    }
    if (rest.startsWith("=")) return { hasDefault: true };
    throw this.error(`Unexpected '${rest}' after ${what}`, line);
  }
}

export function parseScript(
  source: string,
  filePath = "<inline>",
): ScriptClass | null {
  return new GDScriptParser().parse(source, filePath);
}

function stripAnnotations(text: string): string {
  let rest = text.trim();
  while (rest.startsWith("@")) {
    const match = IDENTIFIER.exec(rest.slice(1));
    if (!match) break;
    let end = 1 + match[0].length;
    if (rest[end] === "(") {
      const close = findClosing(rest, end);
      end = close < 0 ? rest.length : close + 1;
    }
    rest = rest.slice(end).trim();
  }
  return rest;
}

export function inferLiteralType(value: string): string | undefined {
  if (/^-?(0x[0-9a-fA-F_]+|0b[01_]+|\d[\d_]*)$/.test(value)) return "int";
  if (/^-?(\d[\d_]*\.\d*|\.\d+|\d[\d_]*(\.\d*)?e[-+]?\d+)$/i.test(value)) {
    return "float";
  }
  if (value === "true" || value === "false") return "bool";
  if (/^(["']).*\1$/.test(value)) return "String";
  if (/^&(["']).*\1$/.test(value)) return "StringName";
  if (/^\^(["']).*\1$/.test(value)) return "NodePath";
  const constructed = /^([A-Z][A-Za-z0-9_]*)(?:\(|\.new\()/.exec(value);
  if (constructed) return constructed[1];
  return undefined;
}

/**
 * Index of the bracket closing the one at `openIndex`, skipping string
 * literals; -1 when unbalanced.
 */
export function findClosing(text: string, openIndex: number): number {
  let depth = 0;
  let quote: string | null = null;
  for (let i = openIndex; i < text.length; i++) {
    const c = text[i];
    if (quote) {
      if (c === "\\") i++;
      else if (c === quote) quote = null;
      continue;
    }
    if (c === '"' || c === "'") {
      quote = c;
      continue;
    }
    if (OPENING.includes(c)) depth++;
    else if (CLOSING.includes(c)) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

export function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let quote: string | null = null;
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (quote) {
      if (c === "\\") i++;
      else if (c === quote) quote = null;
      continue;
    }
    if (c === '"' || c === "'") quote = c;
    else if (OPENING.includes(c)) depth++;
    else if (CLOSING.includes(c)) depth--;
    else if (c === separator && depth === 0) {
      parts.push(text.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(text.slice(start));
  return parts;
}

/**
 * Split source into logical statements: comments removed, bracketed and
 * backslash-continued lines joined.
 */
function scanLogicalLines(source: string, filePath: string): ScanResult {
  const lines: LogicalLine[] = [];
  let error: ScriptParseError | null = null;
  let buffer = "";
  let startLine = 1;
  let lineNo = 1;
  let depth = 0;
  let quote: string | null = null;

  const fail = (message: string, line: number) => {
    error ??= new ScriptParseError(message, filePath, line);
  };
  const flush = () => {
    if (buffer.trim().length > 0) {
      lines.push({
        text: buffer.trim(),
        line: startLine,
        indented: buffer[0] === " " || buffer[0] === "\t",
      });
    }
    buffer = "";
    startLine = lineNo;
  };

  for (let i = 0; i < source.length; i++) {
    const c = source[i];

    if (quote) {
      if (c === "\\") {
        const next = source[i + 1] ?? "";
        buffer += c + next;
        if (next === "\n") lineNo++;
        i++;
      } else if (quote.length === 3 && source.startsWith(quote, i)) {
        buffer += quote;
        i += 2;
        quote = null;
      } else if (c === "\n") {
        lineNo++;
        if (quote.length === 1) {
          fail("Unterminated string literal", startLine);
          quote = null;
          depth = 0;
          flush();
        } else {
          buffer += " ";
        }
      } else if (c !== "\r") {
        buffer += c;
        if (quote.length === 1 && c === quote) quote = null;
      }
      continue;
    }

    if (c === "#") {
      while (i + 1 < source.length && source[i + 1] !== "\n") i++;
      continue;
    }
    if (c === '"' || c === "'") {
      const triple = c.repeat(3);
      if (source.startsWith(triple, i)) {
        quote = triple;
        buffer += triple;
        i += 2;
      } else {
        quote = c;
        buffer += c;
      }
      continue;
    }
    if (c === "\\" && (source[i + 1] === "\n" || source[i + 1] === "\r")) {
      i += source[i + 1] === "\r" ? 2 : 1;
      lineNo++;
      buffer += " ";
      continue;
    }
    if (c === "\r") continue;
    if (c === "\n") {
      lineNo++;
      if (depth > 0) {
        buffer += " ";
        continue;
      }
      flush();
      continue;
    }
    if (OPENING.includes(c)) depth++;
    else if (CLOSING.includes(c)) {
      if (depth === 0) fail(`Unexpected '${c}'`, lineNo);
      else depth--;
    }
    buffer += c;
  }

  if (quote) fail("Unterminated string literal", startLine);
  else if (depth > 0) fail("Unbalanced brackets at end of file", startLine);
  flush();
  return { lines, error };
}
