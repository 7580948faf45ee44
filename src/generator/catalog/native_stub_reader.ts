import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import * as ts from "typescript";
import { compareOrdinal } from "../frontend/inheritance_resolver.js";
import type { SourceText } from "../frontend/types.js";
import { mapStubTypeToCSharp } from "./csharp_type_mapper.js";
import {
  type NativeMember,
  type NativeMethod,
  type NativeProperty,
  type NativeTypeInfo,
  type ObsoleteInfo,
} from "./types.js";

const DEFAULT_SCRIPT_TARGET = ts.ScriptTarget.ES2020;
const EVENT_TYPE_NAME = "EngineEvent";

/** Engine callbacks and internals; never part of a forwarded surface. */
export const RESERVED_MEMBER_PREFIX = "_";

const EXCLUDED_MODIFIERS = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.StaticKeyword,
  ts.SyntaxKind.PrivateKeyword,
  ts.SyntaxKind.ProtectedKeyword,
  ts.SyntaxKind.AbstractKeyword,
]);

/**
 * Read engine type declarations from stub sources. A later declaration of
 * the same type name replaces an earlier one.
 */
export function readNativeStubs(sources: SourceText[]): NativeTypeInfo[] {
  const byName = new Map<string, NativeTypeInfo>();

  for (const source of sources) {
    if (!isSupportedSource(source.path)) continue;
    const sourceFile = ts.createSourceFile(
      source.path,
      source.text,
      DEFAULT_SCRIPT_TARGET,
      true,
    );
    for (const node of sourceFile.statements) {
      if (!ts.isClassDeclaration(node) || !node.name) continue;
      const info = readClass(node, node.name.text, sourceFile);
      byName.delete(info.name);
      byName.set(info.name, info);
    }
  }

  return Array.from(byName.values());
}

function readClass(
  node: ts.ClassDeclaration,
  name: string,
  sourceFile: ts.SourceFile,
): NativeTypeInfo {
  const members: NativeMember[] = [];

  for (const member of node.members) {
    const memberName = member.name
      ? getMemberName(member.name, sourceFile)
      : null;
    if (!memberName || memberName.startsWith(RESERVED_MEMBER_PREFIX)) continue;
    if (hasExcludedModifier(member)) continue;

    if (ts.isGetAccessorDeclaration(member) || ts.isSetAccessorDeclaration(member)) {
      mergeAccessor(members, member, memberName, name, sourceFile);
      continue;
    }

    if (ts.isPropertyDeclaration(member)) {
      const eventHandler = getEventHandlerType(member.type, sourceFile);
      if (eventHandler !== null) {
        members.push({
          kind: "event",
          name: memberName,
          declaringType: name,
          handlerType: eventHandler,
          hasAdd: true,
          hasRemove: true,
          obsolete: getObsolete(member),
        });
        continue;
      }
      members.push({
        kind: "property",
        name: memberName,
        declaringType: name,
        type: mapStubTypeToCSharp(member.type, sourceFile, "Variant"),
        hasGetter: true,
        hasSetter: !hasModifier(member, ts.SyntaxKind.ReadonlyKeyword),
        obsolete: getObsolete(member),
      });
      continue;
    }

    if (ts.isMethodDeclaration(member)) {
      members.push(readMethod(member, memberName, name, sourceFile));
    }
  }

  return {
    name,
    baseName: getBaseName(node, sourceFile),
    members,
    sourcePath: sourceFile.fileName,
  };
}

function readMethod(
  member: ts.MethodDeclaration,
  name: string,
  declaringType: string,
  sourceFile: ts.SourceFile,
): NativeMethod {
  return {
    kind: "method",
    name,
    declaringType,
    typeParameters: (member.typeParameters ?? []).map((param) => ({
      name: param.name.text,
      ...(param.constraint
        ? { constraint: mapStubTypeToCSharp(param.constraint, sourceFile) }
        : {}),
    })),
    parameters: member.parameters.map((param) => ({
      name: param.name.getText(sourceFile),
      type: mapStubTypeToCSharp(param.type, sourceFile, "Variant"),
      isOptional: !!param.questionToken || !!param.initializer,
      isRest: !!param.dotDotDotToken,
    })),
    returnType: mapStubTypeToCSharp(member.type, sourceFile),
    obsolete: getObsolete(member),
  };
}

function mergeAccessor(
  members: NativeMember[],
  accessor: ts.GetAccessorDeclaration | ts.SetAccessorDeclaration,
  name: string,
  declaringType: string,
  sourceFile: ts.SourceFile,
): void {
  const isGetter = ts.isGetAccessorDeclaration(accessor);
  const typeNode = isGetter ? accessor.type : accessor.parameters[0]?.type;
  const obsolete = getObsolete(accessor);
  const existing = members.find(
    (member): member is NativeProperty =>
      member.kind === "property" && member.name === name,
  );

  if (existing) {
    if (isGetter) {
      existing.hasGetter = true;
      existing.type = mapStubTypeToCSharp(typeNode, sourceFile, existing.type);
    } else {
      existing.hasSetter = true;
    }
    if (obsolete.present && !existing.obsolete.present) {
      existing.obsolete = obsolete;
    }
    return;
  }

  members.push({
    kind: "property",
    name,
    declaringType,
    type: mapStubTypeToCSharp(typeNode, sourceFile, "Variant"),
    hasGetter: isGetter,
    hasSetter: !isGetter,
    obsolete,
  });
}

function getEventHandlerType(
  typeNode: ts.TypeNode | undefined,
  sourceFile: ts.SourceFile,
): string | null {
  if (!typeNode || !ts.isTypeReferenceNode(typeNode)) return null;
  if (typeNode.typeName.getText(sourceFile) !== EVENT_TYPE_NAME) return null;
  const handler = typeNode.typeArguments?.[0];
  return handler ? mapStubTypeToCSharp(handler, sourceFile) : "Action";
}

function getObsolete(node: ts.Node): ObsoleteInfo {
  const tag = ts.getJSDocDeprecatedTag(node);
  if (!tag) return { present: false };
  const message = ts.getTextOfJSDocComment(tag.comment)?.trim();
  return message ? { present: true, message } : { present: true };
}

function getBaseName(
  node: ts.ClassDeclaration,
  sourceFile: ts.SourceFile,
): string | undefined {
  const extendsClause = node.heritageClauses?.find(
    (clause) => clause.token === ts.SyntaxKind.ExtendsKeyword,
  );
  return extendsClause?.types[0]?.expression.getText(sourceFile);
}

function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  const modifiers = ts.canHaveModifiers(node) ? ts.getModifiers(node) : [];
  return !!modifiers?.some((mod) => mod.kind === kind);
}

function hasExcludedModifier(node: ts.Node): boolean {
  const modifiers = ts.canHaveModifiers(node) ? ts.getModifiers(node) : [];
  return !!modifiers?.some((mod) => EXCLUDED_MODIFIERS.has(mod.kind));
}

function getMemberName(
  nameNode: ts.PropertyName,
  sourceFile: ts.SourceFile,
): string | null {
  if (ts.isPrivateIdentifier(nameNode)) return null;
  if (ts.isIdentifier(nameNode)) return nameNode.text;
  if (ts.isStringLiteral(nameNode)) return nameNode.text;
  const raw = nameNode.getText(sourceFile).replace(/^['"]|['"]$/g, "");
  return raw || null;
}

function isSupportedSource(filePath: string): boolean {
  return filePath.endsWith(".ts") && !filePath.endsWith(".test.ts");
}

/**
 * Stub sources shipped with the package, followed by the sources found in
 * `extraDirs`.
 */
export function loadStubSources(extraDirs: string[] = []): SourceText[] {
  const dirs = [...findBuiltinStubDirs(), ...extraDirs];
  const sources: SourceText[] = [];
  for (const dir of dirs) {
    for (const filePath of walkStubFiles(dir)) {
      sources.push({ path: filePath, text: fs.readFileSync(filePath, "utf8") });
    }
  }
  return sources;
}

function findBuiltinStubDirs(): string[] {
  const here = path.dirname(fileURLToPath(import.meta.url));
  // sources and tsc output, then the bundled CLI in dist/cli
  const candidates = [
    path.resolve(here, "../../stubs"),
    path.resolve(here, "../stubs"),
  ];
  const found = candidates.find((dir) => fs.existsSync(dir));
  return found ? [found] : [];
}

function walkStubFiles(dir: string): string[] {
  const results: string[] = [];
  const entries = fs
    .readdirSync(dir, { withFileTypes: true })
    .sort((a, b) => compareOrdinal(a.name, b.name));
  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      results.push(...walkStubFiles(entryPath));
      continue;
    }
    if (entry.isFile() && isSupportedSource(entryPath)) {
      results.push(entryPath);
    }
  }
  return results;
}
