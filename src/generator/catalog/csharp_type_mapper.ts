import * as ts from "typescript";

export const STUB_TO_CSHARP = new Map<string, string>([
  ["number", "double"],
  ["boolean", "bool"],
  ["string", "string"],
  ["void", "void"],
  ["object", "object"],
  ["unknown", "Variant"],
  ["any", "Variant"],
  ["int", "int"],
  ["uint", "uint"],
  ["long", "long"],
  ["ulong", "ulong"],
  ["float", "float"],
  ["double", "double"],
  ["byte", "byte"],
  ["bool", "bool"],
  ["GodotArray", "Godot.Collections.Array"],
  ["GodotDictionary", "Godot.Collections.Dictionary"],
]);

const NULLISH_KINDS = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.NullKeyword,
  ts.SyntaxKind.UndefinedKeyword,
]);

export function mapStubTypeName(name: string): string {
  return STUB_TO_CSHARP.get(name) ?? name;
}

/**
 * Map a stub declaration's type annotation to C# type text.
 */
export function mapStubTypeToCSharp(
  typeNode: ts.TypeNode | undefined,
  sourceFile: ts.SourceFile,
  fallback = "void",
): string {
  if (!typeNode) return fallback;

  if (ts.isParenthesizedTypeNode(typeNode)) {
    return mapStubTypeToCSharp(typeNode.type, sourceFile, fallback);
  }
  if (
    ts.isTypeOperatorNode(typeNode) &&
    typeNode.operator === ts.SyntaxKind.ReadonlyKeyword
  ) {
    return mapStubTypeToCSharp(typeNode.type, sourceFile, fallback);
  }
  if (ts.isArrayTypeNode(typeNode)) {
    return `${mapStubTypeToCSharp(typeNode.elementType, sourceFile)}[]`;
  }
  if (ts.isUnionTypeNode(typeNode)) {
    const parts = typeNode.types.filter(
      (part) =>
        !NULLISH_KINDS.has(part.kind) &&
        !(ts.isLiteralTypeNode(part) && NULLISH_KINDS.has(part.literal.kind)),
    );
    if (parts.length === 1) {
      return mapStubTypeToCSharp(parts[0], sourceFile, fallback);
    }
    return "Variant";
  }
  if (ts.isFunctionTypeNode(typeNode)) {
    return mapHandlerType(typeNode, sourceFile);
  }
  if (ts.isTypeReferenceNode(typeNode)) {
    const name = typeNode.typeName.getText(sourceFile);
    const args = (typeNode.typeArguments ?? []).map((arg) =>
      mapStubTypeToCSharp(arg, sourceFile),
    );
    if ((name === "Array" || name === "ReadonlyArray") && args.length === 1) {
      return `${args[0]}[]`;
    }
    const mapped = mapStubTypeName(name);
    return args.length > 0 ? `${mapped}<${args.join(", ")}>` : mapped;
  }

  const keyword = typeNode.getText(sourceFile).trim();
  return mapStubTypeName(keyword);
}

/**
 * `(a: A, b: B) => void` becomes `Action<A, B>`; a non-void return
 * becomes `Func<A, B, R>`.
 */
export function mapHandlerType(
  fn: ts.FunctionTypeNode,
  sourceFile: ts.SourceFile,
): string {
  const params = fn.parameters.map((param) =>
    mapStubTypeToCSharp(param.type, sourceFile, "Variant"),
  );
  const returnType = mapStubTypeToCSharp(fn.type, sourceFile);
  if (returnType === "void") {
    return params.length > 0 ? `Action<${params.join(", ")}>` : "Action";
  }
  return `Func<${[...params, returnType].join(", ")}>`;
}
