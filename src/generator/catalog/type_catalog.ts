/**
 * Read-only snapshot of every type visible to a generation run: engine
 * types read from stub declarations and types already declared in the
 * project.
 */

import { UNIVERSAL_NATIVE_ROOT } from "../frontend/native_kinds.js";
import type { SourceText } from "../frontend/types.js";
import { readNativeStubs } from "./native_stub_reader.js";
import { scanProjectTypes } from "./project_type_scanner.js";
import {
  type AvailableType,
  ENGINE_NAMESPACE,
  type NativeMember,
  type NativeTypeInfo,
} from "./types.js";

export interface CatalogSources {
  stubSources: SourceText[];
  projectSources: SourceText[];
}

export class TypeCatalog {
  private readonly projectTypes: ReadonlyMap<string, AvailableType>;
  private readonly nativeTypes: ReadonlyMap<string, NativeTypeInfo>;
  private readonly availableTypes: readonly AvailableType[];
  private readonly memberCache = new Map<string, readonly NativeMember[]>();

  constructor(nativeTypes: NativeTypeInfo[], projectTypes: AvailableType[]) {
    const projectMap = new Map<string, AvailableType>();
    for (const type of projectTypes) {
      if (!projectMap.has(type.name)) {
        projectMap.set(type.name, Object.freeze({ ...type }));
      }
    }
    const nativeMap = new Map<string, NativeTypeInfo>();
    for (const type of nativeTypes) {
      nativeMap.set(type.name, type);
    }

    this.projectTypes = projectMap;
    this.nativeTypes = nativeMap;
    this.availableTypes = Object.freeze([
      ...projectMap.values(),
      ...Array.from(nativeMap.keys()).map((name) =>
        Object.freeze({ name, namespace: ENGINE_NAMESPACE, isNative: true }),
      ),
    ]);
  }

  /** Project types shadow engine types of the same name. */
  lookupByName(name: string): AvailableType | undefined {
    return (
      this.projectTypes.get(name) ??
      this.availableTypes.find((type) => type.isNative && type.name === name)
    );
  }

  lookupProjectType(name: string): AvailableType | undefined {
    return this.projectTypes.get(name);
  }

  /** Any stub-declared type, value types included. */
  isNativeType(name: string): boolean {
    return this.nativeTypes.has(name);
  }

  /**
   * True for an engine object type: one whose base chain reaches the
   * universal root. Only these can be proxied.
   */
  isNativeRoot(name: string): boolean {
    return this.ancestorsOf(name).some((type) => type.name === UNIVERSAL_NATIVE_ROOT);
  }

  getNativeType(name: string): NativeTypeInfo | undefined {
    return this.nativeTypes.get(name);
  }

  listTypes(): readonly AvailableType[] {
    return this.availableTypes;
  }

  /**
   * Public instance surface of a native type and its ancestors, most
   * derived declaration first. A member redeclared by a derived type is
   * listed once, with the derived type as its declaring type.
   */
  nativeMembersOf(name: string): readonly NativeMember[] {
    const cached = this.memberCache.get(name);
    if (cached) return cached;

    const members: NativeMember[] = [];
    const seen = new Set<string>();
    for (const type of this.ancestorsOf(name)) {
      for (const member of type.members) {
        const key = memberSignature(member);
        if (seen.has(key)) continue;
        seen.add(key);
        members.push(member);
      }
    }

    const frozen = Object.freeze(members);
    this.memberCache.set(name, frozen);
    return frozen;
  }

  /** The type itself followed by its stub ancestors. */
  private ancestorsOf(name: string): NativeTypeInfo[] {
    const chain: NativeTypeInfo[] = [];
    const visited = new Set<string>();
    let current = this.nativeTypes.get(name);
    while (current && !visited.has(current.name)) {
      visited.add(current.name);
      chain.push(current);
      current = current.baseName
        ? this.nativeTypes.get(current.baseName)
        : undefined;
    }
    return chain;
  }
}

function memberSignature(member: NativeMember): string {
  if (member.kind !== "method") return `member:${member.name}`;
  const params = member.parameters.map((param) => param.type).join(",");
  return `method:${member.name}(${params})`;
}

export function buildCatalog(sources: CatalogSources): TypeCatalog {
  return new TypeCatalog(
    readNativeStubs(sources.stubSources),
    scanProjectTypes(sources.projectSources),
  );
}
