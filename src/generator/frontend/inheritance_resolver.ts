/**
 * Inheritance resolver for script classes.
 *
 * The base graph (class -> script base) is built and checked for cycles
 * before anything is resolved; acyclic chains are then resolved from the
 * root down and memoized.
 */

import type { TypeCatalog } from "../catalog/type_catalog.js";
import type { ErrorCollector } from "../errors/error_collector.js";
import { GeneratorError } from "../errors/generator_errors.js";
import type { BridgeNaming } from "./bridge_naming.js";
import { UNIVERSAL_NATIVE_ROOT } from "./native_kinds.js";
import type { ScriptRegistry } from "./script_registry.js";
import type { ScriptClass } from "./types.js";

/** Stands in for both base names when a chain cannot be resolved. */
export const INVALID_BASE = "__INVALID_BASE__";

export interface ResolvedClass {
  scriptClass: ScriptClass;
  bridgeTypeName: string;
  /** Bridge name as referenced from other generated units. */
  qualifiedBridgeTypeName: string;
  namespace?: string;
  baseBridgeTypeName: string;
  nativeRootTypeName: string;
  baseIsNative: boolean;
}

export type Resolution =
  | {
      status: "resolved";
      resolved: ResolvedClass;
      usedNativeTypes: readonly string[];
    }
  | { status: "unresolved"; resolved: ResolvedClass; missingBase: string }
  | { status: "cyclic"; cycle: readonly string[] };

export interface BaseResolution {
  baseBridgeTypeName: string;
  nativeRootTypeName: string;
  baseIsNative: boolean;
  usedNativeTypes: readonly string[];
}

/** Insert-if-absent set of native type names; values come out sorted. */
export class UsedNativeTypes {
  private names = new Set<string>();

  add(name: string): boolean {
    if (this.names.has(name)) return false;
    this.names.add(name);
    return true;
  }

  has(name: string): boolean {
    return this.names.has(name);
  }

  get size(): number {
    return this.names.size;
  }

  values(): string[] {
    return Array.from(this.names).sort(compareOrdinal);
  }
}

export function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

export class InheritanceResolver {
  private resolutions: Map<string, Resolution> | null = null;

  constructor(
    private registry: ScriptRegistry,
    private catalog: TypeCatalog,
    private naming: BridgeNaming,
    private errorCollector: ErrorCollector,
  ) {}

  /**
   * Resolve every registered class. Diagnostics are reported once, on the
   * first call.
   */
  resolveAll(): Map<string, Resolution> {
    if (this.resolutions) return this.resolutions;

    const resolutions = new Map<string, Resolution>();
    const cycles = this.findCycles();

    for (const [name, cycle] of cycles) {
      resolutions.set(name, { status: "cyclic", cycle });
      const scriptClass = this.registry.getClass(name);
      this.errorCollector.add(
        new GeneratorError(
          "CyclicInheritance",
          "error",
          `Cyclic inheritance detected for '${name}': ${[...cycle, cycle[0]].join(" -> ")}`,
          { filePath: scriptClass?.sourcePath ?? "<unknown>", line: 1, column: 1 },
          "Remove the circular dependency in class inheritance.",
        ),
      );
    }

    for (const scriptClass of this.registry.getAllClasses()) {
      if (resolutions.has(scriptClass.name)) continue;
      // Chain up to the first resolved ancestor, then resolve root first.
      const pending: ScriptClass[] = [];
      let current: ScriptClass | undefined = scriptClass;
      while (current && !resolutions.has(current.name)) {
        pending.push(current);
        current = this.registry.getScriptBase(current);
      }
      for (let i = pending.length - 1; i >= 0; i--) {
        resolutions.set(pending[i].name, this.resolveOne(pending[i], resolutions));
      }
    }

    this.resolutions = resolutions;
    return resolutions;
  }

  /**
   * Base names, native root and used native types for one class. Throws
   * for a class on or above a cyclic chain.
   */
  resolveBase(scriptClass: ScriptClass): BaseResolution {
    const resolution = this.resolveAll().get(scriptClass.name);
    if (!resolution) {
      throw new GeneratorError(
        "InternalError",
        "error",
        `Unknown class '${scriptClass.name}'`,
        { filePath: scriptClass.sourcePath, line: 1, column: 1 },
        "Register the class before resolving it.",
      );
    }
    if (resolution.status === "cyclic") {
      throw new GeneratorError(
        "CyclicInheritance",
        "error",
        `Cyclic inheritance detected for '${scriptClass.name}'`,
        { filePath: scriptClass.sourcePath, line: 1, column: 1 },
        "Remove the circular dependency in class inheritance.",
      );
    }
    const { resolved } = resolution;
    return {
      baseBridgeTypeName: resolved.baseBridgeTypeName,
      nativeRootTypeName: resolved.nativeRootTypeName,
      baseIsNative: resolved.baseIsNative,
      usedNativeTypes:
        resolution.status === "resolved" ? resolution.usedNativeTypes : [],
    };
  }

  /** Native types used by the given resolutions, deduplicated. */
  static collectUsedNativeTypes(resolutions: Iterable<Resolution>): UsedNativeTypes {
    const used = new UsedNativeTypes();
    for (const resolution of resolutions) {
      if (resolution.status !== "resolved") continue;
      for (const name of resolution.usedNativeTypes) used.add(name);
    }
    return used;
  }

  /**
   * Classes on a cycle, and classes whose chain runs into one, mapped to
   * the cycle they reach.
   */
  private findCycles(): Map<string, readonly string[]> {
    const cyclic = new Map<string, readonly string[]>();
    const acyclic = new Set<string>();

    for (const start of this.registry.getAllClasses()) {
      const path: string[] = [];
      const visiting = new Map<string, number>();
      let current: ScriptClass | undefined = start;
      let reached: readonly string[] | null = null;

      while (current) {
        if (acyclic.has(current.name)) break;
        const known = cyclic.get(current.name);
        if (known) {
          reached = known;
          break;
        }
        const index = visiting.get(current.name);
        if (index !== undefined) {
          reached = Object.freeze(path.slice(index));
          break;
        }
        visiting.set(current.name, path.length);
        path.push(current.name);
        current = this.registry.getScriptBase(current);
      }

      for (const name of path) {
        if (reached) cyclic.set(name, reached);
        else acyclic.add(name);
      }
    }

    return cyclic;
  }

  private resolveOne(
    scriptClass: ScriptClass,
    resolutions: Map<string, Resolution>,
  ): Resolution {
    const bridgeTypeName = this.naming.bridgeTypeName(scriptClass.name);
    const namespace = this.naming.namespaceFor(bridgeTypeName);
    const self = {
      scriptClass,
      bridgeTypeName,
      qualifiedBridgeTypeName: this.naming.qualify(bridgeTypeName),
      ...(namespace ? { namespace } : {}),
    };

    const base = scriptClass.baseRef;
    if (!base) return this.resolveNative(self, UNIVERSAL_NATIVE_ROOT);
    if (base.kind === "native") return this.resolveNative(self, base.nativeName);

    const scriptBase = this.registry.getScriptBase(scriptClass);
    const baseResolution = scriptBase ? resolutions.get(scriptBase.name) : undefined;
    if (baseResolution && baseResolution.status !== "cyclic") {
      const resolved: ResolvedClass = {
        ...self,
        baseBridgeTypeName: baseResolution.resolved.qualifiedBridgeTypeName,
        nativeRootTypeName: baseResolution.resolved.nativeRootTypeName,
        baseIsNative: false,
      };
      if (baseResolution.status === "unresolved") {
        return {
          status: "unresolved",
          resolved,
          missingBase: baseResolution.missingBase,
        };
      }
      return {
        status: "resolved",
        resolved,
        usedNativeTypes: baseResolution.usedNativeTypes,
      };
    }

    if (base.kind === "named" && this.catalog.isNativeRoot(base.name)) {
      return this.resolveNative(self, base.name);
    }
    return this.unresolved(self, base.kind === "named" ? base.name : base.path);
  }

  private resolveNative(
    self: Omit<ResolvedClass, "baseBridgeTypeName" | "nativeRootTypeName" | "baseIsNative">,
    nativeTypeName: string,
  ): Resolution {
    if (!this.catalog.isNativeRoot(nativeTypeName)) {
      return this.unresolved(self, nativeTypeName);
    }
    return {
      status: "resolved",
      resolved: {
        ...self,
        baseBridgeTypeName: this.naming.qualify(
          this.naming.proxyTypeName(nativeTypeName),
        ),
        nativeRootTypeName: nativeTypeName,
        baseIsNative: true,
      },
      usedNativeTypes: [nativeTypeName],
    };
  }

  private unresolved(
    self: Omit<ResolvedClass, "baseBridgeTypeName" | "nativeRootTypeName" | "baseIsNative">,
    missingBase: string,
  ): Resolution {
    this.errorCollector.add(
      new GeneratorError(
        "UnresolvedBase",
        "warning",
        `Base '${missingBase}' of '${self.scriptClass.name}' is neither a script class nor an engine type`,
        { filePath: self.scriptClass.sourcePath, line: 1, column: 1 },
        `The bridge was generated with the placeholder base ${INVALID_BASE}.`,
      ),
    );
    return {
      status: "unresolved",
      resolved: {
        ...self,
        baseBridgeTypeName: INVALID_BASE,
        nativeRootTypeName: INVALID_BASE,
        baseIsNative: false,
      },
      missingBase,
    };
  }
}
