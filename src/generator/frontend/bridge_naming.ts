/**
 * Naming policy for generated types: optional suffixing and namespace
 * defaulting from a matching project type.
 */

import type { TypeCatalog } from "../catalog/type_catalog.js";
import type { BridgeConfiguration } from "../config/configuration.js";

export const BRIDGE_SUFFIX = "Bridge";
export const PROXY_SUFFIX = "Proxy";

export class BridgeNaming {
  constructor(
    private catalog: TypeCatalog,
    private configuration: Readonly<BridgeConfiguration>,
  ) {}

  bridgeTypeName(className: string): string {
    return this.configuration.appendSuffixToClassNames
      ? `${className}${BRIDGE_SUFFIX}`
      : className;
  }

  proxyTypeName(nativeTypeName: string): string {
    return `${nativeTypeName}${PROXY_SUFFIX}`;
  }

  /**
   * Namespace of the project type with this name, even when that is the
   * global namespace; otherwise the configured default.
   */
  namespaceFor(typeName: string): string | undefined {
    const existing = this.catalog.lookupProjectType(typeName);
    if (existing) return existing.namespace || undefined;
    return this.configuration.defaultNamespace || undefined;
  }

  hasExistingType(typeName: string): boolean {
    return this.catalog.lookupProjectType(typeName) !== undefined;
  }

  /** `global::Ns.Name`, or the bare name outside any namespace. */
  qualify(typeName: string): string {
    const namespace = this.namespaceFor(typeName);
    return namespace ? `global::${namespace}.${typeName}` : typeName;
  }
}
