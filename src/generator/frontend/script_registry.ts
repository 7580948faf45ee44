/**
 * Script class registry
 */

import { normalizeSourcePath, type ScriptClass } from "./types.js";

export class ScriptRegistry {
  private classes: Map<string, ScriptClass> = new Map();
  private classesByPath: Map<string, ScriptClass> = new Map();

  /**
   * Register a parsed class. Returns the already registered class when the
   * name is taken; the new class is not registered in that case.
   */
  register(scriptClass: ScriptClass): ScriptClass | null {
    const existing = this.classes.get(scriptClass.name);
    if (existing) return existing;
    this.classes.set(scriptClass.name, scriptClass);
    this.classesByPath.set(toResourceKey(scriptClass.sourcePath), scriptClass);
    return null;
  }

  getClass(name: string): ScriptClass | undefined {
    return this.classes.get(name);
  }

  getClassByPath(sourcePath: string): ScriptClass | undefined {
    return this.classesByPath.get(toResourceKey(sourcePath));
  }

  /** Classes in registration order. */
  getAllClasses(): ScriptClass[] {
    return Array.from(this.classes.values());
  }

  /**
   * Names of the class and its script ancestors, nearest first. Stops at a
   * native or unknown base and at the first repeated name.
   */
  getInheritanceChain(className: string): string[] {
    const chain: string[] = [];
    const seen = new Set<string>();
    let current = this.classes.get(className);
    while (current && !seen.has(current.name)) {
      seen.add(current.name);
      chain.push(current.name);
      current = this.getScriptBase(current);
    }
    return chain;
  }

  /** Base class of `scriptClass` when it is itself a registered script. */
  getScriptBase(scriptClass: ScriptClass): ScriptClass | undefined {
    const base = scriptClass.baseRef;
    if (!base) return undefined;
    if (base.kind === "named") return this.classes.get(base.name);
    if (base.kind === "path") return this.getClassByPath(base.path);
    return undefined;
  }
}

/** `res://scripts/a.gd`, `scripts/a.gd` and `scripts\a.gd` share one key. */
export function toResourceKey(sourcePath: string): string {
  return normalizeSourcePath(sourcePath)
    .replace(/^res:\/\//, "")
    .replace(/^\.\//, "");
}
