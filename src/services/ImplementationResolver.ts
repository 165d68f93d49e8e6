/**
 * ImplementationResolver — maps an agent's `implementation` reference
 * to a callable.
 *
 * ModuleImplementationResolver loads ES modules from disk relative to
 * the stack file. MapImplementationResolver serves implementations
 * registered in memory (embedding applications and tests).
 */

import * as path from "node:path";
import { pathToFileURL } from "node:url";
import type { AgentImplementation, AgentSpec } from "../types/index.js";

export interface ImplementationResolverLike {
  resolve(spec: AgentSpec): Promise<AgentImplementation>;
}

function isImplementation(value: unknown): value is AgentImplementation {
  return typeof value === "function";
}

/**
 * Resolves `implementation.path` against `baseDir` and imports it.
 * Modules are cached per absolute path.
 */
export class ModuleImplementationResolver implements ImplementationResolverLike {
  private readonly baseDir: string;
  private readonly modules = new Map<string, Promise<Record<string, unknown>>>();

  constructor(baseDir: string) {
    this.baseDir = baseDir;
  }

  /** Absolute module path for an agent, or null when none is declared. */
  modulePath(spec: AgentSpec): string | null {
    if (spec.implementation === undefined) return null;
    return path.resolve(this.baseDir, spec.implementation.path);
  }

  async resolve(spec: AgentSpec): Promise<AgentImplementation> {
    const modulePath = this.modulePath(spec);
    if (modulePath === null) {
      throw new Error(`agent ${spec.name} declares no implementation.path`);
    }

    let loading = this.modules.get(modulePath);
    if (loading === undefined) {
      loading = import(pathToFileURL(modulePath).href);
      this.modules.set(modulePath, loading);
    }

    let mod: Record<string, unknown>;
    try {
      mod = await loading;
    } catch (err) {
      this.modules.delete(modulePath);
      throw err;
    }

    const exportName = spec.implementation?.export ?? "default";
    const candidate = mod[exportName];
    if (!isImplementation(candidate)) {
      throw new Error(
        `${modulePath} has no function export "${exportName}" for agent ${spec.name}`,
      );
    }
    return candidate;
  }
}

/**
 * In-memory registry keyed by agent name, falling back to
 * `implementation.path`.
 */
export class MapImplementationResolver implements ImplementationResolverLike {
  private readonly implementations: Map<string, AgentImplementation>;

  constructor(implementations: Record<string, AgentImplementation> = {}) {
    this.implementations = new Map(Object.entries(implementations));
  }

  register(key: string, implementation: AgentImplementation): this {
    this.implementations.set(key, implementation);
    return this;
  }

  async resolve(spec: AgentSpec): Promise<AgentImplementation> {
    const byName = this.implementations.get(spec.name);
    if (byName !== undefined) return byName;

    const byPath =
      spec.implementation === undefined
        ? undefined
        : this.implementations.get(spec.implementation.path);
    if (byPath !== undefined) return byPath;

    throw new Error(`no implementation registered for agent ${spec.name}`);
  }
}
