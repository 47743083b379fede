import type { DependencySpec } from "@burrow/manifest";

import { MapWithDefault } from "./mapWithDefault";

export type PackageId = number;
export type ScopeId = number;

export const ROOT_SCOPE: ScopeId = 0;

/**
 * `cache` marks a package rebuilt from the lockfile without asking the registry.
 */
export type PackageSource = "registry" | "workspace" | "cache";

export interface ResolvedPackage {
  id: PackageId;
  name: string;
  version: string;
  integrity: string;
  source: PackageSource;
  /**
   * Tarball URL, or `workspace:<relative directory>`.
   */
  resolved: string;
  dependencies: DependencySpec[];
  /**
   * Scope the package is bound in.
   */
  scope: ScopeId;
  depth: number;
  /**
   * Install location relative to the project root.
   */
  path: string;
  /**
   * Directory of a workspace package relative to the project root.
   */
  location?: string;
  /**
   * Only reachable through development dependencies.
   */
  dev: boolean;
}

/**
 * A `node_modules` directory: the root one, or the private one of a package
 * that needed copies of its own.
 */
export interface Scope {
  id: ScopeId;
  parent?: ScopeId;
  owner?: PackageId;
  depth: number;
  /**
   * The `node_modules` directory relative to the project root.
   */
  path: string;
  bindings: Map<string, PackageId>;
  /**
   * Names that packages of this scope already resolved through it to an
   * ancestor binding. Binding one of them here would change what they see.
   */
  passthrough: Set<string>;
}

export interface RootProject {
  name: string;
  version: string;
  dependencies: DependencySpec[];
}

export interface Edge {
  spec: DependencySpec;
  target: PackageId;
}

export class DependencyGraph {
  private readonly packages: ResolvedPackage[] = [];
  private readonly scopes: Scope[] = [];
  private readonly edges = new MapWithDefault<PackageId, Edge[]>(() => []);
  private readonly privateScopes = new Map<PackageId, ScopeId>();
  private readonly byPath = new Map<string, PackageId>();
  readonly rootEdges: Edge[] = [];

  constructor(readonly root: RootProject) {
    this.scopes.push({
      id: ROOT_SCOPE,
      depth: 0,
      path: "node_modules",
      bindings: new Map(),
      passthrough: new Set(),
    });
  }

  get size(): number {
    return this.packages.length;
  }

  get(id: PackageId): ResolvedPackage {
    const pkg = this.packages[id];
    if (pkg === undefined) {
      throw new RangeError(`Unknown package id ${id}`);
    }
    return pkg;
  }

  all(): readonly ResolvedPackage[] {
    return this.packages;
  }

  atPath(path: string): ResolvedPackage | undefined {
    const id = this.byPath.get(path);
    return id === undefined ? undefined : this.get(id);
  }

  scope(id: ScopeId): Scope {
    const scope = this.scopes[id];
    if (scope === undefined) {
      throw new RangeError(`Unknown scope id ${id}`);
    }
    return scope;
  }

  allScopes(): readonly Scope[] {
    return this.scopes;
  }

  privateScopeOf(pkg: PackageId): Scope | undefined {
    const id = this.privateScopes.get(pkg);
    return id === undefined ? undefined : this.scope(id);
  }

  /**
   * Returns the private scope of `pkg`, opening it on first use.
   */
  openPrivateScope(pkg: PackageId): Scope {
    const existing = this.privateScopeOf(pkg);
    if (existing) {
      return existing;
    }
    const owner = this.get(pkg);
    const home = this.scope(owner.scope);
    const scope: Scope = {
      id: this.scopes.length,
      parent: home.id,
      owner: pkg,
      depth: home.depth + 1,
      path: `${owner.location ?? owner.path}/node_modules`,
      bindings: new Map(),
      passthrough: new Set(),
    };
    this.scopes.push(scope);
    this.privateScopes.set(pkg, scope.id);
    return scope;
  }

  /**
   * Creates a package bound under its name in `scope`.
   */
  add(
    scopeId: ScopeId,
    props: Omit<ResolvedPackage, "id" | "scope" | "depth" | "path" | "dev"> & {
      dev?: boolean;
    }
  ): ResolvedPackage {
    const scope = this.scope(scopeId);
    if (scope.bindings.has(props.name)) {
      throw new Error(`${props.name} is already bound in ${scope.path}`);
    }
    const pkg: ResolvedPackage = {
      ...props,
      id: this.packages.length,
      scope: scope.id,
      depth: scope.depth,
      path: `${scope.path}/${props.name}`,
      dev: props.dev ?? false,
    };
    this.packages.push(pkg);
    scope.bindings.set(pkg.name, pkg.id);
    this.byPath.set(pkg.path, pkg.id);
    return pkg;
  }

  link(from: PackageId | undefined, spec: DependencySpec, target: PackageId): void {
    const edge = { spec, target };
    if (from === undefined) {
      this.rootEdges.push(edge);
    } else {
      this.edges.get(from).push(edge);
    }
  }

  edgesOf(from: PackageId | undefined): readonly Edge[] {
    if (from === undefined) {
      return this.rootEdges;
    }
    return this.edges.has(from) ? this.edges.get(from) : [];
  }

  /**
   * Scopes a package sees, nearest first: its private scope, the scope it is
   * bound in, then that scope's ancestors. `undefined` stands for the root
   * project.
   */
  lookupChain(from: PackageId | undefined): Scope[] {
    const chain: Scope[] = [];
    let scopeId: ScopeId | undefined = ROOT_SCOPE;
    if (from !== undefined) {
      const own = this.privateScopeOf(from);
      if (own) {
        chain.push(own);
      }
      scopeId = this.get(from).scope;
    }
    while (scopeId !== undefined) {
      const scope = this.scope(scopeId);
      chain.push(scope);
      scopeId = scope.parent;
    }
    return chain;
  }

  /**
   * The binding node's module resolution would find from `from`.
   */
  lookup(
    from: PackageId | undefined,
    name: string
  ): { pkg: ResolvedPackage; scope: Scope } | undefined {
    for (const scope of this.lookupChain(from)) {
      const id = scope.bindings.get(name);
      if (id !== undefined) {
        return { pkg: this.get(id), scope };
      }
    }
    return undefined;
  }

  /**
   * Owners of the scopes enclosing `scopeId`, innermost first.
   */
  enclosingPackages(scopeId: ScopeId): ResolvedPackage[] {
    const owners: ResolvedPackage[] = [];
    let current: ScopeId | undefined = scopeId;
    while (current !== undefined) {
      const scope = this.scope(current);
      if (scope.owner !== undefined) {
        owners.push(this.get(scope.owner));
      }
      current = scope.parent;
    }
    return owners;
  }
}
