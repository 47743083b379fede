import {
  MalformedManifestError,
  UnsatisfiableRangeError,
  logger as defaultLogger,
} from "@burrow/common";
import type { IntegrityAlgorithm, Logger } from "@burrow/common";
import {
  WORKSPACE_PROTOCOL,
  checkLockfileConsistency,
  dependencyHash,
  dependencySpecs,
  isWorkspaceRange,
  manifestId,
  rangeAccepts,
} from "@burrow/manifest";
import type { DependencySpec, LockEntry, Lockfile, Manifest } from "@burrow/manifest";
import type { RegistryClient } from "@burrow/registry";
import { WorkspaceIndex } from "@burrow/workspace-linker";

import { DependencyGraph, ROOT_SCOPE } from "./graph";
import type { PackageId, ResolvedPackage, Scope } from "./graph";
import { markDevPackages } from "./devMarking";
import { graphFromLockfile } from "./fromLockfile";
import { withoutDevPackages } from "./prune";
import { toLockfile } from "./toLockfile";
import { VersionCatalog, assertValidRange, selectVersion } from "./versions";

export interface ResolveOptions {
  registry: RegistryClient;
  workspaces?: WorkspaceIndex;
  /**
   * Leave development-only packages out of the returned graph. The lockfile
   * still covers them.
   */
  production?: boolean;
  /**
   * Recorded in the lockfile and used for its manifest hash.
   */
  integrityAlgorithm?: IntegrityAlgorithm;
  logger?: Logger;
}

export interface ResolveStats {
  registryQueries: number;
  fromLockfile: boolean;
  packages: number;
  /**
   * Packages kept from the previous lockfile during a registry resolution.
   */
  lockedReused: number;
}

export interface Resolution {
  graph: DependencyGraph;
  lockfile: Lockfile;
  stats: ResolveStats;
}

interface QueueItem {
  /**
   * `undefined` is the root project.
   */
  from: PackageId | undefined;
  spec: DependencySpec;
}

class Resolver {
  private readonly queue: QueueItem[] = [];
  private readonly workspaceIds = new Map<string, PackageId>();
  lockedReused = 0;

  constructor(
    readonly graph: DependencyGraph,
    private readonly catalog: VersionCatalog,
    private readonly workspaces: WorkspaceIndex,
    private readonly previous: ReadonlyMap<string, LockEntry>,
    private readonly logger: Logger
  ) {}

  async run(): Promise<void> {
    for (const member of this.workspaces.members()) {
      const pkg = this.graph.add(ROOT_SCOPE, {
        name: member.name,
        version: member.manifest.version,
        integrity: "",
        source: "workspace",
        resolved: `${WORKSPACE_PROTOCOL}${member.relativePath}`,
        location: member.relativePath,
        dependencies: dependencySpecs(member.manifest),
      });
      this.workspaceIds.set(member.name, pkg.id);
    }

    this.graph.root.dependencies.forEach((spec) =>
      this.queue.push({ from: undefined, spec })
    );
    for (const id of this.workspaceIds.values()) {
      this.enqueueDependencies(this.graph.get(id));
    }

    let item = this.queue.shift();
    while (item !== undefined) {
      await this.process(item);
      item = this.queue.shift();
    }
  }

  private enqueueDependencies(pkg: ResolvedPackage): void {
    pkg.dependencies.forEach((spec) => this.queue.push({ from: pkg.id, spec }));
  }

  private homeScope(from: PackageId | undefined): Scope {
    return this.graph.scope(
      from === undefined ? ROOT_SCOPE : this.graph.get(from).scope
    );
  }

  private async process({ from, spec }: QueueItem): Promise<void> {
    const workspaceId = this.workspaceIds.get(spec.name);
    if (workspaceId !== undefined) {
      this.graph.link(from, spec, workspaceId);
      return;
    }
    if (isWorkspaceRange(spec.range)) {
      throw new UnsatisfiableRangeError(
        spec.name,
        [spec.range],
        "no workspace package has this name"
      );
    }
    assertValidRange(spec.name, spec.range);

    const found = this.graph.lookup(from, spec.name);
    if (found && rangeAccepts(spec.range, found.pkg.version)) {
      this.markPassthrough(from, spec.name, found.scope);
      this.graph.link(from, spec, found.pkg.id);
      return;
    }

    const target = this.targetScope(from, spec, found?.pkg);
    const pkg = await this.create(target, spec);
    this.graph.link(from, spec, pkg.id);
  }

  /**
   * Scopes between the requester and the binding it resolved to must not
   * bind the name later, or the requester would see another package.
   */
  private markPassthrough(
    from: PackageId | undefined,
    name: string,
    found: Scope
  ): void {
    for (const scope of this.graph.lookupChain(from)) {
      if (scope === found) {
        return;
      }
      scope.passthrough.add(name);
    }
  }

  private targetScope(
    from: PackageId | undefined,
    spec: DependencySpec,
    conflicting: ResolvedPackage | undefined
  ): Scope {
    const home = this.homeScope(from);
    const own = from === undefined ? undefined : this.graph.privateScopeOf(from);
    if (
      !own?.bindings.has(spec.name) &&
      !home.bindings.has(spec.name) &&
      !home.passthrough.has(spec.name)
    ) {
      return home;
    }
    if (from === undefined || own?.bindings.has(spec.name)) {
      throw new UnsatisfiableRangeError(
        spec.name,
        [spec.range],
        conflicting
          ? `${conflicting.version} is already installed at ${conflicting.path}`
          : undefined
      );
    }
    return this.graph.openPrivateScope(from);
  }

  /**
   * Ranges of queued requests that will land in `scope` for `name`, in queue order.
   */
  private sharedRanges(name: string, scope: Scope): string[] {
    return this.queue
      .filter(
        (item) =>
          item.spec.name === name &&
          this.homeScope(item.from).id === scope.id &&
          (item.from === undefined ||
            !this.graph.privateScopeOf(item.from)?.bindings.has(name))
      )
      .map((item) => item.spec.range);
  }

  private async create(scope: Scope, spec: DependencySpec): Promise<ResolvedPackage> {
    const path = `${scope.path}/${spec.name}`;
    const locked = this.previous.get(path);
    if (
      locked &&
      locked.name === spec.name &&
      !locked.resolved.startsWith(WORKSPACE_PROTOCOL) &&
      rangeAccepts(spec.range, locked.version)
    ) {
      this.assertNotNested(scope, spec, locked.version);
      this.lockedReused++;
      const requestedBy = `${locked.name}@${locked.version}`;
      const pkg = this.graph.add(scope.id, {
        name: locked.name,
        version: locked.version,
        integrity: locked.integrity,
        source: "cache",
        resolved: locked.resolved,
        dependencies: locked.requires.map((r) => ({
          name: r.name,
          range: r.version,
          isDev: false,
          requestedBy,
        })),
      });
      this.enqueueDependencies(pkg);
      return pkg;
    }

    const metadata = await this.catalog.get(spec.name);
    const info = selectVersion(
      metadata,
      spec.range,
      this.sharedRanges(spec.name, scope)
    );
    this.assertNotNested(scope, spec, info.version);
    const requestedBy = `${spec.name}@${info.version}`;
    const pkg = this.graph.add(scope.id, {
      name: spec.name,
      version: info.version,
      integrity: info.integrity,
      source: "registry",
      resolved: info.tarball,
      dependencies: Object.entries(info.dependencies).map(([name, range]) => ({
        name,
        range,
        isDev: false,
        requestedBy,
      })),
    });
    this.logger.debug(`Resolved ${spec.name}@${spec.range} to ${info.version} at ${pkg.path}`);
    this.enqueueDependencies(pkg);
    return pkg;
  }

  /**
   * A package is never placed inside a copy of itself. Reaching that point
   * means the enclosing copy is hidden from the requester and the same
   * conflict would repeat one level deeper, without end.
   */
  private assertNotNested(scope: Scope, spec: DependencySpec, version: string): void {
    const enclosing = this.graph
      .enclosingPackages(scope.id)
      .find((p) => p.name === spec.name && p.version === version);
    if (enclosing) {
      throw new UnsatisfiableRangeError(
        spec.name,
        [spec.range],
        `${spec.name}@${version} would be nested inside its own copy at ${enclosing.path}`
      );
    }
  }
}

/**
 * Computes the dependency graph of a project.
 *
 * A lockfile consistent with the manifest is used as is, without contacting
 * the registry. Otherwise the graph is resolved breadth first, preferring
 * versions the lockfile already pins at the same location.
 */
export async function resolve(
  manifest: Manifest,
  lockfile: Lockfile | undefined,
  options: ResolveOptions
): Promise<Resolution> {
  const logger = options.logger ?? defaultLogger;
  const workspaces = options.workspaces ?? new WorkspaceIndex("");
  const integrityAlgorithm =
    options.integrityAlgorithm ?? lockfile?.integrityAlgorithm ?? "sha512";
  const manifestHash = dependencyHash(
    manifest,
    workspaces.members().map((m) => m.manifest),
    integrityAlgorithm
  );
  const finish = (
    graph: DependencyGraph,
    stats: Omit<ResolveStats, "packages">
  ): Resolution => {
    const newLockfile = toLockfile(graph, manifestHash, integrityAlgorithm);
    const result = options.production ? withoutDevPackages(graph) : graph;
    return {
      graph: result,
      lockfile: newLockfile,
      stats: { ...stats, packages: result.size },
    };
  };

  let previous = lockfile;
  if (lockfile) {
    const consistency = checkLockfileConsistency(
      manifest,
      lockfile,
      workspaces.manifests()
    );
    if (consistency.consistent) {
      try {
        const graph = graphFromLockfile(manifest, lockfile, workspaces);
        logger.debug(`Using the lockfile of ${manifestId(manifest)}`);
        return finish(graph, {
          registryQueries: 0,
          fromLockfile: true,
          lockedReused: graph.size,
        });
      } catch (e) {
        if (!(e instanceof MalformedManifestError)) {
          throw e;
        }
        logger.warn(`${e.message}, resolving from the registry`);
        previous = undefined;
      }
    } else {
      logger.info(
        `The lockfile is out of date:\n  ${consistency.reasons.join("\n  ")}`
      );
    }
  }

  const graph = new DependencyGraph({
    name: manifest.name,
    version: manifest.version,
    dependencies: dependencySpecs(manifest),
  });
  const catalog = new VersionCatalog(options.registry, logger);
  const resolver = new Resolver(
    graph,
    catalog,
    workspaces,
    new Map((previous?.packages ?? []).map((e) => [e.path, e])),
    logger
  );
  await resolver.run();
  markDevPackages(graph);
  return finish(graph, {
    registryQueries: catalog.queries,
    fromLockfile: false,
    lockedReused: resolver.lockedReused,
  });
}
