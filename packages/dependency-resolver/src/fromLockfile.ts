import { MalformedManifestError } from "@burrow/common";
import { WORKSPACE_PROTOCOL, dependencySpecs, rangeAccepts } from "@burrow/manifest";
import type { DependencySpec, LockEntry, Lockfile, Manifest } from "@burrow/manifest";
import type { WorkspaceIndex } from "@burrow/workspace-linker";

import { DependencyGraph, ROOT_SCOPE } from "./graph";
import type { PackageId, ResolvedPackage, ScopeId } from "./graph";
import { markDevPackages } from "./devMarking";

const NODE_MODULES = "node_modules";

function broken(message: string): MalformedManifestError {
  return new MalformedManifestError(`Lockfile cannot be linked: ${message}`);
}

function isRootScoped(entry: LockEntry): boolean {
  return entry.path === `${NODE_MODULES}/${entry.name}`;
}

/**
 * Rebuilds the graph a lockfile was written from, without the registry.
 * Fails with a MalformedManifestError when an entry sits where no scope can
 * hold it or a requirement cannot be found from its requester.
 */
export function graphFromLockfile(
  manifest: Manifest,
  lockfile: Lockfile,
  workspaces: WorkspaceIndex
): DependencyGraph {
  const graph = new DependencyGraph({
    name: manifest.name,
    version: manifest.version,
    dependencies: dependencySpecs(manifest),
  });

  // Owners come before what they hold: root scope entries first, then
  // deeper paths, which are always longer than their owner's.
  const entries = [...lockfile.packages].sort((a, b) => {
    const rootA = isRootScoped(a);
    const rootB = isRootScoped(b);
    if (rootA !== rootB) {
      return rootA ? -1 : 1;
    }
    return a.path.length - b.path.length || (a.path < b.path ? -1 : 1);
  });

  const ownersByDir = new Map<string, PackageId>();

  for (const entry of entries) {
    const suffix = `/${entry.name}`;
    if (!entry.path.endsWith(suffix)) {
      throw broken(`${entry.path} does not hold ${entry.name}`);
    }
    const scopePath = entry.path.slice(0, -suffix.length);
    let scope: ScopeId;
    if (scopePath === NODE_MODULES) {
      scope = ROOT_SCOPE;
    } else {
      const ownerDir = scopePath.endsWith(`/${NODE_MODULES}`)
        ? scopePath.slice(0, -NODE_MODULES.length - 1)
        : undefined;
      const owner = ownerDir === undefined ? undefined : ownersByDir.get(ownerDir);
      if (owner === undefined) {
        throw broken(`no package owns ${scopePath}`);
      }
      scope = graph.openPrivateScope(owner).id;
    }

    let pkg: ResolvedPackage;
    if (entry.resolved.startsWith(WORKSPACE_PROTOCOL)) {
      const member = workspaces.get(entry.name);
      if (!member || scope !== ROOT_SCOPE) {
        throw broken(`${entry.name} is not a workspace package`);
      }
      pkg = graph.add(scope, {
        name: entry.name,
        version: member.manifest.version,
        integrity: entry.integrity,
        source: "workspace",
        resolved: entry.resolved,
        location: entry.resolved.slice(WORKSPACE_PROTOCOL.length),
        dependencies: dependencySpecs(member.manifest),
      });
    } else {
      const requestedBy = `${entry.name}@${entry.version}`;
      pkg = graph.add(scope, {
        name: entry.name,
        version: entry.version,
        integrity: entry.integrity,
        source: "cache",
        resolved: entry.resolved,
        dependencies: entry.requires.map(
          (r): DependencySpec => ({
            name: r.name,
            range: r.version,
            isDev: false,
            requestedBy,
          })
        ),
      });
    }
    ownersByDir.set(pkg.location ?? pkg.path, pkg.id);
  }

  const linkSpec = (from: PackageId | undefined, spec: DependencySpec) => {
    const found = graph.lookup(from, spec.name);
    if (!found) {
      throw broken(`${spec.requestedBy} requires ${spec.name}, which is not locked`);
    }
    const target = found.pkg;
    const accepted =
      target.source === "workspace"
        ? workspaces.has(spec.name)
        : rangeAccepts(spec.range, target.version);
    if (!accepted) {
      throw broken(
        `${spec.requestedBy} requires ${spec.name}@${spec.range}, found ${target.version}`
      );
    }
    graph.link(from, spec, target.id);
  };

  graph.root.dependencies.forEach((spec) => linkSpec(undefined, spec));
  for (const pkg of graph.all()) {
    pkg.dependencies.forEach((spec) => linkSpec(pkg.id, spec));
  }

  markDevPackages(graph);
  return graph;
}
