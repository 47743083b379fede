import {
  RegistryUnavailableError,
  UnsatisfiableRangeError,
} from "@burrow/common";
import { parseManifest, serializeLockfile } from "@burrow/manifest";
import type { Lockfile } from "@burrow/manifest";
import { InMemoryRegistry } from "@burrow/registry/tests/memoryRegistry";
import { WorkspaceIndex } from "@burrow/workspace-linker";

import { resolve } from "./resolve";

function manifest(document: Record<string, unknown>) {
  return parseManifest(JSON.stringify({ version: "1.0.0", ...document }));
}

function paths(lockfile: Lockfile) {
  return lockfile.packages.map((p) => `${p.path}@${p.version}`);
}

function leftPadRegistry() {
  const registry = new InMemoryRegistry();
  for (const version of ["1.1.0", "1.2.0", "1.3.0", "1.3.1", "2.0.0"]) {
    registry.addVersion("left-pad", version);
  }
  return registry;
}

function conflictRegistry() {
  const registry = new InMemoryRegistry();
  registry.addVersion("a", "1.0.0", { c: "^1.0.0" });
  registry.addVersion("b", "1.0.0", { c: "^2.0.0" });
  for (const version of ["1.0.0", "1.5.0", "2.0.0", "2.1.0"]) {
    registry.addVersion("c", version);
  }
  return registry;
}

function nestedCycleRegistry() {
  const registry = new InMemoryRegistry();
  registry.addVersion("a", "1.0.0", { c: "^1.0.0" });
  registry.addVersion("c", "1.0.0", { a: "^2.0.0" });
  registry.addVersion("a", "2.0.0", { d: "^1.0.0" });
  registry.addVersion("d", "1.0.0", { a: "^1.0.0" });
  return registry;
}

describe("resolve", () => {
  it("selects the highest version satisfying the range", async () => {
    const registry = leftPadRegistry();

    const { graph, lockfile, stats } = await resolve(
      manifest({ name: "app", dependencies: { "left-pad": "^1.3.0" } }),
      undefined,
      { registry }
    );

    expect(graph.atPath("node_modules/left-pad")?.version).toBe("1.3.1");
    expect(lockfile.packages).toEqual([
      {
        path: "node_modules/left-pad",
        name: "left-pad",
        version: "1.3.1",
        integrity: (await registry.getVersions("left-pad")).versions[3]?.integrity,
        resolved: "https://registry.test/left-pad/-/left-pad-1.3.1.tgz",
        requires: [],
      },
    ]);
    expect(stats).toEqual({
      registryQueries: 1,
      fromLockfile: false,
      packages: 1,
      lockedReused: 0,
    });
  });

  it("hoists the first requester's version and nests incompatible ones", async () => {
    const registry = conflictRegistry();

    const { graph, lockfile } = await resolve(
      manifest({ name: "app", dependencies: { a: "^1.0.0", b: "^1.0.0" } }),
      undefined,
      { registry }
    );

    expect(paths(lockfile)).toEqual([
      "node_modules/a@1.0.0",
      "node_modules/b@1.0.0",
      "node_modules/b/node_modules/c@2.1.0",
      "node_modules/c@1.5.0",
    ]);
    const nested = graph.atPath("node_modules/b/node_modules/c");
    expect(nested?.depth).toBe(1);
    expect(lockfile.packages[1]?.requires).toEqual([{ name: "c", version: "2.1.0" }]);
  });

  it("narrows a shared version to what every compatible requester accepts", async () => {
    const registry = new InMemoryRegistry();
    registry.addVersion("a", "1.0.0", { c: "^1.0.0" });
    registry.addVersion("b", "1.0.0", { c: "~1.2.0" });
    for (const version of ["1.0.0", "1.2.0", "1.2.5", "1.5.0"]) {
      registry.addVersion("c", version);
    }

    const { lockfile } = await resolve(
      manifest({ name: "app", dependencies: { a: "^1.0.0", b: "^1.0.0" } }),
      undefined,
      { registry }
    );

    expect(paths(lockfile)).toEqual([
      "node_modules/a@1.0.0",
      "node_modules/b@1.0.0",
      "node_modules/c@1.2.5",
    ]);
  });

  it("reuses packages already bound when dependencies form a cycle", async () => {
    const registry = new InMemoryRegistry();
    registry.addVersion("a", "1.0.0", { b: "^1.0.0" });
    registry.addVersion("b", "1.0.0", { a: "^1.0.0" });

    const { graph } = await resolve(
      manifest({ name: "app", dependencies: { a: "^1.0.0" } }),
      undefined,
      { registry }
    );

    expect(graph.size).toBe(2);
    const a = graph.atPath("node_modules/a");
    const b = graph.atPath("node_modules/b");
    expect(a && graph.edgesOf(a.id).map((e) => e.target)).toEqual([b?.id]);
    expect(b && graph.edgesOf(b.id).map((e) => e.target)).toEqual([a?.id]);
  });

  it("nests a copy inside a cycle when the bound version conflicts", async () => {
    const input = manifest({ name: "app", dependencies: { a: "^1.0.0" } });

    const { graph, lockfile } = await resolve(input, undefined, {
      registry: nestedCycleRegistry(),
    });

    expect(graph.all().map((p) => `${p.path}@${p.version}`)).toEqual([
      "node_modules/a@1.0.0",
      "node_modules/c@1.0.0",
      "node_modules/c/node_modules/a@2.0.0",
      "node_modules/c/node_modules/d@1.0.0",
      "node_modules/c/node_modules/d/node_modules/a@1.0.0",
    ]);
    const inner = graph.atPath("node_modules/c/node_modules/d/node_modules/a");
    expect(inner && graph.edgesOf(inner.id).map((e) => e.target)).toEqual([
      graph.atPath("node_modules/c")?.id,
    ]);

    const registry = nestedCycleRegistry();
    const again = await resolve(input, lockfile, { registry });

    expect(again.stats.registryQueries).toBe(0);
    expect(again.stats.fromLockfile).toBe(true);
    expect(serializeLockfile(again.lockfile)).toBe(serializeLockfile(lockfile));
  });

  it("links every requirement to the package node would load", async () => {
    for (const [dependencies, registry] of [
      [{ a: "^1.0.0" }, nestedCycleRegistry()],
      [{ a: "^1.0.0", b: "^1.0.0" }, conflictRegistry()],
    ] as const) {
      const { graph } = await resolve(manifest({ name: "app", dependencies }), undefined, {
        registry,
      });

      for (const from of [undefined, ...graph.all().map((p) => p.id)]) {
        for (const edge of graph.edgesOf(from)) {
          expect(graph.lookup(from, edge.spec.name)?.pkg.id).toBe(edge.target);
        }
      }
    }
  });

  it("rejects a cycle that would nest a package inside its own copy", async () => {
    const registry = new InMemoryRegistry();
    registry.addVersion("a", "1.0.0", { b: "^1.0.0" });
    registry.addVersion("b", "1.0.0", { a: "^2.0.0" });
    registry.addVersion("a", "2.0.0", { b: "^2.0.0" });
    registry.addVersion("b", "2.0.0", { a: "^1.0.0" });

    await expect(
      resolve(manifest({ name: "app", dependencies: { a: "^1.0.0" } }), undefined, {
        registry,
      })
    ).rejects.toThrow(
      'No version of "b" satisfies "^1.0.0" (b@1.0.0 would be nested inside its own copy at node_modules/b)'
    );
  });

  it("hashes the manifest with the configured algorithm", async () => {
    const input = manifest({ name: "app", dependencies: { "left-pad": "^1.3.0" } });

    const sha1 = await resolve(input, undefined, {
      registry: leftPadRegistry(),
      integrityAlgorithm: "sha1",
    });
    const sha512 = await resolve(input, undefined, {
      registry: leftPadRegistry(),
      integrityAlgorithm: "sha512",
    });

    expect(sha1.lockfile.integrityAlgorithm).toBe("sha1");
    expect(sha1.lockfile.manifestHash).toMatch(/^sha1-/);
    expect(sha512.lockfile.manifestHash).toMatch(/^sha512-/);
    expect(sha1.lockfile.packages).toEqual(sha512.lockfile.packages);

    const again = await resolve(input, sha1.lockfile, { registry: leftPadRegistry() });
    expect(again.stats.fromLockfile).toBe(true);
    expect(again.lockfile.manifestHash).toBe(sha1.lockfile.manifestHash);
  });

  it("produces identical lockfiles for identical inputs", async () => {
    const input = manifest({ name: "app", dependencies: { a: "^1.0.0", b: "^1.0.0" } });

    const first = await resolve(input, undefined, { registry: conflictRegistry() });
    const second = await resolve(input, undefined, { registry: conflictRegistry() });

    expect(serializeLockfile(second.lockfile)).toBe(serializeLockfile(first.lockfile));
  });

  it("rebuilds the graph from a consistent lockfile without registry queries", async () => {
    const input = manifest({ name: "app", dependencies: { a: "^1.0.0", b: "^1.0.0" } });
    const { lockfile } = await resolve(input, undefined, {
      registry: conflictRegistry(),
    });
    const registry = conflictRegistry();

    const result = await resolve(input, lockfile, { registry });

    expect(result.stats.registryQueries).toBe(0);
    expect(result.stats.fromLockfile).toBe(true);
    expect(registry.metadataRequests).toEqual([]);
    expect(result.graph.all().every((p) => p.source === "cache")).toBe(true);
    expect(serializeLockfile(result.lockfile)).toBe(serializeLockfile(lockfile));
  });

  it("keeps locked versions when the manifest changed", async () => {
    const registry = new InMemoryRegistry();
    registry.addVersion("left-pad", "1.3.0");
    registry.addVersion("is-odd", "1.0.0");
    const { lockfile } = await resolve(
      manifest({ name: "app", dependencies: { "left-pad": "^1.3.0" } }),
      undefined,
      { registry }
    );
    registry.addVersion("left-pad", "1.3.1");

    const result = await resolve(
      manifest({
        name: "app",
        dependencies: { "left-pad": "^1.3.0", "is-odd": "^1.0.0" },
      }),
      lockfile,
      { registry }
    );

    expect(paths(result.lockfile)).toEqual([
      "node_modules/is-odd@1.0.0",
      "node_modules/left-pad@1.3.0",
    ]);
    expect(result.stats.registryQueries).toBe(1);
    expect(result.stats.lockedReused).toBe(1);
  });

  it("falls back to the registry when the lockfile cannot be linked", async () => {
    const registry = new InMemoryRegistry();
    registry.addVersion("a", "1.0.0", { b: "^1.0.0" });
    registry.addVersion("b", "1.0.0");
    const input = manifest({ name: "app", dependencies: { a: "^1.0.0" } });
    const { lockfile } = await resolve(input, undefined, { registry });
    const damaged: Lockfile = {
      ...lockfile,
      packages: lockfile.packages.filter((p) => p.name !== "b"),
    };

    const result = await resolve(input, damaged, { registry });

    expect(result.stats.fromLockfile).toBe(false);
    expect(paths(result.lockfile)).toEqual([
      "node_modules/a@1.0.0",
      "node_modules/b@1.0.0",
    ]);
  });

  it("links workspace members regardless of the requested range", async () => {
    const registry = leftPadRegistry();
    registry.addVersion("util", "1.0.0");
    const workspaces = new WorkspaceIndex("/repo", [
      {
        name: "util",
        dir: "/repo/packages/util",
        relativePath: "packages/util",
        manifest: manifest({
          name: "util",
          version: "2.0.0",
          dependencies: { "left-pad": "^2.0.0" },
        }),
      },
    ]);

    const { graph, lockfile } = await resolve(
      manifest({
        name: "app",
        dependencies: { util: "^1.0.0", "left-pad": "^1.0.0" },
      }),
      undefined,
      { registry, workspaces }
    );

    const util = graph.atPath("node_modules/util");
    expect(util?.source).toBe("workspace");
    expect(util?.location).toBe("packages/util");
    expect(registry.metadataRequests).toEqual(["left-pad"]);
    expect(paths(lockfile)).toEqual([
      "node_modules/left-pad@1.3.1",
      "node_modules/util@2.0.0",
      "packages/util/node_modules/left-pad@2.0.0",
    ]);
    expect(lockfile.packages[1]?.resolved).toBe("workspace:packages/util");
  });

  it("resolves dist-tags through the registry", async () => {
    const registry = leftPadRegistry();
    registry.setDistTag("left-pad", "legacy", "1.1.0");

    const { lockfile } = await resolve(
      manifest({ name: "app", dependencies: { "left-pad": "legacy" } }),
      undefined,
      { registry }
    );

    expect(paths(lockfile)).toEqual(["node_modules/left-pad@1.1.0"]);
  });

  it("flags packages only reachable through development dependencies", async () => {
    const registry = new InMemoryRegistry();
    registry.addVersion("a", "1.0.0", { shared: "^1.0.0" });
    registry.addVersion("b", "1.0.0", { shared: "^1.0.0", only: "^1.0.0" });
    registry.addVersion("shared", "1.0.0");
    registry.addVersion("only", "1.0.0");
    const input = manifest({
      name: "app",
      dependencies: { a: "^1.0.0" },
      devDependencies: { b: "^1.0.0" },
    });

    const full = await resolve(input, undefined, { registry });
    const production = await resolve(input, undefined, { registry, production: true });

    expect(full.lockfile.packages.map((p) => [p.name, p.dev === true])).toEqual([
      ["a", false],
      ["b", true],
      ["only", true],
      ["shared", false],
    ]);
    expect(production.graph.all().map((p) => p.path)).toEqual([
      "node_modules/a",
      "node_modules/shared",
    ]);
    expect(production.lockfile).toEqual(full.lockfile);
  });

  it("rejects ranges nothing satisfies", async () => {
    const registry = leftPadRegistry();

    await expect(
      resolve(manifest({ name: "app", dependencies: { "left-pad": "^9.0.0" } }), undefined, {
        registry,
      })
    ).rejects.toThrow(new UnsatisfiableRangeError("left-pad", ["^9.0.0"]));
    await expect(
      resolve(
        manifest({ name: "app", dependencies: { "left-pad": "not a range!!" } }),
        undefined,
        { registry }
      )
    ).rejects.toThrow('No version of "left-pad" satisfies "not a range!!" (invalid range)');
  });

  it("reports packages missing from the registry", async () => {
    await expect(
      resolve(manifest({ name: "app", dependencies: { ghost: "^1.0.0" } }), undefined, {
        registry: new InMemoryRegistry(),
      })
    ).rejects.toThrow(RegistryUnavailableError);
  });
});
