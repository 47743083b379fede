import * as fs from "fs";
import * as path from "path";
import tempy from "tempy";
import {
  FileSystemError,
  IntegrityMismatchError,
  NetworkError,
  createSilentLogger,
} from "@burrow/common";
import { resolve } from "@burrow/dependency-resolver";
import { parseManifest } from "@burrow/manifest";
import { PackageCache } from "@burrow/package-cache";
import { InMemoryRegistry } from "@burrow/registry/tests/memoryRegistry";
import { discoverWorkspaces, isLinkedTo } from "@burrow/workspace-linker";

import { install } from "./install";
import type { InstallOptions } from "./install";
import { INSTALL_MARKER } from "./place";
import type { ScriptRunner } from "./scripts";

const silent = createSilentLogger();

function writeJson(file: string, value: unknown) {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(value));
}

function memoryLogger() {
  const warnings: string[] = [];
  const logger = Object.assign(createSilentLogger(), {
    warn: (message: string) => {
      warnings.push(message);
      return logger;
    },
  });
  return { logger, warnings };
}

function createProject(document: Record<string, unknown>, root = tempy.directory()) {
  writeJson(path.join(root, "package.json"), { version: "1.0.0", ...document });
  return root;
}

async function resolveProject(root: string, registry: InMemoryRegistry) {
  const manifest = parseManifest(fs.readFileSync(path.join(root, "package.json"), "utf8"));
  const workspaces =
    manifest.workspaces.length > 0
      ? await discoverWorkspaces(root, manifest.workspaces, silent)
      : undefined;
  const { graph } = await resolve(manifest, undefined, {
    registry,
    workspaces,
    logger: silent,
  });
  return graph;
}

async function installProject(
  root: string,
  registry: InMemoryRegistry,
  options: Partial<InstallOptions> = {}
) {
  const graph = await resolveProject(root, registry);
  return install(graph, {
    projectRoot: root,
    registry,
    cache: options.cache ?? new PackageCache(tempy.directory()),
    retryDelayMs: 0,
    ignoreScripts: true,
    logger: silent,
    ...options,
  });
}

function readVersion(dir: string): unknown {
  const document: unknown = JSON.parse(
    fs.readFileSync(path.join(dir, "package.json"), "utf8")
  );
  return typeof document === "object" && document !== null && "version" in document
    ? document.version
    : undefined;
}

async function conflictRegistry() {
  const registry = new InMemoryRegistry();
  await registry.publish({ name: "a", version: "1.0.0", dependencies: { c: "^1.0.0" } });
  await registry.publish({ name: "b", version: "1.0.0", dependencies: { c: "^2.0.0" } });
  await registry.publish({ name: "c", version: "1.5.0" });
  await registry.publish({ name: "c", version: "2.1.0" });
  return registry;
}

describe("install", () => {
  it("places every package at its path", async () => {
    const registry = await conflictRegistry();
    const root = createProject({ name: "app", dependencies: { a: "^1.0.0", b: "^1.0.0" } });

    const report = await installProject(root, registry);

    expect(report).toEqual({
      installed: 4,
      cacheHits: 0,
      fetched: 4,
      upToDate: 0,
      linkedBins: 0,
      failedScripts: [],
      failedPackages: [],
    });
    expect(readVersion(path.join(root, "node_modules/c"))).toBe("1.5.0");
    expect(readVersion(path.join(root, "node_modules/b/node_modules/c"))).toBe("2.1.0");
    const integrity = (await registry.getVersions("a")).versions[0]?.integrity;
    expect(
      fs.readFileSync(path.join(root, "node_modules/a", INSTALL_MARKER), "utf8")
    ).toBe(`a@1.0.0 ${integrity}\n`);
  });

  it("leaves packages already in place untouched", async () => {
    const registry = await conflictRegistry();
    const cache = new PackageCache(tempy.directory());
    const root = createProject({ name: "app", dependencies: { a: "^1.0.0", b: "^1.0.0" } });
    await installProject(root, registry, { cache });

    const report = await installProject(root, registry, { cache });

    expect(report.upToDate).toBe(4);
    expect(report.installed).toBe(0);
    expect(report.fetched + report.cacheHits).toBe(0);
    expect(registry.tarballRequests).toHaveLength(4);
  });

  it("shares downloads between projects through the cache", async () => {
    const registry = new InMemoryRegistry();
    await registry.publish({ name: "left-pad", version: "1.3.0" });
    const cache = new PackageCache(tempy.directory());

    const first = await installProject(
      createProject({ name: "one", dependencies: { "left-pad": "^1.0.0" } }),
      registry,
      { cache }
    );
    const second = await installProject(
      createProject({ name: "two", dependencies: { "left-pad": "^1.0.0" } }),
      registry,
      { cache }
    );

    expect([first.fetched, first.cacheHits]).toEqual([1, 0]);
    expect([second.fetched, second.cacheHits]).toEqual([0, 1]);
    expect(registry.tarballRequests).toEqual([
      "https://registry.test/left-pad/-/left-pad-1.3.0.tgz",
    ]);
  });

  it("removes stale entries and leftovers of interrupted runs", async () => {
    const registry = new InMemoryRegistry();
    await registry.publish({ name: "left-pad", version: "1.3.0" });
    const root = createProject({ name: "app", dependencies: { "left-pad": "^1.0.0" } });
    writeJson(path.join(root, "node_modules/old/package.json"), { name: "old" });
    writeJson(path.join(root, "node_modules/@scope/gone/package.json"), { name: "@scope/gone" });
    fs.mkdirSync(path.join(root, "node_modules/.left-pad.burrow-tmp-0a1b2c3d"));
    fs.mkdirSync(path.join(root, "node_modules/.bin"));

    await installProject(root, registry);

    expect(fs.readdirSync(path.join(root, "node_modules")).sort()).toEqual([
      ".bin",
      "@scope",
      "left-pad",
    ]);
    expect(fs.readdirSync(path.join(root, "node_modules/@scope"))).toEqual([]);
  });

  it("links executables and drops dangling ones", async () => {
    const registry = new InMemoryRegistry();
    await registry.publish({
      name: "tool",
      version: "1.0.0",
      bin: { tool: "cli.js" },
      files: { "cli.js": "#!/usr/bin/env node\n" },
    });
    await registry.publish({
      name: "@scope/mk",
      version: "1.0.0",
      bin: "bin.js",
      files: { "bin.js": "#!/usr/bin/env node\n" },
    });
    await registry.publish({
      name: "bad",
      version: "1.0.0",
      bin: { "../evil": "x.js" },
      files: { "x.js": "" },
    });
    const root = createProject({
      name: "app",
      dependencies: { tool: "^1.0.0", "@scope/mk": "^1.0.0", bad: "^1.0.0" },
    });
    fs.mkdirSync(path.join(root, "node_modules/.bin"), { recursive: true });
    fs.symlinkSync("../gone/cli.js", path.join(root, "node_modules/.bin/stale"));
    const { logger, warnings } = memoryLogger();

    const report = await installProject(root, registry, { logger });

    expect(report.linkedBins).toBe(2);
    const binDir = path.join(root, "node_modules/.bin");
    expect(fs.readdirSync(binDir).sort()).toEqual(["mk", "tool"]);
    expect(fs.readlinkSync(path.join(binDir, "mk"))).toBe("../@scope/mk/bin.js");
    expect(fs.readlinkSync(path.join(binDir, "tool"))).toBe("../tool/cli.js");
    expect(warnings).toEqual([
      'Package "bad" exposes a bin script with an invalid name: "../evil"',
    ]);
  });

  it("runs install scripts dependencies first and reports failures", async () => {
    const registry = new InMemoryRegistry();
    await registry.publish({
      name: "helper",
      version: "1.0.0",
      scripts: { preinstall: "prepare-helper" },
    });
    await registry.publish({
      name: "native",
      version: "1.0.0",
      dependencies: { helper: "^1.0.0" },
      scripts: { install: "fail", postinstall: "never-runs" },
    });
    const root = createProject({
      name: "app",
      dependencies: { native: "^1.0.0" },
      scripts: { postinstall: "finish" },
    });
    const calls: string[] = [];
    const scriptRunner: ScriptRunner = async (request) => {
      calls.push(`${request.packageName}:${request.script}`);
      return request.command === "fail"
        ? { exitCode: 3, output: "boom" }
        : { exitCode: 0, output: "" };
    };

    const report = await installProject(root, registry, {
      ignoreScripts: false,
      scriptRunner,
    });

    expect(calls).toEqual(["helper:preinstall", "native:install", "app:postinstall"]);
    expect(report.failedScripts).toEqual([
      { package: "native@1.0.0", script: "install", exitCode: 3, output: "boom" },
    ]);
    expect(report.fatalError).toBeUndefined();
    expect(report.installed).toBe(2);
  });

  it("gives scripts the package directory and the bin folders on PATH", async () => {
    const registry = new InMemoryRegistry();
    await registry.publish({
      name: "native",
      version: "2.0.0",
      scripts: { install: "build" },
    });
    const root = createProject({ name: "app", dependencies: { native: "^2.0.0" } });
    const requests: Parameters<ScriptRunner>[0][] = [];
    const scriptRunner: ScriptRunner = async (request) => {
      requests.push(request);
      return { exitCode: 0, output: "" };
    };

    await installProject(root, registry, { ignoreScripts: false, scriptRunner });

    expect(requests).toHaveLength(1);
    const [request] = requests;
    expect(request?.cwd).toBe(path.join(root, "node_modules/native"));
    expect(request?.env["npm_lifecycle_event"]).toBe("install");
    expect(request?.env["npm_package_version"]).toBe("2.0.0");
    expect(request?.env["PATH"]?.split(path.delimiter).slice(0, 2)).toEqual([
      path.join(root, "node_modules/native/node_modules/.bin"),
      path.join(root, "node_modules/.bin"),
    ]);
  });

  it("skips scripts when asked to", async () => {
    const registry = new InMemoryRegistry();
    await registry.publish({ name: "native", version: "1.0.0", scripts: { install: "build" } });
    const root = createProject({ name: "app", dependencies: { native: "^1.0.0" } });
    const scriptRunner = jest.fn<ReturnType<ScriptRunner>, Parameters<ScriptRunner>>();

    await installProject(root, registry, { ignoreScripts: true, scriptRunner });

    expect(scriptRunner).not.toHaveBeenCalled();
  });

  it("retries failed downloads", async () => {
    const registry = new InMemoryRegistry();
    const info = await registry.publish({ name: "left-pad", version: "1.3.0" });
    registry.failDownloads(info.tarball, 2);
    const root = createProject({ name: "app", dependencies: { "left-pad": "^1.0.0" } });

    const report = await installProject(root, registry, { retries: 3 });

    expect(report.fatalError).toBeUndefined();
    expect(report.installed).toBe(1);
    expect(registry.tarballRequests).toHaveLength(3);
  });

  it("stops on a download that keeps failing and keeps what was installed", async () => {
    const registry = new InMemoryRegistry();
    await registry.publish({ name: "a", version: "1.0.0", files: { "index.js": "" } });
    const b = await registry.publish({ name: "b", version: "1.0.0" });
    const cache = new PackageCache(tempy.directory());
    const root = createProject({ name: "app", dependencies: { a: "^1.0.0" } });
    await installProject(root, registry, { cache });
    createProject({ name: "app", dependencies: { a: "^1.0.0", b: "^1.0.0" } }, root);
    registry.failDownloads(b.tarball, 5);

    const report = await installProject(root, registry, { cache, retries: 2 });

    expect(report.fatalError).toBeInstanceOf(NetworkError);
    expect(report.failedPackages).toEqual(["b@1.0.0"]);
    expect(registry.tarballRequests.filter((url) => url === b.tarball)).toHaveLength(2);
    expect(fs.existsSync(path.join(root, "node_modules/a/index.js"))).toBe(true);
    expect(fs.readdirSync(path.join(root, "node_modules"))).toEqual(["a"]);
  });

  it("lets a running download finish when another one fails", async () => {
    const registry = new InMemoryRegistry();
    const a = await registry.publish({ name: "a", version: "1.0.0" });
    const b = await registry.publish({ name: "b", version: "1.0.0" });
    registry.delayDownloads(a.tarball, 100);
    registry.failDownloads(b.tarball, 1);
    const cache = new PackageCache(tempy.directory());
    const root = createProject({ name: "app", dependencies: { a: "^1.0.0", b: "^1.0.0" } });

    const report = await installProject(root, registry, { cache, retries: 1 });

    expect(report.fatalError).toBeInstanceOf(NetworkError);
    expect(report.failedPackages).toEqual(["b@1.0.0"]);
    expect(report.fetched).toBe(1);
    expect(
      await cache.has({ name: "a", version: "1.0.0", integrity: a.integrity })
    ).toBe(true);
  });

  it("keeps at most `concurrency` downloads in flight", async () => {
    const registry = new InMemoryRegistry();
    const dependencies: Record<string, string> = {};
    for (const name of ["a", "b", "c", "d", "e"]) {
      await registry.publish({ name, version: "1.0.0" });
      dependencies[name] = "^1.0.0";
    }
    registry.downloadDelayMs = 20;
    const root = createProject({ name: "app", dependencies });

    const report = await installProject(root, registry, { concurrency: 2 });

    expect(report.fatalError).toBeUndefined();
    expect(report.fetched).toBe(5);
    expect(registry.tarballRequests).toHaveLength(5);
    expect(registry.maxConcurrentDownloads).toBeLessThanOrEqual(2);
  });

  it("rejects content that does not match its digest", async () => {
    const registry = new InMemoryRegistry();
    const info = await registry.publish({ name: "left-pad", version: "1.3.0" });
    registry.corrupt(info.tarball);
    const root = createProject({ name: "app", dependencies: { "left-pad": "^1.0.0" } });

    const report = await installProject(root, registry, { retries: 2 });

    expect(report.fatalError).toBeInstanceOf(IntegrityMismatchError);
    expect(registry.tarballRequests).toHaveLength(2);
    expect(fs.existsSync(path.join(root, "node_modules/left-pad"))).toBe(false);
  });

  it("links workspace members and installs their own copies beside them", async () => {
    const registry = new InMemoryRegistry();
    await registry.publish({ name: "left-pad", version: "1.0.0" });
    await registry.publish({ name: "left-pad", version: "2.0.0" });
    const root = createProject({
      name: "mono",
      workspaces: ["packages/*"],
      dependencies: { "left-pad": "^1.0.0" },
    });
    writeJson(path.join(root, "packages/util/package.json"), {
      name: "util",
      version: "1.0.0",
      dependencies: { "left-pad": "^2.0.0" },
    });

    const report = await installProject(root, registry);

    expect(report.fatalError).toBeUndefined();
    expect(
      await isLinkedTo(path.join(root, "packages/util"), path.join(root, "node_modules/util"))
    ).toBe(true);
    expect(readVersion(path.join(root, "node_modules/left-pad"))).toBe("1.0.0");
    expect(readVersion(path.join(root, "packages/util/node_modules/left-pad"))).toBe("2.0.0");

    const again = await installProject(root, registry);
    expect(again.upToDate).toBe(3);
  });

  it("installs only production packages when asked to", async () => {
    const registry = new InMemoryRegistry();
    await registry.publish({ name: "left-pad", version: "1.3.0" });
    await registry.publish({ name: "tool", version: "1.0.0" });
    const root = createProject({
      name: "app",
      dependencies: { "left-pad": "^1.0.0" },
      devDependencies: { tool: "^1.0.0" },
    });

    const report = await installProject(root, registry, { production: true });

    expect(report.installed).toBe(1);
    expect(fs.readdirSync(path.join(root, "node_modules"))).toEqual(["left-pad"]);
  });

  it("refuses a location that is not an absolute directory", async () => {
    const registry = new InMemoryRegistry();
    const graph = await resolveProject(createProject({ name: "app" }), registry);

    const report = await install(graph, {
      projectRoot: "relative/dir",
      registry,
      cache: new PackageCache(tempy.directory()),
      logger: silent,
    });

    expect(report.fatalError).toBeInstanceOf(FileSystemError);
    expect(report.fatalError?.message).toBe(
      'Location is not an absolute path: "relative/dir"'
    );
  });
});
