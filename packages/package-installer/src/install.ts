import * as fs from "fs";
import * as path from "path";
import PQueue from "p-queue";
import {
  FileSystemError,
  IntegrityMismatchError,
  MalformedManifestError,
  NetworkError,
  errnoCode,
  logger as defaultLogger,
  toFileSystemError,
  withRetry,
} from "@burrow/common";
import type { BurrowError, Logger, SymlinkType } from "@burrow/common";
import { ROOT_SCOPE } from "@burrow/dependency-resolver";
import type {
  DependencyGraph,
  PackageId,
  ResolvedPackage,
} from "@burrow/dependency-resolver";
import { readManifest } from "@burrow/manifest";
import type { Manifest } from "@burrow/manifest";
import type { CacheEntry, PackageCache } from "@burrow/package-cache";
import type { RegistryClient } from "@burrow/registry";
import { isLinkedTo, linkWorkspace } from "@burrow/workspace-linker";

import { binEntries, isInside, linkBin, pruneDanglingBins } from "./bins";
import { getGraphError, getLocationError, isValidBinName } from "./inputValidation";
import { createInstallPlan } from "./installPlan";
import type { InstallPlan } from "./installPlan";
import { isUpToDate, placePackage, temporarySibling } from "./place";
import { runLifecycleScripts, spawnScript } from "./scripts";
import type { ScriptRunner } from "./scripts";
import { executeTree } from "./treeExecutor";

export interface InstallOptions {
  /**
   * Absolute path of the project; package paths are relative to it.
   */
  projectRoot: string;
  cache: PackageCache;
  registry: RegistryClient;
  /**
   * Downloads in flight at once.
   */
  concurrency?: number;
  /**
   * Attempts per download, counting the first one.
   */
  retries?: number;
  retryDelayMs?: number;
  maxRetryDelayMs?: number;
  /**
   * Timeout of a single download attempt. 0 disables it.
   */
  timeoutMs?: number;
  /**
   * Skip development-only packages.
   */
  production?: boolean;
  ignoreScripts?: boolean;
  scriptRunner?: ScriptRunner;
  scriptTimeoutMs?: number;
  /**
   * Only applicable to windows machines.
   */
  symlinkType?: SymlinkType;
  logger?: Logger;
}

export interface ScriptFailure {
  /**
   * `name@version` of the package, or of the root project.
   */
  package: string;
  script: string;
  exitCode: number | null;
  output: string;
}

export interface InstallReport {
  /**
   * Packages copied or linked by this run.
   */
  installed: number;
  cacheHits: number;
  fetched: number;
  /**
   * Packages already in place from a previous run.
   */
  upToDate: number;
  linkedBins: number;
  failedScripts: ScriptFailure[];
  failedPackages: string[];
  /**
   * The first error that stopped the install.
   */
  fatalError?: BurrowError;
}

export function emptyReport(): InstallReport {
  return {
    installed: 0,
    cacheHits: 0,
    fetched: 0,
    upToDate: 0,
    linkedBins: 0,
    failedScripts: [],
    failedPackages: [],
  };
}

const TEMPORARY_ENTRY = /\.burrow-tmp-[0-9a-f]+$/;

class Installer {
  readonly report = emptyReport();
  private readonly controller = new AbortController();
  private readonly fetchQueue: PQueue;
  private readonly temporaries = new Set<string>();
  private readonly upToDate = new Set<PackageId>();
  private readonly placedNow = new Set<PackageId>();
  private readonly manifests = new Map<PackageId, Manifest>();
  private readonly logger: Logger;

  constructor(
    private readonly graph: DependencyGraph,
    private readonly plan: InstallPlan,
    private readonly options: InstallOptions
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.fetchQueue = new PQueue({ concurrency: options.concurrency ?? 16 });
  }

  private get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  private destination(pkg: ResolvedPackage): string {
    return path.join(this.options.projectRoot, pkg.path);
  }

  /**
   * Directory holding the content of a package.
   */
  private contentDir(pkg: ResolvedPackage): string {
    return path.join(this.options.projectRoot, pkg.location ?? pkg.path);
  }

  private owner(pkg: ResolvedPackage): ResolvedPackage | undefined {
    const owner = this.graph.scope(pkg.scope).owner;
    return owner === undefined ? undefined : this.graph.get(owner);
  }

  private fail(pkg: ResolvedPackage, error: unknown, action: string): void {
    const burrowError = toFileSystemError(error, this.destination(pkg), action);
    this.report.failedPackages.push(`${pkg.name}@${pkg.version}`);
    if (this.report.fatalError === undefined) {
      this.report.fatalError = burrowError;
      this.logger.error(burrowError.message);
      this.controller.abort();
    }
  }

  async run(): Promise<InstallReport> {
    await this.checkUpToDate();
    await this.pruneStaleEntries();

    const placed = new Map<PackageId, Promise<boolean>>();
    // Owners are created before the packages they hold, so ids give a safe order.
    for (const pkg of [...this.plan.packages].sort((a, b) => a.id - b.id)) {
      const fetching =
        pkg.source === "workspace" || this.upToDate.has(pkg.id)
          ? Promise.resolve(undefined)
          : this.fetchQueue.add(() => this.fetch(pkg));
      const owner = this.owner(pkg);
      const ownerPlaced = owner ? placed.get(owner.id) : undefined;
      placed.set(pkg.id, this.place(pkg, fetching, ownerPlaced));
    }
    try {
      await Promise.all(placed.values());
      await this.fetchQueue.onIdle();
    } finally {
      await this.removeTemporaries();
    }
    if (this.cancelled) {
      return this.report;
    }

    await this.linkBins();
    if (this.cancelled) {
      return this.report;
    }
    if (!this.options.ignoreScripts) {
      await this.runScripts();
    }
    return this.report;
  }

  private async checkUpToDate(): Promise<void> {
    for (const pkg of [...this.plan.packages].sort((a, b) => a.id - b.id)) {
      const owner = this.owner(pkg);
      if (owner && owner.source !== "workspace" && !this.upToDate.has(owner.id)) {
        continue;
      }
      const current =
        pkg.source === "workspace"
          ? await isLinkedTo(this.contentDir(pkg), this.destination(pkg))
          : await isUpToDate(this.destination(pkg), pkg);
      if (current) {
        this.upToDate.add(pkg.id);
      }
    }
  }

  /**
   * Removes root level entries of `node_modules` the graph does not contain,
   * and leftovers of interrupted runs.
   */
  private async pruneStaleEntries(): Promise<void> {
    const nodeModules = path.join(this.options.projectRoot, "node_modules");
    const keep = new Set(
      this.plan.packages.filter((p) => p.scope === ROOT_SCOPE).map((p) => p.name)
    );
    const list = async (dir: string): Promise<string[]> => {
      try {
        return await fs.promises.readdir(dir);
      } catch (e) {
        if (errnoCode(e) === "ENOENT") {
          return [];
        }
        throw toFileSystemError(e, dir, "read");
      }
    };
    const names: string[] = [];
    for (const entry of await list(nodeModules)) {
      if (entry.startsWith("@")) {
        const scoped = await list(path.join(nodeModules, entry));
        names.push(...scoped.map((child) => `${entry}/${child}`));
      } else {
        names.push(entry);
      }
    }
    for (const name of names) {
      const base = path.basename(name);
      const stale = TEMPORARY_ENTRY.test(base) || (!base.startsWith(".") && !keep.has(name));
      if (stale) {
        this.logger.debug(`Removing stale node_modules/${name}`);
        await fs.promises.rm(path.join(nodeModules, name), {
          recursive: true,
          force: true,
        });
      }
    }
  }

  private async fetch(pkg: ResolvedPackage): Promise<CacheEntry | undefined> {
    if (this.cancelled) {
      return undefined;
    }
    const { cache } = this.options;
    const key = { name: pkg.name, version: pkg.version, integrity: pkg.integrity };
    try {
      const result = await withRetry(
        () => cache.ensure(key, () => this.download(pkg)),
        {
          attempts: this.options.retries ?? 3,
          baseDelayMs: this.options.retryDelayMs ?? 250,
          maxDelayMs: this.options.maxRetryDelayMs ?? 4_000,
          shouldRetry: (error) =>
            error instanceof NetworkError || error instanceof IntegrityMismatchError,
          onRetry: (error, attempt, delay) =>
            this.logger.warn(
              `Retrying ${pkg.name}@${pkg.version} in ${delay}ms (attempt ${attempt} failed: ${
                error instanceof Error ? error.message : String(error)
              })`
            ),
          signal: this.controller.signal,
        }
      );
      if (result.hit) {
        this.report.cacheHits++;
      } else {
        this.report.fetched++;
      }
      return result.entry;
    } catch (e) {
      if (!this.cancelled) {
        this.fail(pkg, e, "fetch");
      }
      return undefined;
    }
  }

  /**
   * Only the per-attempt timeout aborts a download. A download already running
   * when the install is cancelled finishes and lands in the cache.
   */
  private async download(pkg: ResolvedPackage): Promise<Uint8Array> {
    const controller = new AbortController();
    const timeoutMs = this.options.timeoutMs ?? 0;
    const timer =
      timeoutMs > 0 ? setTimeout(() => controller.abort(), timeoutMs) : undefined;
    try {
      this.logger.debug(`Downloading ${pkg.resolved}`);
      return await this.options.registry.fetchTarball(pkg.resolved, {
        signal: controller.signal,
      });
    } finally {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
    }
  }

  private async place(
    pkg: ResolvedPackage,
    fetching: Promise<CacheEntry | undefined>,
    ownerPlaced: Promise<boolean> | undefined
  ): Promise<boolean> {
    const [ownerOk, entry] = await Promise.all([ownerPlaced ?? true, fetching]);
    if (!ownerOk || this.cancelled) {
      return false;
    }
    if (this.upToDate.has(pkg.id)) {
      this.report.upToDate++;
      return true;
    }
    const dest = this.destination(pkg);
    if (pkg.source === "workspace") {
      try {
        await linkWorkspace(this.contentDir(pkg), dest, this.options.symlinkType);
      } catch (e) {
        this.fail(pkg, e, "link");
        return false;
      }
    } else {
      if (entry === undefined) {
        return false;
      }
      const tmp = temporarySibling(dest);
      this.temporaries.add(tmp);
      try {
        await fs.promises.mkdir(path.dirname(dest), { recursive: true });
        await placePackage(pkg, entry.dir, dest, tmp);
      } catch (e) {
        this.fail(pkg, e, "install");
        return false;
      } finally {
        this.temporaries.delete(tmp);
        await fs.promises.rm(tmp, { recursive: true, force: true });
      }
    }
    this.logger.debug(`Installed ${pkg.name}@${pkg.version} at ${pkg.path}`);
    this.report.installed++;
    this.placedNow.add(pkg.id);
    return true;
  }

  private async removeTemporaries(): Promise<void> {
    await Promise.all(
      [...this.temporaries].map((tmp) =>
        fs.promises.rm(tmp, { recursive: true, force: true })
      )
    );
    this.temporaries.clear();
  }

  private async manifestOf(pkg: ResolvedPackage): Promise<Manifest | undefined> {
    const known = this.manifests.get(pkg.id);
    if (known) {
      return known;
    }
    try {
      const manifest = await readManifest(this.contentDir(pkg), this.logger);
      this.manifests.set(pkg.id, manifest);
      return manifest;
    } catch (e) {
      this.logger.warn(
        `Ignoring the manifest of ${pkg.name}@${pkg.version}: ${
          e instanceof Error ? e.message : String(e)
        }`
      );
      return undefined;
    }
  }

  /**
   * Links executables into the `.bin` of the `node_modules` folder holding each
   * package. Packages are visited in path order; the first one to claim a
   * name keeps it.
   */
  private async linkBins(): Promise<void> {
    const { projectRoot } = this.options;
    const claimed = new Map<string, string>();
    const binDirs = new Set<string>([path.join(projectRoot, "node_modules", ".bin")]);

    for (const pkg of this.plan.packages) {
      const manifest = await this.manifestOf(pkg);
      if (!manifest) {
        continue;
      }
      const dir = this.contentDir(pkg);
      const binDir = path.join(projectRoot, this.graph.scope(pkg.scope).path, ".bin");
      binDirs.add(binDir);
      for (const [binName, file] of binEntries(pkg.name, manifest.bin)) {
        if (!isValidBinName(binName)) {
          this.logger.warn(
            `Package "${pkg.name}" exposes a bin script with an invalid name: "${binName}"`
          );
          continue;
        }
        const target = path.resolve(dir, file);
        if (!isInside(dir, target) || !fs.existsSync(target)) {
          this.logger.warn(`Bin "${binName}" of ${pkg.name} points to a missing file: ${file}`);
          continue;
        }
        const link = path.join(binDir, binName);
        const owner = claimed.get(link);
        if (owner !== undefined) {
          this.logger.debug(
            `Attempted to create symlink to ${link} twice from ${pkg.path}, keeping ${owner}`
          );
          continue;
        }
        claimed.set(link, pkg.path);
        try {
          await linkBin(target, link);
        } catch (e) {
          this.fail(pkg, e, "link");
          return;
        }
        this.report.linkedBins++;
      }
    }

    for (const binDir of binDirs) {
      for (const removed of await pruneDanglingBins(binDir)) {
        this.logger.debug(`Removed dangling bin ${removed}`);
      }
    }
  }

  private async runScripts(): Promise<void> {
    const { projectRoot } = this.options;
    const scriptQueue = new PQueue({ concurrency: 1 });
    const lifecycle = {
      projectRoot,
      runner: this.options.scriptRunner ?? spawnScript,
      timeoutMs: this.options.scriptTimeoutMs ?? 0,
      logger: this.logger,
    };

    const runFor = async (
      target: { name: string; version: string; dir: string },
      manifest: Manifest
    ) => {
      const failure = await scriptQueue.add(() =>
        runLifecycleScripts({ ...target, scripts: manifest.scripts }, lifecycle)
      );
      if (failure) {
        this.report.failedScripts.push({
          package: `${target.name}@${target.version}`,
          script: failure.script,
          exitCode: failure.exitCode,
          output: failure.output,
        });
      }
    };

    await executeTree(this.plan.tree, async (component) => {
      const keys = this.plan.tree.components.get(component)?.keys ?? [];
      const members = keys
        .filter((key) => key !== this.plan.rootKey)
        .map((key) => this.graph.get(key))
        .filter((pkg) => this.placedNow.has(pkg.id))
        .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
      for (const pkg of members) {
        const manifest = await this.manifestOf(pkg);
        if (manifest) {
          await runFor(
            { name: pkg.name, version: pkg.version, dir: this.contentDir(pkg) },
            manifest
          );
        }
      }
      if (keys.includes(this.plan.rootKey)) {
        const root = await readManifest(projectRoot, this.logger);
        await runFor({ name: root.name, version: root.version, dir: projectRoot }, root);
      }
    });
  }
}

/**
 * Materializes `graph` under `options.projectRoot`.
 *
 * Downloads run in a bounded pool and land in the shared cache; each package
 * is then copied to its path once the package enclosing it is in place.
 * Executables are linked next, then the install scripts run, dependencies
 * first and one at a time. Script failures are reported and do not stop the
 * install. Any other failure cancels the remaining work and is returned as
 * `fatalError`; packages completed so far stay in place.
 */
export async function install(
  graph: DependencyGraph,
  options: InstallOptions
): Promise<InstallReport> {
  const locationError = await getLocationError(options.projectRoot);
  if (locationError !== undefined) {
    return {
      ...emptyReport(),
      fatalError: new FileSystemError(locationError, options.projectRoot),
    };
  }
  const graphError = getGraphError(graph);
  if (graphError !== undefined) {
    return { ...emptyReport(), fatalError: new MalformedManifestError(graphError) };
  }

  const plan = createInstallPlan(graph, { production: options.production });
  const installer = new Installer(graph, plan, options);
  try {
    return await installer.run();
  } catch (e) {
    // Failures outside of a single package: pruning, reading the root manifest.
    const report = installer.report;
    if (report.fatalError === undefined) {
      report.fatalError = toFileSystemError(e, options.projectRoot, "install into");
    }
    return report;
  }
}
