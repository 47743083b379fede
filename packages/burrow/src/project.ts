import chalk from "chalk";
import {
  FrozenLockfileError,
  MalformedManifestError,
  loadConfig,
  logger as defaultLogger,
  measure,
} from "@burrow/common";
import type { BurrowConfig, Logger } from "@burrow/common";
import { resolve } from "@burrow/dependency-resolver";
import type { ResolveStats } from "@burrow/dependency-resolver";
import {
  addDependency,
  checkLockfileConsistency,
  isTagRange,
  readLockfile,
  readManifest,
  removeDependency,
  serializeLockfile,
  writeLockfile,
  writeManifest,
} from "@burrow/manifest";
import type { Manifest } from "@burrow/manifest";
import { PackageCache } from "@burrow/package-cache";
import { install, isValidPackageName } from "@burrow/package-installer";
import type { InstallReport, ScriptRunner } from "@burrow/package-installer";
import { HttpRegistryClient } from "@burrow/registry";
import type { RegistryClient } from "@burrow/registry";
import { discoverWorkspaces } from "@burrow/workspace-linker";

export interface ProjectOptions {
  /**
   * Directory holding the project's `package.json`.
   */
  cwd: string;
  /**
   * Loaded from `burrow.config.json` and the environment when absent.
   */
  config?: BurrowConfig;
  registry?: RegistryClient;
  cache?: PackageCache;
  /**
   * Fail instead of updating an outdated lockfile.
   */
  frozenLockfile?: boolean;
  production?: boolean;
  ignoreScripts?: boolean;
  scriptRunner?: ScriptRunner;
  logger?: Logger;
}

export interface ProjectInstallResult {
  report: InstallReport;
  stats: ResolveStats;
  lockfileWritten: boolean;
}

export function createRegistry(config: BurrowConfig, logger: Logger): RegistryClient {
  return new HttpRegistryClient({
    registry: config.registry,
    timeoutMs: config.fetchTimeoutMs,
    retries: config.fetchRetries,
    retryDelayMs: config.retryDelayMs,
    maxRetryDelayMs: config.maxRetryDelayMs,
    logger,
  });
}

/**
 * Resolves the project in `options.cwd`, installs the result and records it in
 * the lockfile. The lockfile is only written when the install had no fatal
 * error.
 */
export async function installProject(
  options: ProjectOptions
): Promise<ProjectInstallResult> {
  const { cwd } = options;
  const logger = options.logger ?? defaultLogger;
  const config = options.config ?? (await loadConfig(cwd, { logger }));
  const registry = options.registry ?? createRegistry(config, logger);
  const cache = options.cache ?? new PackageCache(config.cacheDir, { logger });

  const manifest = await readManifest(cwd, logger);
  const workspaces =
    manifest.workspaces.length > 0
      ? await discoverWorkspaces(cwd, manifest.workspaces, logger)
      : undefined;
  const lockfile = await readLockfile(cwd, { name: config.lockfileName, logger });

  if (options.frozenLockfile) {
    if (!lockfile) {
      throw new FrozenLockfileError([`${config.lockfileName} does not exist`]);
    }
    const consistency = checkLockfileConsistency(
      manifest,
      lockfile,
      workspaces?.manifests() ?? []
    );
    if (!consistency.consistent) {
      throw new FrozenLockfileError(consistency.reasons);
    }
  }

  logger.info(chalk.grey("🔍 Resolving dependencies..."));
  let end = measure();
  const resolution = await resolve(manifest, lockfile, {
    registry,
    workspaces,
    production: options.production,
    integrityAlgorithm: config.integrityAlgorithm,
    logger,
  });
  logger.info(
    chalk.grey(
      `🔍 Resolved ${resolution.stats.packages} packages in ${end()}ms (${
        resolution.stats.fromLockfile
          ? "from the lockfile"
          : `${resolution.stats.registryQueries} registry queries`
      }).`
    )
  );

  logger.info(chalk.grey("🔗 Fetching and linking packages..."));
  end = measure();
  const report = await install(resolution.graph, {
    projectRoot: cwd,
    cache,
    registry,
    concurrency: config.fetchConcurrency,
    retries: config.fetchRetries,
    retryDelayMs: config.retryDelayMs,
    maxRetryDelayMs: config.maxRetryDelayMs,
    timeoutMs: config.fetchTimeoutMs,
    production: options.production,
    ignoreScripts: options.ignoreScripts,
    scriptRunner: options.scriptRunner,
    scriptTimeoutMs: config.scriptTimeoutMs,
    symlinkType: config.symlinkType,
    logger,
  });
  logger.info(chalk.grey(`🔗 Install finished in ${end()}ms.`));

  let lockfileWritten = false;
  const unchanged =
    lockfile !== undefined &&
    serializeLockfile(lockfile) === serializeLockfile(resolution.lockfile);
  if (report.fatalError === undefined && !options.frozenLockfile && !unchanged) {
    await writeLockfile(cwd, resolution.lockfile, config.lockfileName);
    lockfileWritten = true;
  }
  return { report, stats: resolution.stats, lockfileWritten };
}

/**
 * Splits `name@range`; the range part is optional and scoped names keep their
 * leading `@`.
 */
export function parsePackageArg(arg: string): { name: string; range?: string } {
  const at = arg.indexOf("@", arg.startsWith("@") ? 1 : 0);
  const name = at === -1 ? arg : arg.slice(0, at);
  const range = at === -1 ? "" : arg.slice(at + 1);
  if (!isValidPackageName(name)) {
    throw new MalformedManifestError(`Invalid package name "${name}"`);
  }
  return range.length > 0 ? { name, range } : { name };
}

async function defaultRange(
  registry: RegistryClient,
  name: string,
  tag = "latest"
): Promise<string> {
  const metadata = await registry.getVersions(name);
  const tagged = metadata.distTags[tag];
  const newest = metadata.versions[metadata.versions.length - 1];
  const version = tagged ?? (tag === "latest" ? newest?.version : undefined);
  if (version === undefined) {
    throw new MalformedManifestError(`"${name}" has no "${tag}" version`);
  }
  return `^${version}`;
}

/**
 * Runs an install against `next`, putting `previous` back when it fails.
 */
async function installWithManifest(
  previous: Manifest,
  next: Manifest,
  options: ProjectOptions
): Promise<ProjectInstallResult> {
  await writeManifest(options.cwd, next);
  try {
    const result = await installProject(options);
    if (result.report.fatalError !== undefined) {
      await writeManifest(options.cwd, previous);
    }
    return result;
  } catch (e) {
    await writeManifest(options.cwd, previous);
    throw e;
  }
}

/**
 * Adds packages (`name`, `name@range` or `name@tag`) to the manifest and
 * installs. Names without a range get `^<latest version>`; tags are replaced
 * by a caret range on the version they point to.
 */
export async function addDependencies(
  packages: readonly string[],
  options: ProjectOptions & { dev?: boolean }
): Promise<ProjectInstallResult> {
  const logger = options.logger ?? defaultLogger;
  const config = options.config ?? (await loadConfig(options.cwd, { logger }));
  const registry = options.registry ?? createRegistry(config, logger);
  const previous = await readManifest(options.cwd, logger);

  let next = previous;
  for (const arg of packages) {
    const { name, range } = parsePackageArg(arg);
    const pinned =
      range === undefined
        ? await defaultRange(registry, name)
        : isTagRange(range)
          ? await defaultRange(registry, name, range)
          : range;
    logger.info(`➕ ${chalk.cyanBright(name)} ${chalk.magentaBright(pinned)}`);
    next = addDependency(next, name, pinned, options.dev ?? false);
  }
  return installWithManifest(previous, next, { ...options, config, registry });
}

/**
 * Removes packages from both dependency maps and installs, which prunes them
 * from `node_modules`.
 */
export async function removeDependencies(
  names: readonly string[],
  options: ProjectOptions
): Promise<ProjectInstallResult> {
  const logger = options.logger ?? defaultLogger;
  const previous = await readManifest(options.cwd, logger);

  let next = previous;
  for (const name of names) {
    if (!(name in previous.dependencies) && !(name in previous.devDependencies)) {
      logger.warn(`Package "${name}" is not a dependency of ${previous.name}`);
      continue;
    }
    logger.info(`➖ ${chalk.cyanBright(name)}`);
    next = removeDependency(next, name);
  }
  return installWithManifest(previous, next, options);
}
