import * as fs from "fs";
import * as os from "os";
import * as path from "path";

import { ConfigError, errnoCode } from "./errors";
import { isIntegrityAlgorithm } from "./integrity";
import type { IntegrityAlgorithm } from "./integrity";
import { logger as defaultLogger } from "./logger";
import type { Logger } from "./logger";

export const CONFIG_FILE = "burrow.config.json";
export const DEFAULT_REGISTRY = "https://registry.npmjs.org";

export type SymlinkType = "dir" | "junction";

export interface BurrowConfig {
  registry: string;
  /**
   * Cross-project package cache.
   */
  cacheDir: string;
  fetchConcurrency: number;
  fetchRetries: number;
  /**
   * Timeout of a single registry request.
   */
  fetchTimeoutMs: number;
  retryDelayMs: number;
  maxRetryDelayMs: number;
  /**
   * Algorithm of the lockfile's manifest hash. Package digests keep whatever
   * algorithm the registry published them with; workspace entries have none.
   */
  integrityAlgorithm: IntegrityAlgorithm;
  lockfileName: string;
  /**
   * Only applicable to windows machines. "dir" requires developer mode or an elevated shell.
   */
  symlinkType: SymlinkType;
  /**
   * 0 disables the timeout.
   */
  scriptTimeoutMs: number;
}

type Env = Record<string, string | undefined>;

export function defaultCacheDir(
  env: Env = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = os.homedir()
): string {
  if (platform === "win32") {
    const localAppData =
      env["LOCALAPPDATA"] || path.win32.join(home, "AppData", "Local");
    return path.win32.join(localAppData, "burrow", "cache");
  }
  if (platform === "darwin") {
    return path.posix.join(home, "Library", "Caches", "burrow");
  }
  const xdg = env["XDG_CACHE_HOME"];
  return path.posix.join(xdg || path.posix.join(home, ".cache"), "burrow");
}

export function defaultConfig(env: Env = process.env): BurrowConfig {
  return {
    registry: DEFAULT_REGISTRY,
    cacheDir: defaultCacheDir(env),
    fetchConcurrency: 16,
    fetchRetries: 3,
    fetchTimeoutMs: 60_000,
    retryDelayMs: 250,
    maxRetryDelayMs: 4_000,
    integrityAlgorithm: "sha512",
    lockfileName: "burrow.lock",
    symlinkType: "junction",
    scriptTimeoutMs: 0,
  };
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

/**
 * Merges user supplied values over `base`. Values of the wrong type are
 * reported and ignored.
 */
export function mergeConfig(
  base: BurrowConfig,
  input: Record<string, unknown>,
  logger: Logger = defaultLogger
): BurrowConfig {
  const result: BurrowConfig = { ...base };
  const ignore = (key: string) =>
    logger.warn(`Ignoring invalid value for "${key}" in ${CONFIG_FILE}`);

  for (const [key, value] of Object.entries(input)) {
    switch (key) {
      case "registry":
      case "lockfileName":
      case "cacheDir":
        if (typeof value === "string" && value.length > 0) {
          result[key] = value;
        } else {
          ignore(key);
        }
        break;
      case "integrityAlgorithm":
        if (typeof value === "string" && isIntegrityAlgorithm(value)) {
          result.integrityAlgorithm = value;
        } else {
          ignore(key);
        }
        break;
      case "symlinkType":
        if (value === "dir" || value === "junction") {
          result.symlinkType = value;
        } else {
          ignore(key);
        }
        break;
      case "fetchConcurrency":
      case "fetchRetries":
        if (isNonNegativeInteger(value) && value > 0) {
          result[key] = value;
        } else {
          ignore(key);
        }
        break;
      case "fetchTimeoutMs":
      case "retryDelayMs":
      case "maxRetryDelayMs":
      case "scriptTimeoutMs":
        if (isNonNegativeInteger(value)) {
          result[key] = value;
        } else {
          ignore(key);
        }
        break;
      default:
        logger.warn(`Unknown key "${key}" in ${CONFIG_FILE}`);
    }
  }
  return result;
}

function fromEnv(env: Env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (env["BURROW_REGISTRY"]) {
    overrides["registry"] = env["BURROW_REGISTRY"];
  }
  if (env["BURROW_CACHE_DIR"]) {
    overrides["cacheDir"] = env["BURROW_CACHE_DIR"];
  }
  const concurrency = env["BURROW_FETCH_CONCURRENCY"];
  if (concurrency) {
    overrides["fetchConcurrency"] = Number(concurrency);
  }
  return overrides;
}

/**
 * Loads `burrow.config.json` from `cwd` (when present) and applies environment
 * overrides on top of it.
 */
export async function loadConfig(
  cwd: string,
  options: { env?: Env; logger?: Logger } = {}
): Promise<BurrowConfig> {
  const env = options.env ?? process.env;
  const logger = options.logger ?? defaultLogger;
  const file = path.join(cwd, CONFIG_FILE);

  let fileValues: Record<string, unknown> = {};
  let content: string | undefined;
  try {
    content = await fs.promises.readFile(file, { encoding: "utf8" });
  } catch (e) {
    if (errnoCode(e) !== "ENOENT") {
      throw new ConfigError(`Could not read ${file}`, file, e);
    }
  }
  if (content !== undefined) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`${file} is not valid JSON`, file, e);
    }
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new ConfigError(`${file} must contain a JSON object`, file);
    }
    fileValues = { ...parsed };
  }

  const merged = mergeConfig(defaultConfig(env), fileValues, logger);
  const withEnv = mergeConfig(merged, fromEnv(env), logger);
  if (!path.isAbsolute(withEnv.cacheDir)) {
    withEnv.cacheDir = path.resolve(cwd, withEnv.cacheDir);
  }
  return withEnv;
}
