import * as fs from "fs";
import * as path from "path";
import {
  MalformedManifestError,
  errnoCode,
  isIntegrityAlgorithm,
  logger as defaultLogger,
  toFileSystemError,
} from "@burrow/common";
import type { IntegrityAlgorithm, Logger } from "@burrow/common";

import { atomicWriteFile } from "./atomicWrite";

export const LOCKFILE_NAME = "burrow.lock";
export const LOCKFILE_VERSION = 1;

export interface LockRequirement {
  name: string;
  version: string;
}

export interface LockEntry {
  /**
   * Install location relative to the project root, e.g. `node_modules/a/node_modules/b`.
   */
  path: string;
  name: string;
  version: string;
  integrity: string;
  /**
   * Tarball URL, or `workspace:<relative directory>` for workspace packages.
   */
  resolved: string;
  requires: LockRequirement[];
  /**
   * Only reachable through development dependencies.
   */
  dev?: boolean;
}

export interface Lockfile {
  lockfileVersion: number;
  integrityAlgorithm: IntegrityAlgorithm;
  /**
   * Hash of the dependency section the lockfile was computed from.
   */
  manifestHash: string;
  packages: LockEntry[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function readRequirement(value: unknown, where: string): LockRequirement {
  if (
    !isRecord(value) ||
    typeof value["name"] !== "string" ||
    typeof value["version"] !== "string"
  ) {
    throw new MalformedManifestError(`Invalid requirement in ${where}`);
  }
  return { name: value["name"], version: value["version"] };
}

function readString(
  value: Record<string, unknown>,
  field: string,
  where: string
): string {
  const fieldValue = value[field];
  if (typeof fieldValue !== "string") {
    throw new MalformedManifestError(`Missing "${field}" in ${where}`);
  }
  return fieldValue;
}

function readEntry(value: unknown, index: number): LockEntry {
  const where = `lockfile entry #${index}`;
  if (!isRecord(value)) {
    throw new MalformedManifestError(`Invalid ${where}`);
  }
  const requires = value["requires"] ?? [];
  if (!Array.isArray(requires)) {
    throw new MalformedManifestError(`"requires" must be a list in ${where}`);
  }
  const entry: LockEntry = {
    path: readString(value, "path", where),
    name: readString(value, "name", where),
    version: readString(value, "version", where),
    integrity: readString(value, "integrity", where),
    resolved: readString(value, "resolved", where),
    requires: requires.map((r) => readRequirement(r, where)),
  };
  if (value["dev"] === true) {
    entry.dev = true;
  }
  return entry;
}

export function parseLockfile(content: string, source?: string): Lockfile {
  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch {
    throw new MalformedManifestError(
      `Invalid JSON in lockfile${source ? ` ${source}` : ""}`,
      source
    );
  }
  if (!isRecord(document)) {
    throw new MalformedManifestError("A lockfile must be a JSON object", source);
  }
  const version = document["lockfileVersion"];
  if (version !== LOCKFILE_VERSION) {
    throw new MalformedManifestError(
      `Unsupported lockfileVersion ${String(version)}`,
      source
    );
  }
  const algorithm = document["integrityAlgorithm"];
  if (typeof algorithm !== "string" || !isIntegrityAlgorithm(algorithm)) {
    throw new MalformedManifestError(
      `Unsupported integrityAlgorithm ${String(algorithm)}`,
      source
    );
  }
  const manifestHash = document["manifestHash"];
  if (typeof manifestHash !== "string") {
    throw new MalformedManifestError(`Missing "manifestHash"`, source);
  }
  const packages = document["packages"];
  if (!Array.isArray(packages)) {
    throw new MalformedManifestError(`"packages" must be a list`, source);
  }
  return {
    lockfileVersion: version,
    integrityAlgorithm: algorithm,
    manifestHash,
    packages: packages.map(readEntry),
  };
}

/**
 * Deterministic text form: entries sorted by path, requirements by name, keys in
 * a fixed order.
 */
export function serializeLockfile(lockfile: Lockfile): string {
  const packages = [...lockfile.packages]
    .sort((a, b) => compare(a.path, b.path))
    .map((entry) => {
      const out: Record<string, unknown> = {
        path: entry.path,
        name: entry.name,
        version: entry.version,
        integrity: entry.integrity,
        resolved: entry.resolved,
        requires: [...entry.requires]
          .sort((a, b) => compare(a.name, b.name) || compare(a.version, b.version))
          .map((r) => ({ name: r.name, version: r.version })),
      };
      if (entry.dev) {
        out["dev"] = true;
      }
      return out;
    });
  return `${JSON.stringify(
    {
      lockfileVersion: lockfile.lockfileVersion,
      integrityAlgorithm: lockfile.integrityAlgorithm,
      manifestHash: lockfile.manifestHash,
      packages,
    },
    null,
    2
  )}\n`;
}

/**
 * Reads the lockfile of a project. A missing or unreadable lockfile yields
 * `undefined`: the next resolution simply starts from the registry.
 */
export async function readLockfile(
  dir: string,
  options: { name?: string; logger?: Logger } = {}
): Promise<Lockfile | undefined> {
  const logger = options.logger ?? defaultLogger;
  const file = path.join(dir, options.name ?? LOCKFILE_NAME);
  let content: string;
  try {
    content = await fs.promises.readFile(file, { encoding: "utf8" });
  } catch (e) {
    if (errnoCode(e) === "ENOENT") {
      return undefined;
    }
    throw toFileSystemError(e, file, "read");
  }
  try {
    return parseLockfile(content, file);
  } catch (e) {
    logger.warn(
      `Ignoring ${file}: ${e instanceof Error ? e.message : String(e)}`
    );
    return undefined;
  }
}

export async function writeLockfile(
  dir: string,
  lockfile: Lockfile,
  name: string = LOCKFILE_NAME
): Promise<void> {
  await atomicWriteFile(path.join(dir, name), serializeLockfile(lockfile));
}

/**
 * Root scope location of a package name.
 */
export function rootEntryPath(name: string): string {
  return `node_modules/${name}`;
}
