import * as fs from "fs";
import * as path from "path";
import { errnoCode, toFileSystemError } from "@burrow/common";

const cmdShim: (
  from: string,
  to: string
) => Promise<void> = require("cmd-shim");

/**
 * Normalizes the `bin` field of a manifest into `[name, relative file]` pairs.
 * A string names a single executable called like the package (without scope).
 */
export function binEntries(
  packageName: string,
  bin: string | Record<string, string> | undefined
): [string, string][] {
  if (bin === undefined) {
    return [];
  }
  if (typeof bin === "string") {
    const name = packageName.startsWith("@")
      ? packageName.slice(packageName.indexOf("/") + 1)
      : packageName;
    return [[name, bin]];
  }
  return Object.entries(bin);
}

/**
 * Whether `target` stays inside `dir`.
 */
export function isInside(dir: string, target: string): boolean {
  const relative = path.relative(dir, target);
  return relative !== "" && !relative.startsWith("..") && !path.isAbsolute(relative);
}

/**
 * Exposes `target` as `link`: a symlink on POSIX systems, cmd/ps1/sh shims on
 * windows.
 */
export async function linkBin(
  target: string,
  link: string,
  platform: NodeJS.Platform = process.platform
): Promise<void> {
  try {
    await fs.promises.mkdir(path.dirname(link), { recursive: true });
    if (platform === "win32") {
      await cmdShim(target, link);
      return;
    }
    await fs.promises.rm(link, { force: true });
    await fs.promises.symlink(path.relative(path.dirname(link), target), link);
    await fs.promises.chmod(target, 0o755);
  } catch (e) {
    throw toFileSystemError(e, link, "link");
  }
}

/**
 * Removes links of `binDir` whose target is gone. Returns their names.
 */
export async function pruneDanglingBins(binDir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await fs.promises.readdir(binDir);
  } catch (e) {
    if (errnoCode(e) === "ENOENT") {
      return [];
    }
    throw toFileSystemError(e, binDir, "read");
  }
  const removed: string[] = [];
  for (const name of names.sort()) {
    const link = path.join(binDir, name);
    const stat = await fs.promises.lstat(link);
    if (!stat.isSymbolicLink()) {
      continue;
    }
    try {
      await fs.promises.stat(link);
    } catch (e) {
      if (errnoCode(e) !== "ENOENT") {
        throw toFileSystemError(e, link, "stat");
      }
      await fs.promises.rm(link, { force: true });
      removed.push(name);
    }
  }
  return removed;
}
