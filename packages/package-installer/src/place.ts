import * as fs from "fs";
import * as path from "path";
import { randomBytes } from "crypto";
import { errnoCode, toFileSystemError } from "@burrow/common";
import type { ResolvedPackage } from "@burrow/dependency-resolver";

/**
 * Written into every placed package; its content identifies what was placed.
 */
export const INSTALL_MARKER = ".burrow-install";

export function markerContent(pkg: ResolvedPackage): string {
  return `${pkg.name}@${pkg.version} ${pkg.integrity}\n`;
}

export async function isUpToDate(
  dir: string,
  pkg: ResolvedPackage
): Promise<boolean> {
  try {
    const content = await fs.promises.readFile(path.join(dir, INSTALL_MARKER), "utf8");
    return content === markerContent(pkg);
  } catch (e) {
    if (errnoCode(e) === "ENOENT" || errnoCode(e) === "ENOTDIR") {
      return false;
    }
    throw toFileSystemError(e, dir, "read");
  }
}

async function linkOrCopy(src: string, dest: string): Promise<void> {
  try {
    await fs.promises.link(src, dest);
  } catch {
    // Different device or no hard link support.
    await fs.promises.copyFile(src, dest);
  }
}

/**
 * Reproduces the tree at `src` under `dest`, hard-linking files when possible.
 */
export async function copyTree(src: string, dest: string): Promise<void> {
  await fs.promises.mkdir(dest, { recursive: true });
  const entries = await fs.promises.readdir(src, { withFileTypes: true });
  await Promise.all(
    entries.map(async (entry) => {
      const from = path.join(src, entry.name);
      const to = path.join(dest, entry.name);
      if (entry.isDirectory()) {
        await copyTree(from, to);
      } else if (entry.isSymbolicLink()) {
        await fs.promises.symlink(await fs.promises.readlink(from), to);
      } else if (entry.isFile()) {
        await linkOrCopy(from, to);
      }
    })
  );
}

export function temporarySibling(dest: string): string {
  return path.join(
    path.dirname(dest),
    `.${path.basename(dest)}.burrow-tmp-${randomBytes(4).toString("hex")}`
  );
}

/**
 * Copies a cached package to `dest`: the files are assembled in `tmp` (a
 * sibling of `dest`), then renamed over whatever was at `dest`.
 */
export async function placePackage(
  pkg: ResolvedPackage,
  cachedDir: string,
  dest: string,
  tmp: string
): Promise<void> {
  try {
    await copyTree(cachedDir, tmp);
    await fs.promises.writeFile(path.join(tmp, INSTALL_MARKER), markerContent(pkg));
    await fs.promises.rm(dest, { recursive: true, force: true });
    await fs.promises.rename(tmp, dest);
  } catch (e) {
    throw toFileSystemError(e, dest, "install");
  }
}
