import * as fs from "fs";
import * as path from "path";
import { toFileSystemError } from "@burrow/common";
import type { SymlinkType } from "@burrow/common";

/**
 * Points `linkPath` at `target`, replacing whatever was there.
 *
 * Windows gets an absolute link of the requested type ("dir" needs developer
 * mode or an elevated shell); everywhere else the link is relative.
 */
export async function linkWorkspace(
  target: string,
  linkPath: string,
  symlinkType: SymlinkType = "junction",
  platform: NodeJS.Platform = process.platform
): Promise<void> {
  try {
    await fs.promises.rm(linkPath, { recursive: true, force: true });
    await fs.promises.mkdir(path.dirname(linkPath), { recursive: true });
    if (platform === "win32") {
      await fs.promises.symlink(path.resolve(target), linkPath, symlinkType);
    } else {
      await fs.promises.symlink(
        path.relative(path.dirname(linkPath), target),
        linkPath
      );
    }
  } catch (e) {
    throw toFileSystemError(e, linkPath, "link");
  }
}

/**
 * Whether `linkPath` is a link resolving to `target`.
 */
export async function isLinkedTo(target: string, linkPath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.lstat(linkPath);
    if (!stat.isSymbolicLink()) {
      return false;
    }
    const [actual, expected] = await Promise.all([
      fs.promises.realpath(linkPath),
      fs.promises.realpath(target),
    ]);
    return actual === expected;
  } catch {
    return false;
  }
}
