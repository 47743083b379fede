import * as fs from "fs";
import * as path from "path";
import { minimatch } from "minimatch";
import { logger as defaultLogger, toFileSystemError } from "@burrow/common";
import type { Logger } from "@burrow/common";
import { MANIFEST_FILE, readManifest } from "@burrow/manifest";
import type { Manifest, WorkspaceManifest } from "@burrow/manifest";

export interface WorkspaceMember {
  name: string;
  /**
   * Absolute directory of the member.
   */
  dir: string;
  /**
   * Directory relative to the project root, with forward slashes.
   */
  relativePath: string;
  manifest: Manifest;
}

/**
 * Workspace members of one project, by package name.
 */
export class WorkspaceIndex {
  private readonly byName = new Map<string, WorkspaceMember>();

  constructor(
    readonly root: string,
    members: readonly WorkspaceMember[] = []
  ) {
    for (const member of members) {
      if (!this.byName.has(member.name)) {
        this.byName.set(member.name, member);
      }
    }
  }

  resolve(name: string): string | undefined {
    return this.byName.get(name)?.dir;
  }

  get(name: string): WorkspaceMember | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * Members in discovery order.
   */
  members(): WorkspaceMember[] {
    return [...this.byName.values()];
  }

  manifests(): WorkspaceManifest[] {
    return this.members().map((m) => ({
      manifest: m.manifest,
      relativePath: m.relativePath,
    }));
  }
}

function normalizePattern(pattern: string): string {
  return pattern
    .replace(/\\/g, "/")
    .replace(/^\.\//, "")
    .replace(/\/+$/, "");
}

async function listDirectories(
  root: string,
  maxDepth: number
): Promise<string[]> {
  const found: string[] = [];
  const walk = async (relative: string, depth: number): Promise<void> => {
    if (depth > maxDepth) {
      return;
    }
    const dir = path.join(root, relative);
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (e) {
      throw toFileSystemError(e, dir, "read");
    }
    const children = entries
      .filter(
        (e) =>
          e.isDirectory() &&
          e.name !== "node_modules" &&
          !e.name.startsWith(".")
      )
      .map((e) => e.name)
      .sort();
    for (const child of children) {
      const childRelative = relative ? `${relative}/${child}` : child;
      found.push(childRelative);
      await walk(childRelative, depth + 1);
    }
  };
  await walk("", 1);
  return found;
}

/**
 * Expands the `workspaces` globs of the manifest at `root` into members.
 *
 * Patterns are matched against directories relative to the root; a pattern
 * starting with `!` excludes what it matches. Directories without a
 * package.json are ignored, members whose manifest cannot be read are
 * skipped with a warning, and the first member claiming a name wins.
 */
export async function discoverWorkspaces(
  root: string,
  patterns: readonly string[],
  logger: Logger = defaultLogger
): Promise<WorkspaceIndex> {
  const include = patterns
    .filter((p) => !p.startsWith("!"))
    .map(normalizePattern);
  const exclude = patterns
    .filter((p) => p.startsWith("!"))
    .map((p) => normalizePattern(p.slice(1)));
  if (include.length === 0) {
    return new WorkspaceIndex(root);
  }

  const maxDepth = include.some((p) => p.includes("**"))
    ? Infinity
    : Math.max(...include.map((p) => p.split("/").length));
  const directories = await listDirectories(root, maxDepth);

  const ordered: string[] = [];
  for (const pattern of include) {
    for (const dir of directories) {
      if (
        !ordered.includes(dir) &&
        minimatch(dir, pattern) &&
        !exclude.some((e) => minimatch(dir, e))
      ) {
        ordered.push(dir);
      }
    }
  }

  const members: WorkspaceMember[] = [];
  const names = new Map<string, string>();
  for (const relativePath of ordered) {
    const dir = path.join(root, relativePath);
    if (!fs.existsSync(path.join(dir, MANIFEST_FILE))) {
      continue;
    }
    let manifest: Manifest;
    try {
      manifest = await readManifest(dir, logger);
    } catch (e) {
      logger.warn(
        `Skipping workspace ${relativePath}: ${e instanceof Error ? e.message : String(e)}`
      );
      continue;
    }
    const claimedBy = names.get(manifest.name);
    if (claimedBy !== undefined) {
      logger.warn(
        `Workspace ${relativePath} is named "${manifest.name}" like ${claimedBy}, ignoring it`
      );
      continue;
    }
    names.set(manifest.name, relativePath);
    members.push({ name: manifest.name, dir, relativePath, manifest });
  }
  return new WorkspaceIndex(root, members);
}
