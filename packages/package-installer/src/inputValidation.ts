import * as fs from "fs";
import * as path from "path";
import type { DependencyGraph } from "@burrow/dependency-resolver";

const PACKAGE_NAME =
  /^(@[a-z0-9-~][a-z0-9-._~]*\/)?[a-zA-Z0-9-~][a-zA-Z0-9-._~]*$/;

export function isValidPackageName(name: string): boolean {
  return PACKAGE_NAME.test(name);
}

/**
 * Bin names become file names inside `.bin`.
 */
export function isValidBinName(name: string): boolean {
  return (
    name.length > 0 &&
    name !== "." &&
    name !== ".." &&
    !/[\/\\\n\0:*?"<>|]/.test(name)
  );
}

export function getGraphError(graph: DependencyGraph): string | undefined {
  const invalidName = graph.all().find((p) => !isValidPackageName(p.name));
  if (invalidName) {
    return `Package name invalid: "${invalidName.name}"`;
  }

  const unsafePath = graph
    .all()
    .find(
      (p) =>
        path.isAbsolute(p.path) ||
        p.path.split("/").includes("..") ||
        (p.location !== undefined &&
          (path.isAbsolute(p.location) || p.location.split("/").includes("..")))
    );
  if (unsafePath) {
    return `Package ${unsafePath.name} would be installed outside of the project: "${unsafePath.path}"`;
  }

  const paths = new Set<string>();
  for (const pkg of graph.all()) {
    if (paths.has(pkg.path)) {
      return `Multiple packages would be installed at "${pkg.path}"`;
    }
    paths.add(pkg.path);
  }
  return undefined;
}

export async function getLocationError(
  location: string
): Promise<string | undefined> {
  if (!path.isAbsolute(location)) {
    return `Location is not an absolute path: "${location}"`;
  }
  try {
    const stats = await fs.promises.stat(location);
    if (!stats.isDirectory()) {
      return `Location is not a directory: "${location}"`;
    }
  } catch {
    return `Location does not exist: "${location}"`;
  }
  return undefined;
}
