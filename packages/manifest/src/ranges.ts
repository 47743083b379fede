import * as semver from "semver";

export const WORKSPACE_PROTOCOL = "workspace:";

export function isWorkspaceRange(range: string): boolean {
  return range.startsWith(WORKSPACE_PROTOCOL);
}

/**
 * Dist-tags such as "latest" or "next".
 */
export function isTagRange(range: string): boolean {
  return (
    semver.validRange(range) === null && /^[a-zA-Z][a-zA-Z0-9._-]*$/.test(range)
  );
}

/**
 * Whether an already chosen version can serve `range`. Tags can only be
 * checked against registry metadata, so any version is accepted for them.
 */
export function rangeAccepts(range: string, version: string): boolean {
  if (isWorkspaceRange(range)) {
    return false;
  }
  if (isTagRange(range)) {
    return true;
  }
  return (
    semver.validRange(range) !== null &&
    semver.satisfies(version, range, { includePrerelease: false })
  );
}
