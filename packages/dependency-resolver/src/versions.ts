import * as semver from "semver";
import { UnsatisfiableRangeError } from "@burrow/common";
import type { Logger } from "@burrow/common";
import { isTagRange } from "@burrow/manifest";
import type { PackageVersions, RegistryClient, VersionInfo } from "@burrow/registry";

/**
 * Registry metadata of one resolution. Each name is queried at most once.
 */
export class VersionCatalog {
  private readonly cache = new Map<string, Promise<PackageVersions>>();
  queries = 0;

  constructor(
    private readonly registry: RegistryClient,
    private readonly logger: Logger
  ) {}

  get(name: string): Promise<PackageVersions> {
    let pending = this.cache.get(name);
    if (!pending) {
      this.queries++;
      this.logger.debug(`Fetching metadata of ${name}`);
      pending = this.registry.getVersions(name);
      this.cache.set(name, pending);
    }
    return pending;
  }
}

export function assertValidRange(name: string, range: string): void {
  if (semver.validRange(range) === null && !isTagRange(range)) {
    throw new UnsatisfiableRangeError(name, [range], "invalid range");
  }
}

function tagged(metadata: PackageVersions, tag: string): VersionInfo {
  const version = metadata.distTags[tag];
  const info = metadata.versions.find((v) => v.version === version);
  if (!info) {
    throw new UnsatisfiableRangeError(metadata.name, [tag], `no "${tag}" dist-tag`);
  }
  return info;
}

function satisfying(metadata: PackageVersions, range: string): VersionInfo[] {
  return metadata.versions.filter((v) => semver.satisfies(v.version, range));
}

function highest(candidates: readonly VersionInfo[]): VersionInfo | undefined {
  let best: VersionInfo | undefined;
  for (const candidate of candidates) {
    if (!best || semver.gt(candidate.version, best.version)) {
      best = candidate;
    }
  }
  return best;
}

/**
 * Picks the version for `range`. Further ranges of requesters that would
 * share the choice narrow it, in order, as long as some version still
 * satisfies all of them; a range that would leave nothing is skipped.
 */
export function selectVersion(
  metadata: PackageVersions,
  range: string,
  sharedRanges: readonly string[] = []
): VersionInfo {
  if (isTagRange(range)) {
    return tagged(metadata, range);
  }
  let candidates = satisfying(metadata, range);
  if (candidates.length === 0) {
    throw new UnsatisfiableRangeError(metadata.name, [range]);
  }
  for (const shared of sharedRanges) {
    if (isTagRange(shared) || semver.validRange(shared) === null) {
      continue;
    }
    const narrowed = candidates.filter((v) => semver.satisfies(v.version, shared));
    if (narrowed.length > 0) {
      candidates = narrowed;
    }
  }
  const best = highest(candidates);
  if (!best) {
    throw new UnsatisfiableRangeError(metadata.name, [range]);
  }
  return best;
}
