import * as semver from "semver";
import { RegistryUnavailableError } from "@burrow/common";

import type { PackageVersions, VersionInfo } from "./types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringMap(value: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (!isRecord(value)) {
    return result;
  }
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string") {
      result[key] = entry;
    }
  }
  return result;
}

function readBin(value: unknown): string | Record<string, string> | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (isRecord(value)) {
    return stringMap(value);
  }
  return undefined;
}

function readVersion(version: string, value: unknown): VersionInfo | undefined {
  if (!isRecord(value) || semver.valid(version) === null) {
    return undefined;
  }
  const dist = value["dist"];
  if (!isRecord(dist) || typeof dist["tarball"] !== "string") {
    return undefined;
  }
  const integrity = dist["integrity"] ?? dist["shasum"];
  if (typeof integrity !== "string") {
    return undefined;
  }
  const info: VersionInfo = {
    version,
    integrity,
    tarball: dist["tarball"],
    dependencies: stringMap(value["dependencies"]),
  };
  const bin = readBin(value["bin"]);
  if (bin !== undefined) {
    info.bin = bin;
  }
  return info;
}

/**
 * Turns a registry document (npm "packument") into `PackageVersions`.
 *
 * Versions that are not valid semver or carry no tarball and digest are
 * dropped. Dist-tags pointing at dropped versions are dropped as well.
 */
export function validatePackument(name: string, document: unknown): PackageVersions {
  if (!isRecord(document) || !isRecord(document["versions"])) {
    throw new RegistryUnavailableError(
      name,
      `Registry returned an invalid document for "${name}"`
    );
  }
  const versions: VersionInfo[] = [];
  for (const [version, value] of Object.entries(document["versions"])) {
    const info = readVersion(version, value);
    if (info) {
      versions.push(info);
    }
  }
  versions.sort((a, b) => semver.compare(a.version, b.version));

  const known = new Set(versions.map((v) => v.version));
  const distTags: Record<string, string> = {};
  for (const [tag, version] of Object.entries(stringMap(document["dist-tags"]))) {
    if (known.has(version)) {
      distTags[tag] = version;
    }
  }
  return { name, versions, distTags };
}
