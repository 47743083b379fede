export interface VersionInfo {
  version: string;
  /**
   * SRI string (`sha512-...`) or a bare sha1 hex shasum.
   */
  integrity: string;
  tarball: string;
  dependencies: Record<string, string>;
  bin?: string | Record<string, string>;
}

export interface PackageVersions {
  name: string;
  /**
   * Sorted by ascending semver precedence.
   */
  versions: VersionInfo[];
  distTags: Record<string, string>;
}

/**
 * What the resolver and the installer need from a package registry.
 */
export interface RegistryClient {
  getVersions(name: string): Promise<PackageVersions>;
  fetchTarball(url: string, options?: { signal?: AbortSignal }): Promise<Uint8Array>;
}
