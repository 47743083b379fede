export type { PackageVersions, RegistryClient, VersionInfo } from "./types";
export { validatePackument } from "./validate";
export { HttpRegistryClient, packageUrl } from "./httpClient";
export type { HttpRegistryClientOptions } from "./httpClient";
