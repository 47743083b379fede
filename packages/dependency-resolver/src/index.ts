export { DependencyGraph, ROOT_SCOPE } from "./graph";
export type {
  Edge,
  PackageId,
  PackageSource,
  ResolvedPackage,
  RootProject,
  Scope,
  ScopeId,
} from "./graph";
export { resolve } from "./resolve";
export type { ResolveOptions, ResolveStats, Resolution } from "./resolve";
export { graphFromLockfile } from "./fromLockfile";
export { toLockfile } from "./toLockfile";
export { markDevPackages } from "./devMarking";
export { withoutDevPackages } from "./prune";
export { VersionCatalog, selectVersion } from "./versions";
