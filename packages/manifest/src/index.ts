export {
  MANIFEST_FILE,
  addDependency,
  dependencySpecs,
  manifestId,
  parseManifest,
  readManifest,
  removeDependency,
  serializeManifest,
  writeManifest,
} from "./manifest";
export type { DependencyMap, DependencySpec, Manifest } from "./manifest";
export {
  LOCKFILE_NAME,
  LOCKFILE_VERSION,
  parseLockfile,
  readLockfile,
  rootEntryPath,
  serializeLockfile,
  writeLockfile,
} from "./lockfile";
export type { LockEntry, LockRequirement, Lockfile } from "./lockfile";
export { dependencyHash } from "./dependencyHash";
export { checkLockfileConsistency } from "./consistency";
export type { ConsistencyResult, WorkspaceManifest } from "./consistency";
export {
  WORKSPACE_PROTOCOL,
  isTagRange,
  isWorkspaceRange,
  rangeAccepts,
} from "./ranges";
export { atomicWriteFile } from "./atomicWrite";
