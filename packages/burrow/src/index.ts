export {
  addDependencies,
  createRegistry,
  installProject,
  parsePackageArg,
  removeDependencies,
} from "./project";
export type { ProjectInstallResult, ProjectOptions } from "./project";
export { CLI } from "./cli";
export { EXIT_FATAL, EXIT_OK, EXIT_SCRIPTS_FAILED, exitCodeFor, renderReport, summarize } from "./report";
