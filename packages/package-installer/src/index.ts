export { install, emptyReport } from "./install";
export type { InstallOptions, InstallReport, ScriptFailure } from "./install";
export { createInstallPlan } from "./installPlan";
export type { InstallPlan } from "./installPlan";
export { convertGraphToTree } from "./graphToTree";
export type { Graph, Tree } from "./graphToTree";
export { executeTree, getNodesInOrder } from "./treeExecutor";
export type { ExecutableTree } from "./treeExecutor";
export { INSTALL_MARKER, isUpToDate, placePackage } from "./place";
export { binEntries, linkBin, pruneDanglingBins } from "./bins";
export { isValidBinName, isValidPackageName } from "./inputValidation";
export { LIFECYCLE_SCRIPTS, runLifecycleScripts, scriptPath, spawnScript } from "./scripts";
export type {
  LifecycleScript,
  ScriptRequest,
  ScriptResult,
  ScriptRunner,
} from "./scripts";
