export { WorkspaceIndex, discoverWorkspaces } from "./discover";
export type { WorkspaceMember } from "./discover";
export { isLinkedTo, linkWorkspace } from "./link";
