export * from "./workspace.types";
export { WorkspaceReconciler, workspaceDescription } from "./workspace";
