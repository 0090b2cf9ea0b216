export * from "./deploy.types";
export { DeploymentOrchestrator, type OrchestratorComponents } from "./orchestrator";
export { createDeployment, previewDiscovery } from "./factory";
export { buildReport, resolveReportPath, summarize, writeReport, type ReportInput } from "./report";
