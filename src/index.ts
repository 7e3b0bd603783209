export * from "./types/schemas";
export * from "./core/errors";
export * from "./core/lifecycle";
export * from "./core/planner";
export * from "./core/poll";
export { NodeOrchestrator } from "./core/orchestrator";
export { BatchCoordinator } from "./core/batch-coordinator";
export type { DeployReport, NodeStatusReport, TeardownReport } from "./core/batch-coordinator";
export { SettingsManager, CONFIG_ENV_VAR } from "./config/settings";
export { Logger, LogLevel, parseLogLevel } from "./logging/logger";
export type { LogEntry, LoggerOptions } from "./logging/logger";
export { renderGuestConfig } from "./guest/nixos-config";
export * from "./providers/hypervisor";
export { ChildProcessRunner, formatCommand } from "./providers/command-runner";
export type { CommandResult, CommandRunner, RunOptions } from "./providers/command-runner";
export { ProxmoxCli } from "./providers/proxmox";
export type { ProxmoxCliOptions } from "./providers/proxmox";
export { buildProgram, defaultDeps } from "./cli/program";
export type { CliDeps } from "./cli/program";
