// Logger
export { default as logger, serviceLogger } from './logger';
export type { Logger } from './logger';

// Errors
export * from './errors';

// Settings
export { loadSettings } from './settings';
export type { Settings } from './settings';

// Stack files
export { loadStack, parseStack, sanitizeProjectName } from './config/loader';
export type { LoadOptions, ParseOptions } from './config/loader';
export { renderStack } from './config/render';
export { interpolate, InterpolationError } from './config/interpolate';
export type { Environment, InterpolationResult } from './config/interpolate';
export {
  ParseError,
  parseDuration,
  formatDuration,
  parsePort,
  formatPort,
  parseVolume,
  parseRestartPolicy,
  formatRestartPolicy,
  splitCommand,
} from './config/parse';
export type * from './config/types';
export { SECRETS_DIR, DEFAULT_NETWORK } from './config/types';

// Dependency resolution
export { withDependencies, dependentsOf, resolveLayers, startupOrder, shutdownOrder } from './resolver';
export type { DependencyGraph } from './resolver';

// Container runtime
export { DockerRuntime, demuxLogs } from './runtime/docker';
export { LABELS } from './runtime/types';
export type * from './runtime/types';

// Networks and volumes
export { NetworkManager, VolumeManager, scopedName } from './networks';

// Supervision
export { createSupervisor, containerNameFor, containerSpecFor, imageNameFor, restartDelay } from './supervisor';
export type { Supervisor, SupervisorOptions, SupervisorSettings, ServiceState, ServiceStatus } from './supervisor';
export { createOrchestrator } from './orchestrator';
export type { Orchestrator, OrchestratorOptions, OrchestratorSettings, UpOptions, DownOptions } from './orchestrator';

// Generators and tools
export { renderProxyConfig } from './proxy';
export { createBackup, backupFileName } from './backup';
export type { BackupOptions, BackupResult } from './backup';
export { lintMarkdown } from './docs-lint';
export type { LintIssue } from './docs-lint';
export { formatStatusTable } from './format';

// Daemon
export { defineLifecycle } from './lifecycle';
export type { LifecycleConfig, LifecycleInstance, HealthState } from './lifecycle';
export { startHealthCheckServer, sendJson } from './healthcheck';
export type { HealthCheckService, HealthCheckStatus, RouteHandler } from './healthcheck';
export { setupShutdownHandlers, SIGTERM, SIGINT } from './shutdown';
export type { ShutdownSignal, OnShutdownCallback } from './shutdown';
export { runDaemon } from './daemon';
export type { DaemonOptions } from './daemon';
export { createCli } from './cli';
export type { Cli, CliContext } from './cli';
