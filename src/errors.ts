/**
 * Base class for every error homestack raises on purpose.
 */
export class HomestackError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HomestackError';
  }
}

/**
 * A single problem found in a stack file.
 * `path` is dotted, e.g. `services.web.ports[0]`.
 */
export interface ConfigIssue {
  path: string;
  message: string;
}

export class StackConfigError extends HomestackError {
  readonly issues: ConfigIssue[];

  constructor(file: string, issues: ConfigIssue[]) {
    const details = issues.map(issue => `  - ${issue.path ? `${issue.path}: ` : ''}${issue.message}`).join('\n');
    super(`Invalid stack file ${file}:\n${details}`);
    this.name = 'StackConfigError';
    this.issues = issues;
  }
}

export class UnknownDependencyError extends HomestackError {
  readonly service: string;
  readonly dependency: string;

  constructor(service: string, dependency: string) {
    super(`Service "${service}" depends on undefined service "${dependency}"`);
    this.name = 'UnknownDependencyError';
    this.service = service;
    this.dependency = dependency;
  }
}

export class DependencyCycleError extends HomestackError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Dependency cycle detected: ${cycle.join(' -> ')}`);
    this.name = 'DependencyCycleError';
    this.cycle = cycle;
  }
}

export class DependencyFailedError extends HomestackError {
  constructor(dependency: string, reason: string) {
    super(`Dependency "${dependency}" ${reason}`);
    this.name = 'DependencyFailedError';
  }
}

export class DependencyTimeoutError extends HomestackError {
  constructor(dependency: string, condition: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for "${dependency}" (${condition})`);
    this.name = 'DependencyTimeoutError';
  }
}

export class ServiceNotFoundError extends HomestackError {
  constructor(service: string) {
    super(`No such service: ${service}`);
    this.name = 'ServiceNotFoundError';
  }
}

export class NetworkNotFoundError extends HomestackError {
  constructor(networkName: string) {
    super(`Network not found: ${networkName}`);
    this.name = 'NetworkNotFoundError';
  }
}

export class NetworkInUseError extends HomestackError {
  readonly containerCount: number;

  constructor(networkName: string, containerCount: number) {
    super(`Network ${networkName} still has ${containerCount} attached container(s)`);
    this.name = 'NetworkInUseError';
    this.containerCount = containerCount;
  }
}

export class VolumeNotFoundError extends HomestackError {
  constructor(volumeName: string) {
    super(`Volume not found: ${volumeName}`);
    this.name = 'VolumeNotFoundError';
  }
}

export class BackupError extends HomestackError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BackupError';
  }
}

/**
 * A failure reported by the container runtime.
 * `statusCode` is the engine's HTTP status when there is one (404, 409, ...).
 */
export class RuntimeError extends HomestackError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RuntimeError';
    this.statusCode = statusCode;
  }
}
