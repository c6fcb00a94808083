// packages/core/src/utils/errors.ts

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class WorkflowError extends Error {
  constructor(
    message: string,
    public readonly workflow?: string,
  ) {
    super(message);
    this.name = 'WorkflowError';
  }
}

/** Malformed or unreadable workflow manifest. */
export class ManifestError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ManifestError';
  }
}

/** A declared block could not be installed while compiling a workflow. */
export class ResolutionError extends Error {
  constructor(
    message: string,
    public readonly blockName: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ResolutionError';
  }
}

export class GraphError extends Error {
  constructor(
    message: string,
    public readonly label?: string,
    public readonly vertex?: string,
  ) {
    super(message);
    this.name = 'GraphError';
  }
}

export class ExecutionError extends Error {
  constructor(
    message: string,
    public readonly blockName: string,
    public readonly stderr: string = '',
    public readonly exitCode?: number | null,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ExecutionError';
  }

  get isSpawnFailure(): boolean {
    return this.exitCode === undefined;
  }
}

export class PackageError extends Error {
  constructor(
    message: string,
    public readonly repo?: string,
    public readonly statusCode?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'PackageError';
  }

  get isAuthFailure(): boolean {
    return this.statusCode === 401 || this.statusCode === 403;
  }

  get isNotFound(): boolean {
    return this.statusCode === 404;
  }
}

/** Render an unknown thrown value as a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
