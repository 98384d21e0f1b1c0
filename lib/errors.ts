export type GitErrorKind = 'auth' | 'network' | 'conflict' | 'corrupted' | 'timeout';
export type SecretsErrorKind = 'missing-key' | 'malformed' | 'binary-unavailable' | 'timeout';
export type ContainerErrorKind = 'nonzero-exit' | 'timeout' | 'unhealthy';

export type ErrorCategory = 'git' | 'secrets' | 'container' | 'prune' | 'notification';

/**
 * Failure of one deployment step. `category` names the adapter that failed and
 * `kind` the reason, so the log line reads `[git:auth] ...`.
 */
export class DeployError extends Error {
  constructor(
    message: string,
    public readonly category: ErrorCategory,
    public readonly kind: string,
  ) {
    super(message);
    this.name = 'DeployError';
  }

  get tag(): string {
    return `${this.category}:${this.kind}`;
  }
}

export class GitError extends DeployError {
  declare readonly kind: GitErrorKind;

  constructor(kind: GitErrorKind, message: string) {
    super(message, 'git', kind);
    this.name = 'GitError';
  }
}

export class SecretsError extends DeployError {
  declare readonly kind: SecretsErrorKind;

  constructor(kind: SecretsErrorKind, message: string) {
    super(message, 'secrets', kind);
    this.name = 'SecretsError';
  }
}

export class ContainerError extends DeployError {
  declare readonly kind: ContainerErrorKind;

  constructor(
    kind: ContainerErrorKind,
    message: string,
    public readonly exitCode?: number,
  ) {
    super(message, 'container', kind);
    this.name = 'ContainerError';
  }
}

/** Non-fatal: logged on the deployment, never changes its status. */
export class PruneError extends DeployError {
  constructor(message: string) {
    super(message, 'prune', 'failed');
    this.name = 'PruneError';
  }
}

/** Non-fatal: logged, never changes a deployment's status. */
export class NotificationError extends DeployError {
  constructor(
    message: string,
    public readonly url?: string,
  ) {
    super(message, 'notification', 'failed');
    this.name = 'NotificationError';
  }
}

export class NotFoundError extends Error {
  constructor(
    public readonly resourceType: string,
    public readonly resourceId: string | number,
  ) {
    super(`${resourceType} ${resourceId} not found`);
    this.name = 'NotFoundError';
  }

  static repository(id: string | number): NotFoundError {
    return new NotFoundError('Repository', id);
  }

  static deployment(id: string | number): NotFoundError {
    return new NotFoundError('Deployment', id);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
