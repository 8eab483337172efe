export class StackguardError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StackguardError';
  }
}

export class UserCancelledError extends StackguardError {
  constructor(message = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancelledError';
  }
}

export class ProjectNotFoundError extends StackguardError {
  readonly path: string;

  constructor(path: string) {
    super(`Project directory not found: ${path}`);
    this.name = 'ProjectNotFoundError';
    this.path = path;
  }
}

/**
 * Environment or setup problem that must reach the caller: a missing
 * serializer/deserializer, an existing manifest that cannot be read or parsed
 * during a merge, an invalid stackguard.config.json, an unknown tool name.
 */
export class ConfigurationError extends StackguardError {
  readonly path: string | undefined;

  constructor(message: string, options?: { path?: string; cause?: unknown }) {
    super(message);
    this.name = 'ConfigurationError';
    this.path = options?.path;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
