export type DataErrorKind =
  | 'configuration'
  | 'connection'
  | 'repository'
  | 'unsupported-key-type'
  | 'invalid-argument';

export abstract class DataError extends Error {
  abstract readonly kind: DataErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Thrown when repository options are missing or malformed.
// `issues` lists every problem found, not only the first one.
export class ConfigurationError extends DataError {
  readonly kind = 'configuration';
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid repository options: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class ConnectionError extends DataError {
  readonly kind = 'connection';
  readonly databaseId: string;

  constructor(databaseId: string, cause: unknown) {
    super(
      `Unable to reach database '${databaseId}': ${describeCause(cause)}`,
      { cause },
    );
    this.databaseId = databaseId;
  }
}

export type RepositoryOperation = 'add' | 'update' | 'delete';

export type RepositoryErrorContext = {
  operation: RepositoryOperation;
  repository: string;
  model: string;
  // Extended JSON snapshot of the rejected model
  payload: string;
};

/**
 * Raised by the write operations of a repository when the driver call fails.
 * The driver error is always available as `cause`.
 */
export class RepositoryError extends DataError {
  readonly kind = 'repository';
  readonly context: RepositoryErrorContext;

  constructor(context: RepositoryErrorContext, cause: unknown) {
    super(
      `${context.repository} failed to ${context.operation} a '${context.model}' model: ${describeCause(cause)}. Model: ${context.payload}`,
      { cause },
    );
    this.context = context;
  }
}

export class UnsupportedKeyTypeError extends DataError {
  readonly kind = 'unsupported-key-type';
  readonly keyKind: string;

  constructor(keyKind: string) {
    super(`No key generation strategy exists for key kind '${keyKind}'`);
    this.keyKind = keyKind;
  }
}

export class InvalidArgumentError extends DataError {
  readonly kind = 'invalid-argument';
  readonly argument: string;

  constructor(argument: string, reason = 'is required') {
    super(`Argument '${argument}' ${reason}`);
    this.argument = argument;
  }
}

export type Result<T, E extends DataError = DataError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Turns a pending repository call into a result value. Only `DataError`
 * rejections become `{ ok: false }`; anything else is rethrown.
 *
 * @example
 * ```typescript
 * const result = await settle(repo.update(person));
 * if (!result.ok && result.error.kind === 'repository') {
 *   log(result.error.context.payload);
 * }
 * ```
 */
export async function settle<T>(operation: Promise<T>): Promise<Result<T>> {
  try {
    return { ok: true, value: await operation };
  } catch (error) {
    if (error instanceof DataError) {
      return { ok: false, error };
    }
    throw error;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
