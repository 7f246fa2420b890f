/** Pipeline stage an error is attributed to in user-facing messages. */
export type Stage = 'config' | 'read' | 'parse' | 'build' | 'evaluate' | 'write' | 'load';

export class RegionQueryError extends Error {
  override readonly name: string = 'RegionQueryError';

  constructor(
    message: string,
    readonly stage: Stage,
    override readonly cause?: unknown,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InputNotFoundError extends RegionQueryError {
  override readonly name: string = 'InputNotFoundError';

  constructor(
    readonly path: string,
    cause?: unknown,
  ) {
    super(`Input not found: ${path}`, 'read', cause);
  }
}

/**
 * Structural or validation failure in a query description.
 * `path` locates the offending node, e.g. `query.operator_and[1].operator_crop`.
 */
export class MalformedQueryError extends RegionQueryError {
  override readonly name: string = 'MalformedQueryError';

  constructor(
    message: string,
    readonly path: string,
    stage: 'parse' | 'build' = 'build',
    cause?: unknown,
  ) {
    super(path === '' ? message : `${path}: ${message}`, stage, cause);
  }
}

export class UnknownOperatorError extends MalformedQueryError {
  override readonly name: string = 'UnknownOperatorError';

  constructor(
    path: string,
    readonly keys: readonly string[],
  ) {
    super(
      keys.length === 0
        ? 'node has no operator key'
        : `unknown operator (found keys: ${keys.join(', ')})`,
      path,
    );
  }
}

export class StoreUnavailableError extends RegionQueryError {
  override readonly name: string = 'StoreUnavailableError';

  constructor(message: string, cause?: unknown, stage: Stage = 'evaluate') {
    super(message, stage, cause);
  }
}

export class StoreError extends RegionQueryError {
  override readonly name: string = 'StoreError';

  constructor(message: string, cause?: unknown, stage: Stage = 'evaluate') {
    super(message, stage, cause);
  }
}

export class QueryAbortedError extends RegionQueryError {
  override readonly name: string = 'QueryAbortedError';

  constructor(cause?: unknown) {
    super('Query evaluation was aborted', 'evaluate', cause);
  }
}

export class OutputWriteError extends RegionQueryError {
  override readonly name: string = 'OutputWriteError';

  constructor(
    readonly path: string,
    cause?: unknown,
  ) {
    super(`Failed to write output to ${path}: ${String(cause)}`, 'write', cause);
  }
}

export class DataFormatError extends RegionQueryError {
  override readonly name: string = 'DataFormatError';

  constructor(
    message: string,
    readonly file: string,
    readonly line?: number,
  ) {
    super(line === undefined ? `${file}: ${message}` : `${file}:${line}: ${message}`, 'load');
  }
}

export class ConfigError extends RegionQueryError {
  override readonly name: string = 'ConfigError';

  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'config');
  }
}
