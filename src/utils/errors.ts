export type PipelineErrorKind =
  | 'io'
  | 'integrity'
  | 'collision-exhausted'
  | 'remote-failure'
  | 'state-corruption'
  | 'config'
  | 'precondition';

/**
 * Base class for every failure the pipeline reports to the operator.
 */
export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** A file could not be read, copied or written. */
export class IOError extends PipelineError {
  readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super('io', message, options);
    this.path = path;
  }
}

/** The copied bytes do not hash to the source digest. */
export class IntegrityError extends PipelineError {
  constructor(
    readonly sourcePath: string,
    readonly destPath: string,
    readonly expected: string,
    readonly actual: string,
  ) {
    super(
      'integrity',
      `Hash mismatch after copy: ${sourcePath} -> ${destPath} (expected ${expected}, got ${actual})`,
    );
  }
}

export class CollisionExhaustedError extends PipelineError {
  constructor(
    readonly destDir: string,
    readonly fileName: string,
    readonly attempts: number,
  ) {
    super(
      'collision-exhausted',
      `Too many filename collisions for ${fileName} in ${destDir} (${attempts} attempts)`,
    );
  }
}

/** An external transfer tool exited with a non-zero status. */
export class RemoteFailureError extends PipelineError {
  constructor(
    readonly tool: string,
    readonly exitCode: number,
    message?: string,
  ) {
    super('remote-failure', message ?? `${tool} exited with code ${exitCode}`);
  }
}

export class StateCorruptionError extends PipelineError {
  constructor(
    readonly storePath: string,
    message: string,
  ) {
    super('state-corruption', message);
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super('config', message);
  }
}

/** A volume, directory or free-space requirement is not met. */
export class PreconditionError extends PipelineError {
  constructor(message: string) {
    super('precondition', message);
  }
}

export const formatError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};
