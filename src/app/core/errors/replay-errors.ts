export type ReplayErrorCode = 'INSUFFICIENT_DATA' | 'INVALID_CONFIG';

export class ReplayError extends Error {
  constructor(
    message: string,
    public readonly code: ReplayErrorCode,
  ) {
    super(message);
    this.name = 'ReplayError';
  }
}

/**
 * Raised when a reference lap has too few samples to build geometry.
 * The caller is expected to pick another lap.
 */
export class InsufficientDataError extends ReplayError {
  constructor(
    public readonly sampleCount: number,
    public readonly required = 2,
  ) {
    super(
      `Reference lap has ${sampleCount} sample(s), at least ${required} required`,
      'INSUFFICIENT_DATA',
    );
    this.name = 'InsufficientDataError';
  }
}

export class ConfigError extends ReplayError {
  constructor(
    message: string,
    public readonly issues: { field: string; message: string }[],
  ) {
    super(message, 'INVALID_CONFIG');
    this.name = 'ConfigError';
  }
}
