export class AccentDetectorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'AccentDetectorError';
  }
}

export class ValidationError extends AccentDetectorError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export type AcquisitionReason =
  | 'network'
  | 'permission'
  | 'format'
  | 'unsupported-host'
  | 'forbidden'
  | 'not-found'
  | 'tool-unavailable';

export class AcquisitionError extends AccentDetectorError {
  constructor(
    message: string,
    public readonly reason: AcquisitionReason,
    cause?: Error,
  ) {
    super(message, 'ACQUISITION_ERROR', cause);
    this.name = 'AcquisitionError';
  }
}

export class DurationExceededError extends AccentDetectorError {
  constructor(
    public readonly durationSeconds: number,
    public readonly limitSeconds: number,
  ) {
    super(
      `Video is ${Math.round(durationSeconds)} seconds long; the limit is ${limitSeconds} seconds (${limitSeconds / 60} minutes).`,
      'DURATION_EXCEEDED',
    );
    this.name = 'DurationExceededError';
  }
}

export class AnalysisError extends AccentDetectorError {
  constructor(message: string, cause?: Error) {
    super(message, 'ANALYSIS_ERROR', cause);
    this.name = 'AnalysisError';
  }
}

export class ConfigurationError extends AccentDetectorError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
