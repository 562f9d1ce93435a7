export type EditStage = 'resolve' | 'probe' | 'encode' | 'verify';

export class ValidationError extends Error {
  readonly stage: EditStage = 'resolve';

  constructor(
    public readonly field: string,
    public readonly value: string
  ) {
    super(`Invalid value for ${field}: ${value}`);
    this.name = 'ValidationError';
  }
}

export class MissingRequiredFieldError extends Error {
  readonly stage: EditStage = 'resolve';

  constructor(public readonly field: string) {
    super(`${field} is required`);
    this.name = 'MissingRequiredFieldError';
  }
}

export class InputNotFoundError extends Error {
  readonly stage: EditStage = 'resolve';

  constructor(public readonly inputPath: string) {
    super(`Input file does not exist: ${inputPath}`);
    this.name = 'InputNotFoundError';
  }
}

export class DimensionProbeError extends Error {
  readonly stage: EditStage = 'probe';

  constructor(
    public readonly inputPath: string,
    public readonly reason: string,
    public readonly meta: Record<string, unknown> | null = null
  ) {
    super(`Could not get video dimensions for ${inputPath} (${reason})`);
    this.name = 'DimensionProbeError';
  }
}

export class EncodeError extends Error {
  readonly stage: EditStage = 'encode';

  constructor(
    public readonly exitCode: number | null,
    public readonly stderr: string
  ) {
    const detail = stderr.trim().split('\n').slice(-1)[0] ?? '';
    super(detail ? `ffmpeg failed (exit ${exitCode ?? 'unknown'}): ${detail}` : `ffmpeg failed (exit ${exitCode ?? 'unknown'})`);
    this.name = 'EncodeError';
  }
}

export class OutputMissingError extends Error {
  readonly stage: EditStage = 'verify';

  constructor(public readonly outputPath: string) {
    super(`Failed to create video '${outputPath}'`);
    this.name = 'OutputMissingError';
  }
}

export type EditError =
  | ValidationError
  | MissingRequiredFieldError
  | InputNotFoundError
  | DimensionProbeError
  | EncodeError
  | OutputMissingError;

export const isValidationError = (error: unknown): error is ValidationError => error instanceof ValidationError;

export const isDimensionProbeError = (error: unknown): error is DimensionProbeError =>
  error instanceof DimensionProbeError;

export const isEncodeError = (error: unknown): error is EncodeError => error instanceof EncodeError;

export const isEditError = (error: unknown): error is EditError =>
  error instanceof ValidationError ||
  error instanceof MissingRequiredFieldError ||
  error instanceof InputNotFoundError ||
  error instanceof DimensionProbeError ||
  error instanceof EncodeError ||
  error instanceof OutputMissingError;

export interface FailureSummary {
  stage: EditStage | null;
  message: string;
}

export const describeFailure = (error: unknown): FailureSummary => {
  if (isEditError(error)) {
    return { stage: error.stage, message: error.message };
  }
  return {
    stage: null,
    message: error instanceof Error ? error.message : String(error)
  };
};
