export type PodcastErrorCode =
  | 'DIRECTORY_ERROR'
  | 'SYNTHESIS_ERROR'
  | 'VALIDATION_ERROR'
  | 'STATE_ERROR';

/**
 * Base class for every error the studio reports to the user.
 * `code` is stable; `message` is meant to be shown as is.
 */
export class PodcastError extends Error {
  readonly code: PodcastErrorCode;

  constructor(code: PodcastErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The voice list or a voice sample could not be fetched.
 */
export class DirectoryError extends PodcastError {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super('DIRECTORY_ERROR', message, { cause: options.cause });
    this.status = options.status;
  }
}

interface SynthesisErrorOptions {
  label?: string;
  status?: number;
  completedSegments?: number;
  cause?: unknown;
}

/**
 * A single text-to-speech call failed. `label` names the segment
 * ("Intro", "Line 3", ...) once the pipeline knows it.
 */
export class SynthesisError extends PodcastError {
  readonly label?: string;
  readonly status?: number;
  readonly completedSegments?: number;
  readonly detail: string;

  constructor(detail: string, options: SynthesisErrorOptions = {}) {
    const message = options.label ? `Failed to generate "${options.label}": ${detail}` : detail;
    super('SYNTHESIS_ERROR', message, { cause: options.cause });
    this.detail = detail;
    this.label = options.label;
    this.status = options.status;
    this.completedSegments = options.completedSegments;
  }

  withLabel(label: string, completedSegments?: number): SynthesisError {
    return new SynthesisError(this.detail, {
      label,
      status: this.status,
      completedSegments,
      cause: this.cause,
    });
  }
}

export class ValidationError extends PodcastError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('VALIDATION_ERROR', message);
    this.issues = issues;
  }
}

/**
 * An action addressed a segment or line that does not exist, or ran
 * before the session had what it needs.
 */
export class StateError extends PodcastError {
  constructor(message: string) {
    super('STATE_ERROR', message);
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof ValidationError && error.issues.length > 0) {
    return `${error.message}\n${error.issues.map((issue) => `  - ${issue}`).join('\n')}`;
  }
  return error instanceof Error ? error.message : String(error);
};
