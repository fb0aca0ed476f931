/**
 * Error taxonomy for the voice tutor.
 *
 * Load-time errors (IntegrityError) are fatal. Everything raised during a turn
 * is recoverable: the pipeline maps it to a degraded response.
 */

/** The external collaborator steps a turn can suspend on. */
export type CollaboratorStep = 'transcription' | 'generation' | 'synthesis';

/**
 * Raised when the knowledge base is malformed. Carries every problem found,
 * not only the first one.
 */
export class IntegrityError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IntegrityError';
    this.issues = issues;
  }
}

export class NotFoundError extends Error {
  public readonly id: string;

  constructor(id: string) {
    super(`Knowledge node not found: ${id}`);
    this.name = 'NotFoundError';
    this.id = id;
  }
}

/** Base class for failures of an external collaborator call. */
export abstract class CollaboratorError extends Error {
  public abstract readonly step: CollaboratorStep;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class TranscriptionError extends CollaboratorError {
  public readonly step = 'transcription';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TranscriptionError';
  }
}

export class GenerationError extends CollaboratorError {
  public readonly step = 'generation';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationError';
  }
}

export class SynthesisError extends CollaboratorError {
  public readonly step = 'synthesis';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SynthesisError';
  }
}

/**
 * A collaborator call exceeded its budget. Handled exactly like the
 * collaborator error of the same step.
 */
export class TimeoutError extends CollaboratorError {
  public readonly step: CollaboratorStep;
  public readonly timeoutMs: number;

  constructor(step: CollaboratorStep, timeoutMs: number) {
    super(`${step} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.step = step;
    this.timeoutMs = timeoutMs;
  }
}

/** The caller cancelled the turn. Nothing is recorded for it. */
export class CancelledError extends Error {
  constructor(message = 'Turn cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export type ErrorKind = 'timeout' | 'failure';

export function errorKind(error: CollaboratorError): ErrorKind {
  return error instanceof TimeoutError ? 'timeout' : 'failure';
}
