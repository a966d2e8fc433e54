export type PipelineErrorKind =
  | 'acquisition'
  | 'connection'
  | 'protocol'
  | 'inference'
  | 'resource-exhausted'
  | 'write'
  | 'config';

export type Collaborator = 'camera' | 'transport' | 'background-remover' | 'file-io' | 'config';

/**
 * Base class for every failure the pipeline reports. `fatal` errors end the
 * owning process; the rest are contained to the frame or packet they hit.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
  abstract readonly collaborator: Collaborator;
  abstract readonly fatal: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Camera could not be opened or stopped delivering frames. */
export class AcquisitionError extends PipelineError {
  readonly kind = 'acquisition';
  readonly collaborator = 'camera';
  readonly fatal = true;
}

/** Producer could not reach the processing process. */
export class ConnectionError extends PipelineError {
  readonly kind = 'connection';
  readonly collaborator = 'transport';
  readonly fatal = true;
}

/** Malformed packet or payload on the wire. */
export class ProtocolError extends PipelineError {
  readonly kind = 'protocol';
  readonly collaborator = 'transport';
  readonly fatal = false;
}

/** One frame could not be segmented; the stream continues. */
export class InferenceError extends PipelineError {
  readonly kind = 'inference';
  readonly collaborator = 'background-remover';
  readonly fatal = false;
}

/** The inference backend is gone for good. */
export class ResourceExhaustedError extends PipelineError {
  readonly kind = 'resource-exhausted';
  readonly collaborator = 'background-remover';
  readonly fatal = true;
}

/** One output file could not be written; the stream continues. */
export class WriteError extends PipelineError {
  readonly kind = 'write';
  readonly collaborator = 'file-io';
  readonly fatal = false;

  constructor(message: string, readonly path: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ConfigError extends PipelineError {
  readonly kind = 'config';
  readonly collaborator = 'config';
  readonly fatal = true;

  constructor(message: string, readonly issues: string[] = [], options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/** Anything that is not a known recoverable PipelineError is treated as fatal. */
export function isFatal(error: unknown): boolean {
  return isPipelineError(error) ? error.fatal : true;
}

export function describeError(error: unknown): string {
  if (isPipelineError(error)) {
    return `${error.collaborator}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
