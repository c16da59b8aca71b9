/**
 * Error taxonomy
 *
 * Only InputError aborts a run. Everything else is contained to the
 * smallest stage that raised it and surfaces as a warning or a
 * quality issue.
 */

export type ErrorKind =
  | 'input'
  | 'evidence-read'
  | 'synthesis'
  | 'analyzer'
  | 'serialization'
  | 'internal';

export type InputErrorReason =
  | 'path-missing'
  | 'not-a-directory'
  | 'ceiling-exceeded'
  | 'invalid-config'
  | 'invalid-store';

export abstract class ArchscryError extends Error {
  abstract readonly kind: ErrorKind;
}

export class InputError extends ArchscryError {
  readonly kind = 'input';

  constructor(readonly reason: InputErrorReason, message: string) {
    super(message);
    this.name = 'InputError';
  }
}

export class EvidenceReadError extends ArchscryError {
  readonly kind = 'evidence-read';

  constructor(readonly filePath: string, cause: unknown) {
    super(`Could not read ${filePath}: ${describeError(cause)}`);
    this.name = 'EvidenceReadError';
  }
}

export class SynthesisFailure extends ArchscryError {
  readonly kind = 'synthesis';

  constructor(message: string) {
    super(message);
    this.name = 'SynthesisFailure';
  }
}

export class AnalyzerFailure extends ArchscryError {
  readonly kind = 'analyzer';

  constructor(readonly analyzer: string, cause: unknown) {
    super(`${analyzer} failed: ${describeError(cause)}`);
    this.name = 'AnalyzerFailure';
  }
}

export class SerializationError extends ArchscryError {
  readonly kind = 'serialization';

  constructor(readonly artifact: string, detail: string) {
    super(`${artifact} did not round-trip through the YAML parser: ${detail}`);
    this.name = 'SerializationError';
  }
}

export interface StageError {
  kind: ErrorKind;
  message: string;
}

export function toStageError(error: unknown, fallback: ErrorKind): StageError {
  if (error instanceof ArchscryError) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: fallback, message: describeError(error) };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
