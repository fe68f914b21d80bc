// src/errors.ts
import type { SourcePosition } from './types.js';

export enum ErrorKind {
  UnmatchedLoopStart = 'UnmatchedLoopStart',
  UnmatchedLoopEnd = 'UnmatchedLoopEnd',
  ExcessiveLoopDepth = 'ExcessiveLoopDepth',
  TapePointerOutOfBounds = 'TapePointerOutOfBounds',
  StepLimitExceeded = 'StepLimitExceeded',
  SourceReadFailure = 'SourceReadFailure',
}

const formatMessage = (kind: ErrorKind, detail: string, position: SourcePosition | null): string =>
  position
    ? `${kind}: ${detail} (line ${position.line}, column ${position.column})`
    : `${kind}: ${detail}`;

/**
 * Fatal error raised by the scanner, the bracket pre-pass, the engine or the
 * CLI. `position` is null only when no source was scanned.
 */
export class InterpreterError extends Error {
  public readonly position: SourcePosition | null;

  constructor(
    public readonly kind: ErrorKind,
    public readonly detail: string,
    position: SourcePosition | null = null
  ) {
    super(formatMessage(kind, detail, position));
    this.name = 'InterpreterError';
    this.position = position ? { line: position.line, column: position.column } : null;
  }
}

export const unmatchedLoopStart = (at: SourcePosition): InterpreterError =>
  new InterpreterError(ErrorKind.UnmatchedLoopStart, "'[' has no matching ']'", at);

export const unmatchedLoopEnd = (at: SourcePosition): InterpreterError =>
  new InterpreterError(ErrorKind.UnmatchedLoopEnd, "']' has no matching '['", at);

export const excessiveLoopDepth = (at: SourcePosition, limit: number): InterpreterError =>
  new InterpreterError(ErrorKind.ExcessiveLoopDepth, `more than ${limit} nested loops`, at);

export const pointerOutOfBounds = (at: SourcePosition, direction: 'underflow' | 'overflow'): InterpreterError =>
  new InterpreterError(ErrorKind.TapePointerOutOfBounds, `tape pointer out of range (${direction})`, at);

export const stepLimitExceeded = (at: SourcePosition, limit: number): InterpreterError =>
  new InterpreterError(ErrorKind.StepLimitExceeded, `step limit of ${limit} reached`, at);

export const sourceReadFailure = (detail: string): InterpreterError =>
  new InterpreterError(ErrorKind.SourceReadFailure, detail);
