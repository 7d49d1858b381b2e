/**
 * Error Handling Utilities
 */

export class ValidatorError extends Error {
  constructor(
    message: string,
    public readonly location?: { line: number; column: number },
    public readonly code?: string
  ) {
    super(message);
    this.name = 'ValidatorError';
  }

  toString(): string {
    if (this.location) {
      return `${this.name} at line ${this.location.line}, column ${this.location.column}: ${this.message}`;
    }
    return `${this.name}: ${this.message}`;
  }
}

export class ParseError extends ValidatorError {
  constructor(message: string, location?: { line: number; column: number }) {
    super(message, location, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

/** Duplicate contracts, self-inheritance, cyclic or inconsistent inheritance */
export class ResolutionError extends ValidatorError {
  constructor(message: string, location?: { line: number; column: number }) {
    super(message, location, 'RESOLUTION_ERROR');
    this.name = 'ResolutionError';
  }
}

/**
 * A broken invariant of an earlier stage. Never reported as a diagnostic;
 * always thrown to the caller.
 */
export class InternalCompilerError extends ValidatorError {
  constructor(message: string) {
    super(message, undefined, 'INTERNAL_ERROR');
    this.name = 'InternalCompilerError';
  }
}

export function assertInvariant(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new InternalCompilerError(message);
  }
}
