import { describe, it, expect } from 'vitest';
import { ErrorReporter } from '../../src/utils/error-reporter.js';
import {
  assertInvariant,
  InternalCompilerError,
  ParseError,
  ResolutionError,
  ValidatorError,
} from '../../src/utils/errors.js';
import type { SourceLocation } from '../../src/types/ast.js';

const LOCATION: SourceLocation = { sourceName: 'A.sol', start: 10, end: 11, line: 3, column: 7 };

describe('Errors', () => {
  it('should prefix the location when there is one', () => {
    expect(new ParseError('missing ;', { line: 4, column: 2 }).toString())
      .toBe('ParseError at line 4, column 2: missing ;');
    expect(new ResolutionError('cycle').toString()).toBe('ResolutionError: cycle');
  });

  it('should carry error codes', () => {
    expect(new ParseError('x').code).toBe('PARSE_ERROR');
    expect(new ResolutionError('x').code).toBe('RESOLUTION_ERROR');
    expect(new InternalCompilerError('x').code).toBe('INTERNAL_ERROR');
    expect(new InternalCompilerError('x')).toBeInstanceOf(ValidatorError);
  });

  it('should throw InternalCompilerError on a broken invariant', () => {
    expect(() => assertInvariant(true, 'fine')).not.toThrow();
    expect(() => assertInvariant(false, 'broken')).toThrow(InternalCompilerError);
    expect(() => assertInvariant(false, 'broken')).toThrow('broken');
  });
});

describe('ErrorReporter', () => {
  it('should collect diagnostics in order with their messages', () => {
    const reporter = new ErrorReporter();
    expect(reporter.hasErrors()).toBe(false);

    reporter.typeError('InLoop', LOCATION);
    reporter.typeError('InBranch', LOCATION);
    reporter.typeError('InLoop', LOCATION);

    expect(reporter.hasErrors()).toBe(true);
    expect(reporter.diagnostics.map(d => d.kind)).toEqual(['InLoop', 'InBranch', 'InLoop']);
    expect(reporter.count('InLoop')).toBe(2);
    expect(reporter.count('DoubleInitialization')).toBe(0);
    expect(reporter.diagnostics[0]).toEqual({
      kind: 'InLoop',
      severity: 'error',
      message: 'Immutable variables can only be initialized once, not in a loop.',
      location: LOCATION,
      secondary: [],
    });
  });
});
