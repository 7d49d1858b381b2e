/**
 * Diagnostics reported by the immutable validator
 */

import type { SourceLocation } from './ast.js';

export type ImmutableErrorKind =
  | 'NotInConstructor'
  | 'WrongContract'
  | 'InLoop'
  | 'InBranch'
  | 'DoubleInitialization'
  | 'ReadBeforeOrOutsideInit'
  | 'IncompleteInitialization';

export type DiagnosticSeverity = 'error' | 'warning';

export interface SecondaryLocation {
  message: string;
  location: SourceLocation;
}

export interface Diagnostic {
  kind: ImmutableErrorKind;
  severity: DiagnosticSeverity;
  message: string;
  location: SourceLocation;
  secondary: SecondaryLocation[];
}

export const DIAGNOSTIC_MESSAGES: Record<ImmutableErrorKind, string> = {
  NotInConstructor:
    'Immutable variables can only be initialized inline or assigned directly in the constructor.',
  WrongContract:
    'Immutable variables must be initialized in the constructor of the contract they are defined in.',
  InLoop:
    'Immutable variables can only be initialized once, not in a loop.',
  InBranch:
    'Immutable variables must be initialized unconditionally, not in an if statement.',
  DoubleInitialization:
    'Immutable state variable already initialized.',
  ReadBeforeOrOutsideInit:
    'Immutable variables cannot be read during contract creation time, which means they cannot be read in the constructor or any function or modifier called from it.',
  IncompleteInitialization:
    'Construction control flow ends without initializing all immutable state variables.',
};
