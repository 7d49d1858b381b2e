/**
 * Error Reporter
 * Append-only sink for diagnostics. Reporting never throws.
 */

import type { SourceLocation } from '../types/ast.js';
import type { Diagnostic, ImmutableErrorKind, SecondaryLocation } from '../types/diagnostics.js';
import { DIAGNOSTIC_MESSAGES } from '../types/diagnostics.js';

export class ErrorReporter {
  private readonly reported: Diagnostic[] = [];

  typeError(kind: ImmutableErrorKind, location: SourceLocation, secondary: SecondaryLocation[] = []): void {
    this.reported.push({
      kind,
      severity: 'error',
      message: DIAGNOSTIC_MESSAGES[kind],
      location,
      secondary,
    });
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.reported;
  }

  hasErrors(): boolean {
    return this.reported.some(d => d.severity === 'error');
  }

  count(kind: ImmutableErrorKind): number {
    return this.reported.filter(d => d.kind === kind).length;
  }
}
