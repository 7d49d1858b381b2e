/**
 * Diagnostic Formatter
 *
 * Renders validator diagnostics as plain text in the compiler's usual layout:
 * a headline, the location, and (when the source is available) the offending
 * line with a caret under the node.
 */

import type { SourceLocation } from '../types/ast.js';
import type { Diagnostic } from '../types/diagnostics.js';
import type { ContractReport } from '../checker.js';

export function formatLocation(location: SourceLocation): string {
  return `${location.sourceName}:${location.line}:${location.column}`;
}

/**
 * Excerpt of the line a location starts on, with a caret marker.
 * Empty when the line does not exist in `source`.
 */
export function formatExcerpt(location: SourceLocation, source: string): string[] {
  const lines = source.split('\n');
  const text = lines[location.line - 1];
  if (text === undefined) return [];

  const lineText = text.replace(/\r$/, '');
  const gutter = String(location.line);
  const pad = ' '.repeat(gutter.length);
  const startColumn = Math.max(location.column, 1);
  const available = Math.max(lineText.length - (startColumn - 1), 1);
  const width = Math.min(Math.max(location.end - location.start, 1), available);

  return [
    `${pad} |`,
    `${gutter} | ${lineText}`,
    `${pad} | ${' '.repeat(startColumn - 1)}${'^'.repeat(width)}`,
  ];
}

export function formatDiagnostic(diagnostic: Diagnostic, source?: string): string {
  const severity = diagnostic.severity === 'error' ? 'Error' : 'Warning';
  const lines = [
    `${severity} (${diagnostic.kind}): ${diagnostic.message}`,
    ` --> ${formatLocation(diagnostic.location)}:`,
  ];
  if (source !== undefined) {
    lines.push(...formatExcerpt(diagnostic.location, source));
  }

  for (const note of diagnostic.secondary) {
    lines.push(`Note: ${note.message.trim()}`);
    lines.push(` --> ${formatLocation(note.location)}:`);
    if (source !== undefined) {
      lines.push(...formatExcerpt(note.location, source));
    }
  }

  return lines.join('\n');
}

export function formatReport(report: ContractReport, source?: string): string {
  const body = report.diagnostics.map(d => formatDiagnostic(d, source));
  return [`Contract ${report.contract}:`, ...body].join('\n\n');
}

export function summarize(reports: ContractReport[]): string {
  const failing = reports.filter(r => r.diagnostics.length > 0);
  const total = failing.reduce((sum, r) => sum + r.diagnostics.length, 0);
  if (total === 0) return 'No immutable initialization errors';
  return `${total} error(s) in ${failing.length} contract(s)`;
}
