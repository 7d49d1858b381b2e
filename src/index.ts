/**
 * Immutable Validator
 *
 * Library entry point. For CLI, see cli.ts.
 */

export { check, checkFile, analyze, validateContract, loadSourceUnit } from './checker.js';
export type {
  CheckOptions,
  CheckOutput,
  FileCheckOutput,
  ContractReport,
  ContractSummary,
  AnalyzeOutput,
} from './checker.js';

export { ImmutableValidator } from './analyzer/immutable-validator.js';
export type { TraversalContext } from './analyzer/immutable-validator.js';
export { linearize, c3Merge } from './analyzer/linearization.js';

export { buildSourceUnit } from './transformer/contract-transformer.js';
export type { BuildOptions } from './transformer/contract-transformer.js';

export { parseSolidity, extractContracts } from './parser/index.js';
export type { ParseResult, ParseError, ParseOptions } from './parser/index.js';

export {
  formatDiagnostic,
  formatReport,
  formatLocation,
  summarize,
} from './formatter/diagnostic-formatter.js';

export { ErrorReporter } from './utils/error-reporter.js';
export {
  ValidatorError,
  ParseError as SourceParseError,
  ResolutionError,
  InternalCompilerError,
} from './utils/errors.js';

export { DIAGNOSTIC_MESSAGES } from './types/diagnostics.js';
export type {
  Diagnostic,
  DiagnosticSeverity,
  ImmutableErrorKind,
  SecondaryLocation,
} from './types/diagnostics.js';
export { stateVariablesIncludingInherited, isCallableDeclaration } from './types/ast.js';
export type * from './types/ast.js';
