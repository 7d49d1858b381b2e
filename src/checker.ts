/**
 * Checker
 * Orchestrates parsing, lowering and the immutable validator over every
 * contract of a Solidity source.
 */

import { existsSync, readFileSync } from 'fs';
import { parseSolidity } from './parser/solidity-parser.js';
import { buildSourceUnit } from './transformer/contract-transformer.js';
import { ImmutableValidator } from './analyzer/immutable-validator.js';
import { ErrorReporter } from './utils/error-reporter.js';
import { ParseError, ResolutionError } from './utils/errors.js';
import type { ContractDefinition, ContractKind, SourceUnitModel } from './types/ast.js';
import { stateVariablesIncludingInherited } from './types/ast.js';
import type { Diagnostic } from './types/diagnostics.js';

export interface CheckOptions {
  /** Name shown in source locations */
  sourceName?: string;
  /** Only check these contracts. Defaults to every contract that is not an interface. */
  contracts?: string[];
}

export interface ContractReport {
  contract: string;
  diagnostics: Diagnostic[];
}

export interface CheckOutput {
  success: boolean;
  reports: ContractReport[];
  /** Parse and resolution errors; no contract is checked when present */
  errors: string[];
  warnings: string[];
}

export interface FileCheckOutput extends CheckOutput {
  file: string;
  /** File contents; null when the file could not be found */
  source: string | null;
}

export interface ContractSummary {
  name: string;
  kind: ContractKind;
  linearization: string[];
  immutables: string[];
  hasConstructor: boolean;
}

export interface AnalyzeOutput {
  valid: boolean;
  contracts: ContractSummary[];
  errors: string[];
  warnings: string[];
}

/**
 * Run the immutable validator on one contract of a lowered source unit
 */
export function validateContract(unit: SourceUnitModel, contract: ContractDefinition): Diagnostic[] {
  const reporter = new ErrorReporter();
  new ImmutableValidator(unit, contract, reporter).analyze();
  return [...reporter.diagnostics];
}

/**
 * Parse and lower a Solidity source; errors come back as strings
 */
export function loadSourceUnit(
  source: string,
  sourceName: string
): { unit?: SourceUnitModel; errors: string[] } {
  const parseResult = parseSolidity(source);
  if (!parseResult.success || !parseResult.ast) {
    return {
      errors: parseResult.errors.map(e => {
        const location = e.line !== undefined && e.column !== undefined
          ? { line: e.line, column: e.column }
          : undefined;
        return new ParseError(e.message, location).toString();
      }),
    };
  }

  try {
    return { unit: buildSourceUnit(parseResult.ast, { sourceName }), errors: [] };
  } catch (error) {
    if (error instanceof ResolutionError) {
      return { errors: [error.toString()] };
    }
    throw error;
  }
}

/**
 * Check every selected contract of a Solidity source
 */
export function check(source: string, options: CheckOptions = {}): CheckOutput {
  const {
    sourceName = '<stdin>',
    contracts: selected,
  } = options;

  const output: CheckOutput = {
    success: true,
    reports: [],
    errors: [],
    warnings: [],
  };

  const { unit, errors } = loadSourceUnit(source, sourceName);
  if (!unit) {
    output.success = false;
    output.errors = errors;
    return output;
  }
  output.warnings.push(...unit.warnings);

  if (selected) {
    for (const name of selected) {
      if (!unit.contracts.some(c => c.name === name)) {
        output.errors.push(`Contract '${name}' not found`);
      }
    }
  }

  const targets = unit.contracts.filter(c =>
    selected ? selected.includes(c.name) : c.contractKind !== 'interface'
  );

  for (const contract of targets) {
    output.reports.push({
      contract: contract.name,
      diagnostics: validateContract(unit, contract),
    });
  }

  output.success = output.errors.length === 0 &&
    output.reports.every(r => r.diagnostics.length === 0);
  return output;
}

/**
 * Check a Solidity file. A missing file is reported in `errors`.
 */
export function checkFile(file: string, options: Omit<CheckOptions, 'sourceName'> = {}): FileCheckOutput {
  if (!existsSync(file)) {
    return {
      file,
      source: null,
      success: false,
      reports: [],
      errors: [`File not found: ${file}`],
      warnings: [],
    };
  }

  const source = readFileSync(file, 'utf-8');
  return { file, source, ...check(source, { ...options, sourceName: file }) };
}

/**
 * Structure of every contract as the validator sees it
 */
export function analyze(source: string, options: Pick<CheckOptions, 'sourceName'> = {}): AnalyzeOutput {
  const { unit, errors } = loadSourceUnit(source, options.sourceName ?? '<stdin>');
  if (!unit) {
    return { valid: false, contracts: [], errors, warnings: [] };
  }

  return {
    valid: true,
    contracts: unit.contracts.map(contract => ({
      name: contract.name,
      kind: contract.contractKind,
      linearization: contract.linearizedBaseContracts.map(c => c.name),
      immutables: stateVariablesIncludingInherited(contract)
        .filter(v => v.isImmutable)
        .map(v => v.name),
      hasConstructor: contract.constructorDefinition !== null,
    })),
    errors: [],
    warnings: unit.warnings,
  };
}
