/**
 * Solidity Parser Wrapper
 * Parses Solidity source code into AST using @solidity-parser/parser
 */

import * as parser from '@solidity-parser/parser';
import type { SourceLocation } from '../types/ast.js';

export type SourceUnit = ReturnType<typeof parser.parse>;
export type ASTNode = SourceUnit['children'][number];
export type ASTNodeType = ASTNode['type'];
export type NodeOf<T extends ASTNodeType> = Extract<ASTNode, { type: T }>;
export type ContractDefinition = NodeOf<'ContractDefinition'>;

export interface ParserLocation {
  start: { line: number; column: number };
  end: { line: number; column: number };
}

/** The part every parser node has in common */
export interface ParserNode {
  type: string;
  loc?: ParserLocation;
  range?: [number, number];
}

export interface ParseResult {
  success: boolean;
  ast?: SourceUnit;
  errors: ParseError[];
}

export interface ParseError {
  message: string;
  line?: number;
  column?: number;
}

export interface ParseOptions {
  tolerant?: boolean;
}

/**
 * Parse Solidity source code into AST
 */
export function parseSolidity(source: string, options: ParseOptions = {}): ParseResult {
  try {
    const ast = parser.parse(source, {
      tolerant: options.tolerant ?? false,
      range: true,
      loc: true,
    });

    return {
      success: true,
      ast,
      errors: [],
    };
  } catch (error) {
    if (error instanceof parser.ParserError) {
      return {
        success: false,
        errors: error.errors.map(e => ({
          message: e.message,
          line: e.line,
          column: e.column,
        })),
      };
    }

    return {
      success: false,
      errors: [{
        message: error instanceof Error ? error.message : 'Unknown parse error',
      }],
    };
  }
}

/**
 * Extract all contract definitions from a parsed AST
 */
export function extractContracts(ast: SourceUnit): ContractDefinition[] {
  return ast.children.filter(
    (node): node is ContractDefinition => node.type === 'ContractDefinition'
  );
}

export function isParserNode(value: unknown): value is ParserNode {
  return typeof value === 'object' && value !== null && 'type' in value && typeof value.type === 'string';
}

export function isNodeType<T extends ASTNodeType>(
  node: ParserNode | null | undefined,
  type: T
): node is NodeOf<T> {
  return node !== null && node !== undefined && node.type === type;
}

/**
 * Direct child nodes of a parser node, in property order.
 * Location and range data are skipped.
 */
export function childNodes(node: ParserNode): ParserNode[] {
  const children: ParserNode[] = [];
  for (const [key, value] of Object.entries(node)) {
    if (key === 'loc' || key === 'range') continue;
    const candidates: unknown[] = Array.isArray(value) ? value : [value];
    for (const candidate of candidates) {
      if (isParserNode(candidate)) children.push(candidate);
    }
  }
  return children;
}

/**
 * Convert parser position data into a SourceLocation
 */
export function toSourceLocation(node: ParserNode, sourceName: string): SourceLocation {
  const start = node.range ? node.range[0] : 0;
  const end = node.range ? node.range[1] + 1 : start;
  return {
    sourceName,
    start,
    end,
    line: node.loc ? node.loc.start.line : 0,
    column: node.loc ? node.loc.start.column + 1 : 0,
  };
}
