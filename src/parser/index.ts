export {
  parseSolidity,
  extractContracts,
  isParserNode,
  isNodeType,
  childNodes,
  toSourceLocation,
} from './solidity-parser.js';

export type {
  SourceUnit,
  ASTNode,
  ASTNodeType,
  NodeOf,
  ContractDefinition,
  ParserNode,
  ParserLocation,
  ParseResult,
  ParseError,
  ParseOptions,
} from './solidity-parser.js';
