/**
 * Annotated Syntax Tree
 * The resolved, read-only view of a Solidity source unit consumed by the
 * immutable validator. Produced by the transformers from the parser AST.
 */

export type DeclarationId = number;

export interface SourceLocation {
  sourceName: string;
  /** Character offset of the first character */
  start: number;
  /** Character offset one past the last character */
  end: number;
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
}

// ─── Declarations ──────────────────────────────────────────────────────

export type ContractKind = 'contract' | 'abstract' | 'interface' | 'library';

export interface InheritanceSpecifier {
  baseName: string;
  /** Resolved base contract, null when the base is not part of this source unit */
  baseContract: DeclarationId | null;
  /** null when the specifier carries no argument list */
  arguments: Expression[] | null;
  location: SourceLocation;
}

export interface ContractDefinition {
  nodeType: 'ContractDefinition';
  id: DeclarationId;
  name: string;
  contractKind: ContractKind;
  location: SourceLocation;
  baseContracts: InheritanceSpecifier[];
  /** Most-derived first; the first entry is the contract itself */
  linearizedBaseContracts: ContractDefinition[];
  stateVariables: VariableDeclaration[];
  /** Includes constructor, fallback and receive */
  definedFunctions: FunctionDefinition[];
  definedModifiers: ModifierDefinition[];
  constructorDefinition: FunctionDefinition | null;
}

export interface VariableDeclaration {
  nodeType: 'VariableDeclaration';
  id: DeclarationId;
  name: string;
  location: SourceLocation;
  typeName: string;
  isStateVariable: boolean;
  isImmutable: boolean;
  isConstant: boolean;
  value: Expression | null;
  /** Declaring contract; null for locals, parameters and file-level items */
  scope: DeclarationId | null;
}

export type FunctionKind = 'function' | 'constructor' | 'fallback' | 'receive' | 'freeFunction';
export type Visibility = 'public' | 'external' | 'internal' | 'private' | 'default';

export interface FunctionDefinition {
  nodeType: 'FunctionDefinition';
  id: DeclarationId;
  name: string;
  location: SourceLocation;
  scope: DeclarationId | null;
  functionKind: FunctionKind;
  isConstructor: boolean;
  visibility: Visibility;
  virtualSemantics: boolean;
  parameterTypes: string[];
  returnParameterTypes: string[];
  modifiers: ModifierInvocation[];
  /** null for unimplemented functions */
  body: Block | null;
}

export interface ModifierDefinition {
  nodeType: 'ModifierDefinition';
  id: DeclarationId;
  name: string;
  location: SourceLocation;
  scope: DeclarationId | null;
  virtualSemantics: boolean;
  body: Block | null;
}

export interface ModifierInvocation {
  nodeType: 'ModifierInvocation';
  name: Identifier;
  arguments: Expression[] | null;
  location: SourceLocation;
}

/** Functions and modifiers: everything that has a body and can be invoked */
export type CallableDeclaration = FunctionDefinition | ModifierDefinition;

export type Declaration = ContractDefinition | VariableDeclaration | CallableDeclaration;

// ─── Statements ────────────────────────────────────────────────────────

export type Statement =
  | Block
  | IfStatement
  | WhileStatement
  | ForStatement
  | Return
  | ExpressionStatement
  | VariableDeclarationStatement
  | GenericStatement;

export interface Block {
  nodeType: 'Block';
  statements: Statement[];
  unchecked: boolean;
  location: SourceLocation;
}

export interface IfStatement {
  nodeType: 'IfStatement';
  condition: Expression;
  trueBody: Statement;
  falseBody: Statement | null;
  location: SourceLocation;
}

/** Covers both `while` and `do ... while` */
export interface WhileStatement {
  nodeType: 'WhileStatement';
  condition: Expression;
  body: Statement;
  isDoWhile: boolean;
  location: SourceLocation;
}

export interface ForStatement {
  nodeType: 'ForStatement';
  initialization: Statement | null;
  condition: Expression | null;
  loopExpression: Expression | null;
  body: Statement;
  location: SourceLocation;
}

export interface Return {
  nodeType: 'Return';
  expression: Expression | null;
  location: SourceLocation;
}

export interface ExpressionStatement {
  nodeType: 'ExpressionStatement';
  expression: Expression;
  location: SourceLocation;
}

export interface VariableDeclarationStatement {
  nodeType: 'VariableDeclarationStatement';
  declarations: (VariableDeclaration | null)[];
  initialValue: Expression | null;
  location: SourceLocation;
}

/**
 * Statements the validator has no rule for (emit, revert, try, placeholder,
 * break, continue, inline assembly). Children are still walked in order.
 */
export interface GenericStatement {
  nodeType: 'GenericStatement';
  parserType: string;
  children: (Statement | Expression)[];
  location: SourceLocation;
}

// ─── Expressions ───────────────────────────────────────────────────────

export type Expression =
  | Identifier
  | MemberAccess
  | Assignment
  | UnaryOperation
  | BinaryOperation
  | FunctionCall
  | IndexAccess
  | Conditional
  | TupleExpression
  | Literal
  | GenericExpression;

export interface IdentifierAnnotation {
  referencedDeclaration: DeclarationId | null;
  /** The identifier is written to */
  lValueRequested: boolean;
  /** The write is a plain `=` assignment (not `+=`, `++`, `delete`, ...) */
  ordinaryLAssignment: boolean;
}

export interface Identifier {
  nodeType: 'Identifier';
  name: string;
  annotation: IdentifierAnnotation;
  location: SourceLocation;
}

export type FunctionTypeKind = 'internal' | 'external' | 'declaration' | 'delegateCall';

export interface FunctionTypeAnnotation {
  kind: FunctionTypeKind;
  declaration: DeclarationId | null;
}

export interface MemberAccess {
  nodeType: 'MemberAccess';
  expression: Expression;
  memberName: string;
  annotation: { functionType: FunctionTypeAnnotation | null };
  location: SourceLocation;
}

export interface Assignment {
  nodeType: 'Assignment';
  operator: string;
  leftHandSide: Expression;
  rightHandSide: Expression;
  location: SourceLocation;
}

export interface UnaryOperation {
  nodeType: 'UnaryOperation';
  operator: string;
  isPrefix: boolean;
  subExpression: Expression;
  location: SourceLocation;
}

export interface BinaryOperation {
  nodeType: 'BinaryOperation';
  operator: string;
  left: Expression;
  right: Expression;
  location: SourceLocation;
}

export interface FunctionCall {
  nodeType: 'FunctionCall';
  expression: Expression;
  arguments: Expression[];
  location: SourceLocation;
}

export interface IndexAccess {
  nodeType: 'IndexAccess';
  base: Expression;
  index: Expression | null;
  location: SourceLocation;
}

export interface Conditional {
  nodeType: 'Conditional';
  condition: Expression;
  trueExpression: Expression;
  falseExpression: Expression;
  location: SourceLocation;
}

export interface TupleExpression {
  nodeType: 'TupleExpression';
  components: (Expression | null)[];
  isInlineArray: boolean;
  location: SourceLocation;
}

export interface Literal {
  nodeType: 'Literal';
  kind: 'number' | 'bool' | 'string' | 'hex';
  value: string;
  location: SourceLocation;
}

/** new T, type names used as expressions, call options, index ranges */
export interface GenericExpression {
  nodeType: 'GenericExpression';
  parserType: string;
  children: Expression[];
  location: SourceLocation;
}

// ─── Source unit ───────────────────────────────────────────────────────

export interface SourceUnitModel {
  sourceName: string;
  contracts: ContractDefinition[];
  freeFunctions: FunctionDefinition[];
  /** Arena owning every declaration of the unit */
  declarations: Map<DeclarationId, Declaration>;
  warnings: string[];
}

export function isCallableDeclaration(declaration: Declaration): declaration is CallableDeclaration {
  return declaration.nodeType === 'FunctionDefinition' || declaration.nodeType === 'ModifierDefinition';
}

/**
 * State variables visible in `contract`, most-base contract first, each in
 * declaration order.
 */
export function stateVariablesIncludingInherited(contract: ContractDefinition): VariableDeclaration[] {
  const result: VariableDeclaration[] = [];
  for (let i = contract.linearizedBaseContracts.length - 1; i >= 0; i--) {
    result.push(...contract.linearizedBaseContracts[i].stateVariables);
  }
  return result;
}
