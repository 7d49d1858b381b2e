/**
 * Expression Transformer
 * Lowers parser expressions into annotated expressions: resolves identifiers,
 * marks assignment targets and computes the function type of member accesses
 * that denote internal calls.
 */

import type {
  Expression,
  FunctionTypeAnnotation,
  Identifier,
  IdentifierAnnotation,
} from '../types/ast.js';
import { childNodes, isNodeType, isParserNode } from '../parser/solidity-parser.js';
import type { NodeOf, ParserNode } from '../parser/solidity-parser.js';
import type { TransformContext } from './context.js';
import { findFunction, locationOf, resolveName } from './context.js';

export interface LValueMode {
  requested: boolean;
  ordinary: boolean;
}

const NOT_LVALUE: LValueMode = { requested: false, ordinary: false };
const ORDINARY_LVALUE: LValueMode = { requested: true, ordinary: true };
const COMPOUND_LVALUE: LValueMode = { requested: true, ordinary: false };

const ASSIGNMENT_OPERATORS = new Set([
  '=', '|=', '^=', '&=', '<<=', '>>=', '+=', '-=', '*=', '/=', '%=',
]);

const MUTATING_UNARY_OPERATORS = new Set(['++', '--', 'delete']);

/**
 * Transform a parser expression.
 * `argCount` is set when the expression is the callee of a call, so that
 * overloaded functions can be told apart.
 */
export function transformExpression(
  node: ParserNode,
  ctx: TransformContext,
  lvalue: LValueMode = NOT_LVALUE,
  argCount?: number
): Expression {
  const location = locationOf(ctx, node);

  if (isNodeType(node, 'Identifier')) {
    return transformIdentifier(node.name, node, ctx, lvalue, argCount);
  }

  if (isNodeType(node, 'BinaryOperation')) {
    if (ASSIGNMENT_OPERATORS.has(node.operator)) {
      return {
        nodeType: 'Assignment',
        operator: node.operator,
        leftHandSide: transformExpression(
          node.left,
          ctx,
          node.operator === '=' ? ORDINARY_LVALUE : COMPOUND_LVALUE
        ),
        rightHandSide: transformExpression(node.right, ctx),
        location,
      };
    }
    return {
      nodeType: 'BinaryOperation',
      operator: node.operator,
      left: transformExpression(node.left, ctx),
      right: transformExpression(node.right, ctx),
      location,
    };
  }

  if (isNodeType(node, 'UnaryOperation')) {
    const mode = MUTATING_UNARY_OPERATORS.has(node.operator) ? COMPOUND_LVALUE : NOT_LVALUE;
    return {
      nodeType: 'UnaryOperation',
      operator: node.operator,
      isPrefix: node.isPrefix,
      subExpression: transformExpression(node.subExpression, ctx, mode),
      location,
    };
  }

  if (isNodeType(node, 'FunctionCall')) {
    return {
      nodeType: 'FunctionCall',
      expression: transformExpression(node.expression, ctx, NOT_LVALUE, node.arguments.length),
      arguments: node.arguments.map(arg => transformExpression(arg, ctx)),
      location,
    };
  }

  if (isNodeType(node, 'MemberAccess')) {
    return {
      nodeType: 'MemberAccess',
      expression: transformExpression(node.expression, ctx),
      memberName: node.memberName,
      annotation: { functionType: memberFunctionType(node, ctx, argCount) },
      location,
    };
  }

  if (isNodeType(node, 'IndexAccess')) {
    const index: unknown = node.index;
    return {
      nodeType: 'IndexAccess',
      base: transformExpression(node.base, ctx),
      index: isParserNode(index) ? transformExpression(index, ctx) : null,
      location,
    };
  }

  if (isNodeType(node, 'Conditional')) {
    return {
      nodeType: 'Conditional',
      condition: transformExpression(node.condition, ctx),
      trueExpression: transformExpression(node.trueExpression, ctx),
      falseExpression: transformExpression(node.falseExpression, ctx),
      location,
    };
  }

  if (isNodeType(node, 'TupleExpression')) {
    const componentMode = node.isArray ? NOT_LVALUE : lvalue;
    const components: unknown[] = node.components;
    return {
      nodeType: 'TupleExpression',
      components: components.map(c => (isParserNode(c) ? transformExpression(c, ctx, componentMode) : null)),
      isInlineArray: node.isArray,
      location,
    };
  }

  if (isNodeType(node, 'NumberLiteral')) {
    return { nodeType: 'Literal', kind: 'number', value: node.number, location };
  }
  if (isNodeType(node, 'BooleanLiteral')) {
    return { nodeType: 'Literal', kind: 'bool', value: String(node.value), location };
  }
  if (isNodeType(node, 'StringLiteral')) {
    return { nodeType: 'Literal', kind: 'string', value: node.value, location };
  }
  if (isNodeType(node, 'HexLiteral')) {
    return { nodeType: 'Literal', kind: 'hex', value: node.value, location };
  }

  return {
    nodeType: 'GenericExpression',
    parserType: node.type,
    children: childNodes(node).map(child => transformExpression(child, ctx)),
    location,
  };
}

export function transformIdentifier(
  name: string,
  node: ParserNode,
  ctx: TransformContext,
  lvalue: LValueMode = NOT_LVALUE,
  argCount?: number
): Identifier {
  const declaration = resolveName(ctx, name, argCount);
  const annotation: IdentifierAnnotation = {
    referencedDeclaration: declaration ? declaration.id : null,
    lValueRequested: lvalue.requested,
    ordinaryLAssignment: lvalue.ordinary,
  };
  return {
    nodeType: 'Identifier',
    name,
    annotation,
    location: locationOf(ctx, node),
  };
}

/**
 * Function type of `X.f` when it names a function declaration:
 * `super.f` and `Base.f` are internal calls, library functions are internal
 * or delegate calls by visibility, `this.f` is external, and a member of any
 * other contract only names the declaration.
 */
function memberFunctionType(
  node: NodeOf<'MemberAccess'>,
  ctx: TransformContext,
  argCount?: number
): FunctionTypeAnnotation | null {
  const base = node.expression;
  if (!isNodeType(base, 'Identifier')) return null;

  const current = ctx.currentContract;

  if (base.name === 'super') {
    if (!current) return null;
    const fn = findFunction(current.linearizedBaseContracts.slice(1), node.memberName, argCount);
    return fn ? { kind: 'internal', declaration: fn.id } : null;
  }

  if (base.name === 'this') {
    if (!current) return null;
    const fn = findFunction(current.linearizedBaseContracts, node.memberName, argCount);
    return fn ? { kind: 'external', declaration: fn.id } : null;
  }

  const target = ctx.contractsByName.get(base.name);
  if (!target) return null;
  // A variable or function of the same name shadows the contract
  const resolved = resolveName(ctx, base.name);
  if (resolved && resolved.id !== target.id) return null;

  const fn = findFunction(target.linearizedBaseContracts, node.memberName, argCount);
  if (!fn) return null;

  if (target.contractKind === 'library') {
    const internal = fn.visibility === 'internal' || fn.visibility === 'private';
    return { kind: internal ? 'internal' : 'delegateCall', declaration: fn.id };
  }
  if (current && current.linearizedBaseContracts.includes(target)) {
    return { kind: 'internal', declaration: fn.id };
  }
  return { kind: 'declaration', declaration: fn.id };
}
