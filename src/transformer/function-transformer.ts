/**
 * Function Transformer
 * Lowers function, modifier and constructor bodies. Local variables are
 * block scoped; parameters live in the scope of the whole callable.
 */

import type {
  Block,
  Expression,
  ModifierInvocation,
  Statement,
  VariableDeclaration,
} from '../types/ast.js';
import { childNodes, isNodeType, isParserNode } from '../parser/solidity-parser.js';
import type { NodeOf, ParserNode } from '../parser/solidity-parser.js';
import type { TransformContext } from './context.js';
import { declareLocal, locationOf, withScope } from './context.js';
import { transformExpression, transformIdentifier } from './expression-transformer.js';
import { canonicalTypeName } from './type-names.js';

const STATEMENT_TYPES = new Set([
  'Block',
  'UncheckedStatement',
  'IfStatement',
  'WhileStatement',
  'DoWhileStatement',
  'ForStatement',
  'ReturnStatement',
  'ExpressionStatement',
  'VariableDeclarationStatement',
  'EmitStatement',
  'RevertStatement',
  'TryStatement',
  'CatchClause',
  'BreakStatement',
  'ContinueStatement',
  'ThrowStatement',
  'PlaceholderStatement',
]);

/** Yul and type nodes carry nothing the validator looks at */
const OPAQUE_TYPES = new Set(['InlineAssemblyStatement', 'ElementaryTypeName', 'UserDefinedTypeName', 'Mapping']);

/**
 * Declare parameters in the current scope
 */
export function declareParameters(
  params: ParserNode[] | null | undefined,
  ctx: TransformContext
): VariableDeclaration[] {
  return (params ?? []).map(param => declareVariable(param, ctx));
}

function declareVariable(node: ParserNode, ctx: TransformContext): VariableDeclaration {
  if (isNodeType(node, 'VariableDeclaration')) {
    return declareLocal(ctx, node.name, canonicalTypeName(node.typeName), locationOf(ctx, node));
  }
  return declareLocal(ctx, null, '', locationOf(ctx, node));
}

/**
 * Lower a callable body; null stays null for unimplemented callables
 */
export function transformBody(body: ParserNode | null | undefined, ctx: TransformContext): Block | null {
  if (!isParserNode(body)) return null;
  const statement = transformStatement(body, ctx);
  if (statement.nodeType === 'Block') return statement;
  return { nodeType: 'Block', statements: [statement], unchecked: false, location: statement.location };
}

export function transformModifierInvocation(
  node: NodeOf<'ModifierInvocation'>,
  ctx: TransformContext
): ModifierInvocation {
  const args: unknown[] | null = node.arguments;
  return {
    nodeType: 'ModifierInvocation',
    name: transformIdentifier(node.name, node, ctx),
    arguments: args ? args.filter(isParserNode).map(arg => transformExpression(arg, ctx)) : null,
    location: locationOf(ctx, node),
  };
}

export function transformStatement(node: ParserNode, ctx: TransformContext): Statement {
  const location = locationOf(ctx, node);

  if (isNodeType(node, 'Block')) {
    const statements = node.statements;
    return withScope<Statement>(ctx, () => ({
      nodeType: 'Block',
      statements: statements.map(s => transformStatement(s, ctx)),
      unchecked: false,
      location,
    }));
  }

  if (isNodeType(node, 'UncheckedStatement')) {
    const block = transformStatement(node.block, ctx);
    const statements = block.nodeType === 'Block' ? block.statements : [block];
    return { nodeType: 'Block', statements, unchecked: true, location };
  }

  if (isNodeType(node, 'IfStatement')) {
    const falseBody: unknown = node.falseBody;
    return {
      nodeType: 'IfStatement',
      condition: transformExpression(node.condition, ctx),
      trueBody: transformNestedStatement(node.trueBody, ctx),
      falseBody: isParserNode(falseBody) ? transformNestedStatement(falseBody, ctx) : null,
      location,
    };
  }

  if (isNodeType(node, 'WhileStatement')) {
    return {
      nodeType: 'WhileStatement',
      condition: transformExpression(node.condition, ctx),
      body: transformNestedStatement(node.body, ctx),
      isDoWhile: false,
      location,
    };
  }

  if (isNodeType(node, 'DoWhileStatement')) {
    return {
      nodeType: 'WhileStatement',
      condition: transformExpression(node.condition, ctx),
      body: transformNestedStatement(node.body, ctx),
      isDoWhile: true,
      location,
    };
  }

  if (isNodeType(node, 'ForStatement')) {
    const init: unknown = node.initExpression;
    const condition: unknown = node.conditionExpression;
    const loop: unknown = node.loopExpression;
    const body = node.body;
    return withScope<Statement>(ctx, () => {
      return {
        nodeType: 'ForStatement',
        initialization: isParserNode(init) ? transformStatement(init, ctx) : null,
        condition: isParserNode(condition) ? transformExpression(condition, ctx) : null,
        loopExpression: isParserNode(loop) ? loopExpressionOf(loop, ctx) : null,
        body: transformNestedStatement(body, ctx),
        location,
      };
    });
  }

  if (isNodeType(node, 'ReturnStatement')) {
    const expression: unknown = node.expression;
    return {
      nodeType: 'Return',
      expression: isParserNode(expression) ? transformExpression(expression, ctx) : null,
      location,
    };
  }

  if (isNodeType(node, 'ExpressionStatement')) {
    const expression: unknown = node.expression;
    if (!isParserNode(expression)) {
      return { nodeType: 'GenericStatement', parserType: node.type, children: [], location };
    }
    return { nodeType: 'ExpressionStatement', expression: transformExpression(expression, ctx), location };
  }

  if (isNodeType(node, 'VariableDeclarationStatement')) {
    // The initializer is resolved before the new names come into scope
    const initialValue: unknown = node.initialValue;
    const value = isParserNode(initialValue) ? transformExpression(initialValue, ctx) : null;
    const variables: unknown[] = node.variables;
    return {
      nodeType: 'VariableDeclarationStatement',
      declarations: variables.map(v => (isParserNode(v) ? declareVariable(v, ctx) : null)),
      initialValue: value,
      location,
    };
  }

  if (OPAQUE_TYPES.has(node.type)) {
    return { nodeType: 'GenericStatement', parserType: node.type, children: [], location };
  }

  // emit, revert, try/catch, break, continue, placeholder: walk children in order
  const parserType = node.type;
  return withScope<Statement>(ctx, () => ({
    nodeType: 'GenericStatement',
    parserType,
    children: transformChildren(node, ctx),
    location,
  }));
}

/**
 * A statement that is the direct body of an if or a loop gets its own scope
 * even when it is not a block.
 */
function transformNestedStatement(node: ParserNode, ctx: TransformContext): Statement {
  return withScope(ctx, () => transformStatement(node, ctx));
}

function loopExpressionOf(node: ParserNode, ctx: TransformContext): Expression | null {
  if (isNodeType(node, 'ExpressionStatement')) {
    const expression: unknown = node.expression;
    return isParserNode(expression) ? transformExpression(expression, ctx) : null;
  }
  return transformExpression(node, ctx);
}

function transformChildren(node: ParserNode, ctx: TransformContext): (Statement | Expression)[] {
  const children: (Statement | Expression)[] = [];
  for (const child of childNodes(node)) {
    if (isNodeType(child, 'VariableDeclaration')) {
      declareVariable(child, ctx);
    } else if (OPAQUE_TYPES.has(child.type)) {
      continue;
    } else if (STATEMENT_TYPES.has(child.type)) {
      children.push(transformStatement(child, ctx));
    } else {
      children.push(transformExpression(child, ctx));
    }
  }
  return children;
}
