/**
 * Transform Context
 * Shared state while lowering one source unit: the declaration arena, the
 * contract whose code is being lowered and the stack of local scopes.
 */

import type {
  ContractDefinition,
  Declaration,
  DeclarationId,
  FunctionDefinition,
  ModifierDefinition,
  SourceLocation,
  VariableDeclaration,
} from '../types/ast.js';
import { toSourceLocation } from '../parser/solidity-parser.js';
import type { ParserNode } from '../parser/solidity-parser.js';

export interface TransformContext {
  sourceName: string;
  declarations: Map<DeclarationId, Declaration>;
  contractsByName: Map<string, ContractDefinition>;
  freeFunctions: FunctionDefinition[];
  /** Contract whose code is being lowered; null at file level */
  currentContract: ContractDefinition | null;
  scopes: Map<string, VariableDeclaration>[];
  warnings: string[];
  nextId: number;
}

export function createContext(sourceName: string): TransformContext {
  return {
    sourceName,
    declarations: new Map(),
    contractsByName: new Map(),
    freeFunctions: [],
    currentContract: null,
    scopes: [],
    warnings: [],
    nextId: 1,
  };
}

export function allocateId(ctx: TransformContext): DeclarationId {
  return ctx.nextId++;
}

export function register<T extends Declaration>(ctx: TransformContext, declaration: T): T {
  ctx.declarations.set(declaration.id, declaration);
  return declaration;
}

export function locationOf(ctx: TransformContext, node: ParserNode): SourceLocation {
  return toSourceLocation(node, ctx.sourceName);
}

/**
 * Run `fn` inside a fresh local scope
 */
export function withScope<T>(ctx: TransformContext, fn: () => T): T {
  ctx.scopes.push(new Map());
  try {
    return fn();
  } finally {
    ctx.scopes.pop();
  }
}

export function declareLocal(
  ctx: TransformContext,
  name: string | null,
  typeName: string,
  location: SourceLocation
): VariableDeclaration {
  const declaration = register<VariableDeclaration>(ctx, {
    nodeType: 'VariableDeclaration',
    id: allocateId(ctx),
    name: name ?? '',
    location,
    typeName,
    isStateVariable: false,
    isImmutable: false,
    isConstant: false,
    value: null,
    scope: null,
  });

  const scope = ctx.scopes[ctx.scopes.length - 1];
  if (scope && name) scope.set(name, declaration);
  return declaration;
}

// ─── Lookup ────────────────────────────────────────────────────────────

export function lookupLocal(ctx: TransformContext, name: string): VariableDeclaration | undefined {
  for (let i = ctx.scopes.length - 1; i >= 0; i--) {
    const found = ctx.scopes[i].get(name);
    if (found) return found;
  }
  return undefined;
}

/**
 * Find a function by name in a list of contracts searched in order.
 * With an argument count, a function taking that many parameters wins over
 * one that merely shares the name.
 */
export function findFunction(
  contracts: ContractDefinition[],
  name: string,
  argCount?: number
): FunctionDefinition | undefined {
  const candidates = contracts.flatMap(c =>
    c.definedFunctions.filter(f => f.functionKind === 'function' && f.name === name)
  );
  if (argCount !== undefined) {
    const exact = candidates.find(f => f.parameterTypes.length === argCount);
    if (exact) return exact;
  }
  return candidates[0];
}

export function findModifier(contracts: ContractDefinition[], name: string): ModifierDefinition | undefined {
  for (const contract of contracts) {
    const found = contract.definedModifiers.find(m => m.name === name);
    if (found) return found;
  }
  return undefined;
}

export function findStateVariable(contracts: ContractDefinition[], name: string): VariableDeclaration | undefined {
  for (const contract of contracts) {
    const found = contract.stateVariables.find(v => v.name === name);
    if (found) return found;
  }
  return undefined;
}

/**
 * Resolve a bare name the way the language scopes it: locals innermost
 * first, then members of the current contract and its bases, then
 * file-level functions, then contracts.
 */
export function resolveName(ctx: TransformContext, name: string, argCount?: number): Declaration | undefined {
  const local = lookupLocal(ctx, name);
  if (local) return local;

  const contract = ctx.currentContract;
  if (contract) {
    const bases = contract.linearizedBaseContracts;
    const variable = findStateVariable(bases, name);
    if (variable) return variable;
    const fn = findFunction(bases, name, argCount);
    if (fn) return fn;
    const modifier = findModifier(bases, name);
    if (modifier) return modifier;
  }

  const free = findFreeFunction(ctx, name, argCount);
  if (free) return free;

  return ctx.contractsByName.get(name);
}

function findFreeFunction(ctx: TransformContext, name: string, argCount?: number): FunctionDefinition | undefined {
  const candidates = ctx.freeFunctions.filter(f => f.name === name);
  if (argCount !== undefined) {
    const exact = candidates.find(f => f.parameterTypes.length === argCount);
    if (exact) return exact;
  }
  return candidates[0];
}
