/**
 * Contract Transformer
 * Builds the annotated source unit model from a parsed Solidity AST:
 * declares every contract and member, links bases, computes linearizations,
 * then lowers bodies and initializers with names resolved.
 */

import type {
  ContractDefinition,
  ContractKind,
  FunctionDefinition,
  FunctionKind,
  ModifierDefinition,
  SourceUnitModel,
  VariableDeclaration,
  Visibility,
} from '../types/ast.js';
import { extractContracts, isNodeType, isParserNode } from '../parser/solidity-parser.js';
import type { NodeOf, ParserNode, SourceUnit } from '../parser/solidity-parser.js';
import { linearize } from '../analyzer/linearization.js';
import { ResolutionError } from '../utils/errors.js';
import type { TransformContext } from './context.js';
import { allocateId, createContext, locationOf, register, withScope } from './context.js';
import { transformExpression } from './expression-transformer.js';
import {
  declareParameters,
  transformBody,
  transformModifierInvocation,
} from './function-transformer.js';
import { canonicalTypeName } from './type-names.js';

export interface BuildOptions {
  /** Name used in source locations */
  sourceName?: string;
}

type ParsedContract = NodeOf<'ContractDefinition'>;
type ParsedFunction = NodeOf<'FunctionDefinition'>;
type ParsedModifier = NodeOf<'ModifierDefinition'>;

/** Parser nodes whose lowering waits until every declaration is known */
interface PendingBodies {
  contract: ContractDefinition | null;
  initializers: { variable: VariableDeclaration; node: ParserNode }[];
  functions: { model: FunctionDefinition; node: ParsedFunction }[];
  modifiers: { model: ModifierDefinition; node: ParsedModifier }[];
  inheritance: { index: number; args: ParserNode[] }[];
}

/**
 * Transform a parsed source unit into the annotated model
 */
export function buildSourceUnit(ast: SourceUnit, options: BuildOptions = {}): SourceUnitModel {
  const ctx = createContext(options.sourceName ?? '<stdin>');
  const parsed = extractContracts(ast);

  // Phase 1: contracts by name
  const contracts = parsed.map(node => declareContract(node, ctx));

  // Phase 2: bases and linearization
  parsed.forEach((node, i) => resolveBases(node, contracts[i], ctx));
  for (const contract of contracts) {
    const order = linearize(contract.name, {
      bases: name => {
        const c = ctx.contractsByName.get(name);
        return c ? c.baseContracts.flatMap(spec => (spec.baseContract === null ? [] : [spec.baseName])) : [];
      },
    });
    contract.linearizedBaseContracts = order.flatMap(name => {
      const c = ctx.contractsByName.get(name);
      return c ? [c] : [];
    });
  }

  // Phase 3: members
  const pending = parsed.map((node, i) => declareMembers(node, contracts[i], ctx));
  pending.push(declareFreeFunctions(ast, ctx));

  // Phase 4: bodies
  for (const p of pending) {
    lowerBodies(p, ctx);
  }

  return {
    sourceName: ctx.sourceName,
    contracts,
    freeFunctions: ctx.freeFunctions,
    declarations: ctx.declarations,
    warnings: ctx.warnings,
  };
}

function declareContract(node: ParsedContract, ctx: TransformContext): ContractDefinition {
  if (ctx.contractsByName.has(node.name)) {
    throw new ResolutionError(`Identifier already declared: ${node.name}`, node.loc?.start);
  }

  const contract = register<ContractDefinition>(ctx, {
    nodeType: 'ContractDefinition',
    id: allocateId(ctx),
    name: node.name,
    contractKind: toContractKind(node.kind),
    location: locationOf(ctx, node),
    baseContracts: [],
    linearizedBaseContracts: [],
    stateVariables: [],
    definedFunctions: [],
    definedModifiers: [],
    constructorDefinition: null,
  });
  ctx.contractsByName.set(contract.name, contract);
  return contract;
}

function resolveBases(node: ParsedContract, contract: ContractDefinition, ctx: TransformContext): void {
  for (const spec of node.baseContracts) {
    const path = spec.baseName.namePath.split('.');
    const baseName = path[path.length - 1];
    const base = ctx.contractsByName.get(baseName);
    if (!base) {
      ctx.warnings.push(`Base contract '${spec.baseName.namePath}' of '${contract.name}' is not defined in this source; it is ignored`);
    } else if (base === contract) {
      throw new ResolutionError(`Contract '${contract.name}' cannot inherit from itself`, spec.loc?.start);
    }
    contract.baseContracts.push({
      baseName,
      baseContract: base ? base.id : null,
      arguments: null,
      location: locationOf(ctx, spec),
    });
  }
}

function declareMembers(node: ParsedContract, contract: ContractDefinition, ctx: TransformContext): PendingBodies {
  const pending: PendingBodies = {
    contract,
    initializers: [],
    functions: [],
    modifiers: [],
    inheritance: [],
  };

  node.baseContracts.forEach((spec, index) => {
    const args: unknown[] = spec.arguments;
    if (args.length > 0) {
      pending.inheritance.push({ index, args: args.filter(isParserNode) });
    }
  });

  for (const sub of node.subNodes) {
    if (isNodeType(sub, 'StateVariableDeclaration')) {
      const initialValue: unknown = sub.initialValue;
      for (const variable of sub.variables) {
        const model = register<VariableDeclaration>(ctx, {
          nodeType: 'VariableDeclaration',
          id: allocateId(ctx),
          name: variable.name ?? '',
          location: locationOf(ctx, variable),
          typeName: canonicalTypeName(variable.typeName),
          isStateVariable: true,
          isImmutable: variable.isImmutable,
          isConstant: variable.isDeclaredConst === true,
          value: null,
          scope: contract.id,
        });
        contract.stateVariables.push(model);
        if (isParserNode(initialValue)) {
          pending.initializers.push({ variable: model, node: initialValue });
        }
      }
    } else if (isNodeType(sub, 'FunctionDefinition')) {
      const fn = declareFunction(sub, contract, ctx);
      contract.definedFunctions.push(fn);
      if (fn.isConstructor) contract.constructorDefinition = fn;
      pending.functions.push({ model: fn, node: sub });
    } else if (isNodeType(sub, 'ModifierDefinition')) {
      const modifier = register<ModifierDefinition>(ctx, {
        nodeType: 'ModifierDefinition',
        id: allocateId(ctx),
        name: sub.name,
        location: locationOf(ctx, sub),
        scope: contract.id,
        virtualSemantics: sub.isVirtual || contract.contractKind === 'interface',
        body: null,
      });
      contract.definedModifiers.push(modifier);
      pending.modifiers.push({ model: modifier, node: sub });
    }
  }

  return pending;
}

function declareFreeFunctions(ast: SourceUnit, ctx: TransformContext): PendingBodies {
  const pending: PendingBodies = {
    contract: null,
    initializers: [],
    functions: [],
    modifiers: [],
    inheritance: [],
  };
  for (const node of ast.children) {
    if (isNodeType(node, 'FunctionDefinition')) {
      const fn = declareFunction(node, null, ctx);
      ctx.freeFunctions.push(fn);
      pending.functions.push({ model: fn, node });
    }
  }
  return pending;
}

function declareFunction(
  node: ParsedFunction,
  contract: ContractDefinition | null,
  ctx: TransformContext
): FunctionDefinition {
  const kind = functionKindOf(node, contract);
  const returnParameters: ParserNode[] = node.returnParameters ?? [];
  return register<FunctionDefinition>(ctx, {
    nodeType: 'FunctionDefinition',
    id: allocateId(ctx),
    name: kind === 'function' || kind === 'freeFunction' ? node.name ?? '' : kind,
    location: locationOf(ctx, node),
    scope: contract ? contract.id : null,
    functionKind: kind,
    isConstructor: kind === 'constructor',
    visibility: toVisibility(node.visibility),
    virtualSemantics: contract !== null && (node.isVirtual || contract.contractKind === 'interface'),
    parameterTypes: node.parameters.map(p => canonicalTypeName(p.typeName)),
    returnParameterTypes: returnParameters.map(p => (isNodeType(p, 'VariableDeclaration') ? canonicalTypeName(p.typeName) : '')),
    modifiers: [],
    body: null,
  });
}

function lowerBodies(pending: PendingBodies, ctx: TransformContext): void {
  ctx.currentContract = pending.contract;
  try {
    for (const { variable, node } of pending.initializers) {
      variable.value = transformExpression(node, ctx);
    }

    const contract = pending.contract;
    if (contract) {
      for (const { index, args } of pending.inheritance) {
        contract.baseContracts[index].arguments = args.map(arg => transformExpression(arg, ctx));
      }
    }

    for (const { model, node } of pending.functions) {
      withScope(ctx, () => {
        declareParameters(node.parameters, ctx);
        declareParameters(node.returnParameters, ctx);
        model.modifiers = node.modifiers.map(m => transformModifierInvocation(m, ctx));
        model.body = transformBody(node.body, ctx);
      });
    }

    for (const { model, node } of pending.modifiers) {
      withScope(ctx, () => {
        declareParameters(node.parameters, ctx);
        model.body = transformBody(node.body, ctx);
      });
    }
  } finally {
    ctx.currentContract = null;
  }
}

function functionKindOf(node: ParsedFunction, contract: ContractDefinition | null): FunctionKind {
  if (!contract) return 'freeFunction';
  if (node.isConstructor) return 'constructor';
  if (node.isReceiveEther) return 'receive';
  if (node.isFallback) return 'fallback';
  return 'function';
}

function toContractKind(kind: string): ContractKind {
  switch (kind) {
    case 'abstract':
    case 'interface':
    case 'library':
      return kind;
    default:
      return 'contract';
  }
}

function toVisibility(visibility: string): Visibility {
  switch (visibility) {
    case 'public':
    case 'external':
    case 'internal':
    case 'private':
      return visibility;
    default:
      return 'default';
  }
}
