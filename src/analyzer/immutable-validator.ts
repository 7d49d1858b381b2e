/**
 * Immutable Validator
 *
 * Checks that every immutable state variable of a contract is assigned
 * exactly once, unconditionally, in the constructor of the contract that
 * declares it, and is never read while the contract is being constructed.
 *
 * Traversal order mirrors construction order:
 * 1. State variable initializers (inherited ones included)
 * 2. For each contract of the linearization, most-base first: its
 *    constructor and the arguments it passes to base constructors, then the
 *    functions and modifiers it defines that were not reached yet
 * 3. A final completeness check for the implicit end of construction
 *
 * Calls are followed through the statically resolved call graph; virtual
 * functions and modifiers resolve to their final override in the contract
 * under analysis. Each callable is analysed once, under the context of the
 * first call site that reaches it.
 */

import type {
  Block,
  CallableDeclaration,
  ContractDefinition,
  Declaration,
  DeclarationId,
  Expression,
  FunctionDefinition,
  Identifier,
  MemberAccess,
  ModifierInvocation,
  SourceLocation,
  SourceUnitModel,
  Statement,
  VariableDeclaration,
} from '../types/ast.js';
import { isCallableDeclaration, stateVariablesIncludingInherited } from '../types/ast.js';
import type { ErrorReporter } from '../utils/error-reporter.js';
import { assertInvariant, InternalCompilerError } from '../utils/errors.js';

/** Threaded through every recursive call; never mutated */
export interface TraversalContext {
  /** Constructor whose body is being analysed, null inside any other callable */
  readonly currentConstructor: FunctionDefinition | null;
  /** Code that runs while the contract is being created */
  readonly inConstructionContext: boolean;
  readonly inBranch: boolean;
  readonly inLoop: boolean;
}

const OUTSIDE_CONSTRUCTION: TraversalContext = {
  currentConstructor: null,
  inConstructionContext: false,
  inBranch: false,
  inLoop: false,
};

const CONSTRUCTION: TraversalContext = { ...OUTSIDE_CONSTRUCTION, inConstructionContext: true };

export class ImmutableValidator {
  private readonly initializedVariables = new Set<DeclarationId>();
  private readonly visitedCallables = new Set<DeclarationId>();
  /** Initialized, but so far only inside a branch or a loop */
  private readonly conditionallyInitialized = new Set<DeclarationId>();

  constructor(
    private readonly unit: SourceUnitModel,
    private readonly contract: ContractDefinition,
    private readonly reporter: ErrorReporter
  ) {}

  /**
   * Run the analysis. Call once per instance.
   */
  analyze(): void {
    for (const variable of stateVariablesIncludingInherited(this.contract)) {
      if (!variable.value) continue;
      this.visitExpression(variable.value, CONSTRUCTION);
      assertInvariant(
        !this.initializedVariables.has(variable.id),
        `State variable '${variable.name}' has more than one initializer`
      );
      this.initializedVariables.add(variable.id);
    }

    const bases = [...this.contract.linearizedBaseContracts].reverse();
    for (const contract of bases) {
      const ctor = contract.constructorDefinition;
      if (ctor) {
        this.visitedCallables.add(ctor.id);
        this.analyseCallable(ctor, CONSTRUCTION);
      }

      for (const spec of contract.baseContracts) {
        this.visitExpressions(spec.arguments ?? [], CONSTRUCTION);
      }

      for (const fn of contract.definedFunctions) {
        this.visitIfUnvisited(fn, OUTSIDE_CONSTRUCTION);
      }
      for (const modifier of contract.definedModifiers) {
        this.visitIfUnvisited(modifier, OUTSIDE_CONSTRUCTION);
      }
    }

    this.checkAllVariablesInitialized(this.contract.location);
  }

  // ─── Callables ───────────────────────────────────────────────────────

  private visitIfUnvisited(callable: CallableDeclaration, ctx: TraversalContext): void {
    if (this.visitedCallables.has(callable.id)) return;
    this.visitedCallables.add(callable.id);
    this.analyseCallable(callable, ctx);
  }

  /**
   * Analyse modifiers and body of a callable. The caller marks it visited
   * first so that recursive calls stop here.
   */
  private analyseCallable(callable: CallableDeclaration, ctx: TraversalContext): void {
    switch (callable.nodeType) {
      case 'FunctionDefinition': {
        const inner: TraversalContext = {
          ...ctx,
          currentConstructor: callable.isConstructor ? callable : null,
        };
        for (const invocation of callable.modifiers) {
          this.visitModifierInvocation(invocation, inner);
        }
        if (callable.body) this.visitBlock(callable.body, inner);
        return;
      }
      case 'ModifierDefinition': {
        const inner: TraversalContext = { ...ctx, currentConstructor: null };
        if (callable.body) this.visitBlock(callable.body, inner);
        return;
      }
      default: {
        const unreachable: never = callable;
        throw new InternalCompilerError(`Unknown callable ${JSON.stringify(unreachable)}`);
      }
    }
  }

  /**
   * The callable that runs when `callable` is invoked through virtual
   * dispatch from the contract under analysis.
   */
  findFinalOverride(callable: CallableDeclaration): CallableDeclaration {
    if (!callable.virtualSemantics) return callable;

    const bases = this.contract.linearizedBaseContracts;
    switch (callable.nodeType) {
      case 'FunctionDefinition': {
        const origin = callable;
        for (const contract of bases) {
          const match = contract.definedFunctions.find(fn =>
            fn.name === origin.name &&
            sameTypes(fn.parameterTypes, origin.parameterTypes) &&
            sameTypes(fn.returnParameterTypes, origin.returnParameterTypes)
          );
          if (match) return match;
        }
        return callable;
      }
      case 'ModifierDefinition': {
        const name = callable.name;
        for (const contract of bases) {
          const match = contract.definedModifiers.find(m => m.name === name);
          if (match) return match;
        }
        return callable;
      }
      default: {
        const unreachable: never = callable;
        throw new InternalCompilerError(`Unknown callable ${JSON.stringify(unreachable)}`);
      }
    }
  }

  // ─── Statements ──────────────────────────────────────────────────────

  private visitBlock(block: Block, ctx: TraversalContext): void {
    for (const statement of block.statements) {
      this.visitStatement(statement, ctx);
    }
  }

  private visitStatement(statement: Statement, ctx: TraversalContext): void {
    switch (statement.nodeType) {
      case 'Block':
        this.visitBlock(statement, ctx);
        return;

      case 'IfStatement': {
        this.visitExpression(statement.condition, ctx);
        const branch: TraversalContext = { ...ctx, inBranch: true };
        this.visitStatement(statement.trueBody, branch);
        if (statement.falseBody) this.visitStatement(statement.falseBody, branch);
        return;
      }

      case 'WhileStatement': {
        const loop: TraversalContext = { ...ctx, inLoop: true };
        this.visitExpression(statement.condition, loop);
        this.visitStatement(statement.body, loop);
        return;
      }

      case 'ForStatement': {
        if (statement.initialization) this.visitStatement(statement.initialization, ctx);
        const loop: TraversalContext = { ...ctx, inLoop: true };
        if (statement.condition) this.visitExpression(statement.condition, loop);
        this.visitStatement(statement.body, loop);
        if (statement.loopExpression) this.visitExpression(statement.loopExpression, loop);
        return;
      }

      case 'Return':
        if (statement.expression) this.visitExpression(statement.expression, ctx);
        // Every return from a constructor ends construction
        if (ctx.currentConstructor) {
          this.checkAllVariablesInitialized(statement.location);
        }
        return;

      case 'ExpressionStatement':
        this.visitExpression(statement.expression, ctx);
        return;

      case 'VariableDeclarationStatement':
        if (statement.initialValue) this.visitExpression(statement.initialValue, ctx);
        return;

      case 'GenericStatement':
        for (const child of statement.children) {
          if (isStatement(child)) {
            this.visitStatement(child, ctx);
          } else {
            this.visitExpression(child, ctx);
          }
        }
        return;

      default: {
        const unreachable: never = statement;
        throw new InternalCompilerError(`Unknown statement ${JSON.stringify(unreachable)}`);
      }
    }
  }

  // ─── Expressions ─────────────────────────────────────────────────────

  private visitExpressions(expressions: (Expression | null)[], ctx: TraversalContext): void {
    for (const expression of expressions) {
      if (expression) this.visitExpression(expression, ctx);
    }
  }

  private visitExpression(expression: Expression, ctx: TraversalContext): void {
    switch (expression.nodeType) {
      case 'Identifier':
        this.visitIdentifier(expression, ctx);
        return;
      case 'MemberAccess':
        this.visitMemberAccess(expression, ctx);
        return;
      case 'Assignment':
        this.visitExpression(expression.leftHandSide, ctx);
        this.visitExpression(expression.rightHandSide, ctx);
        return;
      case 'UnaryOperation':
        this.visitExpression(expression.subExpression, ctx);
        return;
      case 'BinaryOperation':
        this.visitExpression(expression.left, ctx);
        this.visitExpression(expression.right, ctx);
        return;
      case 'FunctionCall':
        this.visitExpression(expression.expression, ctx);
        this.visitExpressions(expression.arguments, ctx);
        return;
      case 'IndexAccess':
        this.visitExpressions([expression.base, expression.index], ctx);
        return;
      case 'Conditional':
        this.visitExpressions(
          [expression.condition, expression.trueExpression, expression.falseExpression],
          ctx
        );
        return;
      case 'TupleExpression':
        this.visitExpressions(expression.components, ctx);
        return;
      case 'Literal':
        return;
      case 'GenericExpression':
        this.visitExpressions(expression.children, ctx);
        return;
      default: {
        const unreachable: never = expression;
        throw new InternalCompilerError(`Unknown expression ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private visitModifierInvocation(invocation: ModifierInvocation, ctx: TraversalContext): void {
    this.visitIdentifier(invocation.name, ctx);
    this.visitExpressions(invocation.arguments ?? [], ctx);
  }

  private visitMemberAccess(memberAccess: MemberAccess, ctx: TraversalContext): void {
    this.visitExpression(memberAccess.expression, ctx);

    const functionType = memberAccess.annotation.functionType;
    if (!functionType || functionType.declaration === null) return;
    if (functionType.kind !== 'internal' && functionType.kind !== 'declaration') return;

    // Qualified calls bypass virtual dispatch
    const declaration = this.declaration(functionType.declaration);
    if (isCallableDeclaration(declaration)) {
      this.visitIfUnvisited(declaration, ctx);
    }
  }

  private visitIdentifier(identifier: Identifier, ctx: TraversalContext): void {
    const referenced = identifier.annotation.referencedDeclaration;
    if (referenced === null) return;
    const declaration = this.declaration(referenced);

    if (isCallableDeclaration(declaration)) {
      this.visitIfUnvisited(this.findFinalOverride(declaration), ctx);
      return;
    }

    if (
      declaration.nodeType !== 'VariableDeclaration' ||
      !declaration.isStateVariable ||
      !declaration.isImmutable
    ) {
      return;
    }

    if (identifier.annotation.lValueRequested && identifier.annotation.ordinaryLAssignment) {
      this.checkAssignment(identifier, declaration, ctx);
    } else if (ctx.inConstructionContext) {
      this.reporter.typeError('ReadBeforeOrOutsideInit', identifier.location);
    }
  }

  // ─── Initialization rules ────────────────────────────────────────────

  private checkAssignment(identifier: Identifier, variable: VariableDeclaration, ctx: TraversalContext): void {
    const location = identifier.location;

    if (!ctx.currentConstructor) {
      this.reporter.typeError('NotInConstructor', location);
    } else if (ctx.currentConstructor.scope !== variable.scope) {
      this.reporter.typeError('WrongContract', location);
    }
    if (ctx.inLoop) {
      this.reporter.typeError('InLoop', location);
    }
    if (ctx.inBranch) {
      this.reporter.typeError('InBranch', location);
    }

    const wasInitialized = this.isInitialized(variable);
    if (this.initializedVariables.has(variable.id)) {
      this.reporter.typeError('DoubleInitialization', location);
    } else {
      this.initializedVariables.add(variable.id);
    }

    if (ctx.inBranch || ctx.inLoop) {
      if (!wasInitialized) this.conditionallyInitialized.add(variable.id);
    } else {
      this.conditionallyInitialized.delete(variable.id);
    }
  }

  /** Assigned on every path reaching this point */
  private isInitialized(variable: VariableDeclaration): boolean {
    return this.initializedVariables.has(variable.id) && !this.conditionallyInitialized.has(variable.id);
  }

  private checkAllVariablesInitialized(location: SourceLocation): void {
    for (const variable of stateVariablesIncludingInherited(this.contract)) {
      if (variable.isImmutable && !this.isInitialized(variable)) {
        this.reporter.typeError('IncompleteInitialization', location, [
          { message: 'Not initialized: ', location: variable.location },
        ]);
      }
    }
  }

  private declaration(id: DeclarationId): Declaration {
    const declaration = this.unit.declarations.get(id);
    if (!declaration) {
      throw new InternalCompilerError(`Reference to unknown declaration #${id}`);
    }
    return declaration;
  }
}

function sameTypes(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((t, i) => t === b[i]);
}

function isStatement(node: Statement | Expression): node is Statement {
  switch (node.nodeType) {
    case 'Block':
    case 'IfStatement':
    case 'WhileStatement':
    case 'ForStatement':
    case 'Return':
    case 'ExpressionStatement':
    case 'VariableDeclarationStatement':
    case 'GenericStatement':
      return true;
    default:
      return false;
  }
}
