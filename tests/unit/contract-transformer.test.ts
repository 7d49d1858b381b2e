import { describe, it, expect } from 'vitest';
import { buildSourceUnit } from '../../src/transformer/contract-transformer.js';
import { parseSolidity } from '../../src/parser/solidity-parser.js';
import { ResolutionError } from '../../src/utils/errors.js';
import type {
  ContractDefinition,
  Expression,
  FunctionDefinition,
  Identifier,
  MemberAccess,
  SourceUnitModel,
  Statement,
} from '../../src/types/ast.js';

/**
 * Helper: parse and lower a Solidity source
 */
function build(source: string): SourceUnitModel {
  const result = parseSolidity(source);
  if (!result.success || !result.ast) throw new Error('Parse failed');
  return buildSourceUnit(result.ast, { sourceName: 'Test.sol' });
}

function contractNamed(unit: SourceUnitModel, name: string): ContractDefinition {
  const contract = unit.contracts.find(c => c.name === name);
  if (!contract) throw new Error(`No contract ${name}`);
  return contract;
}

function functionNamed(contract: ContractDefinition, name: string): FunctionDefinition {
  const fn = contract.definedFunctions.find(f => f.name === name);
  if (!fn) throw new Error(`No function ${name}`);
  return fn;
}

function statements(fn: FunctionDefinition): Statement[] {
  if (!fn.body) throw new Error(`${fn.name} has no body`);
  return fn.body.statements;
}

function expressionOf(statement: Statement): Expression {
  if (statement.nodeType !== 'ExpressionStatement') throw new Error(`Expected expression statement, got ${statement.nodeType}`);
  return statement.expression;
}

function assignmentTarget(statement: Statement): Identifier {
  const expression = expressionOf(statement);
  if (expression.nodeType !== 'Assignment' || expression.leftHandSide.nodeType !== 'Identifier') {
    throw new Error('Expected assignment to an identifier');
  }
  return expression.leftHandSide;
}

function calleeMember(statement: Statement): MemberAccess {
  const expression = expressionOf(statement);
  const callee = expression.nodeType === 'FunctionCall' ? expression.expression : expression;
  if (callee.nodeType !== 'MemberAccess') throw new Error('Expected member access');
  return callee;
}

describe('Contract Transformer', () => {
  describe('Declarations', () => {
    it('should declare state variables with their flags', () => {
      const unit = build(`
        contract Config {
          uint immutable limit = 10;
          uint256 constant MAX = 100;
          address owner;
        }
      `);
      const [limit, max, owner] = contractNamed(unit, 'Config').stateVariables;

      expect(limit).toMatchObject({ name: 'limit', typeName: 'uint256', isImmutable: true, isConstant: false, isStateVariable: true });
      expect(limit.value).toMatchObject({ nodeType: 'Literal', kind: 'number', value: '10' });
      expect(max).toMatchObject({ name: 'MAX', isImmutable: false, isConstant: true });
      expect(owner).toMatchObject({ name: 'owner', typeName: 'address', value: null });
      expect(unit.declarations.get(limit.id)).toBe(limit);
    });

    it('should declare functions, constructors and modifiers', () => {
      const unit = build(`
        contract Shop {
          constructor() {}
          function buy(uint256 amount) external payable virtual returns (bool) {}
          modifier open() { _; }
          receive() external payable {}
          fallback() external {}
        }
      `);
      const shop = contractNamed(unit, 'Shop');

      expect(shop.definedFunctions.map(f => [f.name, f.functionKind])).toEqual([
        ['constructor', 'constructor'],
        ['buy', 'function'],
        ['receive', 'receive'],
        ['fallback', 'fallback'],
      ]);
      expect(shop.constructorDefinition).toBe(shop.definedFunctions[0]);

      const buy = functionNamed(shop, 'buy');
      expect(buy).toMatchObject({
        visibility: 'external',
        virtualSemantics: true,
        parameterTypes: ['uint256'],
        returnParameterTypes: ['bool'],
        scope: shop.id,
      });
      expect(shop.definedModifiers.map(m => m.name)).toEqual(['open']);
    });

    it('should treat interface functions as virtual', () => {
      const unit = build(`
        interface IToken {
          function supply() external view returns (uint256);
        }
      `);
      const supply = functionNamed(contractNamed(unit, 'IToken'), 'supply');

      expect(supply.virtualSemantics).toBe(true);
      expect(supply.body).toBeNull();
    });

    it('should canonicalize parameter types', () => {
      const unit = build(`
        library Types {
          struct Data { uint a; }
          function f(uint a, bytes memory b, address[2] memory c, mapping(address => uint) storage m, Types.Data storage d) internal {}
        }
      `);
      const f = functionNamed(contractNamed(unit, 'Types'), 'f');

      expect(f.parameterTypes).toEqual(['uint256', 'bytes', 'address[2]', 'mapping(address => uint256)', 'Data']);
    });

    it('should collect file-level functions', () => {
      const unit = build(`
        function helper(uint256 v) pure returns (uint256) {
          return v;
        }
        contract User {}
      `);

      expect(unit.freeFunctions.map(f => [f.name, f.functionKind, f.scope])).toEqual([['helper', 'freeFunction', null]]);
    });
  });

  describe('Inheritance', () => {
    it('should link bases and linearize', () => {
      const unit = build(`
        contract A {}
        contract B {}
        contract C is A, B {}
      `);
      const c = contractNamed(unit, 'C');

      expect(c.baseContracts.map(b => b.baseName)).toEqual(['A', 'B']);
      expect(c.linearizedBaseContracts.map(b => b.name)).toEqual(['C', 'B', 'A']);
    });

    it('should lower inheritance arguments', () => {
      const unit = build(`
        contract A {
          constructor(uint256 v) {}
        }
        contract B is A(42) {}
      `);
      const [spec] = contractNamed(unit, 'B').baseContracts;

      expect(spec.arguments).toHaveLength(1);
      expect(spec.arguments?.[0]).toMatchObject({ nodeType: 'Literal', value: '42' });
    });

    it('should skip unknown bases with a warning', () => {
      const unit = build('contract Token is ERC20 {}');
      const token = contractNamed(unit, 'Token');

      expect(token.baseContracts[0].baseContract).toBeNull();
      expect(token.linearizedBaseContracts.map(c => c.name)).toEqual(['Token']);
      expect(unit.warnings).toEqual(["Base contract 'ERC20' of 'Token' is not defined in this source; it is ignored"]);
    });

    it('should reject duplicate contract names', () => {
      expect(() => build('contract A {} contract A {}')).toThrow(ResolutionError);
      expect(() => build('contract A {} contract A {}')).toThrow('Identifier already declared: A');
    });

    it('should reject self-inheritance', () => {
      expect(() => build('contract A is A {}')).toThrow("Contract 'A' cannot inherit from itself");
    });
  });

  describe('Assignment targets', () => {
    const source = `
      contract Counter {
        uint256 x;
        uint256[] list;
        constructor() {
          x = 1;
          x += 2;
          x++;
          delete x;
          (x, ) = (3, 4);
        }
      }
    `;

    it('should mark plain assignments as ordinary', () => {
      const unit = build(source);
      const counter = contractNamed(unit, 'Counter');
      const target = assignmentTarget(statements(functionNamed(counter, 'constructor'))[0]);

      expect(target.annotation).toEqual({
        referencedDeclaration: counter.stateVariables[0].id,
        lValueRequested: true,
        ordinaryLAssignment: true,
      });
    });

    it('should mark compound assignments as not ordinary', () => {
      const unit = build(source);
      const target = assignmentTarget(statements(functionNamed(contractNamed(unit, 'Counter'), 'constructor'))[1]);

      expect(target.annotation.lValueRequested).toBe(true);
      expect(target.annotation.ordinaryLAssignment).toBe(false);
    });

    it('should mark increments and delete as not ordinary', () => {
      const unit = build(source);
      const body = statements(functionNamed(contractNamed(unit, 'Counter'), 'constructor'));

      for (const statement of [body[2], body[3]]) {
        const expression = expressionOf(statement);
        if (expression.nodeType !== 'UnaryOperation' || expression.subExpression.nodeType !== 'Identifier') {
          throw new Error('Expected unary operation on an identifier');
        }
        expect(expression.subExpression.annotation.lValueRequested).toBe(true);
        expect(expression.subExpression.annotation.ordinaryLAssignment).toBe(false);
      }
    });

    it('should pass the assignment kind to tuple components', () => {
      const unit = build(source);
      const body = statements(functionNamed(contractNamed(unit, 'Counter'), 'constructor'));
      const expression = expressionOf(body[4]);
      if (expression.nodeType !== 'Assignment' || expression.leftHandSide.nodeType !== 'TupleExpression') {
        throw new Error('Expected tuple assignment');
      }
      const [first, second] = expression.leftHandSide.components;

      expect(first).toMatchObject({ nodeType: 'Identifier', annotation: { lValueRequested: true, ordinaryLAssignment: true } });
      expect(second).toBeNull();
    });
  });

  describe('Name resolution', () => {
    it('should prefer parameters and locals over state variables', () => {
      const unit = build(`
        contract Shadow {
          uint256 x;
          uint256 y;
          function f(uint256 x) public {
            x = 1;
            {
              uint256 y = 2;
              y = 3;
            }
            y = 4;
          }
        }
      `);
      const shadow = contractNamed(unit, 'Shadow');
      const body = statements(functionNamed(shadow, 'f'));

      const param = unit.declarations.get(assignmentTarget(body[0]).annotation.referencedDeclaration ?? -1);
      expect(param).toMatchObject({ nodeType: 'VariableDeclaration', name: 'x', isStateVariable: false });

      const inner = body[1];
      if (inner.nodeType !== 'Block') throw new Error('Expected block');
      const local = unit.declarations.get(assignmentTarget(inner.statements[1]).annotation.referencedDeclaration ?? -1);
      expect(local).toMatchObject({ name: 'y', isStateVariable: false });

      expect(assignmentTarget(body[2]).annotation.referencedDeclaration).toBe(shadow.stateVariables[1].id);
    });

    it('should pick overloads by argument count', () => {
      const unit = build(`
        contract Overloads {
          function set(uint256 a) internal {}
          function set(uint256 a, uint256 b) internal {}
          constructor() {
            set(1, 2);
          }
        }
      `);
      const overloads = contractNamed(unit, 'Overloads');
      const call = expressionOf(statements(functionNamed(overloads, 'constructor'))[0]);
      if (call.nodeType !== 'FunctionCall' || call.expression.nodeType !== 'Identifier') {
        throw new Error('Expected call of an identifier');
      }

      expect(call.expression.annotation.referencedDeclaration).toBe(overloads.definedFunctions[1].id);
    });

    it('should resolve inherited members', () => {
      const unit = build(`
        contract Base {
          uint256 value;
        }
        contract Child is Base {
          function f() public {
            value = 1;
          }
        }
      `);
      const target = assignmentTarget(statements(functionNamed(contractNamed(unit, 'Child'), 'f'))[0]);

      expect(target.annotation.referencedDeclaration).toBe(contractNamed(unit, 'Base').stateVariables[0].id);
    });
  });

  describe('Member access function types', () => {
    const source = `
      library Lib {
        function inner(uint256 v) internal pure returns (uint256) { return v; }
        function outer(uint256 v) public pure returns (uint256) { return v; }
      }
      contract Other {
        function ping() public {}
      }
      contract Base {
        function hook() internal virtual {}
      }
      contract Main is Base {
        function hook() internal override {
          super.hook();
          Base.hook();
          this.run();
          Lib.inner(1);
          Lib.outer(1);
          Other.ping;
          msg.sender;
        }
        function run() external {}
      }
    `;

    it('should classify each kind of member call', () => {
      const unit = build(source);
      const main = contractNamed(unit, 'Main');
      const baseHook = functionNamed(contractNamed(unit, 'Base'), 'hook');
      const lib = contractNamed(unit, 'Lib');
      const body = statements(functionNamed(main, 'hook'));

      expect(body.map(s => calleeMember(s).annotation.functionType)).toEqual([
        { kind: 'internal', declaration: baseHook.id },
        { kind: 'internal', declaration: baseHook.id },
        { kind: 'external', declaration: functionNamed(main, 'run').id },
        { kind: 'internal', declaration: functionNamed(lib, 'inner').id },
        { kind: 'delegateCall', declaration: functionNamed(lib, 'outer').id },
        { kind: 'declaration', declaration: functionNamed(contractNamed(unit, 'Other'), 'ping').id },
        null,
      ]);
    });
  });

  describe('Statements', () => {
    it('should lower loops and branches', () => {
      const unit = build(`
        contract Flow {
          event Done();
          function f(bool c) public {
            for (uint256 i = 0; i < 3; i++) {}
            do {} while (c);
            while (c) {}
            if (c) return; else emit Done();
            unchecked { c = !c; }
          }
        }
      `);
      const body = statements(functionNamed(contractNamed(unit, 'Flow'), 'f'));

      expect(body.map(s => s.nodeType)).toEqual([
        'ForStatement',
        'WhileStatement',
        'WhileStatement',
        'IfStatement',
        'Block',
      ]);
      expect(body[0]).toMatchObject({ initialization: { nodeType: 'VariableDeclarationStatement' } });
      expect(body[1]).toMatchObject({ isDoWhile: true });
      expect(body[2]).toMatchObject({ isDoWhile: false });
      expect(body[3]).toMatchObject({ trueBody: { nodeType: 'Return' }, falseBody: { nodeType: 'GenericStatement' } });
      expect(body[4]).toMatchObject({ unchecked: true });
    });

    it('should record source locations', () => {
      const unit = build(`
contract Loc {
    uint256 immutable x;
}
`);
      const [x] = contractNamed(unit, 'Loc').stateVariables;

      expect(x.location.sourceName).toBe('Test.sol');
      expect(x.location.line).toBe(3);
    });
  });
});
