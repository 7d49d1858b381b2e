import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { analyze, check, checkFile } from '../../src/checker.js';

const VAULT = fileURLToPath(new URL('../fixtures/Vault.sol', import.meta.url));
const MISSING = fileURLToPath(new URL('../fixtures/Missing.sol', import.meta.url));

describe('Checker', () => {
  describe('check', () => {
    it('should succeed for a valid contract', () => {
      const result = check(`
        contract Vault {
          address immutable owner;
          constructor() {
            owner = msg.sender;
          }
        }
      `);

      expect(result.success).toBe(true);
      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([]);
      expect(result.reports).toEqual([{ contract: 'Vault', diagnostics: [] }]);
    });

    it('should fail when a contract has diagnostics', () => {
      const result = check(`
        contract Vault {
          address immutable owner;
        }
      `, { sourceName: 'Vault.sol' });

      expect(result.success).toBe(false);
      expect(result.reports).toHaveLength(1);
      const [diagnostic] = result.reports[0].diagnostics;
      expect(diagnostic.kind).toBe('IncompleteInitialization');
      expect(diagnostic.location.sourceName).toBe('Vault.sol');
      expect(diagnostic.location.line).toBe(2);
    });

    it('should skip interfaces by default', () => {
      const result = check(`
        interface IVault {
          function owner() external view returns (address);
        }
        contract Vault {}
        library Math {}
      `);

      expect(result.reports.map(r => r.contract)).toEqual(['Vault', 'Math']);
    });

    it('should only check the selected contracts', () => {
      const result = check(`
        contract First {
          uint256 immutable a;
        }
        contract Second {}
      `, { contracts: ['Second'] });

      expect(result.success).toBe(true);
      expect(result.reports.map(r => r.contract)).toEqual(['Second']);
    });

    it('should report selected contracts that do not exist', () => {
      const result = check('contract Present {}', { contracts: ['Missing'] });

      expect(result.success).toBe(false);
      expect(result.errors).toEqual(["Contract 'Missing' not found"]);
      expect(result.reports).toEqual([]);
    });

    it('should return parse errors without checking', () => {
      const result = check('contract {');

      expect(result.success).toBe(false);
      expect(result.reports).toEqual([]);
      expect(result.errors.length).toBeGreaterThan(0);
      expect(result.errors[0]).toMatch(/^ParseError/);
    });

    it('should return resolution errors', () => {
      const result = check(`
        contract A is B {}
        contract B is A {}
      `);

      expect(result.success).toBe(false);
      expect(result.errors).toEqual([
        "ResolutionError: Definition of base has to precede definition of derived contract: cyclic inheritance involving 'A'",
      ]);
    });

    it('should warn about bases defined elsewhere', () => {
      const result = check(`
        contract Token is Ownable {
          uint256 immutable supply;
          constructor() {
            supply = 100;
          }
        }
      `);

      expect(result.success).toBe(true);
      expect(result.warnings).toEqual([
        "Base contract 'Ownable' of 'Token' is not defined in this source; it is ignored",
      ]);
      expect(result.reports).toEqual([{ contract: 'Token', diagnostics: [] }]);
    });
  });

  describe('checkFile', () => {
    it('should check a file and name locations after it', () => {
      const result = checkFile(VAULT);

      expect(result.file).toBe(VAULT);
      expect(result.source).toContain('contract Vault');
      expect(result.success).toBe(false);
      expect(result.reports).toHaveLength(1);
      expect(result.reports[0].diagnostics.map(d => d.kind)).toEqual(['InBranch', 'IncompleteInitialization']);
      expect(result.reports[0].diagnostics.map(d => d.location.line)).toEqual([9, 4]);
      expect(result.reports[0].diagnostics[0].location.sourceName).toBe(VAULT);
    });

    it('should report a missing file as a result', () => {
      const results = [MISSING, VAULT].map(file => checkFile(file));

      expect(results[0]).toEqual({
        file: MISSING,
        source: null,
        success: false,
        reports: [],
        errors: [`File not found: ${MISSING}`],
        warnings: [],
      });
      expect(results[1].reports.map(r => r.contract)).toEqual(['Vault']);
    });
  });

  describe('analyze', () => {
    it('should summarize contracts', () => {
      const result = analyze(`
        contract A {
          uint256 immutable a;
        }
        abstract contract B is A {
          uint256 immutable b;
          uint256 plain;
          constructor() {
            b = 1;
          }
        }
        interface I {}
      `);

      expect(result.valid).toBe(true);
      expect(result.errors).toEqual([]);
      expect(result.contracts).toEqual([
        { name: 'A', kind: 'contract', linearization: ['A'], immutables: ['a'], hasConstructor: false },
        { name: 'B', kind: 'abstract', linearization: ['B', 'A'], immutables: ['a', 'b'], hasConstructor: true },
        { name: 'I', kind: 'interface', linearization: ['I'], immutables: [], hasConstructor: false },
      ]);
    });

    it('should report invalid sources', () => {
      const result = analyze('contract {');

      expect(result.valid).toBe(false);
      expect(result.contracts).toEqual([]);
      expect(result.errors[0]).toMatch(/^ParseError/);
    });
  });
});
