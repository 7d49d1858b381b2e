/**
 * C3 Linearization
 *
 * Computes the order in which a contract's ancestors are constructed and
 * searched for overrides. The result is most-derived first and starts with the
 * contract itself. Direct bases are listed in source "most base-like first"
 * order, so the last-listed base takes priority.
 */

import { ResolutionError } from '../utils/errors.js';

export interface LinearizationInput {
  /** Names of the direct bases, in the order written after `is` */
  bases(contractName: string): string[];
}

export function linearize(contractName: string, input: LinearizationInput): string[] {
  const memo = new Map<string, string[]>();
  return linearizeRec(contractName, input, memo, new Set());
}

function linearizeRec(
  contractName: string,
  input: LinearizationInput,
  memo: Map<string, string[]>,
  inProgress: Set<string>
): string[] {
  const cached = memo.get(contractName);
  if (cached) return cached;

  if (inProgress.has(contractName)) {
    throw new ResolutionError(`Definition of base has to precede definition of derived contract: cyclic inheritance involving '${contractName}'`);
  }
  inProgress.add(contractName);

  const directBases = input.bases(contractName);
  const lists: string[][] = [];
  for (const base of directBases) {
    lists.unshift([...linearizeRec(base, input, memo, inProgress)]);
  }
  lists.push([...directBases].reverse());

  const merged = c3Merge(lists);
  if (merged === null) {
    throw new ResolutionError(`Linearization of inheritance graph impossible for '${contractName}'`);
  }

  inProgress.delete(contractName);
  const result = [contractName, ...merged];
  memo.set(contractName, result);
  return result;
}

/**
 * Merge the input lists; returns null when no consistent order exists.
 */
export function c3Merge(input: string[][]): string[] | null {
  const lists = input.map(l => [...l]).filter(l => l.length > 0);
  const result: string[] = [];

  while (lists.length > 0) {
    const candidate = lists
      .map(l => l[0])
      .find(head => lists.every(l => l.indexOf(head) <= 0));
    if (candidate === undefined) return null;

    result.push(candidate);
    for (let i = lists.length - 1; i >= 0; i--) {
      if (lists[i][0] === candidate) lists[i].shift();
      if (lists[i].length === 0) lists.splice(i, 1);
    }
  }

  return result;
}
