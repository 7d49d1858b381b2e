/**
 * Canonical type strings, used to compare function signatures when looking
 * up overrides. Data locations are not part of the string.
 */

import { isNodeType } from '../parser/solidity-parser.js';
import type { ParserNode } from '../parser/solidity-parser.js';

export function canonicalTypeName(typeName: ParserNode | null | undefined): string {
  if (!typeName) return '';

  if (isNodeType(typeName, 'ElementaryTypeName')) {
    return canonicalElementary(typeName.name);
  }

  if (isNodeType(typeName, 'UserDefinedTypeName')) {
    const parts = typeName.namePath.split('.');
    return parts[parts.length - 1];
  }

  if (isNodeType(typeName, 'ArrayTypeName')) {
    const length = isNodeType(typeName.length, 'NumberLiteral') ? typeName.length.number : '';
    return `${canonicalTypeName(typeName.baseTypeName)}[${length}]`;
  }

  if (isNodeType(typeName, 'Mapping')) {
    return `mapping(${canonicalTypeName(typeName.keyType)} => ${canonicalTypeName(typeName.valueType)})`;
  }

  // Function types and anything newer compare by node kind only
  return typeName.type;
}

function canonicalElementary(name: string): string {
  switch (name) {
    case 'uint':
      return 'uint256';
    case 'int':
      return 'int256';
    case 'byte':
      return 'bytes1';
    case 'ufixed':
      return 'ufixed128x18';
    case 'fixed':
      return 'fixed128x18';
    default:
      return name;
  }
}
