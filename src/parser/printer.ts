import * as AST from './ast';

/** Render the syntax tree one node per line, indented two spaces per level. */
export function formatTree(node: AST.Node, indent = ''): string[] {
  const lines = [indent + describe(node)];
  for (const child of children(node)) {
    lines.push(...formatTree(child, indent + '  '));
  }
  return lines;
}

function describe(node: AST.Node): string {
  switch (node.type) {
    case 'BinarySetOp':
      return `BinarySetOp ${node.operator}`;
    case 'VariableRef':
      return `VariableRef ${node.name} (slot ${node.slot})`;
    case 'Literal':
      return `Literal ${node.words.map(word => JSON.stringify(word)).join(' ')}`;
    default:
      return node.type;
  }
}

function children(node: AST.Node): AST.Node[] {
  switch (node.type) {
    case 'StatementBlock':
      return node.body;
    case 'Assign':
      return [node.target, node.value];
    case 'BinarySetOp':
      return [node.left, node.right];
    case 'Load':
      return [node.source];
    case 'Print':
      return node.args;
    case 'Filter':
    case 'FilterOut':
      return [node.source, node.patterns];
    case 'VariableRef':
    case 'Literal':
      return [];
  }
}
