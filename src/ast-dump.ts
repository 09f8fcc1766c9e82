/**
 * AST Dump
 * Indented one-node-per-line rendering of a syntax tree (`forge --ast`).
 */

import type { ASTNode } from './types.js';

/**
 * Render `node` and its descendants, two spaces of indent per level.
 * Each line is the node type, its scalar details and its start position.
 *
 * @example
 * ```text
 * Program @1:1
 *   Print @1:1
 *     BinaryExpr + @1:7
 *       NumberLiteral 1 @1:7
 *       NumberLiteral 2 @1:11
 * ```
 */
export function dumpAst(node: ASTNode): string {
  const lines: string[] = [];
  const visit = (current: ASTNode, depth: number): void => {
    const details = describe(current);
    const { line, column } = current.span.start;
    lines.push(
      `${'  '.repeat(depth)}${current.type}${details ? ` ${details}` : ''} @${line}:${column}`
    );
    for (const child of childrenOf(current)) {
      visit(child, depth + 1);
    }
  };
  visit(node, 0);
  return lines.join('\n');
}

function describe(node: ASTNode): string {
  switch (node.type) {
    case 'VarDecl':
    case 'Identifier':
    case 'Param':
      return node.name;
    case 'For':
      return node.binding;
    case 'Member':
      return `.${node.name}`;
    case 'Conversion':
      return `as ${node.targetType}`;
    case 'NumberLiteral':
    case 'BoolLiteral':
      return String(node.value);
    case 'StringLiteral':
      return JSON.stringify(node.value);
    case 'CharLiteral':
      return `'${node.value}'`;
    case 'UnaryExpr':
    case 'BinaryExpr':
    case 'LogicalExpr':
    case 'Assign':
      return node.op;
    case 'ExprStatement':
      return node.echo ? '(echo)' : '';
    case 'RecoveryError':
      return JSON.stringify(node.text);
    default:
      return '';
  }
}

function childrenOf(node: ASTNode): ASTNode[] {
  switch (node.type) {
    case 'Program':
      return [...node.statements];
    case 'Block':
      return [...node.statements];
    case 'VarDecl':
      return [node.init];
    case 'ExprStatement':
    case 'Print':
      return [node.expression];
    case 'If':
      return node.elseBlock
        ? [node.condition, node.thenBlock, node.elseBlock]
        : [node.condition, node.thenBlock];
    case 'While':
      return [node.condition, node.body];
    case 'For':
      return [node.iterable, node.body];
    case 'Input':
      return node.prompt ? [node.prompt, node.target] : [node.target];
    case 'Return':
      return node.value ? [node.value] : [];
    case 'Range':
      return [node.lo, node.hi];
    case 'ListLiteral':
      return [...node.items];
    case 'ListRepeat':
      return [node.item, node.count];
    case 'MapLiteral':
      return [...node.entries];
    case 'MapEntry':
      return [node.key, node.value];
    case 'FunctionLiteral':
      return [...node.params, node.body];
    case 'UnaryExpr':
    case 'Clone':
    case 'Mirror':
    case 'Conversion':
      return [node.operand];
    case 'BinaryExpr':
    case 'LogicalExpr':
      return [node.left, node.right];
    case 'Call':
      return [node.callee, ...node.args];
    case 'Index':
      return [node.target, node.index];
    case 'Member':
      return [node.target];
    case 'Assign':
      return [node.target, node.value];
    case 'InputExpr':
      return [node.prompt];
    case 'RecoveryError':
    case 'Break':
    case 'Continue':
    case 'NumberLiteral':
    case 'StringLiteral':
    case 'CharLiteral':
    case 'BoolLiteral':
    case 'NullLiteral':
    case 'Identifier':
    case 'Param':
      return [];
  }
}
