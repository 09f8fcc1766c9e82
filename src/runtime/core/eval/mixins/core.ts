/**
 * CoreMixin: Node Dispatch
 *
 * Outermost layer of the evaluator. Routes every expression and statement
 * node to its handler and runs whole programs.
 *
 * @internal
 */

import type { ExpressionNode, ProgramNode, StatementNode } from '../../../../types.js';
import { ParseError } from '../../../../types.js';
import { invalidControl, NORMAL, type Completion } from '../../signals.js';
import type { ExecutionResult } from '../../types.js';
import type { ForgeValue } from '../../values.js';
import { char, formatValue } from '../../values.js';
import type { DispatchTargets, EvaluatorConstructor } from '../types.js';

export function CoreMixin<TBase extends EvaluatorConstructor<DispatchTargets>>(Base: TBase) {
  return class CoreEvaluator extends Base {
    override evaluateExpression(node: ExpressionNode): ForgeValue {
      switch (node.type) {
        case 'NumberLiteral':
        case 'StringLiteral':
        case 'BoolLiteral':
          return node.value;
        case 'CharLiteral':
          return char(node.value);
        case 'NullLiteral':
          return null;
        case 'Identifier':
          return this.evaluateIdentifier(node);
        case 'Range':
          return this.evaluateRange(node);
        case 'ListLiteral':
          return this.evaluateListLiteral(node);
        case 'ListRepeat':
          return this.evaluateListRepeat(node);
        case 'MapLiteral':
          return this.evaluateMapLiteral(node);
        case 'FunctionLiteral':
          return this.createFunction(node);
        case 'UnaryExpr':
          return this.evaluateUnary(node);
        case 'BinaryExpr':
          return this.evaluateBinary(node);
        case 'LogicalExpr':
          return this.evaluateLogical(node);
        case 'Call':
          return this.evaluateCall(node);
        case 'Index':
          return this.evaluateIndex(node);
        case 'Member':
          return this.evaluateMember(node);
        case 'Assign':
          return this.evaluateAssign(node);
        case 'Clone':
          return this.evaluateClone(node);
        case 'Mirror':
          return this.evaluateMirror(node);
        case 'Conversion':
          return this.evaluateConversion(node);
        case 'InputExpr':
          return this.evaluateInputExpr(node);
      }
    }

    override executeStatement(node: StatementNode): Completion {
      switch (node.type) {
        case 'VarDecl':
          return this.executeVarDecl(node);
        case 'ExprStatement':
          this.evaluateExpression(node.expression);
          return NORMAL;
        case 'If':
          return this.executeIf(node);
        case 'While':
          return this.executeWhile(node);
        case 'For':
          return this.executeFor(node);
        case 'Print':
          this.ctx.io.write(formatValue(this.evaluateExpression(node.expression)));
          return NORMAL;
        case 'Input':
          return this.executeInput(node);
        case 'Return':
          return {
            kind: 'return',
            value: node.value ? this.evaluateExpression(node.value) : null,
            node,
          };
        case 'Break':
          return { kind: 'break', node };
        case 'Continue':
          return { kind: 'continue', node };
        case 'Block':
          return this.executeBlock(node);
      }
    }

    /**
     * Run top-level statements in the global environment.
     * A top-level `return` ends the program with its value.
     */
    executeProgram(program: ProgramNode): ExecutionResult {
      const statements: StatementNode[] = [];
      for (const statement of program.statements) {
        if (statement.type === 'RecoveryError') {
          throw new ParseError(
            `cannot execute a program with parse errors: ${statement.message}`,
            statement.span
          );
        }
        statements.push(statement);
      }

      let value: ForgeValue = null;
      const echoed: ForgeValue[] = [];
      for (const statement of statements) {
        if (statement.type === 'ExprStatement') {
          value = this.evaluateExpression(statement.expression);
          if (statement.echo) echoed.push(value);
          continue;
        }
        const completion = this.executeStatement(statement);
        if (completion.kind === 'return') return { value: completion.value, echoed };
        if (completion.kind === 'break' || completion.kind === 'continue') {
          throw invalidControl(completion);
        }
      }
      return { value, echoed };
    }
  };
}
