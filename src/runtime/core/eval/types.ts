/**
 * Evaluator Mixin Types
 *
 * Contracts a mixin needs from the layers below it. Each mixin constrains
 * its base constructor to the contract it calls into, so the composition
 * order in evaluator.ts is checked by the compiler.
 *
 * @internal
 */

import type {
  AssignNode,
  BinaryExprNode,
  BinaryOp,
  BlockNode,
  CallNode,
  CloneNode,
  ConversionNode,
  ForNode,
  FunctionLiteralNode,
  IdentifierNode,
  IfNode,
  IndexNode,
  InputExprNode,
  InputNode,
  ListLiteralNode,
  ListRepeatNode,
  LogicalExprNode,
  MapLiteralNode,
  MemberNode,
  MirrorNode,
  RangeNode,
  SourceSpan,
  UnaryExprNode,
  VarDeclNode,
  WhileNode,
} from '../../../types.js';
import type { ScriptFunction } from '../callable.js';
import type { Environment } from '../environment.js';
import type { Completion } from '../signals.js';
import type { ForgeMap, ForgeRange, ForgeValue } from '../values.js';
import type { EvaluatorBase } from './base.js';

/**
 * Constructor type accepted and returned by evaluator mixins.
 * TypeScript requires a mixin base constructor to take `any[]`.
 * @internal
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type EvaluatorConstructor<T = EvaluatorBase> = new (...args: any[]) => T;

/** Binary operator application, used by compound assignment */
export interface OperatorEvaluator extends EvaluatorBase {
  applyBinary(op: BinaryOp, left: ForgeValue, right: ForgeValue, span: SourceSpan): ForgeValue;
}

/** Block execution, used by function invocation */
export interface BlockEvaluator extends EvaluatorBase {
  executeBlock(node: BlockNode, scope?: Environment): Completion;
}

/** Every node handler CoreMixin dispatches to */
export interface DispatchTargets extends OperatorEvaluator, BlockEvaluator {
  evaluateListLiteral(node: ListLiteralNode): ForgeValue[];
  evaluateListRepeat(node: ListRepeatNode): ForgeValue[];
  evaluateMapLiteral(node: MapLiteralNode): ForgeMap;
  evaluateRange(node: RangeNode): ForgeRange;
  createFunction(node: FunctionLiteralNode): ScriptFunction;
  evaluateUnary(node: UnaryExprNode): ForgeValue;
  evaluateBinary(node: BinaryExprNode): ForgeValue;
  evaluateLogical(node: LogicalExprNode): boolean;
  evaluateClone(node: CloneNode): ForgeValue;
  evaluateMirror(node: MirrorNode): ForgeValue;
  evaluateConversion(node: ConversionNode): ForgeValue;
  evaluateIdentifier(node: IdentifierNode): ForgeValue;
  evaluateAssign(node: AssignNode): ForgeValue;
  evaluateIndex(node: IndexNode): ForgeValue;
  evaluateMember(node: MemberNode): ForgeValue;
  evaluateInputExpr(node: InputExprNode): ForgeValue;
  executeVarDecl(node: VarDeclNode): Completion;
  executeInput(node: InputNode): Completion;
  executeIf(node: IfNode): Completion;
  executeWhile(node: WhileNode): Completion;
  executeFor(node: ForNode): Completion;
  evaluateCall(node: CallNode): ForgeValue;
}
