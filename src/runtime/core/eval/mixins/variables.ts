/**
 * VariablesMixin: Names, Places, Indexing and Input
 *
 * Resolves identifiers, declarations and assignment targets. Every
 * assignment target resolves to a Place: a getter/setter pair over the
 * storage it names. String elements and string slices write back through
 * the place of the enclosing string, because strings are values.
 *
 * Error Handling:
 * - Unknown names throw UndefinedVariableError (with a spelling hint)
 * - Out-of-range scalar indexes and missing map keys throw IndexError
 * - Wrong operand types throw RuntimeError(RUNTIME_TYPE_ERROR)
 *
 * @internal
 */

import type {
  AssignNode,
  ExpressionNode,
  IdentifierNode,
  IndexNode,
  InputExprNode,
  InputNode,
  LValueNode,
  MemberNode,
  SourceSpan,
  VarDeclNode,
} from '../../../../types.js';
import { IndexError, UndefinedVariableError } from '../../../../types.js';
import { suggestSimilarNames } from '../../../../error-enrichment.js';
import { NORMAL, type Completion } from '../../signals.js';
import {
  rangeItems,
  scalarIndex,
  sliceBounds,
  spliceList,
  spliceString,
  type SliceBounds,
} from '../../slices.js';
import type { ForgeValue } from '../../values.js';
import {
  char,
  codePointLength,
  codePoints,
  formatValue,
  inspectValue,
  isChar,
  isCustom,
  isList,
  isMap,
  isRange,
  typeName,
} from '../../values.js';
import type { EvaluatorConstructor, OperatorEvaluator } from '../types.js';

/** Settable storage location named by an assignment target */
export interface Place {
  get(): ForgeValue;
  set(value: ForgeValue): void;
}

export function VariablesMixin<TBase extends EvaluatorConstructor<OperatorEvaluator>>(
  Base: TBase
) {
  return class VariablesEvaluator extends Base {
    // ============================================================
    // NAMES
    // ============================================================

    evaluateIdentifier(node: IdentifierNode): ForgeValue {
      const value = this.scope.lookup(node.name);
      if (value === undefined) throw this.undefinedVariable(node);
      return value;
    }

    undefinedVariable(node: IdentifierNode): UndefinedVariableError {
      const [suggestion] = suggestSimilarNames(node.name, this.scope.visibleNames());
      return new UndefinedVariableError(
        node.name,
        node.span,
        suggestion !== undefined ? `Hint: Did you mean '${suggestion}'?` : undefined
      );
    }

    executeVarDecl(node: VarDeclNode): Completion {
      this.scope.define(node.name, this.evaluateExpression(node.init));
      return NORMAL;
    }

    // ============================================================
    // ASSIGNMENT
    // ============================================================

    /** Plain and compound assignment; evaluates to the stored value */
    evaluateAssign(node: AssignNode): ForgeValue {
      const place = this.resolvePlace(node.target);
      const operand = this.evaluateExpression(node.value);
      const value =
        node.op === '='
          ? operand
          : this.applyBinary(compoundOperator(node.op), place.get(), operand, node.span);
      place.set(value);
      return value;
    }

    /**
     * Resolve an assignment target to its storage.
     * The container of an index target is itself resolved as a place when
     * it is an lvalue, so string edits propagate to the variable holding
     * the string.
     */
    resolvePlace(target: LValueNode): Place {
      if (target.type === 'Identifier') {
        return this.variablePlace(target);
      }
      const container = this.containerPlace(target.target);
      const index = this.evaluateExpression(target.index);
      return this.elementPlace(container, index, target);
    }

    variablePlace(node: IdentifierNode): Place {
      const owner = this.scope.resolve(node.name);
      if (!owner) throw this.undefinedVariable(node);
      return {
        get: () => {
          const value = owner.lookup(node.name);
          if (value === undefined) throw this.undefinedVariable(node);
          return value;
        },
        set: (value) => owner.define(node.name, value),
      };
    }

    containerPlace(node: ExpressionNode): Place {
      if (node.type === 'Identifier' || node.type === 'Index') {
        return this.resolvePlace(node);
      }
      // Temporary: lists and maps still mutate in place, strings cannot
      const value = this.evaluateExpression(node);
      return {
        get: () => value,
        set: () => {
          throw this.typeError('cannot assign into a temporary string', node.span);
        },
      };
    }

    elementPlace(container: Place, index: ForgeValue, node: IndexNode): Place {
      const target = container.get();
      const span = node.span;

      // Bounds are checked now and again on each access: evaluating the
      // right-hand side of an assignment may resize the sequence
      if (isList(target)) {
        if (isRange(index)) {
          sliceBounds(index, target.length, 'list', node.index.span);
          const bounds = (): SliceBounds =>
            sliceBounds(index, target.length, 'list', node.index.span);
          return {
            get: () => {
              const { lo, hi } = bounds();
              return target.slice(lo, hi);
            },
            set: (value) => {
              const items = isList(value)
                ? [...value]
                : isRange(value)
                  ? rangeItems(value)
                  : undefined;
              if (items === undefined) {
                throw this.typeError(
                  `cannot splice value of type '${typeName(value)}' into a list slice`,
                  span
                );
              }
              spliceList(target, bounds(), items);
            },
          };
        }
        scalarIndex(index, target.length, 'list', node.index.span);
        const position = (): number => scalarIndex(index, target.length, 'list', node.index.span);
        return {
          get: () => target[position()] ?? null,
          set: (value) => {
            target[position()] = value;
          },
        };
      }

      if (typeof target === 'string') {
        // Strings are rebuilt from the container's current text
        const currentChars = (): string[] => {
          const text = container.get();
          if (typeof text !== 'string') {
            throw this.typeError(`cannot index value of type '${typeName(text)}'`, node.target.span);
          }
          return codePoints(text);
        };
        if (isRange(index)) {
          sliceBounds(index, codePointLength(target), 'string', node.index.span);
          return {
            get: () => {
              const chars = currentChars();
              const { lo, hi } = sliceBounds(index, chars.length, 'string', node.index.span);
              return chars.slice(lo, hi).join('');
            },
            set: (value) => {
              const text = typeof value === 'string' ? value : isChar(value) ? value.value : undefined;
              if (text === undefined) {
                throw this.typeError(
                  `cannot splice value of type '${typeName(value)}' into a string slice`,
                  span
                );
              }
              const chars = currentChars();
              container.set(
                spliceString(chars, sliceBounds(index, chars.length, 'string', node.index.span), text)
              );
            },
          };
        }
        scalarIndex(index, codePointLength(target), 'string', node.index.span);
        return {
          get: () => {
            const chars = currentChars();
            return char(chars[scalarIndex(index, chars.length, 'string', node.index.span)] ?? '');
          },
          set: (value) => {
            const text = isChar(value) ? value.value : value;
            if (typeof text !== 'string' || codePointLength(text) !== 1) {
              throw this.typeError(
                `string element must be a single character, found value of type '${typeName(value)}'`,
                span
              );
            }
            const chars = currentChars();
            const at = scalarIndex(index, chars.length, 'string', node.index.span);
            container.set(spliceString(chars, { lo: at, hi: at + 1 }, text));
          },
        };
      }

      if (isMap(target)) {
        return {
          get: () => {
            const value = target.get(index);
            if (value === undefined) throw missingKey(index, node.index.span);
            return value;
          },
          set: (value) => target.set(index, value),
        };
      }

      if (isCustom(target) && target.ops.index) {
        const read = target.ops.index;
        return {
          get: () => read(target.payload, index),
          set: () => {
            throw this.typeError(`cannot assign into value of type '${typeName(target)}'`, span);
          },
        };
      }

      throw this.typeError(`cannot index value of type '${typeName(target)}'`, node.target.span);
    }

    // ============================================================
    // READS
    // ============================================================

    /** target[index]; reads do not need a place */
    evaluateIndex(node: IndexNode): ForgeValue {
      const target = this.evaluateExpression(node.target);
      const index = this.evaluateExpression(node.index);
      const fixed: Place = {
        get: () => target,
        set: () => undefined,
      };
      return this.elementPlace(fixed, index, node).get();
    }

    /** .len on sequences and maps, .keys/.values on maps, custom members */
    evaluateMember(node: MemberNode): ForgeValue {
      const target = this.evaluateExpression(node.target);

      if (node.name === 'len') {
        if (isList(target)) return target.length;
        if (typeof target === 'string') return codePointLength(target);
        if (isMap(target)) return target.size;
        if (isRange(target)) return Math.max(0, target.hi - target.lo);
      }
      if (isMap(target)) {
        if (node.name === 'keys') return target.keys();
        if (node.name === 'values') return target.values();
      }
      if (isCustom(target) && target.ops.member) {
        const member = target.ops.member(target.payload, node.name);
        if (member !== undefined) return member;
      }

      throw this.typeError(
        `value of type '${typeName(target)}' has no member '${node.name}'`,
        node.span
      );
    }

    // ============================================================
    // INPUT
    // ============================================================

    /** Read one line from the host; null at end of input */
    readInput(prompt: string): ForgeValue {
      return this.ctx.io.readLine(prompt);
    }

    evaluateInputExpr(node: InputExprNode): ForgeValue {
      return this.readInput(formatValue(this.evaluateExpression(node.prompt)));
    }

    /** input [prompt,] target; stores the line without conversion */
    executeInput(node: InputNode): Completion {
      const prompt = node.prompt ? formatValue(this.evaluateExpression(node.prompt)) : '';
      const place = this.resolvePlace(node.target);
      place.set(this.readInput(prompt));
      return NORMAL;
    }
  };
}

function compoundOperator(op: Exclude<AssignNode['op'], '='>): '+' | '-' | '*' | '/' | '%' {
  switch (op) {
    case '+=':
      return '+';
    case '-=':
      return '-';
    case '*=':
      return '*';
    case '/=':
      return '/';
    case '%=':
      return '%';
  }
}

function missingKey(key: ForgeValue, span: SourceSpan): IndexError {
  const shown = inspectValue(key);
  return new IndexError(`no entry for key ${shown} in map`, span, { key: shown });
}
