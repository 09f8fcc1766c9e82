/**
 * Forge AST Types
 * Source locations, error hierarchy, tokens and syntax tree nodes
 */

// ============================================================
// SOURCE LOCATION
// ============================================================

/** Position in source. Columns and offsets count Unicode scalars, not UTF-16 units. */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

/** Half-open source range: `end` points just past the last covered character */
export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

// ============================================================
// ERROR HIERARCHY
// ============================================================

/** Error codes for programmatic handling */
export const FORGE_ERROR_CODES = {
  // Lexer errors
  LEX_INVALID_CHARACTER: 'LEX_INVALID_CHARACTER',
  LEX_UNTERMINATED_LITERAL: 'LEX_UNTERMINATED_LITERAL',
  LEX_INVALID_ESCAPE: 'LEX_INVALID_ESCAPE',
  LEX_INVALID_CHAR_LITERAL: 'LEX_INVALID_CHAR_LITERAL',

  // Parse errors
  PARSE_UNEXPECTED_TOKEN: 'PARSE_UNEXPECTED_TOKEN',
  PARSE_INVALID_ASSIGNMENT_TARGET: 'PARSE_INVALID_ASSIGNMENT_TARGET',
  PARSE_INVALID_SYNTAX: 'PARSE_INVALID_SYNTAX',

  // Runtime errors
  RUNTIME_UNDEFINED_VARIABLE: 'RUNTIME_UNDEFINED_VARIABLE',
  RUNTIME_TYPE_ERROR: 'RUNTIME_TYPE_ERROR',
  RUNTIME_ARITY_MISMATCH: 'RUNTIME_ARITY_MISMATCH',
  RUNTIME_INDEX_OUT_OF_BOUNDS: 'RUNTIME_INDEX_OUT_OF_BOUNDS',
  RUNTIME_INVALID_CONTROL: 'RUNTIME_INVALID_CONTROL',
  RUNTIME_LIMIT_EXCEEDED: 'RUNTIME_LIMIT_EXCEEDED',
} as const;

export type ForgeErrorCode =
  (typeof FORGE_ERROR_CODES)[keyof typeof FORGE_ERROR_CODES];

/** Which pipeline stage raised an error; drives the diagnostic header */
export type ErrorStage = 'lexing' | 'parsing' | 'runtime';

/**
 * Extra source region attached to an error, rendered as its own snippet
 * below the primary one (e.g. where a called function was declared).
 */
export interface DiagnosticFrame {
  readonly label: string;
  readonly span: SourceSpan;
}

/** Structured error data for host applications */
export interface ForgeErrorData {
  readonly code: ForgeErrorCode;
  readonly stage: ErrorStage;
  readonly message: string;
  readonly span?: SourceSpan | undefined;
  readonly context?: Record<string, unknown> | undefined;
  readonly contextTrail?: readonly string[] | undefined;
  readonly frames?: readonly DiagnosticFrame[] | undefined;
}

/**
 * Base error class for all Forge errors.
 * Provides structured data for host applications to format as needed.
 */
export class ForgeError extends Error {
  readonly code: ForgeErrorCode;
  readonly stage: ErrorStage;
  readonly span?: SourceSpan | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(
    data: Omit<ForgeErrorData, 'contextTrail' | 'frames'>
  ) {
    const locationStr = data.span
      ? ` at ${data.span.start.line}:${data.span.start.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'ForgeError';
    this.code = data.code;
    this.stage = data.stage;
    this.span = data.span;
    this.context = data.context;
  }

  /** Start of the primary span, when known */
  get location(): SourceLocation | undefined {
    return this.span?.start;
  }

  /** Parse-context labels active when the error was raised, innermost first */
  get contextTrail(): readonly string[] {
    return [];
  }

  /** Secondary source frames rendered after the primary snippet */
  get frames(): readonly DiagnosticFrame[] {
    return [];
  }

  /** Get structured error data for custom formatting */
  toData(): ForgeErrorData {
    return {
      code: this.code,
      stage: this.stage,
      message: this.message.replace(/ at \d+:\d+$/, ''), // Strip location suffix
      span: this.span,
      context: this.context,
      contextTrail: this.contextTrail,
      frames: this.frames,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: ForgeErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

/** Details recorded by the parser when a grammar rule fails */
export interface ParseErrorDetails {
  /** Human-readable descriptions of what would have been accepted */
  readonly expected?: readonly string[];
  /** Description of the token actually found */
  readonly found?: string;
  /** Grammar-rule labels active at the failure, innermost first */
  readonly contextTrail?: readonly string[];
  readonly code?: ForgeErrorCode;
}

/** Parse-time errors */
export class ParseError extends ForgeError {
  readonly expected: readonly string[];
  readonly found: string | undefined;
  private readonly trail: readonly string[];

  constructor(message: string, span: SourceSpan, details: ParseErrorDetails = {}) {
    super({
      code: details.code ?? FORGE_ERROR_CODES.PARSE_UNEXPECTED_TOKEN,
      stage: 'parsing',
      message,
      span,
      context: details.found !== undefined ? { found: details.found } : undefined,
    });
    this.name = 'ParseError';
    this.expected = details.expected ?? [];
    this.found = details.found;
    this.trail = details.contextTrail ?? [];
  }

  override get contextTrail(): readonly string[] {
    return this.trail;
  }

  /** Copy of this error with a different context trail */
  withContextTrail(trail: readonly string[]): ParseError {
    return new ParseError(this.toData().message, this.spanOrThrow(), {
      expected: this.expected,
      ...(this.found !== undefined ? { found: this.found } : {}),
      contextTrail: trail,
      code: this.code,
    });
  }

  private spanOrThrow(): SourceSpan {
    if (!this.span) throw new Error('ParseError without span');
    return this.span;
  }
}

/** Runtime execution errors */
export class RuntimeError extends ForgeError {
  private readonly extraFrames: readonly DiagnosticFrame[];

  constructor(
    code: ForgeErrorCode,
    message: string,
    span?: SourceSpan,
    context?: Record<string, unknown>,
    frames: readonly DiagnosticFrame[] = []
  ) {
    super({ code, stage: 'runtime', message, span, context });
    this.name = 'RuntimeError';
    this.extraFrames = frames;
  }

  override get frames(): readonly DiagnosticFrame[] {
    return this.extraFrames;
  }

  /** Create from an AST node */
  static fromNode(
    code: ForgeErrorCode,
    message: string,
    node?: { span: SourceSpan },
    context?: Record<string, unknown>
  ): RuntimeError {
    return new RuntimeError(code, message, node?.span, context);
  }
}

/** Identifier not bound in any enclosing scope */
export class UndefinedVariableError extends RuntimeError {
  readonly variableName: string;

  constructor(name: string, span?: SourceSpan, hint?: string) {
    const message = hint
      ? `undefined variable '${name}'. ${hint}`
      : `undefined variable '${name}'`;
    super(FORGE_ERROR_CODES.RUNTIME_UNDEFINED_VARIABLE, message, span, {
      name,
    });
    this.name = 'UndefinedVariableError';
    this.variableName = name;
  }
}

/** Call argument count differs from the declared parameter count */
export class ArityError extends RuntimeError {
  readonly expected: number;
  readonly found: number;
  readonly declarationSpan: SourceSpan | undefined;

  constructor(
    expected: number,
    found: number,
    callSpan: SourceSpan | undefined,
    declarationSpan?: SourceSpan
  ) {
    super(
      FORGE_ERROR_CODES.RUNTIME_ARITY_MISMATCH,
      `wrong number of arguments: expected ${expected}, found ${found}`,
      callSpan,
      { expected, found },
      declarationSpan
        ? [
            {
              label: `function declared at ${declarationSpan.start.line}:${declarationSpan.start.column}`,
              span: declarationSpan,
            },
          ]
        : []
    );
    this.name = 'ArityError';
    this.expected = expected;
    this.found = found;
    this.declarationSpan = declarationSpan;
  }
}

/** Scalar index outside a List or Str, or a missing Map key */
export class IndexError extends RuntimeError {
  constructor(message: string, span?: SourceSpan, context?: Record<string, unknown>) {
    super(FORGE_ERROR_CODES.RUNTIME_INDEX_OUT_OF_BOUNDS, message, span, context);
    this.name = 'IndexError';
  }
}

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  NUMBER: 'NUMBER',
  STRING: 'STRING',
  CHAR: 'CHAR',
  TRUE: 'TRUE',
  FALSE: 'FALSE',
  NULL: 'NULL',

  // Identifiers
  IDENTIFIER: 'IDENTIFIER',

  // Keywords
  VAR: 'VAR',
  PRINT: 'PRINT',
  INPUT: 'INPUT',
  IF: 'IF',
  ELSE: 'ELSE',
  WHILE: 'WHILE',
  FOR: 'FOR',
  IN: 'IN',
  RETURN: 'RETURN',
  BREAK: 'BREAK',
  CONTINUE: 'CONTINUE',
  CLONE: 'CLONE',
  MIRROR: 'MIRROR',
  AS: 'AS',
  AND: 'AND',
  OR: 'OR',
  XOR: 'XOR',

  // Assignment
  ASSIGN: 'ASSIGN', // =
  PLUS_ASSIGN: 'PLUS_ASSIGN', // +=
  MINUS_ASSIGN: 'MINUS_ASSIGN', // -=
  STAR_ASSIGN: 'STAR_ASSIGN', // *=
  SLASH_ASSIGN: 'SLASH_ASSIGN', // /=
  PERCENT_ASSIGN: 'PERCENT_ASSIGN', // %=

  // Comparison operators
  EQ: 'EQ', // ==
  NE: 'NE', // !=
  LT: 'LT', // <
  GT: 'GT', // >
  LE: 'LE', // <=
  GE: 'GE', // >=

  // Arithmetic operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  STAR: 'STAR', // *
  SLASH: 'SLASH', // /
  PERCENT: 'PERCENT', // %
  BANG: 'BANG', // !

  // Punctuation
  DOT: 'DOT', // .
  DOT_DOT: 'DOT_DOT', // ..
  COMMA: 'COMMA', // ,
  COLON: 'COLON', // :
  SEMICOLON: 'SEMICOLON', // ;
  PIPE_BAR: 'PIPE_BAR', // |

  // Delimiters
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  LBRACKET: 'LBRACKET', // [
  RBRACKET: 'RBRACKET', // ]

  // Special
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  /** Source text for punctuation/keywords; decoded content for literals */
  readonly value: string;
  readonly span: SourceSpan;
}

// ============================================================
// AST NODE TYPES
// ============================================================

export type NodeType =
  | 'Program'
  | 'VarDecl'
  | 'ExprStatement'
  | 'If'
  | 'While'
  | 'For'
  | 'Print'
  | 'Input'
  | 'Return'
  | 'Break'
  | 'Continue'
  | 'Block'
  | 'RecoveryError'
  | 'NumberLiteral'
  | 'StringLiteral'
  | 'CharLiteral'
  | 'BoolLiteral'
  | 'NullLiteral'
  | 'Identifier'
  | 'Range'
  | 'ListLiteral'
  | 'ListRepeat'
  | 'MapLiteral'
  | 'MapEntry'
  | 'FunctionLiteral'
  | 'Param'
  | 'UnaryExpr'
  | 'BinaryExpr'
  | 'LogicalExpr'
  | 'Call'
  | 'Index'
  | 'Member'
  | 'Assign'
  | 'Clone'
  | 'Mirror'
  | 'Conversion'
  | 'InputExpr';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// PROGRAM STRUCTURE
// ============================================================

export interface ProgramNode extends BaseNode {
  readonly type: 'Program';
  /** May include RecoveryErrorNode entries when parsed with recovery */
  readonly statements: (StatementNode | RecoveryErrorNode)[];
}

/**
 * Placeholder left where recovery skipped a malformed statement.
 * Never executed: hosts refuse to run programs with parse errors.
 */
export interface RecoveryErrorNode extends BaseNode {
  readonly type: 'RecoveryError';
  readonly message: string;
  /** Raw source text that was skipped */
  readonly text: string;
}

// ============================================================
// STATEMENTS
// ============================================================

export type StatementNode =
  | VarDeclNode
  | ExprStatementNode
  | IfNode
  | WhileNode
  | ForNode
  | PrintNode
  | InputNode
  | ReturnNode
  | BreakNode
  | ContinueNode
  | BlockNode;

/** var name = init; */
export interface VarDeclNode extends BaseNode {
  readonly type: 'VarDecl';
  readonly name: string;
  readonly nameSpan: SourceSpan;
  readonly init: ExpressionNode;
}

export interface ExprStatementNode extends BaseNode {
  readonly type: 'ExprStatement';
  readonly expression: ExpressionNode;
  /**
   * Set for a REPL line holding a bare expression with no trailing `;`.
   * The REPL echoes the value of such statements.
   */
  readonly echo: boolean;
}

/** if cond { } else { }. `else if` nests an IfNode inside elseBlock. */
export interface IfNode extends BaseNode {
  readonly type: 'If';
  readonly condition: ExpressionNode;
  readonly thenBlock: BlockNode;
  readonly elseBlock: BlockNode | null;
}

export interface WhileNode extends BaseNode {
  readonly type: 'While';
  readonly condition: ExpressionNode;
  readonly body: BlockNode;
}

/** for binding in iterable { body } */
export interface ForNode extends BaseNode {
  readonly type: 'For';
  readonly binding: string;
  readonly bindingSpan: SourceSpan;
  readonly iterable: ExpressionNode;
  readonly body: BlockNode;
}

export interface PrintNode extends BaseNode {
  readonly type: 'Print';
  readonly expression: ExpressionNode;
}

/** input target; or input prompt, target; */
export interface InputNode extends BaseNode {
  readonly type: 'Input';
  readonly prompt: ExpressionNode | null;
  readonly target: LValueNode;
}

export interface ReturnNode extends BaseNode {
  readonly type: 'Return';
  readonly value: ExpressionNode | null;
}

export interface BreakNode extends BaseNode {
  readonly type: 'Break';
}

export interface ContinueNode extends BaseNode {
  readonly type: 'Continue';
}

/** { statements } with its own scope */
export interface BlockNode extends BaseNode {
  readonly type: 'Block';
  readonly statements: StatementNode[];
}

// ============================================================
// EXPRESSIONS
// ============================================================

export type ExpressionNode =
  | LiteralNode
  | IdentifierNode
  | RangeNode
  | ListLiteralNode
  | ListRepeatNode
  | MapLiteralNode
  | FunctionLiteralNode
  | UnaryExprNode
  | BinaryExprNode
  | LogicalExprNode
  | CallNode
  | IndexNode
  | MemberNode
  | AssignNode
  | CloneNode
  | MirrorNode
  | ConversionNode
  | InputExprNode;

export type LiteralNode =
  | NumberLiteralNode
  | StringLiteralNode
  | CharLiteralNode
  | BoolLiteralNode
  | NullLiteralNode;

export interface NumberLiteralNode extends BaseNode {
  readonly type: 'NumberLiteral';
  readonly value: number;
}

export interface StringLiteralNode extends BaseNode {
  readonly type: 'StringLiteral';
  readonly value: string;
}

export interface CharLiteralNode extends BaseNode {
  readonly type: 'CharLiteral';
  readonly value: string;
}

export interface BoolLiteralNode extends BaseNode {
  readonly type: 'BoolLiteral';
  readonly value: boolean;
}

export interface NullLiteralNode extends BaseNode {
  readonly type: 'NullLiteral';
}

export interface IdentifierNode extends BaseNode {
  readonly type: 'Identifier';
  readonly name: string;
}

/** lo..hi (half-open) */
export interface RangeNode extends BaseNode {
  readonly type: 'Range';
  readonly lo: ExpressionNode;
  readonly hi: ExpressionNode;
}

/** [e1, e2, ...] */
export interface ListLiteralNode extends BaseNode {
  readonly type: 'ListLiteral';
  readonly items: ExpressionNode[];
}

/** [item; count] builds a list of `count` independent copies of `item` */
export interface ListRepeatNode extends BaseNode {
  readonly type: 'ListRepeat';
  readonly item: ExpressionNode;
  readonly count: ExpressionNode;
}

/** [k1: v1, k2: v2] or [:] */
export interface MapLiteralNode extends BaseNode {
  readonly type: 'MapLiteral';
  readonly entries: MapEntryNode[];
}

export interface MapEntryNode extends BaseNode {
  readonly type: 'MapEntry';
  readonly key: ExpressionNode;
  readonly value: ExpressionNode;
}

/**
 * Function literal: |a, b| { body }
 * The node span covers the whole literal and becomes the function value's
 * declaration span.
 */
export interface FunctionLiteralNode extends BaseNode {
  readonly type: 'FunctionLiteral';
  readonly params: ParamNode[];
  readonly body: BlockNode;
}

export interface ParamNode extends BaseNode {
  readonly type: 'Param';
  readonly name: string;
}

export type UnaryOp = '-' | '!';

export interface UnaryExprNode extends BaseNode {
  readonly type: 'UnaryExpr';
  readonly op: UnaryOp;
  readonly operand: ExpressionNode;
}

export type ArithmeticOp = '+' | '-' | '*' | '/' | '%';
export type ComparisonOp = '==' | '!=' | '<' | '<=' | '>' | '>=';
export type BinaryOp = ArithmeticOp | ComparisonOp;

export interface BinaryExprNode extends BaseNode {
  readonly type: 'BinaryExpr';
  readonly op: BinaryOp;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
  /** Span of the operator token itself */
  readonly opSpan: SourceSpan;
}

export type LogicalOp = 'and' | 'or' | 'xor';

export interface LogicalExprNode extends BaseNode {
  readonly type: 'LogicalExpr';
  readonly op: LogicalOp;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

/** callee(args) */
export interface CallNode extends BaseNode {
  readonly type: 'Call';
  readonly callee: ExpressionNode;
  readonly args: ExpressionNode[];
}

/** target[index]; index may be a RangeNode for slices */
export interface IndexNode extends BaseNode {
  readonly type: 'Index';
  readonly target: ExpressionNode;
  readonly index: ExpressionNode;
}

/** target.name */
export interface MemberNode extends BaseNode {
  readonly type: 'Member';
  readonly target: ExpressionNode;
  readonly name: string;
}

/** Expression forms accepted on the left of an assignment */
export type LValueNode = IdentifierNode | IndexNode;

export type AssignOp = '=' | '+=' | '-=' | '*=' | '/=' | '%=';

export interface AssignNode extends BaseNode {
  readonly type: 'Assign';
  readonly target: LValueNode;
  readonly op: AssignOp;
  readonly value: ExpressionNode;
}

/** clone expr: deep copy */
export interface CloneNode extends BaseNode {
  readonly type: 'Clone';
  readonly operand: ExpressionNode;
}

/** mirror expr: alias of the same storage */
export interface MirrorNode extends BaseNode {
  readonly type: 'Mirror';
  readonly operand: ExpressionNode;
}

/** Target types of the `as` operator */
export const CONVERSION_TYPES = ['number', 'string', 'char', 'bool', 'list'] as const;

export type ConversionType = (typeof CONVERSION_TYPES)[number];

/** operand as type: convert a value to another kind */
export interface ConversionNode extends BaseNode {
  readonly type: 'Conversion';
  readonly operand: ExpressionNode;
  readonly targetType: ConversionType;
  readonly typeSpan: SourceSpan;
}

/** input prompt: reads one line from the host */
export interface InputExprNode extends BaseNode {
  readonly type: 'InputExpr';
  readonly prompt: ExpressionNode;
}

// ============================================================
// UNION TYPE FOR ALL NODES
// ============================================================

export type ASTNode =
  | ProgramNode
  | RecoveryErrorNode
  | StatementNode
  | ExpressionNode
  | MapEntryNode
  | ParamNode;

// ============================================================
// PARSE OPTIONS
// ============================================================

/**
 * Options for the parser.
 */
export interface ParseOptions {
  /**
   * Collect errors and resynchronise at statement boundaries instead of
   * throwing on the first error.
   * Default: false.
   */
  readonly recoveryMode?: boolean;
  /**
   * Accept a trailing bare expression without `;` as an echoed expression
   * statement (REPL input).
   * Default: false.
   */
  readonly replMode?: boolean;
}

/**
 * Result of parsing with recovery mode enabled.
 * Contains the AST (which may include RecoveryError entries) and collected errors.
 */
export interface ParseResult {
  /** The parsed AST (may contain RecoveryError entries in statements) */
  readonly ast: ProgramNode;
  /** Errors collected during recovery, in source order (empty if none) */
  readonly errors: ForgeError[];
  /** True if parsing completed without errors */
  readonly success: boolean;
}
