/**
 * Expression Evaluator
 *
 * Lexer and recursive-descent evaluator for `expr`. Operands that need
 * substitution ($var, [command], "quoted" text) are substituted only when the
 * evaluator reaches them, so `&&`, `||` and `?:` skip what they do not need;
 * braced operands are literal. Values are integers (arbitrary precision),
 * doubles or strings, and are formatted back to strings the way the console
 * language does: doubles always carry a fraction (`16.0`), booleans are `1`
 * and `0`.
 *
 * Operator precedence, highest first:
 *   unary - + ! ~ | ** | * / % | + - | << >> | < > <= >= | == != eq ne
 *   | & | ^ | | | && | || | ?:
 */

import { ExpressionError } from '../errors.js';
import { findCloseBrace, findCloseBracket } from './parser.js';

// =============================================================================
// Values
// =============================================================================

type IntValue = { type: 'int'; value: bigint };
type DoubleValue = { type: 'double'; value: number };
type NumericValue = IntValue | DoubleValue;

export type ExprValue = NumericValue | { type: 'string'; value: string };

const int = (value: bigint): IntValue => ({ type: 'int', value });
const double = (value: number): DoubleValue => ({ type: 'double', value });
const bool = (value: boolean): ExprValue => int(value ? 1n : 0n);

const asNumber = (value: NumericValue): number => (value.type === 'int' ? Number(value.value) : value.value);

/** Whole number of a double result, for functions that return integers */
function toInt(value: number, name: string): IntValue {
  if (!Number.isFinite(value)) {
    throw new ExpressionError(`integer value too large to represent in "${name}"`);
  }
  return int(BigInt(value));
}

const INT_PATTERN = /^[+-]?(0[xX][0-9a-fA-F]+|\d+)$/;
const DOUBLE_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Interpret a string operand as a number where it looks like one */
export function classify(text: string): ExprValue {
  const trimmed = text.trim();
  if (INT_PATTERN.test(trimmed)) {
    const magnitude = BigInt(trimmed.replace(/^[+-]/, ''));
    return int(trimmed.startsWith('-') ? -magnitude : magnitude);
  }
  if (DOUBLE_PATTERN.test(trimmed)) {
    return double(Number(trimmed));
  }
  return { type: 'string', value: text };
}

export function formatValue(value: ExprValue): string {
  switch (value.type) {
    case 'int':
      return value.value.toString();
    case 'string':
      return value.value;
    case 'double': {
      if (Number.isNaN(value.value)) return 'NaN';
      if (!Number.isFinite(value.value)) return value.value > 0 ? 'Inf' : '-Inf';
      const text = String(value.value);
      return /^-?\d+$/.test(text) ? `${text}.0` : text;
    }
  }
}

const TRUE_WORDS = ['true', 'yes', 'on'];
const FALSE_WORDS = ['false', 'no', 'off'];

function truthOf(value: ExprValue): boolean {
  if (value.type === 'int') return value.value !== 0n;
  if (value.type === 'double') return value.value !== 0;
  const word = value.value.trim().toLowerCase();
  if (TRUE_WORDS.includes(word)) return true;
  if (FALSE_WORDS.includes(word)) return false;
  throw new ExpressionError(`expected boolean value but got "${value.value}"`);
}

/**
 * Truth value of a string: nonzero numbers, true, yes and on (any case) are
 * true; zero, false, no and off are false.
 *
 * @throws ExpressionError for anything else
 */
export function isTrue(text: string): boolean {
  return truthOf(classify(text));
}

// =============================================================================
// Lexer
// =============================================================================

/**
 * Substitution hooks the interpreter provides
 */
export interface ExprContext {
  variable(name: string): string;
  command(script: string): string;
  /** Full substitution of quoted operands */
  substitute(text: string): string;
}

/** Rejected anywhere in an expression, before or after substitution */
export const FORBIDDEN_IN_EXPRESSIONS: readonly string[] = ['lambda', '__', '\n', ';', 'exec'];

function assertAllowed(text: string): void {
  for (const forbidden of FORBIDDEN_IN_EXPRESSIONS) {
    if (text.includes(forbidden)) {
      throw new ExpressionError(`Tried to evaluate expression with forbidden word: ${JSON.stringify(forbidden)}`);
    }
  }
}

/** Operand value, substituted on first use */
type Operand = () => ExprValue;

type Token =
  | { kind: 'value'; value: Operand }
  | { kind: 'op'; op: string }
  | { kind: 'func'; name: string }
  | { kind: '(' | ')' | ',' };

const OPERATORS = [
  '**', '<<', '>>', '<=', '>=', '==', '!=', '&&', '||',
  '+', '-', '*', '/', '%', '<', '>', '!', '~', '&', '|', '^', '?', ':',
];
const WORD_OPERATORS = ['eq', 'ne'];

function tokenize(expression: string, ctx: ExprContext): Token[] {
  const tokens: Token[] = [];
  const substituted = (substitute: () => string): Operand => () => {
    const text = substitute();
    assertAllowed(text);
    return classify(text);
  };
  const literal = (text: string): Operand => {
    const value = classify(text);
    return () => value;
  };
  let i = 0;

  while (i < expression.length) {
    const c = expression[i];
    const rest = expression.slice(i);

    if (/\s/.test(c)) {
      i++;
      continue;
    }

    const number = /^(0[xX][0-9a-fA-F]+|\d+\.?\d*([eE][+-]?\d+)?|\.\d+([eE][+-]?\d+)?)/.exec(rest);
    if (number) {
      tokens.push({ kind: 'value', value: literal(number[0]) });
      i += number[0].length;
      continue;
    }

    if (c === '$') {
      const braced = /^\$\{([^}]+)\}/.exec(rest);
      const plain = /^\$([A-Za-z0-9_:]+)/.exec(rest);
      const match = braced ?? plain;
      if (!match) {
        throw new ExpressionError(`invalid character "$" in expression "${expression}"`);
      }
      const name = match[1];
      tokens.push({ kind: 'value', value: substituted(() => ctx.variable(name)) });
      i += match[0].length;
      continue;
    }

    if (c === '[') {
      const close = findCloseBracket(expression, i);
      if (close < 0) throw new ExpressionError('missing close-bracket in expression');
      const script = expression.slice(i + 1, close);
      tokens.push({ kind: 'value', value: substituted(() => ctx.command(script)) });
      i = close + 1;
      continue;
    }

    if (c === '"') {
      let j = i + 1;
      while (j < expression.length && expression[j] !== '"') {
        if (expression[j] === '\\') j++;
        j++;
      }
      if (j >= expression.length) throw new ExpressionError('missing close-quote in expression');
      const text = expression.slice(i + 1, j);
      tokens.push({ kind: 'value', value: substituted(() => ctx.substitute(text)) });
      i = j + 1;
      continue;
    }

    if (c === '{') {
      const close = findCloseBrace(expression, i);
      if (close < 0) throw new ExpressionError('missing close-brace in expression');
      tokens.push({ kind: 'value', value: literal(expression.slice(i + 1, close)) });
      i = close + 1;
      continue;
    }

    if (c === '(' || c === ')' || c === ',') {
      tokens.push({ kind: c });
      i++;
      continue;
    }

    const word = /^[A-Za-z_][A-Za-z0-9_]*/.exec(rest);
    if (word) {
      const name = word[0];
      i += name.length;
      if (WORD_OPERATORS.includes(name)) {
        tokens.push({ kind: 'op', op: name });
      } else if (/^\s*\(/.test(expression.slice(i))) {
        tokens.push({ kind: 'func', name });
      } else if (TRUE_WORDS.includes(name.toLowerCase()) || FALSE_WORDS.includes(name.toLowerCase())) {
        tokens.push({ kind: 'value', value: () => ({ type: 'string', value: name }) });
      } else {
        throw new ExpressionError(`invalid bareword "${name}" in expression "${expression}"`);
      }
      continue;
    }

    const op = OPERATORS.find((candidate) => rest.startsWith(candidate));
    if (op === undefined) {
      throw new ExpressionError(`invalid character "${c}" in expression "${expression}"`);
    }
    tokens.push({ kind: 'op', op });
    i += op.length;
  }

  return tokens;
}

// =============================================================================
// Parser
// =============================================================================

type Node =
  | { kind: 'value'; value: Operand }
  | { kind: 'unary'; op: string; operand: Node }
  | { kind: 'binary'; op: string; left: Node; right: Node }
  | { kind: 'ternary'; condition: Node; then: Node; otherwise: Node }
  | { kind: 'call'; name: string; args: Node[] };

const BINARY_LEVELS: readonly (readonly string[])[] = [
  ['||'],
  ['&&'],
  ['|'],
  ['^'],
  ['&'],
  ['==', '!=', 'eq', 'ne'],
  ['<', '>', '<=', '>='],
  ['<<', '>>'],
  ['+', '-'],
  ['*', '/', '%'],
];

class ExpressionParser {
  private pos = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly source: string
  ) {}

  parse(): Node {
    if (this.tokens.length === 0) {
      throw new ExpressionError('empty expression');
    }
    const node = this.parseTernary();
    if (this.pos < this.tokens.length) {
      throw new ExpressionError(`syntax error in expression "${this.source}"`);
    }
    return node;
  }

  private peekOp(): string | null {
    const token = this.tokens[this.pos];
    return token !== undefined && token.kind === 'op' ? token.op : null;
  }

  private expect(kind: ')' | ',' | '('): void {
    const token = this.tokens[this.pos];
    if (token === undefined || token.kind !== kind) {
      throw new ExpressionError(`expected "${kind}" in expression "${this.source}"`);
    }
    this.pos++;
  }

  private parseTernary(): Node {
    const condition = this.parseBinary(0);
    if (this.peekOp() !== '?') {
      return condition;
    }
    this.pos++;
    const then = this.parseTernary();
    if (this.peekOp() !== ':') {
      throw new ExpressionError(`missing ":" in expression "${this.source}"`);
    }
    this.pos++;
    const otherwise = this.parseTernary();
    return { kind: 'ternary', condition, then, otherwise };
  }

  private parseBinary(level: number): Node {
    const operators = BINARY_LEVELS[level];
    if (operators === undefined) {
      return this.parsePower();
    }
    let left = this.parseBinary(level + 1);
    let op = this.peekOp();
    while (op !== null && operators.includes(op)) {
      this.pos++;
      const right = this.parseBinary(level + 1);
      left = { kind: 'binary', op, left, right };
      op = this.peekOp();
    }
    return left;
  }

  private parsePower(): Node {
    const base = this.parseUnary();
    if (this.peekOp() === '**') {
      this.pos++;
      return { kind: 'binary', op: '**', left: base, right: this.parsePower() };
    }
    return base;
  }

  private parseUnary(): Node {
    const op = this.peekOp();
    if (op === '-' || op === '+' || op === '!' || op === '~') {
      this.pos++;
      return { kind: 'unary', op, operand: this.parseUnary() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): Node {
    const token = this.tokens[this.pos];
    if (token === undefined) {
      throw new ExpressionError(`missing operand in expression "${this.source}"`);
    }
    this.pos++;

    switch (token.kind) {
      case 'value':
        return { kind: 'value', value: token.value };
      case '(': {
        const inner = this.parseTernary();
        this.expect(')');
        return inner;
      }
      case 'func': {
        this.expect('(');
        const args: Node[] = [];
        if (this.tokens[this.pos]?.kind !== ')') {
          args.push(this.parseTernary());
          while (this.tokens[this.pos]?.kind === ',') {
            this.pos++;
            args.push(this.parseTernary());
          }
        }
        this.expect(')');
        return { kind: 'call', name: token.name, args };
      }
      default:
        throw new ExpressionError(`syntax error in expression "${this.source}"`);
    }
  }
}

// =============================================================================
// Evaluation
// =============================================================================

function numeric(value: ExprValue, op: string): NumericValue {
  if (value.type !== 'string') {
    return value;
  }
  const reclassified = classify(value.value);
  if (reclassified.type === 'string') {
    throw new ExpressionError(`can't use non-numeric string "${value.value}" as operand of "${op}"`);
  }
  return reclassified;
}

function integer(value: ExprValue, op: string): bigint {
  const n = numeric(value, op);
  if (n.type !== 'int') {
    throw new ExpressionError(`can't use floating-point value as operand of "${op}"`);
  }
  return n.value;
}

/** Integer division rounding towards minus infinity */
function floorDivide(a: bigint, b: bigint): bigint {
  const quotient = a / b;
  return a % b !== 0n && (a < 0n) !== (b < 0n) ? quotient - 1n : quotient;
}

function integerArithmetic(op: string, a: bigint, b: bigint): ExprValue {
  switch (op) {
    case '+':
      return int(a + b);
    case '-':
      return int(a - b);
    case '*':
      return int(a * b);
    case '/':
      if (b === 0n) throw new ExpressionError('divide by zero');
      return int(floorDivide(a, b));
    case '%':
      if (b === 0n) throw new ExpressionError('divide by zero');
      return int(a - b * floorDivide(a, b));
    case '**':
      return b >= 0n ? int(a ** b) : double(Number(a) ** Number(b));
    default:
      throw new ExpressionError(`unknown operator "${op}"`);
  }
}

function arithmetic(op: string, leftValue: ExprValue, rightValue: ExprValue): ExprValue {
  const a = numeric(leftValue, op);
  const b = numeric(rightValue, op);
  if (a.type === 'int' && b.type === 'int') {
    return integerArithmetic(op, a.value, b.value);
  }
  const x = asNumber(a);
  const y = asNumber(b);

  switch (op) {
    case '+':
      return double(x + y);
    case '-':
      return double(x - y);
    case '*':
      return double(x * y);
    case '/':
      if (y === 0) throw new ExpressionError('divide by zero');
      return double(x / y);
    case '%':
      throw new ExpressionError(`can't use floating-point value as operand of "${op}"`);
    case '**':
      return double(x ** y);
    default:
      throw new ExpressionError(`unknown operator "${op}"`);
  }
}

function shift(op: string, left: ExprValue, right: ExprValue): ExprValue {
  const value = integer(left, op);
  const count = integer(right, op);
  if (count < 0n) {
    throw new ExpressionError('negative shift argument');
  }
  return int(op === '<<' ? value << count : value >> count);
}

function compare(op: string, left: ExprValue, right: ExprValue): ExprValue {
  let order: number;
  const a = left.type === 'string' ? classify(left.value) : left;
  const b = right.type === 'string' ? classify(right.value) : right;
  if (a.type === 'int' && b.type === 'int') {
    order = a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
  } else if (a.type !== 'string' && b.type !== 'string') {
    order = asNumber(a) - asNumber(b);
  } else {
    const x = formatValue(left);
    const y = formatValue(right);
    order = x < y ? -1 : x > y ? 1 : 0;
  }
  switch (op) {
    case '==':
      return bool(order === 0);
    case '!=':
      return bool(order !== 0);
    case '<':
      return bool(order < 0);
    case '>':
      return bool(order > 0);
    case '<=':
      return bool(order <= 0);
    default:
      return bool(order >= 0);
  }
}

type MathFunction = (args: NumericValue[]) => ExprValue;

function unaryDouble(fn: (x: number) => number): { arity: number; fn: MathFunction } {
  return { arity: 1, fn: ([x]) => double(fn(asNumber(x))) };
}

const MATH_FUNCTIONS: Record<string, { arity: number | 'variadic'; fn: MathFunction }> = {
  abs: {
    arity: 1,
    fn: ([x]) => (x.type === 'int' ? int(x.value < 0n ? -x.value : x.value) : double(Math.abs(x.value))),
  },
  sqrt: unaryDouble(Math.sqrt),
  sin: unaryDouble(Math.sin),
  cos: unaryDouble(Math.cos),
  tan: unaryDouble(Math.tan),
  exp: unaryDouble(Math.exp),
  log: unaryDouble(Math.log),
  log10: unaryDouble(Math.log10),
  floor: unaryDouble(Math.floor),
  ceil: unaryDouble(Math.ceil),
  hypot: { arity: 2, fn: ([x, y]) => double(Math.hypot(asNumber(x), asNumber(y))) },
  atan2: { arity: 2, fn: ([y, x]) => double(Math.atan2(asNumber(y), asNumber(x))) },
  pow: { arity: 2, fn: ([x, y]) => double(asNumber(x) ** asNumber(y)) },
  round: {
    arity: 1,
    fn: ([x]) => (x.type === 'int' ? x : toInt(Math.sign(x.value) * Math.round(Math.abs(x.value)), 'round')),
  },
  int: { arity: 1, fn: ([x]) => (x.type === 'int' ? x : toInt(Math.trunc(x.value), 'int')) },
  double: { arity: 1, fn: ([x]) => double(asNumber(x)) },
  min: {
    arity: 'variadic',
    fn: (args) => args.reduce((best, x) => (asNumber(x) < asNumber(best) ? x : best)),
  },
  max: {
    arity: 'variadic',
    fn: (args) => args.reduce((best, x) => (asNumber(x) > asNumber(best) ? x : best)),
  },
};

function call(name: string, args: ExprValue[]): ExprValue {
  const definition = MATH_FUNCTIONS[name];
  if (definition === undefined) {
    throw new ExpressionError(`unknown math function "${name}"`);
  }
  const expected = definition.arity;
  if (expected === 'variadic' ? args.length === 0 : args.length < expected) {
    throw new ExpressionError(`too few arguments for math function "${name}"`);
  }
  if (expected !== 'variadic' && args.length > expected) {
    throw new ExpressionError(`too many arguments for math function "${name}"`);
  }
  return definition.fn(args.map((arg) => numeric(arg, name)));
}

function evaluateNode(node: Node): ExprValue {
  switch (node.kind) {
    case 'value':
      return node.value();

    case 'ternary':
      return truthOf(evaluateNode(node.condition)) ? evaluateNode(node.then) : evaluateNode(node.otherwise);

    case 'call':
      return call(node.name, node.args.map(evaluateNode));

    case 'unary': {
      const operand = evaluateNode(node.operand);
      switch (node.op) {
        case '!':
          return bool(!truthOf(operand));
        case '~':
          return int(~integer(operand, '~'));
        case '-': {
          const n = numeric(operand, '-');
          return n.type === 'int' ? int(-n.value) : double(-n.value);
        }
        default:
          return numeric(operand, '+');
      }
    }

    case 'binary': {
      const { op } = node;
      // The right operand is only substituted when it decides the result
      if (op === '&&') {
        return bool(truthOf(evaluateNode(node.left)) && truthOf(evaluateNode(node.right)));
      }
      if (op === '||') {
        return bool(truthOf(evaluateNode(node.left)) || truthOf(evaluateNode(node.right)));
      }
      const left = evaluateNode(node.left);
      const right = evaluateNode(node.right);
      switch (op) {
        case 'eq':
          return bool(formatValue(left) === formatValue(right));
        case 'ne':
          return bool(formatValue(left) !== formatValue(right));
        case '==':
        case '!=':
        case '<':
        case '>':
        case '<=':
        case '>=':
          return compare(op, left, right);
        case '&':
          return int(integer(left, op) & integer(right, op));
        case '|':
          return int(integer(left, op) | integer(right, op));
        case '^':
          return int(integer(left, op) ^ integer(right, op));
        case '<<':
        case '>>':
          return shift(op, left, right);
        default:
          return arithmetic(op, left, right);
      }
    }
  }
}

/**
 * Evaluate an expression and format the result.
 *
 * @throws ExpressionError for syntax errors, bad operands and forbidden input
 */
export function evaluateExpression(expression: string, ctx: ExprContext): string {
  assertAllowed(expression);
  const tokens = tokenize(expression, ctx);
  const tree = new ExpressionParser(tokens, expression).parse();
  return formatValue(evaluateNode(tree));
}
