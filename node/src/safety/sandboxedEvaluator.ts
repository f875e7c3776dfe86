/**
 * Arithmetic evaluator for untrusted input. The expression is tokenized,
 * parsed into a tree and the tree is evaluated; nothing reaches a code
 * execution facility.
 *
 * Grammar:
 *   expr    := term (('+' | '-') term)*
 *   term    := unary (('*' | '/' | '%') unary)*
 *   unary   := ('+' | '-') unary | power
 *   power   := primary (('^' | '**') unary)?
 *   primary := NUMBER | CONSTANT | FUNCTION '(' expr ')' | '(' expr ')'
 */

export type EvalErrorKind = 'rejected' | 'division_by_zero' | 'domain' | 'overflow';

export interface EvalError {
  kind: EvalErrorKind;
  message: string;
}

export type EvalResult = { success: true; value: number } | { success: false; error: EvalError };

export type ExprNode =
  | { type: 'number'; value: number }
  | { type: 'unary'; op: '+' | '-'; operand: ExprNode }
  | { type: 'binary'; op: BinaryOp; left: ExprNode; right: ExprNode }
  | { type: 'call'; fn: MathFunction; arg: ExprNode };

type BinaryOp = '+' | '-' | '*' | '/' | '%' | '^';

type Token =
  | { kind: 'number'; value: number; pos: number }
  | { kind: 'ident'; name: string; pos: number }
  | { kind: 'op'; op: BinaryOp; pos: number }
  | { kind: 'lparen'; pos: number }
  | { kind: 'rparen'; pos: number };

const FUNCTIONS = {
  sqrt: Math.sqrt,
  cbrt: Math.cbrt,
  sin: Math.sin,
  cos: Math.cos,
  tan: Math.tan,
  asin: Math.asin,
  acos: Math.acos,
  atan: Math.atan,
  log: Math.log,
  ln: Math.log,
  log10: Math.log10,
  log2: Math.log2,
  exp: Math.exp,
  abs: Math.abs,
  floor: Math.floor,
  ceil: Math.ceil,
  round: Math.round,
} as const;

export type MathFunction = keyof typeof FUNCTIONS;

const CONSTANTS: Record<string, number> = { pi: Math.PI, e: Math.E };

const MAX_EXPRESSION_LENGTH = 512;
const MAX_DEPTH = 64;

class EvalFailure extends Error {
  constructor(
    readonly kind: EvalErrorKind,
    message: string,
  ) {
    super(message);
  }
}

function isMathFunction(name: string): name is MathFunction {
  return Object.prototype.hasOwnProperty.call(FUNCTIONS, name);
}

function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    const ch = input[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    const num = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/.exec(input.slice(i));
    if (num) {
      tokens.push({ kind: 'number', value: Number(num[0]), pos: i });
      i += num[0].length;
      continue;
    }

    const ident = /^[A-Za-z_][A-Za-z0-9_]*/.exec(input.slice(i));
    if (ident) {
      tokens.push({ kind: 'ident', name: ident[0], pos: i });
      i += ident[0].length;
      continue;
    }

    if (ch === '*' && input[i + 1] === '*') {
      tokens.push({ kind: 'op', op: '^', pos: i });
      i += 2;
      continue;
    }
    if (ch === '+' || ch === '-' || ch === '*' || ch === '/' || ch === '%' || ch === '^') {
      tokens.push({ kind: 'op', op: ch, pos: i });
      i++;
      continue;
    }
    if (ch === '(') {
      tokens.push({ kind: 'lparen', pos: i });
      i++;
      continue;
    }
    if (ch === ')') {
      tokens.push({ kind: 'rparen', pos: i });
      i++;
      continue;
    }

    throw new EvalFailure('rejected', `Unexpected character '${ch}' at position ${i}`);
  }

  return tokens;
}

class Parser {
  private index = 0;
  private depth = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): ExprNode {
    if (this.tokens.length === 0) throw new EvalFailure('rejected', 'Empty expression');
    const node = this.expr();
    const extra = this.peek();
    if (extra) throw new EvalFailure('rejected', `Unexpected token at position ${extra.pos}`);
    return node;
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private next(): Token | undefined {
    return this.tokens[this.index++];
  }

  private nested<T>(fn: () => T): T {
    if (++this.depth > MAX_DEPTH) throw new EvalFailure('rejected', 'Expression is nested too deeply');
    try {
      return fn();
    } finally {
      this.depth--;
    }
  }

  private expr(): ExprNode {
    let left = this.term();
    while (true) {
      const tok = this.peek();
      if (tok?.kind !== 'op' || (tok.op !== '+' && tok.op !== '-')) return left;
      this.index++;
      left = { type: 'binary', op: tok.op, left, right: this.term() };
    }
  }

  private term(): ExprNode {
    let left = this.unary();
    while (true) {
      const tok = this.peek();
      if (tok?.kind !== 'op' || (tok.op !== '*' && tok.op !== '/' && tok.op !== '%')) return left;
      this.index++;
      left = { type: 'binary', op: tok.op, left, right: this.unary() };
    }
  }

  private unary(): ExprNode {
    const tok = this.peek();
    if (tok?.kind === 'op' && (tok.op === '+' || tok.op === '-')) {
      this.index++;
      const op = tok.op;
      return this.nested<ExprNode>(() => ({ type: 'unary', op, operand: this.unary() }));
    }
    return this.power();
  }

  private power(): ExprNode {
    const base = this.primary();
    const tok = this.peek();
    if (tok?.kind === 'op' && tok.op === '^') {
      this.index++;
      return this.nested<ExprNode>(() => ({ type: 'binary', op: '^', left: base, right: this.unary() }));
    }
    return base;
  }

  private primary(): ExprNode {
    const tok = this.next();
    if (!tok) throw new EvalFailure('rejected', 'Unexpected end of expression');

    switch (tok.kind) {
      case 'number':
        return { type: 'number', value: tok.value };
      case 'lparen': {
        const inner = this.nested(() => this.expr());
        this.expect('rparen');
        return inner;
      }
      case 'ident': {
        const name = tok.name.toLowerCase();
        if (name in CONSTANTS && this.peek()?.kind !== 'lparen') {
          return { type: 'number', value: CONSTANTS[name] };
        }
        if (!isMathFunction(name)) {
          throw new EvalFailure('rejected', `Unknown identifier '${tok.name}'`);
        }
        this.expect('lparen');
        const arg = this.nested(() => this.expr());
        this.expect('rparen');
        return { type: 'call', fn: name, arg };
      }
      default:
        throw new EvalFailure('rejected', `Unexpected token at position ${tok.pos}`);
    }
  }

  private expect(kind: 'lparen' | 'rparen'): void {
    const tok = this.next();
    if (tok?.kind !== kind) {
      throw new EvalFailure('rejected', `Expected '${kind === 'lparen' ? '(' : ')'}'`);
    }
  }
}

function checkDomain(fn: MathFunction, x: number): void {
  switch (fn) {
    case 'sqrt':
      if (x < 0) throw new EvalFailure('domain', 'sqrt of a negative number');
      return;
    case 'log':
    case 'ln':
    case 'log10':
    case 'log2':
      if (x <= 0) throw new EvalFailure('domain', `${fn} of a non-positive number`);
      return;
    case 'asin':
    case 'acos':
      if (x < -1 || x > 1) throw new EvalFailure('domain', `${fn} argument outside [-1, 1]`);
      return;
    default:
      return;
  }
}

export function evaluateTree(node: ExprNode, maxMagnitude = Number.MAX_VALUE): number {
  const value = evaluateNode(node);
  if (Number.isNaN(value)) throw new EvalFailure('domain', 'Result is not a real number');
  if (!Number.isFinite(value) || Math.abs(value) > maxMagnitude) {
    throw new EvalFailure('overflow', 'Result is too large');
  }
  return value;

  function evaluateNode(n: ExprNode): number {
    switch (n.type) {
      case 'number':
        return n.value;
      case 'unary': {
        const v = evaluateNode(n.operand);
        return n.op === '-' ? -v : v;
      }
      case 'call': {
        const arg = evaluateNode(n.arg);
        checkDomain(n.fn, arg);
        return guard(FUNCTIONS[n.fn](arg));
      }
      case 'binary':
        return applyBinary(n.op, evaluateNode(n.left), evaluateNode(n.right));
    }
  }

  function applyBinary(op: BinaryOp, l: number, r: number): number {
    switch (op) {
      case '+':
        return guard(l + r);
      case '-':
        return guard(l - r);
      case '*':
        return guard(l * r);
      case '/':
        if (r === 0) throw new EvalFailure('division_by_zero', 'Division by zero');
        return guard(l / r);
      case '%':
        if (r === 0) throw new EvalFailure('division_by_zero', 'Modulo by zero');
        return guard(l % r);
      case '^':
        if (l === 0 && r < 0) throw new EvalFailure('division_by_zero', 'Zero raised to a negative power');
        return guard(l ** r);
      default:
        throw new EvalFailure('rejected', `Unsupported operator ${String(op)}`);
    }
  }

  function guard(v: number): number {
    if (Number.isNaN(v)) throw new EvalFailure('domain', 'Result is not a real number');
    if (!Number.isFinite(v)) throw new EvalFailure('overflow', 'Result is too large');
    return v;
  }
}

export function parseExpression(expression: string): ExprNode {
  if (expression.length > MAX_EXPRESSION_LENGTH) {
    throw new EvalFailure('rejected', `Expression exceeds ${MAX_EXPRESSION_LENGTH} characters`);
  }
  return new Parser(tokenize(expression)).parse();
}

export function evaluate(expression: string, maxMagnitude?: number): EvalResult {
  try {
    const tree = parseExpression(expression);
    return { success: true, value: evaluateTree(tree, maxMagnitude) };
  } catch (err) {
    if (err instanceof EvalFailure) {
      return { success: false, error: { kind: err.kind, message: err.message } };
    }
    throw err;
  }
}

/** True when the text is nothing but an arithmetic expression with at least one operator. */
export function looksLikeExpression(text: string): boolean {
  const trimmed = text.trim();
  if (!/[+\-*/^%]/.test(trimmed.replace(/^[+-]/, ''))) return false;
  try {
    parseExpression(trimmed);
    return /\d/.test(trimmed);
  } catch {
    return false;
  }
}

/** Integers print as-is; other values are rounded to 12 significant digits. */
export function formatResult(value: number): string {
  if (Number.isInteger(value)) return String(value);
  return String(Number(value.toPrecision(12)));
}
