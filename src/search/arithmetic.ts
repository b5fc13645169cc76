// src/search/arithmetic.ts: tiny recursive-descent evaluator for + - * / and parentheses

export const ARITHMETIC_ALLOW_LIST = /^[\d\s.+\-*/()]+$/;

type Token = { kind: 'num'; value: number } | { kind: 'op'; value: string };

function tokenize(expr: string): Token[] | null {
  const tokens: Token[] = [];
  let i = 0;
  while (i < expr.length) {
    const ch = expr[i];
    if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') {
      i++;
      continue;
    }
    if ('+-*/()'.includes(ch)) {
      tokens.push({ kind: 'op', value: ch });
      i++;
      continue;
    }
    const num = /^\d+(?:\.\d+)?|^\.\d+/.exec(expr.slice(i));
    if (!num) return null;
    tokens.push({ kind: 'num', value: Number(num[0]) });
    i += num[0].length;
  }
  return tokens;
}

class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): number | null {
    const value = this.expression();
    if (value === null || this.pos !== this.tokens.length) return null;
    return value;
  }

  private peekOp(): string | null {
    const t = this.tokens[this.pos];
    return t && t.kind === 'op' ? t.value : null;
  }

  // expression := term (('+' | '-') term)*
  private expression(): number | null {
    let left = this.term();
    while (left !== null) {
      const op = this.peekOp();
      if (op !== '+' && op !== '-') break;
      this.pos++;
      const right = this.term();
      if (right === null) return null;
      left = op === '+' ? left + right : left - right;
    }
    return left;
  }

  // term := factor (('*' | '/') factor)*
  private term(): number | null {
    let left = this.factor();
    while (left !== null) {
      const op = this.peekOp();
      if (op !== '*' && op !== '/') break;
      this.pos++;
      const right = this.factor();
      if (right === null) return null;
      if (op === '/' && right === 0) return null;
      left = op === '*' ? left * right : left / right;
    }
    return left;
  }

  // factor := ('+' | '-') factor | number | '(' expression ')'
  private factor(): number | null {
    const t = this.tokens[this.pos];
    if (!t) return null;

    if (t.kind === 'num') {
      this.pos++;
      return t.value;
    }
    if (t.value === '-' || t.value === '+') {
      this.pos++;
      const inner = this.factor();
      if (inner === null) return null;
      return t.value === '-' ? -inner : inner;
    }
    if (t.value === '(') {
      this.pos++;
      const inner = this.expression();
      if (inner === null || this.peekOp() !== ')') return null;
      this.pos++;
      return inner;
    }
    return null;
  }
}

/**
 * Evaluates an allow-listed arithmetic expression.
 * Returns null for anything outside the allow-list, a syntax error or division by zero.
 */
export function evaluateArithmetic(expr: string): number | null {
  if (!ARITHMETIC_ALLOW_LIST.test(expr)) return null;
  const tokens = tokenize(expr);
  if (!tokens || tokens.length === 0) return null;
  const value = new Parser(tokens).parse();
  return value !== null && Number.isFinite(value) ? value : null;
}

/** Rounds half away from zero, so 0.125 -> 0.13. */
export function roundAwayFromZero(value: number, digits: number): number {
  const factor = 10 ** digits;
  const rounded = Math.round(Math.abs(value) * factor + Number.EPSILON) / factor;
  return value < 0 ? -rounded : rounded;
}

/** Integers print plainly, everything else with at most two decimals. */
export function formatArithmeticResult(value: number): string {
  if (Number.isInteger(value)) return String(value);
  return String(roundAwayFromZero(value, 2));
}

/** 34.5 -> "34.50", 1234.5 -> "1,234.50" */
export function formatGrouped2(value: number): string {
  return value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}
