import type { OperationContext, OperationOutcome } from '../../types.js';

import { OperationExecutionError } from '../operation-errors.js';
import { BaseOperation, fail, succeed } from '../types.js';

type Token =
  | { kind: 'number'; value: number }
  | { kind: 'ident'; value: string }
  | { kind: 'op'; value: string };

const FUNCTIONS: Readonly<Record<string, (...args: number[]) => number>> = {
  sqrt: Math.sqrt,
  abs: Math.abs,
  round: Math.round,
  floor: Math.floor,
  ceil: Math.ceil,
  min: Math.min,
  max: Math.max,
  log: Math.log10,
  ln: Math.log,
  sin: Math.sin,
  cos: Math.cos,
  tan: Math.tan,
};

const CONSTANTS: Readonly<Record<string, number>> = {
  pi: Math.PI,
  e: Math.E,
};

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < expression.length) {
    const ch = expression[i];
    if (/\s/.test(ch)) {
      i += 1;
      continue;
    }
    const numberMatch = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/.exec(expression.slice(i));
    if (numberMatch !== null) {
      tokens.push({ kind: 'number', value: Number(numberMatch[0]) });
      i += numberMatch[0].length;
      continue;
    }
    const identMatch = /^[A-Za-z_]\w*/.exec(expression.slice(i));
    if (identMatch !== null) {
      tokens.push({ kind: 'ident', value: identMatch[0].toLowerCase() });
      i += identMatch[0].length;
      continue;
    }
    if (expression.startsWith('**', i)) {
      tokens.push({ kind: 'op', value: '^' });
      i += 2;
      continue;
    }
    if ('+-*/%^(),'.includes(ch)) {
      tokens.push({ kind: 'op', value: ch });
      i += 1;
      continue;
    }
    throw new Error(`Unexpected character '${ch}' at position ${String(i + 1)}`);
  }
  return tokens;
}

class ExpressionParser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): number {
    if (this.tokens.length === 0) throw new Error('Empty expression');
    const value = this.expression();
    const rest = this.peek();
    if (rest !== undefined) throw new Error(`Unexpected token '${String(rest.value)}'`);
    return value;
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private isOp(value: string): boolean {
    const token = this.peek();
    return token?.kind === 'op' && token.value === value;
  }

  private expect(value: string): void {
    if (!this.isOp(value)) throw new Error(`Expected '${value}'`);
    this.index += 1;
  }

  private expression(): number {
    let value = this.term();
    while (this.isOp('+') || this.isOp('-')) {
      const op = this.tokens[this.index].value;
      this.index += 1;
      const right = this.term();
      value = op === '+' ? value + right : value - right;
    }
    return value;
  }

  private term(): number {
    let value = this.unary();
    while (this.isOp('*') || this.isOp('/') || this.isOp('%')) {
      const op = this.tokens[this.index].value;
      this.index += 1;
      const right = this.unary();
      if ((op === '/' || op === '%') && right === 0) throw new Error('Division by zero');
      if (op === '*') value *= right;
      else if (op === '/') value /= right;
      else value %= right;
    }
    return value;
  }

  private unary(): number {
    if (this.isOp('-')) {
      this.index += 1;
      return -this.unary();
    }
    if (this.isOp('+')) {
      this.index += 1;
      return this.unary();
    }
    return this.power();
  }

  // Right-associative; -2^2 is -(2^2)
  private power(): number {
    const base = this.primary();
    if (this.isOp('^')) {
      this.index += 1;
      return base ** this.unary();
    }
    return base;
  }

  private primary(): number {
    const token = this.peek();
    if (token === undefined) throw new Error('Unexpected end of expression');
    if (token.kind === 'number') {
      this.index += 1;
      return token.value;
    }
    if (token.kind === 'ident') {
      this.index += 1;
      const fn = FUNCTIONS[token.value];
      if (fn !== undefined) {
        this.expect('(');
        const args = [this.expression()];
        while (this.isOp(',')) {
          this.index += 1;
          args.push(this.expression());
        }
        this.expect(')');
        return fn(...args);
      }
      const constant = CONSTANTS[token.value];
      if (constant !== undefined) return constant;
      throw new Error(`Unknown identifier '${token.value}'`);
    }
    if (token.value === '(') {
      this.index += 1;
      const value = this.expression();
      this.expect(')');
      return value;
    }
    throw new Error(`Unexpected token '${token.value}'`);
  }
}

/** Arithmetic only: + - * / % ^, parentheses, unary signs, a few Math functions. */
export function evaluateExpression(expression: string): number {
  const value = new ExpressionParser(tokenize(expression)).parse();
  if (!Number.isFinite(value)) throw new Error('Result is not a finite number');
  return value;
}

export function formatNumber(value: number): string {
  if (Number.isInteger(value)) return String(value);
  return String(Number(value.toPrecision(12)));
}

export class MathEvaluatorOperation extends BaseOperation {
  readonly name = 'MathEvaluator';
  readonly description = 'Evaluates arithmetic expressions safely (no code execution)';
  override readonly aliases = ['Calculator', 'Math'];
  readonly capabilities = ['math:evaluate', 'arithmetic:calculate'];
  readonly inputSchema = {
    type: 'object',
    properties: { expression: { type: 'string', minLength: 1 } },
    required: ['expression'],
  };

  run(context: Readonly<OperationContext>): Promise<OperationOutcome> {
    const expression = context.parameters.expression;
    if (typeof expression !== 'string' || expression.trim().length === 0) {
      return Promise.reject(new OperationExecutionError('invalid_parameters', "invalid_parameters: 'expression' (string) is required"));
    }
    try {
      const value = evaluateExpression(expression);
      return Promise.resolve(succeed(`${expression.trim()} = ${formatNumber(value)}`));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      // A malformed expression fails the same way on every retry
      return Promise.resolve(fail(`Error evaluating expression: ${message}`, 'invalid_parameters'));
    }
  }
}
