import { describe, it, expect } from 'vitest';
import { MAX_DEPTH, parse, parseExpression } from './parser';
import { tokenize } from './tokens';
import type { Node } from './types';
import { ExpressionSyntaxError, LexError } from './errors';

// Fully parenthesized prefix form, so tests see the exact tree shape
function sexpr(node: Node): string {
  switch (node.type) {
    case 'Constant':
      return String(node.value);
    case 'Variable':
      return node.name;
    case 'UnaryOp':
      return `(neg ${sexpr(node.operand)})`;
    case 'BinaryOp':
      return `(${node.operator} ${sexpr(node.left)} ${sexpr(node.right)})`;
    case 'Call':
      return `(${[node.name, ...node.args.map(sexpr)].join(' ')})`;
  }
}

function syntaxError(source: string): ExpressionSyntaxError {
  try {
    parseExpression(source);
  } catch (e) {
    if (e instanceof ExpressionSyntaxError) return e;
    throw e;
  }
  throw new Error(`Expected '${source}' to fail`);
}

describe('Expression Parser', () => {
  const shape = (source: string) => sexpr(parseExpression(source));

  it('parses atoms', () => {
    expect(shape('42')).toBe('42');
    expect(shape('x')).toBe('x');
    expect(shape('1.5e-3 * x')).toBe('(* 0.0015 x)');
  });

  it('respects operator precedence', () => {
    expect(shape('1 + 2 * 3')).toBe('(+ 1 (* 2 3))');
    expect(shape('(1 + 2) * 3')).toBe('(* (+ 1 2) 3)');
    expect(shape('2 * x^2')).toBe('(* 2 (^ x 2))');
  });

  it('associates additive and multiplicative operators to the left', () => {
    expect(shape('1 - 2 - 3')).toBe('(- (- 1 2) 3)');
    expect(shape('8 / 4 / 2')).toBe('(/ (/ 8 4) 2)');
  });

  it('associates exponentiation to the right', () => {
    expect(shape('2^3^2')).toBe('(^ 2 (^ 3 2))');
  });

  it('binds unary minus looser than exponentiation', () => {
    expect(shape('-x^2')).toBe('(neg (^ x 2))');
    expect(shape('2^-x')).toBe('(^ 2 (neg x))');
    expect(shape('--x')).toBe('(neg (neg x))');
    expect(shape('-2 * x')).toBe('(* (neg 2) x)');
  });

  it('parses function calls with ordered arguments', () => {
    expect(shape('sin(x)*exp(-x^2)')).toBe('(* (sin x) (exp (neg (^ x 2))))');
    expect(shape('max(x, 1 + 2)')).toBe('(max x (+ 1 2))');
    expect(shape('f()')).toBe('(f)');
    expect(shape('f(1, 2, 3)')).toBe('(f 1 2 3)');
  });

  it('records node positions', () => {
    const root = parseExpression('x + sin(2)');
    expect(root).toEqual({
      type: 'BinaryOp',
      operator: '+',
      position: 2,
      left: { type: 'Variable', name: 'x', position: 0 },
      right: {
        type: 'Call',
        name: 'sin',
        position: 4,
        args: [{ type: 'Constant', value: 2, position: 8 }],
      },
    });
  });

  it('rejects unmatched parentheses', () => {
    const open = syntaxError('sin(x');
    expect(open.expected).toBe("')'");
    expect(open.found).toBe('end of input');
    expect(open.position).toBe(5);

    const close = syntaxError('(3 + 2))^2');
    expect(close.expected).toBe('end of input');
    expect(close.found).toBe("')'");
    expect(close.position).toBe(7);
  });

  it('rejects empty expressions', () => {
    const error = syntaxError('');
    expect(error.reason).toBe('Empty expression');
    expect(error.position).toBe(0);
    expect(() => parseExpression('   ')).toThrow(ExpressionSyntaxError);
  });

  it('rejects a missing operand', () => {
    const error = syntaxError('3 + ');
    expect(error.expected).toBe('expression');
    expect(error.found).toBe('end of input');
    expect(error.position).toBe(4);
  });

  it('rejects trailing tokens', () => {
    const error = syntaxError('2 3');
    expect(error.reason).toBe("Expected end of input but found '3'");
    expect(error.position).toBe(2);
  });

  it('rejects structurally missing arguments', () => {
    expect(syntaxError('sin(x,)').position).toBe(6);
    expect(syntaxError('sin(,x)').found).toBe("','");
  });

  it('rejects number literals that overflow', () => {
    const error = syntaxError('1e999');
    expect(error.reason).toBe('Number out of range: 1e999');
    expect(error.position).toBe(0);
  });

  it('limits how deeply expressions nest', () => {
    const nested = (depth: number) => '('.repeat(depth) + 'x' + ')'.repeat(depth);
    expect(shape(nested(MAX_DEPTH - 1))).toBe('x');

    const parens = syntaxError(nested(5000));
    expect(parens.reason).toBe('Expression is nested more than 200 levels deep');
    expect(parens.found).toBe("'('");
    expect(parens.position).toBe(200);

    expect(() => parseExpression('-'.repeat(MAX_DEPTH - 1) + 'x')).not.toThrow();
    const minuses = syntaxError('-'.repeat(20000) + 'x');
    expect(minuses.found).toBe("'-'");
    expect(minuses.position).toBe(200);

    // Long chains of operators build tall trees without nesting
    expect(() => parseExpression('x' + '+x'.repeat(MAX_DEPTH - 1))).not.toThrow();
    const chain = syntaxError('x' + '*x'.repeat(MAX_DEPTH));
    expect(chain.found).toBe('end of input');
    expect(chain.position).toBe(401);
  });

  it('passes lexical errors through', () => {
    expect(() => parseExpression('x $ 1')).toThrow(LexError);
  });

  it('parses a bare token stream', () => {
    expect(sexpr(parse(tokenize('x*2')))).toBe('(* x 2)');

    // Without the source, errors at the end point just past the last token
    try {
      parse(tokenize('(1'));
    } catch (e) {
      expect(e).toBeInstanceOf(ExpressionSyntaxError);
      if (e instanceof ExpressionSyntaxError) {
        expect(e.position).toBe(2);
      }
    }
  });
});
