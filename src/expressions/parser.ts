/* Recursive descent parser for function expressions.
 *
 * Grammar, lowest precedence first:
 *   expression     := additive
 *   additive       := multiplicative (('+' | '-') multiplicative)*
 *   multiplicative := unary (('*' | '/') unary)*
 *   unary          := '-' unary | power
 *   power          := primary ('^' unary)?
 *   primary        := number | identifier | identifier '(' arguments? ')' | '(' expression ')'
 *   arguments      := expression (',' expression)*
 *
 * The exponent of '^' is parsed at unary level, which makes '^' right-associative
 * and lets `2^-x` through, while `-x^2` still reads as `-(x^2)`.
 */

import type { Node } from './types';
import {
  createBinaryOpNode,
  createCallNode,
  createConstantNode,
  createUnaryOpNode,
  createVariableNode,
} from './types';
import type { Operator, OperatorToken, Token, TokenKind } from './tokens';
import { tokenize } from './tokens';
import { ExpressionSyntaxError } from './errors';

const tokenDescriptions: Record<TokenKind, string> = {
  Number: 'number',
  Identifier: 'identifier',
  Operator: 'operator',
  LeftParen: "'('",
  RightParen: "')'",
  Comma: "','",
};

// Limit on both the parser's own nesting and the height of the tree it builds.
// Every later stage walks the tree recursively.
export const MAX_DEPTH = 200;

export class Parser {
  private depth = 0;
  private heights = new WeakMap<Node, number>();
  private iterator: Iterator<Token>;
  private current: Token | undefined;
  private last: Token | undefined;

  constructor(
    tokens: Iterable<Token>,
    private source: string = ''
  ) {
    this.iterator = tokens[Symbol.iterator]();
    this.current = this.pull();
  }

  parse(): Node {
    if (this.isAtEnd()) {
      throw this.error('expression', 'Empty expression');
    }

    const root = this.expression();

    if (!this.isAtEnd()) {
      throw this.error('end of input');
    }
    return root;
  }

  private expression(): Node {
    return this.additive();
  }

  private additive(): Node {
    let left = this.multiplicative();

    let operator = this.matchOperator('+', '-');
    while (operator) {
      const right = this.multiplicative();
      left = this.built(createBinaryOpNode(operator.text, left, right, operator.position), left, right);
      operator = this.matchOperator('+', '-');
    }

    return left;
  }

  private multiplicative(): Node {
    let left = this.unary();

    let operator = this.matchOperator('*', '/');
    while (operator) {
      const right = this.unary();
      left = this.built(createBinaryOpNode(operator.text, left, right, operator.position), left, right);
      operator = this.matchOperator('*', '/');
    }

    return left;
  }

  // Every nested subexpression passes through here, so this is where depth is counted
  private unary(): Node {
    if (this.depth === MAX_DEPTH) throw this.tooDeep();
    this.depth++;

    let node: Node;
    const minus = this.matchOperator('-');
    if (minus) {
      const operand = this.unary();
      node = this.built(createUnaryOpNode('-', operand, minus.position), operand);
    } else {
      node = this.power();
    }

    this.depth--;
    return node;
  }

  private power(): Node {
    const base = this.primary();

    const caret = this.matchOperator('^');
    if (caret) {
      const exponent = this.unary();
      return this.built(createBinaryOpNode('^', base, exponent, caret.position), base, exponent);
    }

    return base;
  }

  private primary(): Node {
    const token = this.current;
    if (!token) throw this.error('expression');

    switch (token.kind) {
      case 'Number':
        if (!Number.isFinite(token.value)) {
          throw this.error('finite number', `Number out of range: ${token.text}`);
        }
        this.advance();
        return createConstantNode(token.value, token.position);

      case 'LeftParen': {
        this.advance();
        const expr = this.expression();
        this.expect('RightParen');
        return expr;
      }

      case 'Identifier': {
        this.advance();
        if (!this.match('LeftParen')) {
          return createVariableNode(token.text, token.position);
        }

        // Function call
        const args: Node[] = [];
        if (!this.check('RightParen')) {
          do {
            args.push(this.expression());
          } while (this.match('Comma'));
        }
        this.expect('RightParen');
        return this.built(createCallNode(token.text, args, token.position), ...args);
      }

      default:
        throw this.error('expression');
    }
  }

  // Records the height of a new node; leaves are not recorded and count as 1
  private built(node: Node, ...children: Node[]): Node {
    const height = 1 + Math.max(0, ...children.map((child) => this.heights.get(child) ?? 1));
    if (height > MAX_DEPTH) throw this.tooDeep();
    this.heights.set(node, height);
    return node;
  }

  private tooDeep(): ExpressionSyntaxError {
    return this.error('expression', `Expression is nested more than ${MAX_DEPTH} levels deep`);
  }

  private pull(): Token | undefined {
    const next = this.iterator.next();
    return next.done ? undefined : next.value;
  }

  private advance(): Token | undefined {
    if (this.current) {
      this.last = this.current;
      this.current = this.pull();
    }
    return this.last;
  }

  private isAtEnd(): boolean {
    return this.current === undefined;
  }

  private check(kind: TokenKind): boolean {
    return this.current?.kind === kind;
  }

  private match(kind: TokenKind): boolean {
    if (this.check(kind)) {
      this.advance();
      return true;
    }
    return false;
  }

  private matchOperator(...operators: Operator[]): OperatorToken | undefined {
    const token = this.current;
    if (token?.kind === 'Operator' && operators.includes(token.text)) {
      this.advance();
      return token;
    }
    return undefined;
  }

  private expect(kind: TokenKind): void {
    if (!this.match(kind)) {
      throw this.error(tokenDescriptions[kind]);
    }
  }

  // Offset used for errors at the end of the token stream
  private endPosition(): number {
    if (this.source) return this.source.length;
    return this.last ? this.last.position + this.last.text.length : 0;
  }

  private error(expected: string, reason?: string): ExpressionSyntaxError {
    const token = this.current;
    const found = token ? `'${token.text}'` : 'end of input';
    const position = token ? token.position : this.endPosition();
    return new ExpressionSyntaxError(expected, found, position, this.source, reason);
  }
}

export function parse(tokens: Iterable<Token>, source?: string): Node {
  return new Parser(tokens, source).parse();
}

export function parseExpression(source: string): Node {
  return parse(tokenize(source), source);
}
