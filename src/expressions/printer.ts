import type { BinaryOperator, Node } from './types';

// Binding strength of each node kind; higher binds tighter.
const ADDITIVE = 1;
const MULTIPLICATIVE = 2;
const UNARY = 3;
const POWER = 4;
const ATOM = 5;

function operatorPrecedence(operator: BinaryOperator): number {
  switch (operator) {
    case '+':
    case '-':
      return ADDITIVE;
    case '*':
    case '/':
      return MULTIPLICATIVE;
    case '^':
      return POWER;
  }
}

function precedence(node: Node): number {
  switch (node.type) {
    case 'Constant':
      return node.value < 0 || Object.is(node.value, -0) ? UNARY : ATOM;
    case 'Variable':
    case 'Call':
      return ATOM;
    case 'UnaryOp':
      return UNARY;
    case 'BinaryOp':
      return operatorPrecedence(node.operator);
  }
}

function wrap(node: Node, parenthesize: boolean): string {
  const text = print(node);
  return parenthesize ? `(${text})` : text;
}

/**
 * Renders an AST as source text with only the parentheses the grammar needs,
 * so that parsing the result yields the same tree.
 */
export function print(node: Node): string {
  switch (node.type) {
    case 'Constant':
      return String(node.value);
    case 'Variable':
      return node.name;
    case 'Call':
      return `${node.name}(${node.args.map(print).join(', ')})`;
    case 'UnaryOp':
      return `-${wrap(node.operand, precedence(node.operand) < UNARY)}`;
    case 'BinaryOp': {
      const own = precedence(node);
      if (node.operator === '^') {
        // The base must be an atom, the exponent is parsed at unary level
        const base = wrap(node.left, precedence(node.left) < ATOM);
        const exponent = wrap(node.right, precedence(node.right) < UNARY);
        return `${base}^${exponent}`;
      }
      const left = wrap(node.left, precedence(node.left) < own);
      const right = wrap(node.right, precedence(node.right) <= own);
      return `${left} ${node.operator} ${right}`;
    }
  }
}
