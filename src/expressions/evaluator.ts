import type { BinaryOpNode, CallNode, Node, VariableNode } from './types';
import type { ValidatedAst } from './validator';
import type { SymbolRegistry } from './registry';
import { lookupFunction, lookupVariable } from './registry';
import { DomainError } from './errors';

export type Bindings = Readonly<Record<string, number>>;

// Every primitive result goes through here so that no NaN or infinity ever
// reaches the next operation.
function finite(value: number, position: number): number {
  if (!Number.isFinite(value)) {
    throw new DomainError('NonFinite', position);
  }
  return value;
}

function evaluateVariable(node: VariableNode, registry: SymbolRegistry, bindings: Bindings): number {
  const variable = lookupVariable(registry, node.name);
  if (!variable) {
    throw new Error(`Variable ${node.name} is not registered`);
  }
  if (variable.role === 'constant') {
    return variable.value;
  }
  if (!Object.prototype.hasOwnProperty.call(bindings, node.name)) {
    throw new Error(`No binding for variable: ${node.name}`);
  }
  return finite(bindings[node.name], node.position);
}

function applyBinary(node: BinaryOpNode, lval: number, rval: number): number {
  switch (node.operator) {
    case '+':
      return finite(lval + rval, node.position);
    case '-':
      return finite(lval - rval, node.position);
    case '*':
      return finite(lval * rval, node.position);
    case '/':
      if (rval === 0) throw new DomainError('DivByZero', node.position);
      return finite(lval / rval, node.position);
    case '^':
      if (lval < 0 && !Number.isInteger(rval)) {
        throw new DomainError('InvalidPow', node.position);
      }
      return finite(Math.pow(lval, rval), node.position);
  }
}

function evaluateCall(node: CallNode, args: number[], registry: SymbolRegistry): number {
  const fn = lookupFunction(registry, node.name);
  if (!fn) {
    throw new Error(`Function ${node.name} is not registered`);
  }
  const result = fn.evaluate(...args);
  if (typeof result === 'string') {
    throw new DomainError(result, node.position);
  }
  return finite(result, node.position);
}

function evaluateNode(node: Node, registry: SymbolRegistry, bindings: Bindings): number {
  switch (node.type) {
    case 'Constant':
      return node.value;
    case 'Variable':
      return evaluateVariable(node, registry, bindings);
    case 'UnaryOp':
      return -evaluateNode(node.operand, registry, bindings);
    case 'BinaryOp': {
      const lval = evaluateNode(node.left, registry, bindings);
      const rval = evaluateNode(node.right, registry, bindings);
      return applyBinary(node, lval, rval);
    }
    case 'Call': {
      const args = node.args.map((arg) => evaluateNode(arg, registry, bindings));
      return evaluateCall(node, args, registry);
    }
  }
}

/**
 * Evaluates a validated expression for the given variable values.
 * Returns a finite number or throws a DomainError; a missing binding for a free
 * variable is a caller bug and throws a plain Error.
 */
export function evaluate(ast: ValidatedAst, bindings: Bindings): number {
  return evaluateNode(ast.root, ast.registry, bindings);
}
