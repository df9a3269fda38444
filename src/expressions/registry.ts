import type { DomainErrorKind } from './errors';

/**
 * A function that may be called from an expression. `evaluate` receives exactly
 * `arity` finite arguments and either returns a number or names the domain
 * error for arguments outside the function's domain.
 */
export interface FunctionDefinition {
  readonly arity: number;
  readonly description: string;
  readonly evaluate: (...args: number[]) => number | DomainErrorKind;
}

export type VariableDefinition =
  | { readonly role: 'independent'; readonly description: string }
  | { readonly role: 'constant'; readonly value: number; readonly description: string };

export interface SymbolRegistry {
  readonly functions: Readonly<Record<string, FunctionDefinition>>;
  readonly variables: Readonly<Record<string, VariableDefinition>>;
}

export function lookupFunction(registry: SymbolRegistry, name: string): FunctionDefinition | undefined {
  return Object.prototype.hasOwnProperty.call(registry.functions, name) ? registry.functions[name] : undefined;
}

export function lookupVariable(registry: SymbolRegistry, name: string): VariableDefinition | undefined {
  return Object.prototype.hasOwnProperty.call(registry.variables, name) ? registry.variables[name] : undefined;
}

/** Builds a deeply frozen registry. */
export function createRegistry(definition: SymbolRegistry): SymbolRegistry {
  const functions: Record<string, FunctionDefinition> = {};
  for (const [name, fn] of Object.entries(definition.functions)) {
    functions[name] = Object.freeze({ ...fn });
  }
  const variables: Record<string, VariableDefinition> = {};
  for (const [name, variable] of Object.entries(definition.variables)) {
    variables[name] = Object.freeze({ ...variable });
  }
  return Object.freeze({
    functions: Object.freeze(functions),
    variables: Object.freeze(variables),
  });
}

const unary = (description: string, evaluate: (value: number) => number | DomainErrorKind): FunctionDefinition => ({
  arity: 1,
  description,
  evaluate,
});

export const builtinFunctions: Readonly<Record<string, FunctionDefinition>> = {
  sin: unary('Sine (radians)', Math.sin),
  cos: unary('Cosine (radians)', Math.cos),
  tan: unary('Tangent (radians)', Math.tan),
  exp: unary('Natural exponential', Math.exp),
  ln: unary('Natural logarithm', (value) => (value <= 0 ? 'LogDomain' : Math.log(value))),
  sqrt: unary('Square root', (value) => (value < 0 ? 'SqrtDomain' : Math.sqrt(value))),
  abs: unary('Absolute value', Math.abs),
  min: { arity: 2, description: 'Smaller of two values', evaluate: (a, b) => Math.min(a, b) },
  max: { arity: 2, description: 'Larger of two values', evaluate: (a, b) => Math.max(a, b) },
};

export const builtinVariables: Readonly<Record<string, VariableDefinition>> = {
  x: { role: 'independent', description: 'Independent variable' },
  pi: { role: 'constant', value: Math.PI, description: "Ratio of a circle's circumference to its diameter" },
  e: { role: 'constant', value: Math.E, description: "Euler's number" },
};

export const defaultRegistry: SymbolRegistry = createRegistry({
  functions: builtinFunctions,
  variables: builtinVariables,
});

export function independentVariables(registry: SymbolRegistry): string[] {
  return Object.entries(registry.variables)
    .filter(([, variable]) => variable.role === 'independent')
    .map(([name]) => name);
}
