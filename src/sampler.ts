import type { Expression } from './expressions/expression';
import { DomainError, InvalidCountError, InvalidRangeError } from './expressions/errors';
import { Interval } from './interval';

export interface SamplePoint {
  x: number;
  y: number | undefined; // undefined where the function is not defined
}

export interface DefinedPoint extends SamplePoint {
  y: number;
}

/**
 * Evaluates `expression` at `count` evenly spaced values of `variableName`
 * covering [low, high], both ends included. Points where evaluation hits a
 * domain error get `y: undefined`; any other error propagates.
 *
 * Range and count are checked before the first evaluation.
 */
export function sample(
  expression: Expression,
  variableName: string,
  low: number,
  high: number,
  count: number
): SamplePoint[] {
  if (!Number.isFinite(low) || !Number.isFinite(high) || low >= high) {
    throw new InvalidRangeError(low, high);
  }
  if (!Number.isInteger(count) || count < 2) {
    throw new InvalidCountError(count);
  }
  for (const name of expression.freeVariables) {
    if (name !== variableName) {
      throw new Error(`Expression depends on ${name}, but only ${variableName} is sampled`);
    }
  }

  const points: SamplePoint[] = [];

  for (let i = 0; i < count; i++) {
    // Interpolate instead of stepping: high - low overflows for ranges wider
    // than the largest double. The last point is pinned to `high`.
    const t = i / (count - 1);
    const x = i === count - 1 ? high : low * (1 - t) + high * t;
    points.push({ x, y: evaluateAt(expression, variableName, x) });
  }

  return points;
}

function evaluateAt(expression: Expression, variableName: string, x: number): number | undefined {
  try {
    return expression.evaluate({ [variableName]: x });
  } catch (e) {
    if (e instanceof DomainError) {
      return undefined;
    }
    throw e;
  }
}

export function isDefined(point: SamplePoint): point is DefinedPoint {
  return point.y !== undefined;
}

/** The range of all defined y values, or undefined if there are none. */
export function bounds(points: readonly SamplePoint[]): Interval | undefined {
  const defined = points.filter(isDefined);
  if (defined.length === 0) return undefined;
  return Interval.bound(defined.map((p) => p.y));
}

/**
 * Splits the points into runs of consecutive defined points. A curve is drawn
 * as one polyline per run, broken wherever the function is undefined.
 */
export function segments(points: readonly SamplePoint[]): DefinedPoint[][] {
  const runs: DefinedPoint[][] = [];
  let run: DefinedPoint[] = [];

  for (const point of points) {
    if (isDefined(point)) {
      run.push(point);
    } else if (run.length > 0) {
      runs.push(run);
      run = [];
    }
  }
  if (run.length > 0) runs.push(run);

  return runs;
}
