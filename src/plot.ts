/* One refresh of a function graph: validate the limits, compile the function
 * text, sample it and work out the y-axis range. User mistakes come back as a
 * failed PlotResult for display next to the input; they are never thrown.
 */

import type { Expression } from './expressions/expression';
import { compile } from './expressions/expression';
import { ExpressionError } from './expressions/errors';
import type { SymbolRegistry } from './expressions/registry';
import { defaultRegistry, independentVariables } from './expressions/registry';
import type { DefinedPoint, SamplePoint } from './sampler';
import { bounds, sample, segments } from './sampler';
import type { GrapherSettings } from './settings';
import { DEFAULT_SETTINGS, LimitsError, SettingsError, parseLimits, parseSettings } from './settings';
import type { Interval } from './interval';

// Fraction of the y range left empty above and below the curve
export const Y_MARGIN = 0.05;

export interface PlotRequest {
  function: string;
  /** Either numbers or the text typed into the limit fields. */
  from?: number | string;
  to?: number | string;
  samples?: number;
  registry?: SymbolRegistry;
  /** Defaults to the registry's independent variable. */
  variable?: string;
}

export interface Plot {
  ok: true;
  settings: GrapherSettings;
  expression: Expression;
  points: SamplePoint[];
  segments: DefinedPoint[][];
  /** Range of the defined y values; undefined when no point is defined. */
  bounds: Interval | undefined;
  /** `bounds` with a margin, for the y axis. */
  yRange: Interval | undefined;
}

export type PlotFailure =
  | { ok: false; stage: 'settings'; error: SettingsError | LimitsError }
  | { ok: false; stage: 'compile'; error: ExpressionError };

export type PlotResult = Plot | PlotFailure;

function resolveSettings(request: PlotRequest): GrapherSettings {
  let { from, to } = request;
  if (typeof from === 'string' || typeof to === 'string') {
    // A limit left out keeps its default, even when the other one is text
    const limits = parseLimits(String(from ?? DEFAULT_SETTINGS.from), String(to ?? DEFAULT_SETTINGS.to));
    from = limits.from;
    to = limits.to;
  }
  return parseSettings({ function: request.function, from, to, samples: request.samples });
}

function resolveVariable(request: PlotRequest, registry: SymbolRegistry): string {
  if (request.variable) return request.variable;
  const [variable] = independentVariables(registry);
  if (!variable) {
    throw new Error('Registry defines no independent variable to sample');
  }
  return variable;
}

export function plot(request: PlotRequest): PlotResult {
  const registry = request.registry ?? defaultRegistry;

  let settings: GrapherSettings;
  try {
    settings = resolveSettings(request);
  } catch (e) {
    if (e instanceof SettingsError || e instanceof LimitsError) {
      return { ok: false, stage: 'settings', error: e };
    }
    throw e;
  }

  let expression: Expression;
  try {
    expression = compile(settings.function, registry);
  } catch (e) {
    if (e instanceof ExpressionError) {
      return { ok: false, stage: 'compile', error: e };
    }
    throw e;
  }

  const points = sample(expression, resolveVariable(request, registry), settings.from, settings.to, settings.samples);
  const range = bounds(points);

  return {
    ok: true,
    settings,
    expression,
    points,
    segments: segments(points),
    bounds: range,
    yRange: range?.pad(Y_MARGIN),
  };
}
