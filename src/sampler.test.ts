import { describe, it, expect, vi } from 'vitest';
import { bounds, sample, segments } from './sampler';
import { compile } from './expressions/expression';
import { createRegistry } from './expressions/registry';
import { InvalidCountError, InvalidRangeError } from './expressions/errors';
import { Interval } from './interval';

describe('Sampler', () => {
  it('samples evenly over the range, ends included', () => {
    expect(sample(compile('x^2'), 'x', -1, 1, 3)).toEqual([
      { x: -1, y: 1 },
      { x: 0, y: 0 },
      { x: 1, y: 1 },
    ]);
  });

  it('marks points with domain errors as undefined', () => {
    expect(sample(compile('1/x'), 'x', -1, 1, 3)).toEqual([
      { x: -1, y: -1 },
      { x: 0, y: undefined },
      { x: 1, y: 1 },
    ]);

    const ys = sample(compile('ln(x)'), 'x', -1, 1, 5).map((p) => p.y);
    expect(ys).toEqual([undefined, undefined, undefined, Math.log(0.5), 0]);
  });

  it('lands exactly on the upper end', () => {
    const points = sample(compile('x'), 'x', 0, 1, 11);
    expect(points).toHaveLength(11);
    expect(points[0].x).toBe(0);
    expect(points[3].x).toBeCloseTo(0.3, 12);
    expect(points[10].x).toBe(1);
  });

  it('spaces points evenly over ranges wider than the largest double', () => {
    const xs = sample(compile('x'), 'x', -1e308, 1e308, 3).map((p) => p.x);
    expect(xs).toEqual([-1e308, 0, 1e308]);

    const wide = sample(compile('x'), 'x', -Number.MAX_VALUE, Number.MAX_VALUE, 9).map((p) => p.x);
    expect(wide.every(Number.isFinite)).toBe(true);
    wide.slice(1).forEach((x, i) => expect(x).toBeGreaterThan(wide[i]));
  });

  it('rejects bad counts before evaluating anything', () => {
    const expression = compile('x');
    const evaluate = vi.spyOn(expression, 'evaluate');

    expect(() => sample(expression, 'x', 0, 1, 1)).toThrow(InvalidCountError);
    expect(() => sample(expression, 'x', 0, 1, 0)).toThrow(InvalidCountError);
    expect(() => sample(expression, 'x', 0, 1, 2.5)).toThrow(InvalidCountError);
    expect(evaluate).not.toHaveBeenCalled();
  });

  it('rejects bad ranges before evaluating anything', () => {
    const expression = compile('x');
    const evaluate = vi.spyOn(expression, 'evaluate');

    expect(() => sample(expression, 'x', 1, 1, 10)).toThrow(InvalidRangeError);
    expect(() => sample(expression, 'x', 2, 1, 10)).toThrow(InvalidRangeError);
    expect(() => sample(expression, 'x', NaN, 1, 10)).toThrow(InvalidRangeError);
    expect(() => sample(expression, 'x', 0, Infinity, 10)).toThrow(InvalidRangeError);
    // Range is checked first
    expect(() => sample(expression, 'x', 1, 0, 1)).toThrow(InvalidRangeError);
    expect(evaluate).not.toHaveBeenCalled();
  });

  it('evaluates once per point', () => {
    const expression = compile('x');
    const evaluate = vi.spyOn(expression, 'evaluate');

    sample(expression, 'x', 0, 1, 7);
    expect(evaluate).toHaveBeenCalledTimes(7);
    expect(evaluate).toHaveBeenLastCalledWith({ x: 1 });
  });

  it('is deterministic', () => {
    const expression = compile('sin(x) * exp(-x^2)');
    expect(sample(expression, 'x', -3, 3, 101)).toEqual(sample(expression, 'x', -3, 3, 101));
  });

  it('refuses expressions that depend on an unsampled variable', () => {
    const registry = createRegistry({
      functions: {},
      variables: {
        x: { role: 'independent', description: 'Abscissa' },
        t: { role: 'independent', description: 'Time' },
      },
    });
    const expression = compile('x + t', registry);
    const evaluate = vi.spyOn(expression, 'evaluate');

    expect(() => sample(expression, 'x', 0, 1, 2)).toThrow('Expression depends on t, but only x is sampled');
    expect(evaluate).not.toHaveBeenCalled();
  });

  it('samples constant expressions', () => {
    expect(sample(compile('2'), 'x', 0, 1, 2)).toEqual([
      { x: 0, y: 2 },
      { x: 1, y: 2 },
    ]);
  });
});

describe('Sample post-processing', () => {
  it('computes the bounds of defined values', () => {
    expect(bounds(sample(compile('x^2'), 'x', -1, 1, 3))).toEqual(new Interval(0, 1));
    expect(bounds(sample(compile('1/x'), 'x', -1, 1, 3))).toEqual(new Interval(-1, 1));
  });

  it('has no bounds when nothing is defined', () => {
    expect(bounds(sample(compile('sqrt(-1)'), 'x', 0, 1, 4))).toBeUndefined();
    expect(bounds([])).toBeUndefined();
  });

  it('splits the curve at undefined points', () => {
    expect(segments(sample(compile('1/x'), 'x', -1, 1, 5))).toEqual([
      [
        { x: -1, y: -1 },
        { x: -0.5, y: -2 },
      ],
      [
        { x: 0.5, y: 2 },
        { x: 1, y: 1 },
      ],
    ]);
  });

  it('skips leading and trailing undefined points', () => {
    expect(
      segments([
        { x: 0, y: undefined },
        { x: 1, y: 2 },
        { x: 2, y: undefined },
      ])
    ).toEqual([[{ x: 1, y: 2 }]]);
    expect(segments([])).toEqual([]);
  });
});
