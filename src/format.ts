import type { SamplePoint } from './sampler';

/** One `x<TAB>y` line per point; undefined points print `undefined` as y. */
export function formatPoints(points: readonly SamplePoint[]): string {
  return points.map((point) => `${point.x}\t${point.y ?? 'undefined'}`).join('\n');
}
