/**
 * A closed range [min, max] of y values, used to scale the y axis.
 */
export class Interval {
  constructor(
    public readonly min: number,
    public readonly max: number
  ) {
    if (Number.isNaN(min) || Number.isNaN(max)) {
      throw new Error('Interval bounds must be numbers, got NaN');
    }
    if (min > max) {
      throw new Error(`Empty interval: ${min} is above ${max}`);
    }
  }

  /** Smallest interval holding every value; there must be at least one. */
  static bound(values: Iterable<number>): Interval {
    let min = Infinity;
    let max = -Infinity;
    for (const value of values) {
      min = Math.min(min, value);
      max = Math.max(max, value);
    }
    if (min > max) throw new Error('Cannot bound an empty set of values');
    return new Interval(min, max);
  }

  size(): number {
    return this.max - this.min;
  }

  /**
   * Widens the interval by `fraction` of its size on each side. A single point
   * is widened by `fraction` of its magnitude, or by 1 around zero, so that an
   * axis built from it never collapses.
   */
  pad(fraction: number): Interval {
    const size = this.size();
    const margin = size > 0 ? size * fraction : Math.abs(this.min) * fraction || 1;
    return new Interval(this.min - margin, this.max + margin);
  }

  toString(): string {
    return `[${this.min}, ${this.max}]`;
  }
}
