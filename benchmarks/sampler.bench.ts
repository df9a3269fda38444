import { describe, bench } from 'vitest'
import { compile } from '../src/expressions/expression'
import { sample } from '../src/sampler'

const DAMPED_WAVE = 'sin(5*x) * exp(-x^2 / 8) + sqrt(abs(x)) / (1 + x^2)'

describe('Sampling Benchmarks', () => {
  const expression = compile(DAMPED_WAVE)

  bench('compile a nested expression', () => {
    compile(DAMPED_WAVE)
  })

  bench('sample 10k points over [-10, 10]', () => {
    sample(expression, 'x', -10, 10, 10000)
  })

  bench('sample 10k points with undefined regions', () => {
    // ln and 1/x are undefined over half the range
    sample(compile('ln(x) + 1/x'), 'x', -10, 10, 10000)
  })
})
