import { COVERAGE_FACTOR } from '../config'
import type { CalibrationPoint, CalibrationStatistics, LinearTrend } from './types'

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0
  return values.reduce((a, b) => a + b, 0) / values.length
}

// Sample standard deviation (n-1). Zero below two values, never NaN.
export function sampleStdDev(values: readonly number[]): number {
  const n = values.length
  if (n < 2) return 0
  const m = mean(values)
  return Math.sqrt(values.reduce((s, x) => s + (x - m) ** 2, 0) / (n - 1))
}

// Least-squares fit y = slope*x + intercept. With a single distinct x the slope
// is undefined: the fit falls back to a flat line through the mean of y.
export function linearFit(xs: readonly number[], ys: readonly number[]): LinearTrend | null {
  const n = Math.min(xs.length, ys.length)
  if (n < 2) return null
  const mx = mean(xs.slice(0, n))
  const my = mean(ys.slice(0, n))
  // Compare raw values: the mean of identical floats can be an ulp off, leaving sxx tiny but non-zero.
  if (xs.slice(0, n).every(x => x === xs[0])) return { slope: 0, intercept: my, degenerate: true }

  let sxx = 0
  let sxy = 0
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - mx
    sxx += dx * dx
    sxy += dx * (ys[i] - my)
  }
  if (!(sxx > 0)) return { slope: 0, intercept: my, degenerate: true }

  const slope = sxy / sxx
  return { slope, intercept: my - slope * mx, degenerate: false }
}

export function computeStatistics(points: readonly CalibrationPoint[]): CalibrationStatistics | null {
  if (!points.length) return null

  const errors = points.map(p => p.error_m_s)
  const refs = points.map(p => p.referenceVelocity_m_s)
  const std = sampleStdDev(errors)

  return {
    count: points.length,
    meanError_m_s: mean(errors),
    stdError_m_s: std,
    maxError_m_s: Math.max(...errors),
    minError_m_s: Math.min(...errors),
    expandedUncertainty_m_s: COVERAGE_FACTOR * std,
    coverageFactor: COVERAGE_FACTOR,
    trend: linearFit(refs, errors),
    referenceRange: { min_m_s: Math.min(...refs), max_m_s: Math.max(...refs) },
  }
}
