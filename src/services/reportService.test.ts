import { describe, it, expect } from 'vitest'
import { renderReport, renderStatisticsSummary, renderCalculation, formatTrend } from './reportService'
import { pipeFromDimensions } from '../domain/pipe'
import { computeStatistics } from '../domain/statistics'
import { computeVelocity } from '../domain/velocity'
import type { CalibrationPoint, PipeSpec } from '../domain/types'

function pipe(outer: number, wall: number): PipeSpec {
  const r = pipeFromDimensions(outer, wall)
  if (!r.ok) throw new Error(r.error.message)
  return r.value
}

const POINTS: CalibrationPoint[] = [
  { index: 1, referenceVelocity_m_s: 1.0, instrumentVelocity_m_s: 1.05, error_m_s: 0.05 },
  { index: 2, referenceVelocity_m_s: 2.0, instrumentVelocity_m_s: 2.1, error_m_s: 0.1 },
]

describe('renderReport', () => {
  it('lays out header, pipe, points and statistics in order', () => {
    const r = renderReport(pipe(114.3, 6.02), POINTS, computeStatistics(POINTS))
    if (!r.ok) throw new Error(r.error.message)
    const rule = '='.repeat(50)
    const dash = '-'.repeat(50)
    expect(r.value).toBe([
      'VELOCIMETER CALIBRATION REPORT',
      rule,
      '',
      'Pipe configuration:',
      '- Outer diameter: 114.30 mm',
      '- Wall thickness: 6.02 mm',
      '- Inner diameter: 102.26 mm',
      '',
      'CALIBRATION DATA:',
      dash,
      'Point  V.Ref(m/s)   V.Inst(m/s)  Error(m/s)',
      dash,
      '1      1.0000       1.0500       0.0500    ',
      '2      2.0000       2.1000       0.1000    ',
      '',
      rule,
      'STATISTICS:',
      '- Mean error: 0.0750 m/s',
      '- Standard deviation: 0.0354 m/s',
      '- Maximum error: 0.1000 m/s',
      '- Minimum error: 0.0500 m/s',
      '- Expanded uncertainty (k=2): ±0.0707 m/s',
      '- Trend: y = 0.0500x + 0.0000',
      '',
    ].join('\n'))
  })

  it('omits the trend line for a single point', () => {
    const one = POINTS.slice(0, 1)
    const r = renderReport(pipe(114.3, 6.02), one, computeStatistics(one))
    if (!r.ok) throw new Error(r.error.message)
    const lines = r.value.trimEnd().split('\n')
    expect(lines[lines.length - 1]).toBe('- Expanded uncertainty (k=2): ±0.0000 m/s')
  })

  it('refuses to render without points', () => {
    const r = renderReport(pipe(100, 5), [], null)
    expect(r).toEqual({ ok: false, error: { kind: 'EmptyStateError', code: 'NoCalibrationPoints', message: 'No calibration data to report.' } })
  })
})

describe('report table', () => {
  it('pads every column to a fixed width', () => {
    const r = renderReport(pipe(114.3, 6.02), POINTS, computeStatistics(POINTS))
    if (!r.ok) throw new Error(r.error.message)
    const rows = r.value.split('\n').filter(l => /^\d/.test(l))
    expect(rows.map(l => l.length)).toEqual([6 + 1 + 12 + 1 + 12 + 1 + 10, 6 + 1 + 12 + 1 + 12 + 1 + 10])
  })
})

describe('formatTrend', () => {
  it('shows the intercept sign explicitly', () => {
    expect(formatTrend(0.0123, -0.5)).toBe('y = 0.0123x - 0.5000')
    expect(formatTrend(-1, 0.25)).toBe('y = -1.0000x + 0.2500')
  })
})

describe('renderStatisticsSummary', () => {
  it('is empty without statistics', () => {
    expect(renderStatisticsSummary(null)).toBe('')
  })

  it('includes the count and the velocity range', () => {
    const lines = renderStatisticsSummary(computeStatistics(POINTS)).split('\n')
    expect(lines[2]).toBe('Number of points: 2')
    expect(lines[lines.length - 1]).toBe('Velocity range: 1.000 - 2.000 m/s')
  })
})

describe('renderCalculation', () => {
  it('shows inputs, intermediate values, velocity and analysis', () => {
    const p = pipe(114.3, 6.02)
    const v = computeVelocity(10, 'm3_per_hour', p)
    if (!v.ok) throw new Error(v.error.message)
    const lines = renderCalculation({ flowValue: 10, flowUnit: 'm3_per_hour' }, p, v.value).split('\n')
    expect(lines).toContain('• Flow rate: 10.00 m³/h')
    expect(lines).toContain('• Outer diameter: 114.30 mm')
    expect(lines).toContain('• Inner diameter: 102.26 mm (0.1023 m)')
    expect(lines).toContain('• Flow area: 0.008213 m²')
    expect(lines).toContain('• Converted flow: 0.002778 m³/s')
    expect(lines).toContain('RESULTING VELOCITY: 0.338 m/s')
    expect(lines[lines.length - 1]).toBe('Analysis: LOW velocity - possible sedimentation')
  })

  it('groups thousands in the flow rate', () => {
    const p = pipe(114.3, 6.02)
    const v = computeVelocity(1500, 'L_per_min', p)
    if (!v.ok) throw new Error(v.error.message)
    const text = renderCalculation({ flowValue: 1500, flowUnit: 'L_per_min' }, p, v.value)
    expect(text.split('\n')[3]).toBe('• Flow rate: 1,500.00 L/min')
  })
})
