import { describe, it, expect } from 'vitest'
import { emptySession, addPoint, clearSession, sessionPoints, sessionState } from './calibration'
import { pipeFromDimensions } from './pipe'
import type { CalibrationSession, PipeSpec } from './types'

function pipe(outer: number, wall: number): PipeSpec {
  const r = pipeFromDimensions(outer, wall)
  if (!r.ok) throw new Error(r.error.message)
  return r.value
}

// 50 mm bore: 7.2 m³/h -> 0.002 m³/s -> 1.0185916... m/s
const BORE_50 = pipe(50, 0)
const REF_7_2 = 0.002 / (Math.PI * 0.025 ** 2)

function add(session: CalibrationSession, instrument: number): CalibrationSession {
  const r = addPoint(session, BORE_50, 7.2, 'm3_per_hour', instrument)
  if (!r.ok) throw new Error(r.error.message)
  return r.value.session
}

describe('addPoint', () => {
  it('computes the reference velocity and the error', () => {
    const r = addPoint(emptySession(), BORE_50, 7.2, 'm3_per_hour', 1.05)
    if (!r.ok) throw new Error(r.error.message)
    const { point, session, warnings } = r.value
    expect(point.index).toBe(1)
    expect(point.referenceVelocity_m_s).toBeCloseTo(REF_7_2, 12)
    expect(point.referenceVelocity_m_s).toBeCloseTo(1.01859, 5)
    expect(point.instrumentVelocity_m_s).toBe(1.05)
    expect(point.error_m_s).toBeCloseTo(1.05 - REF_7_2, 12)
    expect(sessionPoints(session)).toEqual([point])
    expect(warnings).toEqual([])
  })

  it('moves EMPTY to POPULATED and numbers points in insertion order', () => {
    let s = emptySession()
    expect(sessionState(s)).toBe('EMPTY')
    s = add(s, 1.0)
    expect(sessionState(s)).toBe('POPULATED')
    s = add(s, 1.1)
    s = add(s, 0.9)
    expect(sessionPoints(s).map(p => p.index)).toEqual([1, 2, 3])
    expect(sessionPoints(s).map(p => p.instrumentVelocity_m_s)).toEqual([1.0, 1.1, 0.9])
  })

  it('leaves the previous session untouched', () => {
    const before = add(emptySession(), 1.0)
    const after = add(before, 1.2)
    expect(before.points).toHaveLength(1)
    expect(after.points).toHaveLength(2)
  })

  it('propagates a non-positive flow without adding a point', () => {
    const s = add(emptySession(), 1.0)
    const r = addPoint(s, BORE_50, 0, 'm3_per_hour', 1.0)
    expect(r.ok).toBe(false)
    if (!r.ok) expect(r.error.code).toBe('NonPositiveFlow')
    expect(s.points).toHaveLength(1)
  })

  it('rejects a non-finite instrument reading', () => {
    const r = addPoint(emptySession(), BORE_50, 7.2, 'm3_per_hour', NaN)
    expect(r.ok).toBe(false)
    if (!r.ok) expect(r.error.code).toBe('NonFiniteReading')
  })

  it('reports completion from the tenth point on without capping', () => {
    let s = emptySession()
    for (let i = 0; i < 9; i++) s = add(s, 1.0)

    const tenth = addPoint(s, BORE_50, 7.2, 'm3_per_hour', 1.0)
    if (!tenth.ok) throw new Error(tenth.error.message)
    expect(tenth.value.point.index).toBe(10)
    expect(tenth.value.warnings).toEqual(['10 points recorded. Calibration complete.'])

    const eleventh = addPoint(tenth.value.session, BORE_50, 7.2, 'm3_per_hour', 1.0)
    if (!eleventh.ok) throw new Error(eleventh.error.message)
    expect(eleventh.value.point.index).toBe(11)
    expect(eleventh.value.warnings).toHaveLength(1)
  })
})

describe('clearSession', () => {
  it('is idempotent', () => {
    const s = add(add(emptySession(), 1.0), 1.1)
    const once = clearSession(s)
    const twice = clearSession(once)
    expect(sessionState(once)).toBe('EMPTY')
    expect(sessionState(twice)).toBe('EMPTY')
    expect(sessionPoints(twice)).toEqual([])
  })

  it('restarts numbering at 1', () => {
    const s = add(clearSession(add(emptySession(), 1.0)), 1.0)
    expect(sessionPoints(s)[0].index).toBe(1)
  })
})
