import { CALIBRATION_TARGET_POINTS } from '../config'
import type { CalibrationPoint, CalibrationSession, FlowUnit, PipeSpec, SessionState } from './types'
import { Result, ValidationError, ok, err } from './errors'
import { computeVelocity } from './velocity'

// Sessions are values: every mutation returns a new session and leaves the old one untouched.

export type AddPointOutcome = {
  session: CalibrationSession
  point: CalibrationPoint
  warnings: string[]
}

const EMPTY: CalibrationSession = Object.freeze({ points: Object.freeze([]) })

export function emptySession(): CalibrationSession {
  return EMPTY
}

export function sessionPoints(session: CalibrationSession): readonly CalibrationPoint[] {
  return session.points
}

export function sessionState(session: CalibrationSession): SessionState {
  return session.points.length === 0 ? 'EMPTY' : 'POPULATED'
}

export function addPoint(
  session: CalibrationSession,
  pipe: PipeSpec,
  flowValue: number,
  flowUnit: FlowUnit,
  instrumentVelocity_m_s: number,
): Result<AddPointOutcome, ValidationError> {
  if (!Number.isFinite(instrumentVelocity_m_s)) {
    return err({ kind: 'ValidationError', code: 'NonFiniteReading', message: `Instrument velocity must be a finite number (got ${instrumentVelocity_m_s}).` })
  }
  const reference = computeVelocity(flowValue, flowUnit, pipe)
  if (!reference.ok) return reference

  const referenceVelocity_m_s = reference.value.velocity_m_s
  const point: CalibrationPoint = Object.freeze({
    index: session.points.length + 1,
    referenceVelocity_m_s,
    instrumentVelocity_m_s,
    error_m_s: instrumentVelocity_m_s - referenceVelocity_m_s,
  })
  const points = Object.freeze([...session.points, point])

  const warnings: string[] = []
  if (points.length >= CALIBRATION_TARGET_POINTS) {
    warnings.push(`${CALIBRATION_TARGET_POINTS} points recorded. Calibration complete.`)
  }
  return ok({ session: { points }, point, warnings })
}

export function clearSession(_session: CalibrationSession): CalibrationSession {
  return EMPTY
}
