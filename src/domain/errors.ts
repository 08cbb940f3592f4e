export type Result<T, E> = { ok: true, value: T } | { ok: false, error: E }

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

export type ValidationError = {
  kind: 'ValidationError'
  code: 'NonPositiveFlow' | 'NonFiniteReading' | 'InvalidInput'
  message: string
  field?: string
}

export type GeometryError = {
  kind: 'GeometryError'
  code: 'NonPositiveOuterDiameter' | 'NegativeWallThickness' | 'WallTooThick' | 'ZeroFlowArea'
  message: string
}

export type EmptyStateError = {
  kind: 'EmptyStateError'
  code: 'NoCalibrationPoints'
  message: string
}

export type ExportError = {
  kind: 'ExportError'
  code: 'WriteFailed'
  message: string
  cause: unknown
}

export type EngineError = ValidationError | GeometryError | EmptyStateError | ExportError

export const NO_POINTS_ERROR: EmptyStateError = {
  kind: 'EmptyStateError',
  code: 'NoCalibrationPoints',
  message: 'No calibration data to report.',
}
