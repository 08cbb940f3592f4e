// Units:
// - diameters, wall thickness: mm
// - area: m^2
// - flow: m^3/s after conversion
// - velocities and errors: m/s

export const FLOW_UNIT_KEYS = ['m3_per_hour', 'L_per_hour', 'L_per_min', 'L_per_s', 'm3_per_s', 'gpm', 'cfm'] as const
export type FlowUnit = typeof FLOW_UNIT_KEYS[number]

export type VelocityRegime = 'LOW' | 'OPTIMAL' | 'ACCEPTABLE' | 'HIGH' | 'VERY_HIGH'

export type PipeSpec = {
  readonly outerDiameter_mm: number
  readonly wallThickness_mm: number
  readonly innerDiameter_mm: number
  readonly flowArea_m2: number
}

export type VelocityResult = {
  readonly velocity_m_s: number
  readonly regime: VelocityRegime
  readonly flow_m3_s: number
}

export type CalibrationPoint = {
  readonly index: number
  readonly referenceVelocity_m_s: number
  readonly instrumentVelocity_m_s: number
  readonly error_m_s: number          // instrument - reference
}

export type SessionState = 'EMPTY' | 'POPULATED'

export type CalibrationSession = {
  readonly points: readonly CalibrationPoint[]
}

export type LinearTrend = {
  slope: number
  intercept: number
  degenerate: boolean                 // all reference velocities identical
}

export type CalibrationStatistics = {
  count: number
  meanError_m_s: number
  stdError_m_s: number
  maxError_m_s: number
  minError_m_s: number
  expandedUncertainty_m_s: number
  coverageFactor: number
  trend: LinearTrend | null
  referenceRange: { min_m_s: number, max_m_s: number }
}
