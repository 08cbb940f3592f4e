import type { FlowUnit, VelocityRegime } from './domain/types'

export type FlowUnitDef = {
  label: string
  description: string
  toM3PerS: (value: number) => number
}

// Conversions to m^3/s. Volumetric units divide exactly; imperial units use fixed factors.
export const FLOW_UNITS: Record<FlowUnit, FlowUnitDef> = {
  m3_per_hour: { label: 'm³/h', description: 'cubic metres per hour', toM3PerS: v => v / 3600 },
  L_per_hour: { label: 'L/h', description: 'litres per hour', toM3PerS: v => v / 3600000 },
  L_per_min: { label: 'L/min', description: 'litres per minute', toM3PerS: v => v / 60000 },
  L_per_s: { label: 'L/s', description: 'litres per second', toM3PerS: v => v / 1000 },
  m3_per_s: { label: 'm³/s', description: 'cubic metres per second', toM3PerS: v => v },
  gpm: { label: 'GPM', description: 'US gallons per minute', toM3PerS: v => v * 0.00006309 },
  cfm: { label: 'CFM', description: 'cubic feet per minute', toM3PerS: v => v * 0.00047194 },
}

// Upper bounds (m/s) of each regime, inclusive. Anything above the last is VERY_HIGH.
export const REGIME_LIMITS: { regime: VelocityRegime, max_m_s: number }[] = [
  { regime: 'OPTIMAL', max_m_s: 1.5 },
  { regime: 'ACCEPTABLE', max_m_s: 3.0 },
  { regime: 'HIGH', max_m_s: 5.0 },
]
export const LOW_VELOCITY_LIMIT_m_s = 0.5

export const REGIME_MESSAGES: Record<VelocityRegime, string> = {
  LOW: 'LOW velocity - possible sedimentation',
  OPTIMAL: 'OPTIMAL velocity for water pipes',
  ACCEPTABLE: 'ACCEPTABLE velocity - monitor erosion',
  HIGH: 'HIGH velocity - possible erosion and noise',
  VERY_HIGH: 'VERY HIGH velocity - REVISE the design',
}

export const CALIBRATION_TARGET_POINTS = 10
export const COVERAGE_FACTOR = 2
export const TREND_SAMPLES = 100

export const REPORT_RULE_WIDTH = 50
export const REPORT_COLUMNS = { index: 6, reference: 12, instrument: 12, error: 10 } as const
