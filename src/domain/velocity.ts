import { LOW_VELOCITY_LIMIT_m_s, REGIME_LIMITS, REGIME_MESSAGES } from '../config'
import type { FlowUnit, PipeSpec, VelocityRegime, VelocityResult } from './types'
import { Result, ValidationError, ok, err } from './errors'
import { toM3PerS } from './units'

export function classifyVelocity(velocity_m_s: number): VelocityRegime {
  if (velocity_m_s < LOW_VELOCITY_LIMIT_m_s) return 'LOW'
  for (const { regime, max_m_s } of REGIME_LIMITS) {
    if (velocity_m_s <= max_m_s) return regime
  }
  return 'VERY_HIGH'
}

export function regimeMessage(regime: VelocityRegime): string {
  return REGIME_MESSAGES[regime]
}

export function computeVelocity(flowValue: number, flowUnit: FlowUnit, pipe: PipeSpec): Result<VelocityResult, ValidationError> {
  if (!Number.isFinite(flowValue) || flowValue <= 0) {
    return err({ kind: 'ValidationError', code: 'NonPositiveFlow', message: `Flow rate must be positive (got ${flowValue}).` })
  }
  const flow_m3_s = toM3PerS(flowValue, flowUnit)
  const velocity_m_s = flow_m3_s / pipe.flowArea_m2
  return ok({ velocity_m_s, regime: classifyVelocity(velocity_m_s), flow_m3_s })
}
