import { FLOW_UNITS } from '../config'
import type { FlowUnit } from './types'

export function toM3PerS(value: number, unit: FlowUnit): number {
  const def = FLOW_UNITS[unit]
  if (!def) throw new Error(`Unknown flow unit: ${String(unit)}`)
  return def.toM3PerS(value)
}

export function flowUnitLabel(unit: FlowUnit): string {
  return FLOW_UNITS[unit].label
}
