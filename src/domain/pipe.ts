// Units:
// - outer diameter, wall thickness, inner diameter: mm
// - flow area: m^2

import type { PipeSpec } from './types'
import { Result, GeometryError, ok, err } from './errors'

export function innerDiameter_mm(outer_mm: number, wall_mm: number): number {
  return outer_mm - 2 * wall_mm
}

export function flowArea_m2(inner_mm: number): number {
  const d_m = inner_mm / 1000.0
  return Math.PI * (d_m / 2.0) ** 2
}

export function pipeFromDimensions(outer_mm: number, wall_mm: number): Result<PipeSpec, GeometryError> {
  if (!Number.isFinite(outer_mm) || outer_mm <= 0) {
    return err({ kind: 'GeometryError', code: 'NonPositiveOuterDiameter', message: `Outer diameter must be positive (got ${outer_mm} mm).` })
  }
  if (!Number.isFinite(wall_mm) || wall_mm < 0) {
    return err({ kind: 'GeometryError', code: 'NegativeWallThickness', message: `Wall thickness cannot be negative (got ${wall_mm} mm).` })
  }
  if (wall_mm >= outer_mm / 2) {
    return err({ kind: 'GeometryError', code: 'WallTooThick', message: `Wall thickness ${wall_mm} mm is too large for an outer diameter of ${outer_mm} mm.` })
  }

  const inner = innerDiameter_mm(outer_mm, wall_mm)
  const area = flowArea_m2(inner)
  if (!(inner > 0) || !(area > 0) || !Number.isFinite(area)) {
    return err({ kind: 'GeometryError', code: 'ZeroFlowArea', message: `Inner diameter ${inner} mm gives no usable flow area.` })
  }
  return ok(Object.freeze({
    outerDiameter_mm: outer_mm,
    wallThickness_mm: wall_mm,
    innerDiameter_mm: inner,
    flowArea_m2: area,
  }))
}
