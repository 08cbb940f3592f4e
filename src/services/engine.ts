import type { CalibrationPoint, CalibrationSession, CalibrationStatistics, PipeSpec, VelocityResult } from '../domain/types'
import { Result, ValidationError, GeometryError, ok } from '../domain/errors'
import { pipeFromDimensions } from '../domain/pipe'
import { computeVelocity } from '../domain/velocity'
import { addPoint } from '../domain/calibration'
import { computeStatistics } from '../domain/statistics'
import { CalculatorForm, CalibrationForm, parseCalculatorForm, parseCalibrationForm } from './inputService'
import { renderCalculation, renderStatisticsSummary } from './reportService'
import { Chart, buildCalibrationChart } from './chartService'

// Pipeline used by both tabs:
// - raw form text -> numbers (inputService)
// - dimensions -> PipeSpec
// - flow -> velocity, or a new calibration point
// - statistics recomputed from the full point list after every change

export type CalculationOutcome = {
  pipe: PipeSpec
  result: VelocityResult
  text: string
}

export function calculate(form: CalculatorForm): Result<CalculationOutcome, ValidationError | GeometryError> {
  const input = parseCalculatorForm(form)
  if (!input.ok) return input
  const { flow, flowUnit, outerDiameter, wallThickness } = input.value

  const pipe = pipeFromDimensions(outerDiameter, wallThickness)
  if (!pipe.ok) return pipe

  const velocity = computeVelocity(flow, flowUnit, pipe.value)
  if (!velocity.ok) return velocity

  return ok({
    pipe: pipe.value,
    result: velocity.value,
    text: renderCalculation({ flowValue: flow, flowUnit }, pipe.value, velocity.value),
  })
}

export type RecordOutcome = {
  session: CalibrationSession
  pipe: PipeSpec
  point: CalibrationPoint
  warnings: string[]
}

export function recordPoint(session: CalibrationSession, form: CalibrationForm): Result<RecordOutcome, ValidationError | GeometryError> {
  const input = parseCalibrationForm(form)
  if (!input.ok) return input
  const { flow, flowUnit, outerDiameter, wallThickness, instrumentVelocity } = input.value

  const pipe = pipeFromDimensions(outerDiameter, wallThickness)
  if (!pipe.ok) return pipe

  const added = addPoint(session, pipe.value, flow, flowUnit, instrumentVelocity)
  if (!added.ok) return added

  return ok({ ...added.value, pipe: pipe.value })
}

export type CalibrationSnapshot = {
  points: readonly CalibrationPoint[]
  statistics: CalibrationStatistics | null
  summary: string
  chart: Chart
}

export function calibrationSnapshot(session: CalibrationSession): CalibrationSnapshot {
  const statistics = computeStatistics(session.points)
  return {
    points: session.points,
    statistics,
    summary: renderStatisticsSummary(statistics),
    chart: buildCalibrationChart(session.points, statistics),
  }
}
