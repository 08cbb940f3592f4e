import { REPORT_COLUMNS, REPORT_RULE_WIDTH } from '../config'
import type { CalibrationPoint, CalibrationStatistics, FlowUnit, PipeSpec, VelocityResult } from '../domain/types'
import { Result, EmptyStateError, NO_POINTS_ERROR, ok, err } from '../domain/errors'
import { flowUnitLabel } from '../domain/units'
import { regimeMessage } from '../domain/velocity'

const f4 = (x: number) => x.toFixed(4)
const f2 = (x: number) => x.toFixed(2)

// Thousands separators like the calculator panel, fixed decimals.
function grouped(x: number, decimals: number): string {
  return x.toLocaleString('en-US', { minimumFractionDigits: decimals, maximumFractionDigits: decimals })
}

function pointRow(p: CalibrationPoint): string {
  return [
    String(p.index).padEnd(REPORT_COLUMNS.index),
    f4(p.referenceVelocity_m_s).padEnd(REPORT_COLUMNS.reference),
    f4(p.instrumentVelocity_m_s).padEnd(REPORT_COLUMNS.instrument),
    f4(p.error_m_s).padEnd(REPORT_COLUMNS.error),
  ].join(' ')
}

function tableHeader(): string {
  return [
    'Point'.padEnd(REPORT_COLUMNS.index),
    'V.Ref(m/s)'.padEnd(REPORT_COLUMNS.reference),
    'V.Inst(m/s)'.padEnd(REPORT_COLUMNS.instrument),
    'Error(m/s)'.padEnd(REPORT_COLUMNS.error),
  ].join(' ')
}

export function formatTrend(slope: number, intercept: number): string {
  const sign = intercept < 0 ? '-' : '+'
  return `y = ${f4(slope)}x ${sign} ${f4(Math.abs(intercept))}`
}

export function renderReport(
  pipe: PipeSpec,
  points: readonly CalibrationPoint[],
  stats: CalibrationStatistics | null,
): Result<string, EmptyStateError> {
  if (!points.length || !stats) return err(NO_POINTS_ERROR)

  const heavy = '='.repeat(REPORT_RULE_WIDTH)
  const light = '-'.repeat(REPORT_RULE_WIDTH)
  const lines: string[] = [
    'VELOCIMETER CALIBRATION REPORT',
    heavy,
    '',
    'Pipe configuration:',
    `- Outer diameter: ${f2(pipe.outerDiameter_mm)} mm`,
    `- Wall thickness: ${f2(pipe.wallThickness_mm)} mm`,
    `- Inner diameter: ${f2(pipe.innerDiameter_mm)} mm`,
    '',
    'CALIBRATION DATA:',
    light,
    tableHeader(),
    light,
    ...points.map(pointRow),
    '',
    heavy,
    'STATISTICS:',
    `- Mean error: ${f4(stats.meanError_m_s)} m/s`,
    `- Standard deviation: ${f4(stats.stdError_m_s)} m/s`,
    `- Maximum error: ${f4(stats.maxError_m_s)} m/s`,
    `- Minimum error: ${f4(stats.minError_m_s)} m/s`,
    `- Expanded uncertainty (k=${stats.coverageFactor}): ±${f4(stats.expandedUncertainty_m_s)} m/s`,
  ]
  if (stats.trend) lines.push(`- Trend: ${formatTrend(stats.trend.slope, stats.trend.intercept)}`)

  return ok(lines.join('\n') + '\n')
}

export function renderStatisticsSummary(stats: CalibrationStatistics | null): string {
  if (!stats) return ''
  return [
    'CALIBRATION STATISTICS:',
    '',
    `Number of points: ${stats.count}`,
    `Mean error: ${f4(stats.meanError_m_s)} m/s`,
    `Standard deviation: ${f4(stats.stdError_m_s)} m/s`,
    `Maximum error: ${f4(stats.maxError_m_s)} m/s`,
    `Minimum error: ${f4(stats.minError_m_s)} m/s`,
    `Expanded uncertainty (k=${stats.coverageFactor}): ±${f4(stats.expandedUncertainty_m_s)} m/s`,
    '',
    `Velocity range: ${stats.referenceRange.min_m_s.toFixed(3)} - ${stats.referenceRange.max_m_s.toFixed(3)} m/s`,
  ].join('\n')
}

export type CalculationInput = {
  flowValue: number
  flowUnit: FlowUnit
}

export function renderCalculation(input: CalculationInput, pipe: PipeSpec, result: VelocityResult): string {
  return [
    'CALCULATION RESULTS:',
    '',
    'Input data:',
    `• Flow rate: ${grouped(input.flowValue, 2)} ${flowUnitLabel(input.flowUnit)}`,
    `• Outer diameter: ${grouped(pipe.outerDiameter_mm, 2)} mm`,
    `• Wall thickness: ${grouped(pipe.wallThickness_mm, 2)} mm`,
    '',
    'Intermediate values:',
    `• Inner diameter: ${grouped(pipe.innerDiameter_mm, 2)} mm (${(pipe.innerDiameter_mm / 1000).toFixed(4)} m)`,
    `• Flow area: ${pipe.flowArea_m2.toFixed(6)} m²`,
    `• Converted flow: ${result.flow_m3_s.toFixed(6)} m³/s`,
    '',
    `RESULTING VELOCITY: ${result.velocity_m_s.toFixed(3)} m/s`,
    '',
    `Analysis: ${regimeMessage(result.regime)}`,
  ].join('\n')
}
