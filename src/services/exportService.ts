import type { CalibrationSession, PipeSpec } from '../domain/types'
import { Result, EmptyStateError, ExportError, ok, err } from '../domain/errors'
import { computeStatistics } from '../domain/statistics'
import { renderReport } from './reportService'

export interface ReportWriter {
  write(fileName: string, content: string): void
}

export function reportFileName(pointCount: number): string {
  return `velocimeter_calibration_${pointCount}_points.txt`
}

export function exportCalibrationReport(
  pipe: PipeSpec,
  session: CalibrationSession,
  writer: ReportWriter,
): Result<{ fileName: string }, EmptyStateError | ExportError> {
  const report = renderReport(pipe, session.points, computeStatistics(session.points))
  if (!report.ok) return report

  const fileName = reportFileName(session.points.length)
  try {
    writer.write(fileName, report.value)
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e)
    return err({ kind: 'ExportError', code: 'WriteFailed', message: `Could not write ${fileName}: ${reason}`, cause: e })
  }
  return ok({ fileName })
}

// Browser writer: hands the report to the user as a UTF-8 text download.
export const downloadWriter: ReportWriter = {
  write(fileName, content) {
    const blob = new Blob([content], { type: 'text/plain;charset=utf-8' })
    const url = URL.createObjectURL(blob)
    try {
      const a = document.createElement('a')
      a.href = url
      a.download = fileName
      document.body.appendChild(a)
      a.click()
      a.remove()
    } finally {
      // revoking during click() can cancel the download in some browsers
      setTimeout(() => URL.revokeObjectURL(url), 0)
    }
  },
}
