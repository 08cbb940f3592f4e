import type { Layout, PlotData } from 'plotly.js'
import { TREND_SAMPLES } from '../config'
import type { CalibrationPoint, CalibrationStatistics } from '../domain/types'

export type ChartTrace = Partial<PlotData>
export type Chart = { data: ChartTrace[], layout: Partial<Layout> }

const TITLE = 'Error vs Velocity - Velocimeter Calibration'

export function linspace(start: number, stop: number, n: number): number[] {
  if (n < 2) return [start]
  return Array.from({ length: n }, (_, i) => start + (stop - start) * i / (n - 1))
}

// Horizontal reference lines need a non-zero width when every point shares one velocity.
export function referenceSpan(stats: CalibrationStatistics): [number, number] {
  const { min_m_s: xMin, max_m_s: xMax } = stats.referenceRange
  if (xMin !== xMax) return [xMin, xMax]
  const pad = Math.max(Math.abs(xMin) * 0.1, 0.1)
  return [xMin - pad, xMax + pad]
}

function baseLayout(): Partial<Layout> {
  return {
    title: { text: TITLE },
    xaxis: { title: { text: 'Reference velocity (m/s)' } },
    yaxis: { title: { text: 'Error (m/s)' }, zeroline: false },
    legend: { x: 1, xanchor: 'right', y: 1 },
  }
}

function statsAnnotation(stats: CalibrationStatistics): string {
  return [
    '<b>Statistics</b>',
    `Mean error: ${stats.meanError_m_s.toFixed(4)} m/s`,
    `Std. deviation: ${stats.stdError_m_s.toFixed(4)} m/s`,
    `Max error: ${stats.maxError_m_s.toFixed(4)} m/s`,
    `Min error: ${stats.minError_m_s.toFixed(4)} m/s`,
    `Uncertainty (${stats.coverageFactor}σ): ±${stats.expandedUncertainty_m_s.toFixed(4)} m/s`,
  ].join('<br>')
}

export function buildCalibrationChart(points: readonly CalibrationPoint[], stats: CalibrationStatistics | null): Chart {
  if (!points.length || !stats) {
    return {
      data: [{ type: 'scatter', mode: 'lines', name: 'Error = 0', x: [0, 1], y: [0, 0], line: { color: 'black' } }],
      layout: baseLayout(),
    }
  }

  const xs = points.map(p => p.referenceVelocity_m_s)
  const ys = points.map(p => p.error_m_s)
  const span = referenceSpan(stats)

  const data: ChartTrace[] = [
    { type: 'scatter', mode: 'lines', name: 'Error = 0', x: span, y: [0, 0], line: { color: 'black' }, opacity: 0.5 },
    {
      type: 'scatter', mode: 'markers', name: 'Measurement points', x: xs, y: ys,
      marker: { color: 'red', size: 10, line: { color: 'darkred', width: 1 } },
    },
  ]

  if (stats.trend) {
    const { slope, intercept } = stats.trend
    const xt = linspace(span[0], span[1], TREND_SAMPLES)
    data.push({
      type: 'scatter', mode: 'lines',
      name: `Trend: y = ${slope.toFixed(4)}x + ${intercept.toFixed(4)}`,
      x: xt, y: xt.map(x => slope * x + intercept),
      line: { color: 'blue', dash: 'dash' }, opacity: 0.7,
    })
  }

  // ±kσ band around the mean error
  if (stats.stdError_m_s > 0) {
    const upper = stats.meanError_m_s + stats.expandedUncertainty_m_s
    const lower = stats.meanError_m_s - stats.expandedUncertainty_m_s
    const k = stats.coverageFactor
    data.push(
      { type: 'scatter', mode: 'lines', name: `+${k}σ`, x: span, y: [upper, upper], line: { color: 'orange', dash: 'dot' } },
      {
        type: 'scatter', mode: 'lines', name: `-${k}σ`, x: span, y: [lower, lower],
        line: { color: 'orange', dash: 'dot' }, fill: 'tonexty', fillcolor: 'rgba(255,165,0,0.1)',
      },
    )
  }

  return {
    data,
    layout: {
      ...baseLayout(),
      annotations: [{
        text: statsAnnotation(stats), xref: 'paper', yref: 'paper', x: 0.02, y: 0.98,
        xanchor: 'left', yanchor: 'top', align: 'left', showarrow: false,
        bgcolor: 'wheat', opacity: 0.8,
      }],
    },
  }
}
