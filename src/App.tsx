import React, { useMemo, useState } from 'react'
import Plot from './ui/Plot'
import { FLOW_UNITS } from './config'
import { FLOW_UNIT_KEYS, FlowUnit, CalibrationSession, PipeSpec } from './domain/types'
import { emptySession, clearSession, sessionState } from './domain/calibration'
import { calculate, recordPoint, calibrationSnapshot } from './services/engine'
import { exportCalibrationReport, downloadWriter } from './services/exportService'

type Tab = 'calculator'|'calibration'

function isFlowUnit(v: string): v is FlowUnit {
  return (FLOW_UNIT_KEYS as readonly string[]).includes(v)
}

export default function App(){
  const [tab, setTab] = useState<Tab>('calculator')

  // calculator tab
  const [flow, setFlow] = useState('')
  const [flowUnit, setFlowUnit] = useState<FlowUnit>('m3_per_hour')
  const [outer, setOuter] = useState('')
  const [wall, setWall] = useState('')
  const [resultText, setResultText] = useState('')
  const [calcWarnings, setCalcWarnings] = useState<string[]>([])

  // calibration tab
  const [calOuter, setCalOuter] = useState('')
  const [calWall, setCalWall] = useState('')
  const [calFlow, setCalFlow] = useState('')
  const [calUnit, setCalUnit] = useState<FlowUnit>('m3_per_hour')
  const [instrument, setInstrument] = useState('')
  const [session, setSession] = useState<CalibrationSession>(emptySession())
  const [pipe, setPipe] = useState<PipeSpec | null>(null)
  const [calWarnings, setCalWarnings] = useState<string[]>([])

  const snapshot = useMemo(() => calibrationSnapshot(session), [session])

  const onCalculate = () => {
    const r = calculate({ flow, flowUnit, outerDiameter: outer, wallThickness: wall })
    if (!r.ok){ setCalcWarnings([r.error.message]); return }
    setCalcWarnings([])
    setResultText(r.value.text)
  }

  const onClearCalculator = () => {
    setFlow(''); setOuter(''); setWall(''); setResultText(''); setCalcWarnings([])
    setFlowUnit('m3_per_hour')
  }

  const onAddPoint = () => {
    const r = recordPoint(session, { flow: calFlow, flowUnit: calUnit, outerDiameter: calOuter, wallThickness: calWall, instrumentVelocity: instrument })
    if (!r.ok){ setCalWarnings([r.error.message]); return }
    setSession(r.value.session)
    setPipe(r.value.pipe)
    setCalWarnings(r.value.warnings)
    setCalFlow(''); setInstrument('')
  }

  const onClearCalibration = () => {
    if (!window.confirm('Clear all calibration data?')) return
    setSession(prev => clearSession(prev))
    setPipe(null)
    setCalWarnings([])
  }

  const onExport = () => {
    if (!pipe){ setCalWarnings(['No calibration data to export.']); return }
    const r = exportCalibrationReport(pipe, session, downloadWriter)
    setCalWarnings(r.ok ? [`Results exported to: ${r.value.fileName}`] : [r.error.message])
  }

  const unitOptions = (long: boolean) => FLOW_UNIT_KEYS.map(u => (
    <option key={u} value={u}>{long ? `${FLOW_UNITS[u].label} (${FLOW_UNITS[u].description})` : FLOW_UNITS[u].label}</option>
  ))

  return (
    <div className="container">
      <div className="card">
        <div className="h1">Pipe Velocity Calculator &amp; Velocimeter Calibration</div>

        <div className="tabs">
          <button className={"tab "+(tab==='calculator'?'active':'')} onClick={()=>setTab('calculator')}>Velocity Calculator</button>
          <button className={"tab "+(tab==='calibration'?'active':'')} onClick={()=>setTab('calibration')}>Velocimeter Calibration</button>
        </div>

        {tab==='calculator' && (
          <div className="row">
            <div className="col card">
              <div className="h1">Input data</div>
              <label>Flow rate</label>
              <input value={flow} placeholder="Enter the flow rate" onChange={e=>setFlow(e.target.value)}/>
              <select value={flowUnit} onChange={e=>{ if (isFlowUnit(e.target.value)) setFlowUnit(e.target.value) }}>{unitOptions(true)}</select>
              <label>Outer diameter (mm)</label>
              <input value={outer} placeholder="Outer diameter in mm" onChange={e=>setOuter(e.target.value)}/>
              <label>Wall thickness (mm)</label>
              <input value={wall} placeholder="Wall thickness in mm" onChange={e=>setWall(e.target.value)}/>
              <div className="row" style={{marginTop:10}}>
                <button onClick={onCalculate}>Calculate velocity</button>
                <button className="danger" onClick={onClearCalculator}>Clear</button>
              </div>
              <small>
                Di = De - 2×wall · A = π × (Di/2)² · v = Q / A
              </small>
            </div>
            <div className="col card">
              <div className="h1">Results</div>
              {calcWarnings.map((w,i)=><div key={i} className="warn">• {w}</div>)}
              <pre>{resultText}</pre>
            </div>
          </div>
        )}

        {tab==='calibration' && (
          <div className="row">
            <div className="col card">
              <div className="h1">Pipe configuration</div>
              <label>Outer diameter (mm)</label>
              <input value={calOuter} onChange={e=>setCalOuter(e.target.value)}/>
              <label>Wall thickness (mm)</label>
              <input value={calWall} onChange={e=>setCalWall(e.target.value)}/>

              <div className="h1" style={{marginTop:10}}>Calibration data</div>
              <label>Reference flow</label>
              <input value={calFlow} placeholder="Reference flow rate" onChange={e=>setCalFlow(e.target.value)}/>
              <select value={calUnit} onChange={e=>{ if (isFlowUnit(e.target.value)) setCalUnit(e.target.value) }}>{unitOptions(false)}</select>
              <label>Instrument velocity (m/s)</label>
              <input value={instrument} placeholder="Reading of the instrument under calibration" onChange={e=>setInstrument(e.target.value)}/>

              <div className="row" style={{marginTop:10}}>
                <button onClick={onAddPoint}>Add point</button>
                <button className="warning" onClick={onClearCalibration} disabled={sessionState(session)==='EMPTY'}>Clear calibration</button>
                <button className="info" onClick={onExport}>Export results</button>
              </div>

              {calWarnings.length>0 && (<div className="card"><div className="h1">Warnings</div>{calWarnings.map((w,i)=><div key={i} className="warn">• {w}</div>)}</div>)}

              <table>
                <thead><tr><th>Point</th><th>V. Ref (m/s)</th><th>V. Inst (m/s)</th><th>Error (m/s)</th></tr></thead>
                <tbody>
                  {snapshot.points.map(p=>(
                    <tr key={p.index}>
                      <td>{p.index}</td>
                      <td>{p.referenceVelocity_m_s.toFixed(4)}</td>
                      <td>{p.instrumentVelocity_m_s.toFixed(4)}</td>
                      <td>{p.error_m_s.toFixed(4)}</td>
                    </tr>
                  ))}
                </tbody>
              </table>

              <div className="h1" style={{marginTop:10}}>Calibration statistics</div>
              <pre>{snapshot.summary}</pre>
            </div>
            <div className="col card">
              <Plot data={snapshot.chart.data} layout={snapshot.chart.layout} style={{height:560}}/>
            </div>
          </div>
        )}
      </div>
    </div>
  )
}
