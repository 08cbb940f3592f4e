import React, { useEffect, useRef, useState } from 'react'
import Plotly from 'plotly.js-dist-min'
import type { Config, Data, Layout } from 'plotly.js'

type Props = {
  data: Data[]
  layout?: Partial<Layout>
  config?: Partial<Config>
  style?: React.CSSProperties
}

export default function Plot({ data, layout, config, style }: Props){
  const divRef = useRef<HTMLDivElement | null>(null)
  const [renderError, setRenderError] = useState<string | null>(null)

  useEffect(() => {
    const div = divRef.current
    if (!div) return
    Plotly.newPlot(div, data, { margin: { t: 40, r: 10, b: 40, l: 55 }, ...layout }, { responsive: true, displayModeBar: true, ...config })
      .then(() => setRenderError(null))
      .catch((e: unknown) => setRenderError(e instanceof Error ? e.message : String(e)))
    return () => {
      Plotly.purge(div)
    }
  }, [JSON.stringify(data), JSON.stringify(layout), JSON.stringify(config)])

  return (
    <>
      {renderError && <div className="warn">• Chart could not be drawn: {renderError}</div>}
      <div ref={divRef} style={{ width: '100%', height: 360, ...style }} />
    </>
  )
}
