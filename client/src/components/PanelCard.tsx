import Plot from 'react-plotly.js'
import type { PanelContent, PanelView } from '../types'
import { barTraces, lineTraces } from '../utils/planHelpers'
import NoticeBanner from './NoticeBanner'
import ResultTable from './ResultTable'

const CHART_LAYOUT = {
  height: 300,
  autosize: true,
  margin: { l: 50, r: 20, t: 10, b: 90 }
}

const CHART_CONFIG = { displayModeBar: false, responsive: true }

function PanelBody({ content }: { content: PanelContent }) {
  switch (content.kind) {
    case 'metrics':
      return (
        <div className="metrics-row">
          {content.items.map(item => (
            <div key={item.label} className="metric">
              <div className="metric-label">{item.label}</div>
              <div className="metric-value">{item.value}</div>
            </div>
          ))}
        </div>
      )
    case 'bar':
      return (
        <Plot
          data={barTraces(content)}
          layout={{ ...CHART_LAYOUT, xaxis: { title: { text: content.x } }, yaxis: { title: { text: content.y } } }}
          config={CHART_CONFIG}
          style={{ width: '100%' }}
          useResizeHandler
        />
      )
    case 'line':
      return (
        <Plot
          data={lineTraces(content)}
          layout={{ ...CHART_LAYOUT, xaxis: { title: { text: content.index }, type: 'category' } }}
          config={CHART_CONFIG}
          style={{ width: '100%' }}
          useResizeHandler
        />
      )
    case 'table':
      return <ResultTable data={content.data} />
    case 'placeholder':
      return <NoticeBanner notice={content.notice} />
  }
}

export default function PanelCard({ panel }: { panel: PanelView }) {
  return (
    <section className={`panel-card panel-${panel.width}`} data-testid={`panel-${panel.id}`} title={panel.sql}>
      <h4>{panel.title}</h4>
      <PanelBody content={panel.content} />
    </section>
  )
}
