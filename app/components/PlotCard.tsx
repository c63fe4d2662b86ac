"use client"

import {
  BarChart, Bar, XAxis, YAxis, CartesianGrid, Tooltip, ResponsiveContainer,
  ScatterChart, Scatter, Cell,
} from 'recharts'
import type { PlotPayload } from '@/lib/types'

const COLORS = ['#60a5fa', '#f472b6', '#34d399', '#fbbf24', '#a78bfa', '#fb923c', '#22d3ee', '#e879f9']

const tooltipStyle = {
  background: 'var(--bg-tertiary)',
  border: '1px solid var(--border-color)',
  borderRadius: '8px',
  color: 'var(--text-primary)',
}

const tick = { fill: 'var(--text-secondary)', fontSize: 11 }

function formatEdge(n: number): string {
  return Number.isInteger(n) ? String(n) : n.toFixed(2)
}

type BoxPlot = Extract<PlotPayload, { type: 'box' }>
type Heatmap = Extract<PlotPayload, { type: 'heatmap' }>

function BoxPlotView({ plot }: { plot: BoxPlot }) {
  const { stats, outliers } = plot
  const lo = Math.min(stats.min, stats.lowerBound)
  const hi = Math.max(stats.max, stats.upperBound)
  const span = hi - lo || 1
  const x = (v: number) => 20 + ((v - lo) / span) * 360

  const whiskerLow = Math.max(stats.min, stats.lowerBound)
  const whiskerHigh = Math.min(stats.max, stats.upperBound)

  return (
    <div className="p-4">
      <svg viewBox="0 0 400 90" className="w-full">
        <line x1={x(whiskerLow)} x2={x(stats.q1)} y1={40} y2={40} stroke="var(--text-secondary)" />
        <line x1={x(stats.q3)} x2={x(whiskerHigh)} y1={40} y2={40} stroke="var(--text-secondary)" />
        <line x1={x(whiskerLow)} x2={x(whiskerLow)} y1={30} y2={50} stroke="var(--text-secondary)" />
        <line x1={x(whiskerHigh)} x2={x(whiskerHigh)} y1={30} y2={50} stroke="var(--text-secondary)" />
        <rect
          x={x(stats.q1)}
          y={22}
          width={Math.max(1, x(stats.q3) - x(stats.q1))}
          height={36}
          fill="var(--accent-muted)"
          stroke={COLORS[0]}
        />
        <line x1={x(stats.median)} x2={x(stats.median)} y1={22} y2={58} stroke={COLORS[3]} strokeWidth={2} />
        {outliers.map((v, i) => (
          <circle key={i} cx={x(v)} cy={40} r={3} fill={COLORS[1]} />
        ))}
        <text x={20} y={82} fontSize={10} fill="var(--text-tertiary)">{formatEdge(lo)}</text>
        <text x={380} y={82} fontSize={10} fill="var(--text-tertiary)" textAnchor="end">{formatEdge(hi)}</text>
      </svg>
      <p className="mt-2 text-xs" style={{ color: 'var(--text-secondary)' }}>
        Q1 {formatEdge(stats.q1)} · median {formatEdge(stats.median)} · Q3 {formatEdge(stats.q3)} · {outliers.length} outlier(s)
      </p>
    </div>
  )
}

function heatColor(r: number | null): string {
  if (r === null) return 'var(--bg-tertiary)'
  const alpha = Math.abs(r).toFixed(2)
  return r >= 0 ? `rgba(96, 165, 250, ${alpha})` : `rgba(248, 113, 113, ${alpha})`
}

function HeatmapView({ plot }: { plot: Heatmap }) {
  return (
    <div className="overflow-x-auto p-4">
      <table className="text-xs">
        <thead>
          <tr>
            <th />
            {plot.columns.map(c => (
              <th key={c} className="px-2 py-1 font-medium" style={{ color: 'var(--text-secondary)' }}>{c}</th>
            ))}
          </tr>
        </thead>
        <tbody>
          {plot.matrix.map((row, i) => (
            <tr key={plot.columns[i]}>
              <th className="px-2 py-1 text-right font-medium" style={{ color: 'var(--text-secondary)' }}>
                {plot.columns[i]}
              </th>
              {row.map((r, j) => (
                <td
                  key={plot.columns[j]}
                  className="h-10 w-14 text-center"
                  style={{ background: heatColor(r) }}
                >
                  {r === null ? '—' : r.toFixed(2)}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  )
}

export default function PlotCard({ plot }: { plot: PlotPayload }) {
  const renderPlot = () => {
    switch (plot.type) {
      case 'histogram': {
        const data = plot.bins.map(b => ({ range: `${formatEdge(b.start)} to ${formatEdge(b.end)}`, count: b.count }))
        return (
          <ResponsiveContainer width="100%" height={250}>
            <BarChart data={data}>
              <CartesianGrid strokeDasharray="3 3" stroke="var(--border-color)" />
              <XAxis dataKey="range" tick={tick} />
              <YAxis allowDecimals={false} tick={tick} />
              <Tooltip contentStyle={tooltipStyle} />
              <Bar dataKey="count" fill={COLORS[0]} radius={[4, 4, 0, 0]} />
            </BarChart>
          </ResponsiveContainer>
        )
      }

      case 'bar':
        return (
          <ResponsiveContainer width="100%" height={250}>
            <BarChart data={plot.data}>
              <CartesianGrid strokeDasharray="3 3" stroke="var(--border-color)" />
              <XAxis dataKey="label" tick={tick} />
              <YAxis allowDecimals={false} tick={tick} />
              <Tooltip contentStyle={tooltipStyle} />
              <Bar dataKey="value" radius={[4, 4, 0, 0]}>
                {plot.data.map((_, i) => (
                  <Cell key={i} fill={COLORS[i % COLORS.length]} />
                ))}
              </Bar>
            </BarChart>
          </ResponsiveContainer>
        )

      case 'scatter':
        return (
          <ResponsiveContainer width="100%" height={250}>
            <ScatterChart>
              <CartesianGrid strokeDasharray="3 3" stroke="var(--border-color)" />
              <XAxis type="number" dataKey="x" name={plot.x} tick={tick} />
              <YAxis type="number" dataKey="y" name={plot.y} tick={tick} />
              <Tooltip contentStyle={tooltipStyle} />
              <Scatter data={plot.points} fill={COLORS[2]} />
            </ScatterChart>
          </ResponsiveContainer>
        )

      case 'box':
        return <BoxPlotView plot={plot} />

      case 'heatmap':
        return <HeatmapView plot={plot} />
    }
  }

  return (
    <div
      className="mt-3 overflow-hidden rounded-xl border"
      style={{ background: 'var(--bg-card)', borderColor: 'var(--border-color)' }}
    >
      <div className="border-b px-4 py-3" style={{ borderColor: 'var(--border-color)' }}>
        <h3 className="text-sm font-medium">{plot.title}</h3>
      </div>
      {renderPlot()}
    </div>
  )
}
