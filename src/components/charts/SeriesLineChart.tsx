import type { ReactElement } from 'react'
import { ResponsiveContainer, LineChart, Line, XAxis, YAxis, CartesianGrid, Tooltip, Brush, Legend, ReferenceLine } from 'recharts'
import { format, parseISO } from 'date-fns'
import type { Frequency, SeriesLine } from '@/lib/schema/indicator'
import { buildChartRows, dateTickPattern, LINE_COLORS } from '@/lib/utils/chart-data'

interface RefLine {
  y: number
  color?: string
  dash?: string
}

interface SeriesLineChartProps {
  lines: readonly SeriesLine[]
  frequency: Frequency
  valueFormatter?: (v: number) => string
  refLines?: RefLine[]
  defaultWindowCount?: number
  height?: number
  /** Fixed width instead of filling the parent. */
  width?: number
  animate?: boolean
}

export function SeriesLineChart({
  lines,
  frequency,
  valueFormatter = (v) => String(v),
  refLines = [],
  defaultWindowCount,
  height = 220,
  width,
  animate = true,
}: SeriesLineChartProps) {
  const data = buildChartRows(lines)
  const startIndex = defaultWindowCount ? Math.max(0, data.length - defaultWindowCount) : undefined
  const tickPattern = dateTickPattern(frequency)

  const chart: ReactElement = (
    <LineChart data={data} width={width} height={height} margin={{ left: 8, right: 8, top: 8, bottom: 8 }}>
      <CartesianGrid strokeDasharray="3 3" stroke="#e0e0e0" />
      <XAxis dataKey="date" tickFormatter={(v: string) => format(parseISO(v), tickPattern)} minTickGap={24} stroke="#666" fontSize={12} />
      <YAxis stroke="#666" fontSize={12} tickFormatter={(v: number) => valueFormatter(Number(v))} width={64} />
      <Tooltip
        formatter={(value: number, name: string) => [valueFormatter(Number(value)), name]}
        labelFormatter={(label: string) => format(parseISO(label), 'MMM dd, yyyy')}
        contentStyle={{ backgroundColor: '#fff', border: '1px solid #ccc', borderRadius: '4px' }}
      />
      {refLines.map((r, i) => (
        <ReferenceLine key={i} y={r.y} stroke={r.color || '#999'} strokeDasharray={r.dash || '3 3'} />
      ))}
      {lines.length > 1 && <Legend wrapperStyle={{ fontSize: 12 }} />}
      {lines.map((line, i) => (
        <Line
          key={line.key}
          type="monotone"
          dataKey={line.key}
          name={line.meta ? `${line.meta.flag} ${line.label}` : line.label}
          stroke={LINE_COLORS[i % LINE_COLORS.length]}
          strokeWidth={i === 0 ? 2 : 1.5}
          dot={false}
          connectNulls={false}
          isAnimationActive={animate}
        />
      ))}
      {data.length > 30 && <Brush dataKey="date" height={22} travellerWidth={8} stroke="#94a3b8" startIndex={startIndex} />}
    </LineChart>
  )

  if (width !== undefined) return chart
  return (
    <ResponsiveContainer width="100%" height={height}>
      {chart}
    </ResponsiveContainer>
  )
}
