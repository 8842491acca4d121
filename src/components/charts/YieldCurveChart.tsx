import { LineChart, Line, XAxis, YAxis, CartesianGrid, Tooltip, ResponsiveContainer, Legend } from 'recharts'
import { format, parseISO } from 'date-fns'
import type { CurveSnapshot } from '@/lib/schema/indicator'
import { buildCurveRows } from '@/lib/utils/chart-data'

interface YieldCurveChartProps {
  snapshots: readonly CurveSnapshot[]
  inverted: boolean
}

const SNAPSHOT_STYLE: Record<CurveSnapshot['key'], { label: string; dash?: string; color: string }> = {
  current: { label: 'Current', color: '#2563eb' },
  one_month_ago: { label: '1M ago', color: '#94a3b8', dash: '4 4' },
  one_year_ago: { label: '1Y ago', color: '#d1d5db', dash: '2 4' },
}

export function YieldCurveChart({ snapshots, inverted }: YieldCurveChartProps) {
  const data = buildCurveRows(snapshots)

  return (
    <ResponsiveContainer width="100%" height={220}>
      <LineChart data={data} margin={{ left: 8, right: 8, top: 8, bottom: 8 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#e0e0e0" />
        <XAxis dataKey="maturity" stroke="#666" fontSize={12} />
        <YAxis tickFormatter={(v) => `${Number(v).toFixed(1)}%`} stroke="#666" fontSize={12} domain={['auto', 'auto']} />
        <Tooltip
          formatter={(value: number, name: string) => [`${Number(value).toFixed(2)}%`, name]}
          contentStyle={{ backgroundColor: '#fff', border: '1px solid #ccc', borderRadius: '4px' }}
        />
        <Legend wrapperStyle={{ fontSize: 12 }} />
        {snapshots.map((snapshot) => {
          const style = SNAPSHOT_STYLE[snapshot.key]
          const isCurrent = snapshot.key === 'current'
          return (
            <Line
              key={snapshot.key}
              type="monotone"
              dataKey={snapshot.key}
              name={`${style.label} (${format(parseISO(snapshot.date), 'MMM dd, yyyy')})`}
              stroke={isCurrent && inverted ? '#dc2626' : style.color}
              strokeDasharray={style.dash}
              strokeWidth={isCurrent ? 2 : 1.5}
              dot={isCurrent}
              connectNulls={false}
            />
          )
        })}
      </LineChart>
    </ResponsiveContainer>
  )
}
