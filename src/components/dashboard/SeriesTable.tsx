import type { SeriesLine } from '@/lib/schema/indicator'
import { formatChange, formatPercentage, formatUnitValue } from '@/lib/utils/format'

export function changeDecimals(units: string): number {
  if (units === 'trillion_usd') return 3
  if (units === 'pmi') return 1
  if (units === 'percent_of_gdp') return 0
  return 2
}

export function SeriesTable({ lines }: { lines: readonly SeriesLine[] }) {
  const showYoy = lines.some((l) => l.yoyPct !== null)

  return (
    <table className="w-full text-sm">
      <thead>
        <tr className="text-left text-xs text-gray-500 dark:text-gray-400">
          <th className="font-medium py-1">Series</th>
          <th className="font-medium py-1 text-right">Latest</th>
          <th className="font-medium py-1 text-right">Change</th>
          {showYoy && <th className="font-medium py-1 text-right">YoY</th>}
          <th className="font-medium py-1 text-right">As of</th>
        </tr>
      </thead>
      <tbody>
        {lines.map((line) => (
          <tr key={line.key} className="border-t border-gray-100 dark:border-gray-700">
            <td className="py-1">
              {line.meta && <span className="mr-1">{line.meta.flag}</span>}
              {line.label}
              {line.meta?.bank && <span className="ml-1 text-xs text-gray-400">({line.meta.bank})</span>}
            </td>
            <td className="py-1 text-right font-medium">{formatUnitValue(line.latest?.value, line.units)}</td>
            <td className={`py-1 text-right ${line.change !== null && line.change < 0 ? 'text-red-600' : 'text-green-600'}`}>
              {formatChange(line.change, line.units, changeDecimals(line.units))}
            </td>
            {showYoy && <td className="py-1 text-right">{line.yoyPct === null ? '—' : formatPercentage(line.yoyPct, 1)}</td>}
            <td className="py-1 text-right text-xs text-gray-500">{line.latest?.date ?? '—'}</td>
          </tr>
        ))}
      </tbody>
    </table>
  )
}
