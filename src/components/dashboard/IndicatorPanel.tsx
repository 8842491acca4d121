'use client'

import { ChartContainer } from '@/components/charts/ChartContainer'
import { SeriesLineChart } from '@/components/charts/SeriesLineChart'
import { YieldCurveChart } from '@/components/charts/YieldCurveChart'
import { DataFreshnessBadge } from '@/components/ui/data-freshness-badge'
import { useIndicator } from '@/hooks/use-indicators'
import type { CatalogEntry } from '@/lib/indicators/catalog'
import type { IndicatorDocument } from '@/lib/schema/indicator'
import { formatPercentage, formatUnitValue } from '@/lib/utils/format'
import { IndicatorCard } from './IndicatorCard'
import { getSignalStatusLabel, SignalsPanel } from './SignalsPanel'
import { SeriesTable } from './SeriesTable'

interface Headline {
  value: string
  subtitle?: string
  interpretation?: string
  alert?: boolean
}

export function getHeadline(doc: IndicatorDocument): Headline {
  if (doc.id === 'yield_curve') {
    const spread = doc.signals.find((s) => s.key === '2s10s')
    if (spread) {
      return {
        value: formatPercentage(spread.value),
        subtitle: `10Y - 2Y spread · ${getSignalStatusLabel(spread.status)}`,
        alert: spread.status === 'INVERTED',
      }
    }
  }

  const primary = doc.lines[0]
  const regime = doc.signals.find((s) => s.status !== 'none' && s.key === doc.id)
  const yoy = primary?.yoyPct
  return {
    value: formatUnitValue(primary?.latest?.value, primary?.units ?? doc.units),
    subtitle: primary ? `${primary.meta ? `${primary.meta.flag} ` : ''}${primary.label} · as of ${primary.latest?.date ?? '—'}` : undefined,
    interpretation: regime
      ? getSignalStatusLabel(regime.status)
      : yoy !== null && yoy !== undefined
        ? `${yoy >= 0 ? '+' : ''}${yoy.toFixed(1)}% year over year`
        : undefined,
    alert: regime?.status === 'tight',
  }
}

/**
 * One indicator. Renders nothing at all when its file has not been published.
 */
export function IndicatorPanel({ entry }: { entry: CatalogEntry }) {
  const { data, error, isLoading, refetch } = useIndicator(entry)

  if (isLoading) return <IndicatorCard title={entry.title} isLoading />
  if (error) return <IndicatorCard title={entry.title} error={error} onRetry={() => void refetch()} />
  if (!data) return null

  const headline = getHeadline(data)
  const primaryUnits = data.lines[0]?.units ?? data.units
  const chartLines = data.id === 'm2' ? data.lines.slice(0, 2) : data.lines

  return (
    <IndicatorCard
      title={data.title}
      value={headline.value}
      subtitle={headline.subtitle}
      interpretation={headline.interpretation}
      alert={headline.alert}
      badge={<DataFreshnessBadge lastUpdated={data.lastUpdated} />}
    >
      {data.curve && data.curve.length > 0 ? (
        <ChartContainer caption={entry.description}>
          <YieldCurveChart snapshots={data.curve} inverted={headline.alert === true} />
        </ChartContainer>
      ) : (
        <ChartContainer caption={entry.description}>
          <SeriesLineChart
            lines={chartLines}
            frequency={data.frequency}
            valueFormatter={(v) => formatUnitValue(v, primaryUnits)}
            refLines={data.id === 'pmi' ? [{ y: 50 }] : data.id === 'nfci' ? [{ y: 0 }] : []}
            defaultWindowCount={data.frequency === 'a' ? undefined : 120}
          />
        </ChartContainer>
      )}
      <SignalsPanel signals={data.signals.filter((s) => s.key !== data.id)} formatValue={(v) => formatUnitValue(v, data.units)} />
      {(data.lines.length > 1 || data.id !== 'yield_curve') && <SeriesTable lines={data.lines} />}
    </IndicatorCard>
  )
}
