/**
 * Format number as currency with abbreviations (K, M, B, T)
 */
export function formatCurrency(value: number, decimals: number = 2): string {
  const sign = value < 0 ? '-' : ''
  const abs = Math.abs(value)
  if (abs >= 1_000_000_000_000) return `${sign}$${(abs / 1_000_000_000_000).toFixed(decimals)}T`
  if (abs >= 1_000_000_000) return `${sign}$${(abs / 1_000_000_000).toFixed(decimals)}B`
  if (abs >= 1_000_000) return `${sign}$${(abs / 1_000_000).toFixed(decimals)}M`
  if (abs >= 1_000) return `${sign}$${(abs / 1_000).toFixed(decimals)}K`
  return `${sign}$${abs.toFixed(decimals)}`
}

/**
 * Format percentage
 */
export function formatPercentage(value: number, decimals: number = 2): string {
  return `${value.toFixed(decimals)}%`
}

/**
 * Format large numbers with commas
 */
export function formatNumber(value: number, decimals: number = 0): string {
  return new Intl.NumberFormat('en-US', { minimumFractionDigits: decimals, maximumFractionDigits: decimals }).format(value)
}

/**
 * Display a value stored in one of the document unit codes
 */
export function formatUnitValue(value: number | null | undefined, units: string): string {
  if (value === null || value === undefined || !Number.isFinite(value)) return '—'
  switch (units) {
    case 'trillion_usd':
      return formatCurrency(value * 1_000_000_000_000)
    case 'percent':
      return formatPercentage(value)
    case 'percent_of_gdp':
      return formatPercentage(value, 0)
    case 'pmi':
      return value.toFixed(1)
    case 'national_currency':
      return formatNumber(value)
    default:
      return value.toFixed(2)
  }
}

/**
 * Signed change, e.g. "+0.25" / "-1.0"; percent units get a "pp" suffix
 */
export function formatChange(value: number | null | undefined, units: string, decimals: number = 2): string {
  if (value === null || value === undefined || !Number.isFinite(value)) return '—'
  const sign = value > 0 ? '+' : ''
  const suffix = units === 'percent' || units === 'percent_of_gdp' ? 'pp' : ''
  return `${sign}${value.toFixed(decimals)}${suffix}`
}
