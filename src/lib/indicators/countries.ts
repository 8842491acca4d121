import type { CountryMeta } from '@/lib/schema/indicator'

export type CountryCode = 'us' | 'eu' | 'jp' | 'kr' | 'cn'

export const COUNTRIES: Record<CountryCode, CountryMeta> = {
  us: { country: 'United States', flag: '🇺🇸' },
  eu: { country: 'Euro Area', flag: '🇪🇺' },
  jp: { country: 'Japan', flag: '🇯🇵' },
  kr: { country: 'South Korea', flag: '🇰🇷' },
  cn: { country: 'China', flag: '🇨🇳' },
}

export const CENTRAL_BANKS: Record<CountryCode, string> = {
  us: 'Fed',
  eu: 'ECB',
  jp: 'BOJ',
  kr: 'BOK',
  cn: 'PBoC',
}
