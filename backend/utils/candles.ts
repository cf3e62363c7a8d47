// backend/utils/candles.ts
import { CandleRecord } from '../services/types'
import { toNaiveDate } from './util'

const toNumber = (value: unknown): number | null => {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : null
  }
  return null
}

/**
 * Converts provider rows `[timestamp, open, high, low, close, volume]` into
 * candle records. Returns null when any row is malformed.
 */
export function parseCandleRows(data: unknown): CandleRecord[] | null {
  if (!Array.isArray(data)) return null

  const candles: CandleRecord[] = []
  for (const row of data) {
    if (!Array.isArray(row) || row.length < 6) return null
    const [timestamp, ...values] = row
    if (typeof timestamp !== 'string') return null

    const date = toNaiveDate(timestamp)
    const [open, high, low, close, volume] = values.slice(0, 5).map(toNumber)
    if (!date || open === null || high === null || low === null || close === null || volume === null) {
      return null
    }
    candles.push({ date, open, high, low, close, volume })
  }
  return candles
}
