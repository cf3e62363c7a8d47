// services/StrikeRangeService.ts
import { DateTime } from 'luxon'
import { CandleDataSource } from './angel-service'
import { parseCandleRows } from '../utils/candles'
import { formatProviderDateTime, marketNow, roundDownToMultiple, roundUpToMultiple } from '../utils/util'
import { HistoricalSummary, IndexProfile, RangeEstimator, StrikeRange, StrikeRangeResult } from './types'

export const DEFAULT_LOOKBACK_WEEKS = 6

/**
 * low = floor(minLow − buffer) clamped at 0, high = ceil(maxHigh + buffer),
 * both to the profile's rounding granularity.
 */
export function computeStrikeRange(summary: HistoricalSummary, profile: IndexProfile): StrikeRange {
  const low = roundDownToMultiple(summary.minLow - profile.buffer, profile.roundTo)
  const high = roundUpToMultiple(summary.maxHigh + profile.buffer, profile.roundTo)
  return { low: Math.max(0, low), high }
}

export class StrikeRangeService implements RangeEstimator {
  constructor(
    private readonly candles: CandleDataSource,
    private readonly lookbackWeeks: number = DEFAULT_LOOKBACK_WEEKS,
    private readonly clock: () => DateTime = marketNow
  ) {}

  /**
   * Daily candle extremes over the lookback window ending now. Any transport
   * or data-shape problem yields null.
   */
  async getHistoricalSummary(symbolToken: string, weeks: number = this.lookbackWeeks): Promise<HistoricalSummary | null> {
    try {
      const toDate = this.clock()
      const fromDate = toDate.minus({ weeks })

      const response = await this.candles.getCandleData({
        exchange: 'NSE',
        symboltoken: symbolToken,
        interval: 'ONE_DAY',
        fromdate: `${fromDate.toFormat('yyyy-MM-dd')} 09:15`,
        todate: formatProviderDateTime(toDate),
      })

      if (!response.status) {
        console.warn(`${symbolToken} historical request not ok: ${response.message}`)
        return null
      }

      const rows = parseCandleRows(response.data)
      if (!rows || rows.length === 0) {
        console.warn(`${symbolToken} historical data empty or malformed`)
        return null
      }

      return {
        minLow: Math.min(...rows.map((row) => row.low)),
        maxHigh: Math.max(...rows.map((row) => row.high)),
        currentClose: rows[rows.length - 1].close,
      }
    } catch (error) {
      console.error(`${symbolToken} historical error:`, error instanceof Error ? error.message : error)
      return null
    }
  }

  async estimate(profile: IndexProfile): Promise<StrikeRangeResult> {
    const summary = await this.getHistoricalSummary(profile.token)
    if (!summary) {
      console.error(`❌ Historical data unavailable for ${profile.name} (${profile.token})`)
      return { status: 'unavailable', reason: 'Historical data unavailable' }
    }

    console.log(
      `${profile.name} ${this.lookbackWeeks}w low ${summary.minLow}, high ${summary.maxHigh}, last close ${summary.currentClose}`
    )
    return { status: 'available', range: computeStrikeRange(summary, profile), summary }
  }
}
