// services/angel-service/HistoricalDataService.ts
import { DateTime } from 'luxon'
import { formatProviderDateTime, marketNow } from '../../utils/util'
import { parseCandleRows } from '../../utils/candles'
import { AngelService } from './AngelService'
import { CandleDataRequest, CandleDataResponse, CandleDataSource } from './types'

const CANDLE_PATH = '/rest/secure/angelbroking/historical/v1/getCandleData'

export class HistoricalDataService implements CandleDataSource {
  constructor(private angelService: AngelService) {}

  /**
   * Raw candle request. Transport errors propagate; a falsy `status` is
   * returned as-is for the caller to judge.
   */
  async getCandleData(params: CandleDataRequest): Promise<CandleDataResponse> {
    const body = await this.angelService.post<CandleDataResponse | null>(CANDLE_PATH, params)
    if (!body || typeof body !== 'object') {
      return { status: false, message: 'Empty response', errorcode: '', data: null }
    }
    return body
  }

  /**
   * Last close of the one-minute series since the previous day's open.
   */
  async getLastTradedPrice(symbolToken: string, now: DateTime = marketNow()): Promise<number | null> {
    try {
      const response = await this.getCandleData({
        exchange: 'NSE',
        symboltoken: symbolToken,
        interval: 'ONE_MINUTE',
        fromdate: `${now.minus({ days: 1 }).toFormat('yyyy-MM-dd')} 09:15`,
        todate: formatProviderDateTime(now),
      })
      if (!response.status) return null
      const candles = parseCandleRows(response.data)
      if (!candles || candles.length === 0) return null
      return candles[candles.length - 1].close
    } catch (error) {
      console.warn(`LTP unavailable for ${symbolToken}:`, error instanceof Error ? error.message : error)
      return null
    }
  }
}
