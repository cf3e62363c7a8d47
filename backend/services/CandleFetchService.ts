// services/CandleFetchService.ts
import { CandleDataSource } from './angel-service'
import { parseCandleRows } from '../utils/candles'
import { linearBackoff, sleep } from '../utils/util'
import { ContractRow, ContractWorker, FetchOutcome, FetchWindow, RetryPolicy } from './types'

export const DEFAULT_RETRY_POLICY: RetryPolicy = linearBackoff(3, 5000)

export const NO_DATA = 'No data'
export const MALFORMED_DATA = 'Malformed candle data'

/**
 * Minute candles for one NFO contract. Never throws: every path ends in a
 * FetchOutcome.
 */
export class CandleFetchService implements ContractWorker {
  constructor(
    private readonly candles: CandleDataSource,
    private readonly retryPolicy: RetryPolicy = DEFAULT_RETRY_POLICY,
    private readonly wait: (ms: number) => Promise<void> = sleep
  ) {}

  async fetchContract(contract: ContractRow, window: FetchWindow): Promise<FetchOutcome> {
    const { maxAttempts } = this.retryPolicy
    const params = {
      exchange: 'NFO' as const,
      symboltoken: String(contract.token),
      interval: 'ONE_MINUTE' as const,
      fromdate: window.fromdate,
      todate: window.todate,
    }

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const response = await this.candles.getCandleData(params)
        if (response.status) {
          return this.toOutcome(response.data)
        }
        console.warn(`  ⚠️ ${contract.tradingSymbol} attempt ${attempt}/${maxAttempts}: ${response.message || 'not ok'}`)
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error)
        console.warn(`  ⚠️ ${contract.tradingSymbol} attempt ${attempt}/${maxAttempts} failed: ${message}`)
      }

      if (attempt < maxAttempts) {
        await this.wait(this.retryPolicy.delayMs(attempt))
      }
    }

    return { status: 'failed', reason: NO_DATA }
  }

  private toOutcome(data: unknown): FetchOutcome {
    if (data === null || data === undefined || (Array.isArray(data) && data.length === 0)) {
      return { status: 'empty' }
    }
    const candles = parseCandleRows(data)
    if (!candles) {
      return { status: 'failed', reason: MALFORMED_DATA }
    }
    return { status: 'success', candles }
  }
}
