// services/ContractFilterService.ts
import { ContractRow, OPTION_INDEX_INSTRUMENT, StrikeRange } from './types'

export class ContractFilterService {
  private optionRowsFor(rows: ContractRow[], indexName: string): ContractRow[] {
    return rows.filter((row) => row.symbol === indexName && row.instrument === OPTION_INDEX_INSTRUMENT)
  }

  /**
   * True when any option row of the index expires on `today` (ISO date,
   * exchange calendar).
   */
  isExpiryToday(rows: ContractRow[], indexName: string, today: string): boolean {
    return this.optionRowsFor(rows, indexName).some((row) => row.expiryDate === today)
  }

  /**
   * Option contracts of the index expiring exactly on `expiry` whose strike
   * lies in [low, high] and is a multiple of `strikeStep`.
   */
  selectContracts(
    rows: ContractRow[],
    indexName: string,
    expiry: string,
    range: StrikeRange,
    strikeStep: number
  ): ContractRow[] {
    return this.optionRowsFor(rows, indexName).filter((row) => {
      if (row.expiryDate !== expiry) return false
      const strike = row.strikePrice
      if (strike === null) return false
      return strike >= range.low && strike <= range.high && strike % strikeStep === 0
    })
  }
}
