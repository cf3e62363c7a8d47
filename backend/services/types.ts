// services/types.ts
import { FailedSymbol } from '../../shared/types'

export interface IndexProfile {
  name: string
  token: string // reference instrument on NSE
  strikeStep: number // strikes listed at multiples of this
  roundTo: number // granularity of the derived range
  buffer: number // points added outside the observed high/low
}

export interface HistoricalSummary {
  minLow: number
  maxHigh: number
  currentClose: number
}

export interface StrikeRange {
  low: number
  high: number
}

export type StrikeRangeResult =
  | { status: 'available'; range: StrikeRange; summary: HistoricalSummary }
  | { status: 'unavailable'; reason: string }

export const OPTION_INDEX_INSTRUMENT = 'OPTIDX'

export interface ContractRow {
  symbol: string // underlying, e.g. BANKNIFTY
  instrument: string // OPTIDX, FUTIDX, ...
  expiry: string // as listed, DD-MON-YYYY
  expiryDate: string | null // ISO yyyy-MM-dd, null when unparseable
  strikePrice: number | null
  tradingSymbol: string
  token: string
}

export interface CandleRecord {
  date: Date // exchange wall-clock time, offset dropped (stored as UTC)
  open: number
  high: number
  low: number
  close: number
  volume: number
}

export type FetchOutcome =
  | { status: 'success'; candles: CandleRecord[] }
  | { status: 'empty' }
  | { status: 'failed'; reason: string }

export interface FetchWindow {
  fromdate: string // yyyy-MM-dd HH:mm, exchange time
  todate: string
}

export interface ArchiveEntry {
  name: string
  bytes: Buffer
}

export interface RetryPolicy {
  maxAttempts: number
  delayMs: (attempt: number) => number
}

export interface CoordinatorResult {
  archive: Buffer | null
  succeeded: string[]
  failed: FailedSymbol[]
}

// Collaborator seams used by the orchestrator

export interface RangeEstimator {
  estimate(profile: IndexProfile): Promise<StrikeRangeResult>
}

export interface ContractWorker {
  fetchContract(contract: ContractRow, window: FetchWindow): Promise<FetchOutcome>
}

export interface ContractFetchCoordinator {
  run(contracts: ContractRow[], window: FetchWindow): Promise<CoordinatorResult>
}

export interface SymbolMasterSource {
  load(): Promise<ContractRow[]>
}

export interface ArchiveDelivery {
  sendDocument(bytes: Buffer, filename: string): Promise<boolean>
}
