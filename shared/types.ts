export interface StrikeBand {
  low: number
  high: number
}

export type IndexRunResult =
  | { index: string; state: 'not-expiry' }
  | { index: string; state: 'range-unavailable'; reason: string }
  | { index: string; state: 'no-contracts'; range: StrikeBand }
  | { index: string; state: 'no-data'; range: StrikeBand; contracts: number; failed: number }
  | {
      index: string
      state: 'archive-produced'
      range: StrikeBand
      contracts: number
      succeeded: number
      failed: number
      filename: string
      delivered: boolean
      savedTo: string | null
    }
  | { index: string; state: 'failed'; error: string }

export interface FailedSymbol {
  symbol: string
  reason: string
}

export interface RunReport {
  runId: string
  startedAt: string
  finishedAt: string
  indices: IndexRunResult[]
  succeeded: string[]
  failed: FailedSymbol[]
}

export interface SnapshotStatus {
  inFlight: boolean
  lastRunStartedAt: string | null
  lastRunFinishedAt: string | null
  lastRunStatus: 'idle' | 'running' | 'success' | 'error'
  lastRunError: string | null
  lastReport: RunReport | null
}
