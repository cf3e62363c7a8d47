// services/SnapshotFetchCoordinator.ts
import Bottleneck from 'bottleneck'
import { candlesToXlsx } from './ArchiveWriter'
import { NO_DATA } from './CandleFetchService'
import { ContractResult, SnapshotAccumulator } from './SnapshotAccumulator'
import { ContractFetchCoordinator, ContractRow, ContractWorker, CoordinatorResult, FetchWindow } from './types'

export interface CoordinatorOptions {
  maxConcurrent: number
  minTimeMs: number
  serialize?: typeof candlesToXlsx
}

export class SnapshotFetchCoordinator implements ContractFetchCoordinator {
  private readonly serialize: typeof candlesToXlsx

  constructor(private readonly worker: ContractWorker, private readonly options: CoordinatorOptions) {
    this.serialize = options.serialize ?? candlesToXlsx
  }

  /**
   * Fetches every contract on a bounded pool and waits for all of them.
   * Outcomes are recorded in completion order.
   */
  async run(contracts: ContractRow[], window: FetchWindow): Promise<CoordinatorResult> {
    const limiter = new Bottleneck({
      maxConcurrent: this.options.maxConcurrent,
      minTime: this.options.minTimeMs,
    })
    const accumulator = new SnapshotAccumulator()
    const total = contracts.length
    let processed = 0

    console.log(`Fetching ${total} contracts (${this.options.maxConcurrent} workers, ${window.fromdate} → ${window.todate})`)

    const jobs = contracts.map((contract) =>
      limiter
        .schedule(() => this.fetchAndSerialize(contract, window))
        .catch((error: unknown): ContractResult => ({
          symbol: contract.tradingSymbol,
          status: 'failed',
          reason: error instanceof Error ? error.message : String(error),
        }))
        .then((result) => {
          accumulator.record(result)
          processed++
          if (result.status === 'failed') {
            console.warn(`  ❌ [${processed}/${total}] ${result.symbol}: ${result.reason}`)
          } else if (processed % 25 === 0 || processed === total) {
            console.log(`  📥 [${processed}/${total}] ${accumulator.entryCount} stored`)
          }
        })
    )

    await Promise.all(jobs)

    const archive = await accumulator.finalize()
    return {
      archive,
      succeeded: accumulator.succeeded,
      failed: accumulator.failed,
    }
  }

  private async fetchAndSerialize(contract: ContractRow, window: FetchWindow): Promise<ContractResult> {
    const symbol = contract.tradingSymbol
    const outcome = await this.worker.fetchContract(contract, window)

    switch (outcome.status) {
      case 'success':
        if (outcome.candles.length === 0) {
          return { symbol, status: 'failed', reason: NO_DATA }
        }
        return { symbol, status: 'stored', bytes: await this.serialize(outcome.candles) }
      case 'empty':
        return { symbol, status: 'failed', reason: NO_DATA }
      case 'failed':
        return { symbol, status: 'failed', reason: outcome.reason }
    }
  }
}
