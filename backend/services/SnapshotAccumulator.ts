// services/SnapshotAccumulator.ts
import { buildZip, entryNameFor } from './ArchiveWriter'
import { RunTally } from './RunTally'
import { ArchiveEntry } from './types'

export type ContractResult =
  | { symbol: string; status: 'stored'; bytes: Buffer }
  | { symbol: string; status: 'failed'; reason: string }

/**
 * The only mutable state shared by the workers of one index. `record` is
 * synchronous, so each completion lands as one whole insert and tally update
 * before the next callback can run.
 */
export class SnapshotAccumulator {
  private readonly entries: ArchiveEntry[] = []
  private readonly tally = new RunTally()
  private sealed = false

  record(result: ContractResult): void {
    if (this.sealed) {
      throw new Error(`Archive already finalised, cannot record ${result.symbol}`)
    }
    if (result.status === 'stored') {
      this.entries.push({ name: entryNameFor(result.symbol), bytes: result.bytes })
      this.tally.recordSuccess(result.symbol)
    } else {
      this.tally.recordFailure(result.symbol, result.reason)
    }
  }

  get entryCount(): number {
    return this.entries.length
  }

  get succeeded(): string[] {
    return this.tally.succeeded
  }

  get failed() {
    return this.tally.failed
  }

  /**
   * Seals the accumulator. Null when nothing succeeded.
   */
  async finalize(): Promise<Buffer | null> {
    this.sealed = true
    if (this.entries.length === 0) return null
    return buildZip(this.entries)
  }
}
