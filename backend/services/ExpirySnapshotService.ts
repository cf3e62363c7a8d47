// services/ExpirySnapshotService.ts
import { randomUUID } from 'crypto'
import { mkdir, writeFile } from 'fs/promises'
import path from 'path'
import { DateTime } from 'luxon'
import { IndexRunResult, RunReport } from '../../shared/types'
import { FatalStartupError, describeError } from '../utils/errors'
import { marketNow } from '../utils/util'
import { ContractFilterService } from './ContractFilterService'
import { RunTally } from './RunTally'
import {
  ArchiveDelivery,
  ContractFetchCoordinator,
  ContractRow,
  FetchWindow,
  IndexProfile,
  RangeEstimator,
  SymbolMasterSource,
} from './types'

const SUMMARY_FAILED_LIMIT = 10

export interface ExpirySnapshotDeps {
  symbolMaster: SymbolMasterSource
  ranges: RangeEstimator
  filter: ContractFilterService
  coordinator: ContractFetchCoordinator
  delivery: ArchiveDelivery
  clock?: () => DateTime
  historyDays?: number
  outputDir?: string | null
  saveArchive?: (filePath: string, bytes: Buffer) => Promise<void>
}

async function saveToDisk(filePath: string, bytes: Buffer): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true })
  await writeFile(filePath, bytes)
}

export function archiveFilename(indexName: string, day: DateTime): string {
  return `${indexName}_expiry_${day.toFormat('ddMMyy')}_1min.zip`
}

// expiry − historyDays at the open through expiry's close
export function fetchWindowFor(expiry: DateTime, historyDays: number): FetchWindow {
  return {
    fromdate: `${expiry.minus({ days: historyDays }).toFormat('yyyy-MM-dd')} 09:15`,
    todate: `${expiry.toFormat('yyyy-MM-dd')} 15:30`,
  }
}

export class ExpirySnapshotService {
  private readonly clock: () => DateTime
  private readonly historyDays: number
  private readonly outputDir: string | null
  private readonly saveArchive: (filePath: string, bytes: Buffer) => Promise<void>

  constructor(private readonly deps: ExpirySnapshotDeps) {
    this.clock = deps.clock ?? marketNow
    this.historyDays = deps.historyDays ?? 90
    this.outputDir = deps.outputDir ?? null
    this.saveArchive = deps.saveArchive ?? saveToDisk
  }

  /**
   * Runs every index in order. A failure inside one index is logged and
   * recorded; only an unavailable symbol master stops the run.
   */
  async run(profiles: IndexProfile[]): Promise<RunReport> {
    const runId = randomUUID()
    const startedAt = new Date().toISOString()
    console.log(`🚀 Snapshot run ${runId}: ${profiles.map((p) => p.name).join(', ')}`)

    let master: ContractRow[]
    try {
      master = await this.deps.symbolMaster.load()
    } catch (error) {
      throw new FatalStartupError(`Symbol master unavailable: ${describeError(error)}`, { cause: error })
    }

    const tally = new RunTally()
    const indices: IndexRunResult[] = []

    for (const profile of profiles) {
      try {
        indices.push(await this.processIndex(profile, master, tally))
      } catch (error) {
        console.error(`❌ Error processing ${profile.name}:`, error)
        indices.push({ index: profile.name, state: 'failed', error: describeError(error) })
      }
    }

    this.logSummary(tally)

    return {
      runId,
      startedAt,
      finishedAt: new Date().toISOString(),
      indices,
      succeeded: tally.succeeded,
      failed: tally.failed,
    }
  }

  async processIndex(profile: IndexProfile, master: ContractRow[], tally: RunTally): Promise<IndexRunResult> {
    const index = profile.name
    const today = this.clock().startOf('day')
    const todayIso = today.toFormat('yyyy-MM-dd')
    console.log(`🔍 Processing ${index}...`)

    if (!this.deps.filter.isExpiryToday(master, index, todayIso)) {
      console.log(`📅 Not ${index} expiry day. Skipping.`)
      return { index, state: 'not-expiry' }
    }
    console.log(`✅ Today is ${index} expiry day: ${todayIso}`)

    const estimate = await this.deps.ranges.estimate(profile)
    if (estimate.status === 'unavailable') {
      console.error(`❌ Could not calculate strike range for ${index}: ${estimate.reason}`)
      return { index, state: 'range-unavailable', reason: estimate.reason }
    }
    const { range } = estimate
    console.log(`📊 ${index} strike range: ${range.low} to ${range.high}`)

    const contracts = this.deps.filter.selectContracts(master, index, todayIso, range, profile.strikeStep)
    if (contracts.length === 0) {
      console.warn(`⚠️ No option symbols found for ${index}`)
      return { index, state: 'no-contracts', range }
    }
    console.log(`📈 Found ${contracts.length} option symbols for ${index}`)

    const result = await this.deps.coordinator.run(contracts, fetchWindowFor(today, this.historyDays))
    tally.absorb(result.succeeded, result.failed)

    if (!result.archive) {
      console.warn(`⚠️ No data downloaded for ${index}`)
      return { index, state: 'no-data', range, contracts: contracts.length, failed: result.failed.length }
    }
    console.log(`✅ Downloaded ${result.succeeded.length} symbols for ${index}`)

    const filename = archiveFilename(index, today)
    const delivered = await this.deliver(result.archive, filename)
    const savedTo = await this.keepLocalCopy(result.archive, filename)

    return {
      index,
      state: 'archive-produced',
      range,
      contracts: contracts.length,
      succeeded: result.succeeded.length,
      failed: result.failed.length,
      filename,
      delivered,
      savedTo,
    }
  }

  private async deliver(archive: Buffer, filename: string): Promise<boolean> {
    try {
      return await this.deps.delivery.sendDocument(archive, filename)
    } catch (error) {
      console.error(`Delivery error for ${filename}: ${describeError(error)}`)
      return false
    }
  }

  private async keepLocalCopy(archive: Buffer, filename: string): Promise<string | null> {
    if (!this.outputDir) return null
    const filePath = path.join(this.outputDir, filename)
    try {
      await this.saveArchive(filePath, archive)
      console.log(`💾 Saved ${filePath} locally`)
      return filePath
    } catch (error) {
      console.error(`Could not save ${filePath}: ${describeError(error)}`)
      return null
    }
  }

  private logSummary(tally: RunTally): void {
    const failed = tally.failed
    console.log(`✅ Run completed. Success: ${tally.succeeded.length}, Failed: ${failed.length}`)
    if (failed.length === 0) return

    const shown = failed.slice(0, SUMMARY_FAILED_LIMIT).map((f) => f.symbol)
    console.warn(`Failed symbols: ${shown.join(', ')}`)
    if (failed.length > SUMMARY_FAILED_LIMIT) {
      console.warn(`... and ${failed.length - SUMMARY_FAILED_LIMIT} more`)
    }
  }
}
