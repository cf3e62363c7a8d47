// services/SnapshotJobService.ts
import { RunReport, SnapshotStatus } from '../../shared/types'
import { describeError } from '../utils/errors'

/**
 * Wraps one orchestration run for the cron trigger and the HTTP API so a run
 * already in flight is never started twice.
 */
export class SnapshotJobService {
  private inFlight: Promise<RunReport> | null = null
  private lastRunStartedAtMs: number | null = null
  private lastRunFinishedAtMs: number | null = null
  private lastRunError: string | null = null
  private lastReport: RunReport | null = null

  constructor(private readonly execute: () => Promise<RunReport>) {}

  isRunning(): boolean {
    return this.inFlight !== null
  }

  run(): Promise<RunReport> {
    if (this.inFlight) return this.inFlight

    this.lastRunStartedAtMs = Date.now()
    this.inFlight = this.execute()
      .then((report) => {
        this.lastReport = report
        this.lastRunError = null
        return report
      })
      .catch((error: unknown) => {
        this.lastRunError = describeError(error)
        throw error
      })
      .finally(() => {
        this.lastRunFinishedAtMs = Date.now()
        this.inFlight = null
      })
    return this.inFlight
  }

  /**
   * Fire-and-forget variant for triggers that do not wait for the report.
   * Returns false when a run is already in flight.
   */
  start(): boolean {
    if (this.inFlight) return false
    this.run().catch((error: unknown) => {
      console.error('Snapshot run failed:', describeError(error))
    })
    return true
  }

  getStatus(): SnapshotStatus {
    const lastRunStatus = this.inFlight
      ? 'running'
      : this.lastRunError
        ? 'error'
        : this.lastRunFinishedAtMs
          ? 'success'
          : 'idle'

    return {
      inFlight: this.inFlight !== null,
      lastRunStartedAt: this.lastRunStartedAtMs !== null ? new Date(this.lastRunStartedAtMs).toISOString() : null,
      lastRunFinishedAt: this.lastRunFinishedAtMs !== null ? new Date(this.lastRunFinishedAtMs).toISOString() : null,
      lastRunStatus,
      lastRunError: this.lastRunError,
      lastReport: this.lastReport,
    }
  }
}
