// backend/scheduler.ts
import cron, { ScheduledTask } from 'node-cron'
import { MARKET_ZONE } from './utils/util'
import { SnapshotJobService } from './services/SnapshotJobService'

export function startSnapshotCron(job: SnapshotJobService, expression: string): ScheduledTask {
  if (!cron.validate(expression)) {
    throw new Error(`Invalid cron expression: ${expression}`)
  }

  const task = cron.schedule(
    expression,
    () => {
      if (!job.start()) {
        console.warn('[SnapshotCron] Previous run still in flight, skipping')
      }
    },
    { timezone: MARKET_ZONE }
  )

  console.log(`[SnapshotCron] Scheduled "${expression}" (${MARKET_ZONE})`)
  return task
}
