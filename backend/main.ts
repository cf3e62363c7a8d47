#!/usr/bin/env node
// main.ts
import dotenv from 'dotenv'
import { loadSettings } from './config/settings'
import { startSnapshotCron } from './scheduler'
import { createApp } from './server'
import { createSnapshotJob } from './services'
import { describeError } from './utils/errors'

dotenv.config()

type Mode = 'run' | 'serve'

function parseMode(value: string | undefined): Mode {
  if (value === undefined || value === 'run') return 'run'
  if (value === 'serve') return 'serve'
  throw new Error(`Unknown mode "${value}" (expected "run" or "serve")`)
}

async function runOnce(): Promise<void> {
  const job = createSnapshotJob(loadSettings())
  const report = await job.run()
  const produced = report.indices.filter((r) => r.state === 'archive-produced').length
  console.log(`🏁 Run ${report.runId} finished: ${produced} archive(s) produced`)
}

function serve(): void {
  const settings = loadSettings()
  const job = createSnapshotJob(settings)

  startSnapshotCron(job, settings.cron)

  const app = createApp(job)
  app.listen(settings.port, () => {
    console.log(`🚀 Snapshot service listening on port ${settings.port}`)
  })
}

async function main(): Promise<void> {
  const mode = parseMode(process.argv[2])
  if (mode === 'serve') {
    serve()
    return
  }
  await runOnce()
}

if (require.main === module) {
  main().catch((error) => {
    console.error(`Fatal error: ${describeError(error)}`)
    if (error instanceof Error && error.stack) console.error(error.stack)
    process.exit(1)
  })
}
