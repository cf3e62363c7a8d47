// routes/snapshot.ts
import { Router } from 'express'
import { SnapshotJobService } from '../services/SnapshotJobService'

export function createSnapshotRouter(job: SnapshotJobService): Router {
  const router = Router()

  // Last run and whether one is in flight
  router.get('/status', (req, res) => {
    res.json(job.getStatus())
  })

  // Starts a run in the background
  router.post('/run', (req, res) => {
    const started = job.start()
    if (!started) {
      res.status(409).json({
        success: false,
        message: 'A snapshot run is already in progress',
      })
      return
    }
    res.status(202).json({
      success: true,
      message: 'Snapshot run started',
    })
  })

  return router
}
