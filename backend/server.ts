// server.ts
import express from 'express'
import cors from 'cors'
import { createSnapshotRouter } from './routes/snapshot'
import { SnapshotJobService } from './services/SnapshotJobService'

export function createApp(job: SnapshotJobService): express.Express {
  const app = express()

  app.use(cors())
  app.use(express.json())

  app.use('/api/snapshot', createSnapshotRouter(job))

  // Health check
  app.get('/api/health', (req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      message: 'Expiry snapshot service is running',
    })
  })

  app.use((err: Error, req: express.Request, res: express.Response, next: express.NextFunction) => {
    console.error('API Error:', err)
    res.status(500).json({
      success: false,
      error: 'Internal server error',
      message: err.message,
    })
  })

  return app
}
